// utils/tokens.ts
export function estimateTokens(text: string) {
  // quick heuristic: ~4 characters per token (depends on language)
  return Math.ceil(text.length / 4);
}

/**
 * Keeps the most recent messages that fit in `maxTokens`, oldest first.
 */
export function truncateToTokenLimit<T extends { content: string }>(
  messages: T[],
  maxTokens: number
): T[] {
  let total = 0;
  const out: T[] = [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    const t = estimateTokens(m.content);
    if (total + t > maxTokens) break;
    out.unshift(m);
    total += t;
  }
  return out;
}

