import { estimateTokens, truncateToTokenLimit } from "./token";
import type { ChatTurn } from "../types/chatSessionTypes";
import type { ScoredVectorEntry } from "../types/fileTypes";
import type { PromptMessage } from "../types/providerTypes";

//========================================SYSTEM PROMPT ===========================

export const SYSTEM_INSTRUCTIONS = `You are an assistant that answers like a knowledgeable, practical friend. Follow these rules.

1) Use the document contexts when they are available.
   - Treat the contexts as facts. Use only the provided contexts to support factual claims about the documents.
   - Cite passages inline using the reference in brackets, for example [Source 2, report.pdf p.5].
   - Start with a one or two sentence summary, then give the full answer.

2) If the provided contexts do not contain relevant information:
   - Say, "I do not see relevant document context; answering from general knowledge."
   - Then answer clearly and directly from general knowledge.

3) If the documents do not provide enough information to answer confidently:
   - Say you do not have enough information, do not invent facts, and ask one short, focused clarifying question.

4) Keep the tone professional, conversational, and direct. If giving steps, number them.

Be concise, useful, and human.`;

export interface PromptLimits {
  historyMaxTokens: number;
  contextMaxTokens: number;
}

export const citationLabel = (entry: ScoredVectorEntry, index: number) =>
  `[Source ${index + 1}, ${entry.fileName}${
    entry.pageNumber != null ? ` p.${entry.pageNumber}` : ""
  }]`;

/**
 * Context block with citations. Passages are added best-first until the
 * token budget is spent; the first one is always kept, cut to fit.
 */
export function formatContexts(
  entries: ScoredVectorEntry[],
  maxTokens: number
): string {
  const blocks: string[] = [];
  let used = 0;
  entries.forEach((entry, i) => {
    const block = `${citationLabel(entry, i)}:\n${entry.chunkText}`;
    const cost = estimateTokens(block);
    if (used + cost <= maxTokens) {
      blocks.push(block);
      used += cost;
    } else if (blocks.length === 0) {
      blocks.push(block.slice(0, maxTokens * 4));
      used = maxTokens;
    }
  });
  return blocks.join("\n\n---\n\n");
}

export function buildPromptMessages(
  question: string,
  contexts: ScoredVectorEntry[],
  history: ChatTurn[],
  limits: PromptLimits
): PromptMessage[] {
  const pastMessages: PromptMessage[] = history.flatMap((turn) => [
    { role: "user" as const, content: turn.question },
    { role: "assistant" as const, content: turn.answer },
  ]);
  const recent = truncateToTokenLimit(pastMessages, limits.historyMaxTokens);
  // never open the window on a dangling assistant reply
  if (recent.length > 0 && recent[0].role === "assistant") recent.shift();

  const contextText =
    contexts.length > 0
      ? `Document contexts (only use them as facts):\n${formatContexts(
          contexts,
          limits.contextMaxTokens
        )}`
      : "Document contexts: none available for this question.";

  return [
    { role: "system", content: SYSTEM_INSTRUCTIONS },
    ...recent,
    { role: "system", content: contextText },
    { role: "user", content: question },
  ];
}
