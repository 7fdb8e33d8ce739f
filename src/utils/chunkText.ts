import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import type { ExtractedPage } from "./extractText";

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface TextChunk {
  text: string;
  offset: number;
  pageNumber: number | null;
}

/**
 * Splits every page and numbers the chunks across the whole file.
 * Blank chunks are dropped.
 */
export async function chunkPages(
  pages: ExtractedPage[],
  { chunkSize, chunkOverlap }: ChunkOptions
): Promise<TextChunk[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap: Math.min(chunkOverlap, Math.max(0, chunkSize - 1)),
  });

  const chunks: TextChunk[] = [];
  for (const page of pages) {
    if (!page.text.trim()) continue;
    const parts = await splitter.splitText(page.text);
    for (const part of parts) {
      if (!part.trim()) continue;
      chunks.push({
        text: part,
        offset: chunks.length,
        pageNumber: page.pageNumber,
      });
    }
  }
  return chunks;
}
