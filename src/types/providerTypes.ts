import type { IndexJob, ScoredVectorEntry, VectorEntry } from "./fileTypes";

export interface BlobStore {
  put(key: string, bytes: Buffer, contentType?: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
}

export interface JobQueue {
  enqueue(job: IndexJob): Promise<void>;
}

export interface VectorQueryFilter {
  userId: string;
  fileIds: string[];
}

export interface VectorIndex {
  upsert(collection: string, entries: VectorEntry[]): Promise<void>;
  query(
    collection: string,
    vector: number[],
    filter: VectorQueryFilter,
    topK: number
  ): Promise<ScoredVectorEntry[]>;
  delete(collection: string, filter: { fileId: string }): Promise<void>;
}

/**
 * Indexing and querying must use the same model: vectors of different
 * models are not comparable.
 */
export interface EmbeddingProvider {
  readonly modelId: string;
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export type PromptRole = "system" | "user" | "assistant";

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface GenerationProvider {
  readonly modelId: string;
  /** Finite, not restartable. Aborting `signal` ends the sequence. */
  generate(
    messages: PromptMessage[],
    options?: { signal?: AbortSignal }
  ): AsyncIterable<string>;
}
