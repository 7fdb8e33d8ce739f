import { AppError, ErrorKind, errorMessage } from "../helper/appError";
import { resolveContentType } from "../helper/contentTypes";
import { chunkPages, ChunkOptions, TextChunk } from "../utils/chunkText";
import { extractText, TextExtractor } from "../utils/extractText";
import type { StatusStore } from "./statusStore";
import type { FileRecord, IndexJob, VectorEntry } from "../types/fileTypes";
import type {
  BlobStore,
  EmbeddingProvider,
  VectorIndex,
} from "../types/providerTypes";

export interface IndexerDeps {
  statusStore: StatusStore;
  blobStore: BlobStore;
  vectorIndex: VectorIndex;
  embeddings: EmbeddingProvider;
  collection: string;
  chunking: ChunkOptions;
  extract?: TextExtractor;
}

export type IndexOutcome = "indexed" | "failed" | "skipped" | "discarded";

class StepError extends Error {
  constructor(step: string, cause: unknown) {
    super(`${step}: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * Turns an IndexJob into vector entries. Safe to run several times for the
 * same file: only the worker that wins the pending -> processing claim does
 * any work.
 */
export class Indexer {
  private readonly extract: TextExtractor;

  constructor(private readonly deps: IndexerDeps) {
    this.extract = deps.extract ?? extractText;
  }

  async handle(job: IndexJob): Promise<IndexOutcome> {
    const { statusStore } = this.deps;

    // a store error here propagates so the transport redelivers the job
    const claimed = await statusStore.transition(
      job.fileId,
      ["pending"],
      "processing"
    );
    if (!claimed) {
      console.log("[Indexer] not pending, dropping duplicate job:", job.fileId);
      return "skipped";
    }

    console.log("[Indexer] started", job.fileId, job.fileName);
    let written = false;
    try {
      const entries = await this.buildEntries(claimed, job);

      try {
        written = true;
        await this.deps.vectorIndex.upsert(this.deps.collection, entries);
      } catch (err) {
        throw new StepError("write vectors", err);
      }

      const done = await statusStore.transition(
        job.fileId,
        ["processing"],
        "indexed",
        { lastError: null }
      );
      if (!done) {
        // deleted (or swept) while we were working: drop what we wrote
        console.warn("[Indexer] file no longer processing, discarding:", job.fileId);
        await this.removeVectors(job.fileId);
        return "discarded";
      }

      console.log(`[Indexer] indexed ${job.fileId}: ${entries.length} chunks`);
      return "indexed";
    } catch (err) {
      console.error("[Indexer] failed", job.fileId, errorMessage(err));
      if (written) await this.removeVectors(job.fileId);
      await this.markFailed(job.fileId, errorMessage(err));
      return "failed";
    }
  }

  private async buildEntries(
    record: FileRecord,
    job: IndexJob
  ): Promise<VectorEntry[]> {
    let bytes: Buffer;
    try {
      bytes = await this.deps.blobStore.get(job.blobKey);
    } catch (err) {
      throw new StepError("fetch blob", err);
    }

    const contentType =
      record.contentType || resolveContentType(job.fileName);
    let chunks: TextChunk[];
    try {
      const pages = await this.extract(bytes, contentType);
      chunks = await chunkPages(pages, this.deps.chunking);
    } catch (err) {
      throw new StepError("extract text", err);
    }
    if (chunks.length === 0) {
      throw new StepError("extract text", "no text content in file");
    }

    let vectors: number[][];
    try {
      vectors = await this.deps.embeddings.embedDocuments(
        chunks.map((c) => c.text)
      );
    } catch (err) {
      throw new StepError("embed chunks", err);
    }
    if (vectors.length !== chunks.length) {
      throw new StepError(
        "embed chunks",
        new AppError(
          ErrorKind.ProviderError,
          `expected ${chunks.length} vectors, got ${vectors.length}`
        )
      );
    }

    return chunks.map((chunk, i) => ({
      vector: vectors[i],
      fileId: job.fileId,
      userId: record.userId,
      fileName: record.fileName,
      chunkText: chunk.text,
      chunkOffset: chunk.offset,
      pageNumber: chunk.pageNumber,
    }));
  }

  private async removeVectors(fileId: string): Promise<void> {
    try {
      await this.deps.vectorIndex.delete(this.deps.collection, { fileId });
    } catch (err) {
      // chat drops hits of files that are not indexed
      console.error("[Indexer] vector cleanup failed:", fileId, errorMessage(err));
    }
  }

  private async markFailed(fileId: string, reason: string): Promise<void> {
    try {
      await this.deps.statusStore.transition(fileId, ["processing"], "failed", {
        lastError: reason,
      });
    } catch (err) {
      // the sweep moves rows stuck in processing to failed
      console.error("[Indexer] could not record failure:", fileId, errorMessage(err));
    }
  }
}
