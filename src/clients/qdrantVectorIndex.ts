import { QdrantClient } from "@qdrant/js-client-rest";
import { v5 as uuidv5 } from "uuid";

import ensureQdrantCollection from "../utils/ensureQdrantCollection";
import type { ScoredVectorEntry, VectorEntry } from "../types/fileTypes";
import type { VectorIndex, VectorQueryFilter } from "../types/providerTypes";

// fixed namespace: the same (fileId, chunkOffset) always maps to the same point
const POINT_NAMESPACE = "8f5b6c3e-2d7a-4e1b-9c0f-3a6d2e8b7f41";

export const pointIdFor = (fileId: string, chunkOffset: number) =>
  uuidv5(`${fileId}:${chunkOffset}`, POINT_NAMESPACE);

type Payload = Record<string, unknown> | null | undefined;

function toEntry(payload: Payload, score: number): ScoredVectorEntry | null {
  if (!payload) return null;
  const { fileId, userId, fileName, chunkText, chunkOffset, pageNumber } = payload;
  if (
    typeof fileId !== "string" ||
    typeof userId !== "string" ||
    typeof chunkText !== "string" ||
    typeof chunkOffset !== "number"
  ) {
    return null;
  }
  return {
    fileId,
    userId,
    fileName: typeof fileName === "string" ? fileName : "",
    chunkText,
    chunkOffset,
    pageNumber: typeof pageNumber === "number" ? pageNumber : null,
    score,
  };
}

export class QdrantVectorIndex implements VectorIndex {
  private readonly ready = new Map<string, Promise<void>>();

  constructor(
    private readonly client: QdrantClient,
    private readonly vectorSize: number
  ) {}

  private ensure(collection: string): Promise<void> {
    let pending = this.ready.get(collection);
    if (!pending) {
      pending = ensureQdrantCollection(this.client, collection, this.vectorSize);
      // retry on the next call if creation failed
      pending.catch(() => this.ready.delete(collection));
      this.ready.set(collection, pending);
    }
    return pending;
  }

  async upsert(collection: string, entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.ensure(collection);
    await this.client.upsert(collection, {
      wait: true,
      points: entries.map((e) => ({
        id: pointIdFor(e.fileId, e.chunkOffset),
        vector: e.vector,
        payload: {
          fileId: e.fileId,
          userId: e.userId,
          fileName: e.fileName,
          chunkText: e.chunkText,
          chunkOffset: e.chunkOffset,
          pageNumber: e.pageNumber,
        },
      })),
    });
  }

  async query(
    collection: string,
    vector: number[],
    { userId, fileIds }: VectorQueryFilter,
    topK: number
  ): Promise<ScoredVectorEntry[]> {
    if (fileIds.length === 0) return [];
    await this.ensure(collection);
    const hits = await this.client.search(collection, {
      vector,
      limit: topK,
      with_payload: true,
      filter: {
        must: [
          { key: "userId", match: { value: userId } },
          { key: "fileId", match: { any: fileIds } },
        ],
      },
    });

    const out: ScoredVectorEntry[] = [];
    for (const hit of hits) {
      const entry = toEntry(hit.payload, hit.score);
      // never hand back another user's chunk
      if (entry && entry.userId === userId && fileIds.includes(entry.fileId)) {
        out.push(entry);
      }
    }
    return out;
  }

  async delete(collection: string, { fileId }: { fileId: string }): Promise<void> {
    await this.ensure(collection);
    await this.client.delete(collection, {
      wait: true,
      filter: { must: [{ key: "fileId", match: { value: fileId } }] },
    });
  }
}
