import { errorMessage } from "../helper/appError";
import type { StatusStore } from "./statusStore";
import type { FileRecord, FileStatus } from "../types/fileTypes";
import type { BlobStore, VectorIndex } from "../types/providerTypes";

export interface FileDeleterDeps {
  statusStore: StatusStore;
  blobStore: BlobStore;
  vectorIndex: VectorIndex;
  collection: string;
}

export interface DeleteResult {
  deleted: Array<{ fileId: string; priorStatus: FileStatus; purged: boolean }>;
  notFound: string[];
}

export class FileDeleter {
  constructor(private readonly deps: FileDeleterDeps) {}

  /**
   * Marks the files deleted, then removes their vectors and blobs. A record
   * whose cleanup fails stays `deleted` (never queryable) and is retried by
   * the sweep.
   */
  async deleteFiles(userId: string, fileIds: string[]): Promise<DeleteResult> {
    const unique = [...new Set(fileIds)];
    const marked = await this.deps.statusStore.markDeleted(userId, unique);

    const result: DeleteResult = { deleted: [], notFound: [] };
    const seen = new Set(marked.map((m) => m.record.fileId));
    result.notFound = unique.filter((id) => !seen.has(id));

    for (const { record, priorStatus } of marked) {
      const purged = await this.cleanup(record);
      result.deleted.push({ fileId: record.fileId, priorStatus, purged });
    }

    console.log(
      `[Delete] user ${userId}: ${result.deleted.length} deleted, ${result.notFound.length} not found`
    );
    return result;
  }

  async cleanup(record: FileRecord): Promise<boolean> {
    try {
      await this.deps.vectorIndex.delete(this.deps.collection, {
        fileId: record.fileId,
      });
      await this.deps.blobStore.delete(record.blobKey);
      return await this.deps.statusStore.purge(record.fileId);
    } catch (err) {
      console.error("[Delete] cleanup failed, will retry:", record.fileId, errorMessage(err));
      return false;
    }
  }
}
