export const FILE_STATUSES = [
  "pending",
  "processing",
  "indexed",
  "failed",
  "deleted",
] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

/**
 * Lifecycle row for one uploaded document
 */
export interface FileRecord {
  fileId: string;
  userId: string;
  fileName: string;
  status: FileStatus;
  blobKey: string;
  contentType: string;
  size: number;
  contentHash: string;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewFileRecord = Omit<
  FileRecord,
  "status" | "lastError" | "createdAt" | "updatedAt"
>;

/**
 * Queue payload. Delivered at least once.
 */
export interface IndexJob {
  fileId: string;
  userId: string;
  blobKey: string;
  fileName: string;
}

/**
 * One embedded chunk as stored in the vector index
 */
export interface VectorEntry {
  vector: number[];
  fileId: string;
  userId: string;
  fileName: string;
  chunkText: string;
  chunkOffset: number; // ordinal of the chunk inside its file
  pageNumber: number | null;
}

export interface ScoredVectorEntry extends Omit<VectorEntry, "vector"> {
  score: number;
}

export interface DeletedFile {
  record: FileRecord;
  priorStatus: FileStatus;
}
