import { v4 as uuidv4 } from "uuid";

import { AppError, asAppError, ErrorKind, errorMessage } from "../helper/appError";
import { isAllowedContentType, resolveContentType } from "../helper/contentTypes";
import { sha256Hex } from "../helper/hashing";
import { DuplicateFileIdError, StatusStore } from "./statusStore";
import type { FileRecord } from "../types/fileTypes";
import type { BlobStore, JobQueue } from "../types/providerTypes";

export interface UploadGatewayDeps {
  statusStore: StatusStore;
  blobStore: BlobStore;
  queue: JobQueue;
  maxBytes?: number;
  newId?: () => string;
}

export interface UploadInput {
  userId: string;
  bytes: Buffer;
  fileName: string;
  contentType?: string;
}

export const blobKeyFor = (userId: string, fileId: string) =>
  `files/${userId}/${fileId}`;

/**
 * Upload succeeds once blob and record are durable. Indexing is not
 * guaranteed here: a failed enqueue leaves the record `pending` for the
 * reconciliation sweep.
 */
export class UploadGateway {
  private readonly newId: () => string;

  constructor(private readonly deps: UploadGatewayDeps) {
    this.newId = deps.newId ?? uuidv4;
  }

  async upload(input: UploadInput): Promise<FileRecord> {
    const { name, type } = this.validate(input);
    const { userId, bytes } = input;

    const contentHash = sha256Hex(bytes);
    const record = await this.persist(userId, name, bytes, type, contentHash);

    try {
      await this.deps.queue.enqueue({
        fileId: record.fileId,
        userId: record.userId,
        blobKey: record.blobKey,
        fileName: record.fileName,
      });
      console.log("[Upload] queued", record.fileId, record.fileName);
    } catch (err) {
      // the record is committed; the sweep re-enqueues stale pending rows
      console.error(
        "[Upload] enqueue failed, left pending:",
        record.fileId,
        errorMessage(err)
      );
    }

    return record;
  }

  /**
   * Checks an upload without storing anything. Returns the trimmed file name
   * and the content type the file will be recorded with.
   */
  validate({ userId, bytes, fileName, contentType }: UploadInput): {
    name: string;
    type: string;
  } {
    const name = (fileName || "").trim();
    if (!userId || !userId.trim()) {
      throw new AppError(ErrorKind.InvalidInput, "user id is required");
    }
    if (!name) {
      throw new AppError(ErrorKind.InvalidInput, "file name is required");
    }
    if (!bytes || bytes.length === 0) {
      throw new AppError(ErrorKind.InvalidInput, `file is empty: ${name}`);
    }
    if (this.deps.maxBytes && bytes.length > this.deps.maxBytes) {
      throw new AppError(
        ErrorKind.InvalidInput,
        `file exceeds ${this.deps.maxBytes} bytes: ${name}`
      );
    }
    const type = resolveContentType(name, contentType);
    if (!isAllowedContentType(type)) {
      throw new AppError(
        ErrorKind.InvalidInput,
        `Invalid file type: ${name} (${type})`
      );
    }
    return { name, type };
  }

  private async persist(
    userId: string,
    fileName: string,
    bytes: Buffer,
    contentType: string,
    contentHash: string
  ): Promise<FileRecord> {
    let fileId = this.newId();
    let blobKey = await this.putBlob(userId, fileId, bytes, contentType);

    try {
      return await this.deps.statusStore.insert({
        fileId,
        userId,
        fileName,
        blobKey,
        contentType,
        size: bytes.length,
        contentHash,
      });
    } catch (err) {
      if (!(err instanceof DuplicateFileIdError)) {
        await this.discardBlob(blobKey);
        throw asAppError(err, ErrorKind.StorageUnavailable, "save file record");
      }
      console.warn("[Upload] duplicate fileId, regenerating:", fileId);
      await this.discardBlob(blobKey);
    }

    // one retry under a fresh identifier
    fileId = this.newId();
    blobKey = await this.putBlob(userId, fileId, bytes, contentType);
    try {
      return await this.deps.statusStore.insert({
        fileId,
        userId,
        fileName,
        blobKey,
        contentType,
        size: bytes.length,
        contentHash,
      });
    } catch (err) {
      await this.discardBlob(blobKey);
      throw new AppError(
        ErrorKind.StorageUnavailable,
        `save file record: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  private async putBlob(
    userId: string,
    fileId: string,
    bytes: Buffer,
    contentType: string
  ): Promise<string> {
    const key = blobKeyFor(userId, fileId);
    try {
      await this.deps.blobStore.put(key, bytes, contentType);
    } catch (err) {
      throw asAppError(err, ErrorKind.StorageUnavailable, "store file");
    }
    return key;
  }

  // orphan blobs are harmless; this is housekeeping only
  private async discardBlob(key: string): Promise<void> {
    try {
      await this.deps.blobStore.delete(key);
    } catch (err) {
      console.warn("[Upload] could not remove orphan blob:", key, errorMessage(err));
    }
  }
}
