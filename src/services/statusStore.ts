import mongoose from "mongoose";
import FileRecordModel from "../model/fileModel/fileRecordModel";
import { asAppError, ErrorKind } from "../helper/appError";
import type {
  DeletedFile,
  FileRecord,
  FileStatus,
  NewFileRecord,
} from "../types/fileTypes";

export class DuplicateFileIdError extends Error {
  constructor(readonly fileId: string) {
    super(`fileId already exists: ${fileId}`);
    this.name = "DuplicateFileIdError";
  }
}

export interface ListOptions {
  page: number;
  limit: number;
  q?: string;
}

/**
 * Single source of truth for file lifecycle state. Every status change is a
 * compare-and-swap on the current status; a `null` result means no row
 * matched and the caller lost the race (or the file is gone).
 */
export interface StatusStore {
  insert(record: NewFileRecord): Promise<FileRecord>;
  transition(
    fileId: string,
    from: FileStatus[],
    to: FileStatus,
    patch?: { lastError?: string | null }
  ): Promise<FileRecord | null>;
  /** Marks the user's files `deleted` and reports the status each had before. */
  markDeleted(userId: string, fileIds: string[]): Promise<DeletedFile[]>;
  /** Removes a `deleted` record once its vectors and blob are gone. */
  purge(fileId: string): Promise<boolean>;
  findByIds(fileIds: string[]): Promise<FileRecord[]>;
  findOne(userId: string, fileId: string): Promise<FileRecord | null>;
  listByUser(
    userId: string,
    options: ListOptions
  ): Promise<{ records: FileRecord[]; total: number }>;
  findStale(
    status: FileStatus,
    olderThan: Date,
    limit: number
  ): Promise<FileRecord[]>;
}

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const isDuplicateKey = (err: unknown) =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

const toRecord = (doc: FileRecord): FileRecord => ({
  fileId: doc.fileId,
  userId: doc.userId,
  fileName: doc.fileName,
  status: doc.status,
  blobKey: doc.blobKey,
  contentType: doc.contentType,
  size: doc.size,
  contentHash: doc.contentHash,
  lastError: doc.lastError ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoStatusStore implements StatusStore {
  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw asAppError(err, ErrorKind.StorageUnavailable, context);
    }
  }

  async insert(record: NewFileRecord): Promise<FileRecord> {
    try {
      const created = await FileRecordModel.create({
        ...record,
        status: "pending",
        lastError: null,
      });
      return toRecord(created.toObject());
    } catch (err) {
      if (isDuplicateKey(err)) throw new DuplicateFileIdError(record.fileId);
      throw asAppError(err, ErrorKind.StorageUnavailable, "insert file record");
    }
  }

  transition(
    fileId: string,
    from: FileStatus[],
    to: FileStatus,
    patch: { lastError?: string | null } = {}
  ): Promise<FileRecord | null> {
    return this.run(`transition ${fileId} -> ${to}`, async () => {
      const doc = await FileRecordModel.findOneAndUpdate(
        { fileId, status: { $in: from } },
        { $set: { status: to, ...patch } },
        { new: true }
      ).lean<FileRecord | null>();
      return doc ? toRecord(doc) : null;
    });
  }

  markDeleted(userId: string, fileIds: string[]): Promise<DeletedFile[]> {
    return this.run("mark files deleted", async () => {
      const out: DeletedFile[] = [];
      for (const fileId of fileIds) {
        // new: false returns the row as it was before the update
        const prior = await FileRecordModel.findOneAndUpdate(
          { fileId, userId, status: { $ne: "deleted" } },
          { $set: { status: "deleted" } },
          { new: false }
        ).lean<FileRecord | null>();
        if (prior) {
          out.push({
            record: { ...toRecord(prior), status: "deleted" },
            priorStatus: prior.status,
          });
        }
      }
      return out;
    });
  }

  purge(fileId: string): Promise<boolean> {
    return this.run(`purge ${fileId}`, async () => {
      const res = await FileRecordModel.deleteOne({ fileId, status: "deleted" });
      return res.deletedCount > 0;
    });
  }

  findByIds(fileIds: string[]): Promise<FileRecord[]> {
    return this.run("find files by id", async () => {
      if (fileIds.length === 0) return [];
      const docs = await FileRecordModel.find({
        fileId: { $in: fileIds },
      }).lean<FileRecord[]>();
      return docs.map(toRecord);
    });
  }

  findOne(userId: string, fileId: string): Promise<FileRecord | null> {
    return this.run(`find ${fileId}`, async () => {
      const doc = await FileRecordModel.findOne({
        fileId,
        userId,
        status: { $ne: "deleted" },
      }).lean<FileRecord | null>();
      return doc ? toRecord(doc) : null;
    });
  }

  listByUser(
    userId: string,
    { page, limit, q }: ListOptions
  ): Promise<{ records: FileRecord[]; total: number }> {
    return this.run("list files", async () => {
      const filter: mongoose.FilterQuery<FileRecord> = {
        userId,
        status: { $ne: "deleted" },
      };
      if (q && q.trim().length > 0) {
        filter.fileName = { $regex: escapeRegex(q.trim()), $options: "i" };
      }

      const total = await FileRecordModel.countDocuments(filter);
      const docs = await FileRecordModel.find(filter)
        .sort({ createdAt: -1 })
        .skip((page - 1) * limit)
        .limit(limit)
        .lean<FileRecord[]>();

      return { records: docs.map(toRecord), total };
    });
  }

  findStale(
    status: FileStatus,
    olderThan: Date,
    limit: number
  ): Promise<FileRecord[]> {
    return this.run(`find stale ${status}`, async () => {
      const docs = await FileRecordModel.find({
        status,
        updatedAt: { $lt: olderThan },
      })
        .sort({ updatedAt: 1 })
        .limit(limit)
        .lean<FileRecord[]>();
      return docs.map(toRecord);
    });
  }
}
