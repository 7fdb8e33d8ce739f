// models/fileRecordModel.ts
import mongoose from "mongoose";
import { FILE_STATUSES, FileRecord } from "../../types/fileTypes";

const FileRecordSchema = new mongoose.Schema<FileRecord>(
  {
    fileId: {
      type: String,
      required: true,
      unique: true,
    }, // uuid
    userId: {
      type: String,
      required: true,
      index: true,
    },
    fileName: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: FILE_STATUSES,
      default: "pending",
      required: true,
    },
    blobKey: { type: String, required: true },
    contentType: { type: String, required: true },
    size: { type: Number, required: true },
    contentHash: { type: String, required: true, index: true },
    lastError: { type: String, default: null },
  },
  { timestamps: true }
);

// reconciliation sweep scans by status and age
FileRecordSchema.index({ status: 1, updatedAt: 1 });

const FileRecordModel = mongoose.model<FileRecord>(
  "FileRecord",
  FileRecordSchema
);

export default FileRecordModel;
