import { Response } from "express";
import type { UploadedFile } from "express-fileupload";

import { AppError, ErrorKind } from "../../helper/appError";
import { sendError } from "../../middi/errorHandler";
import { UserRequest, userIdOf } from "../../middi/userAuth";
import type { FileDeleter } from "../../services/fileDeleter";
import type { StatusStore } from "../../services/statusStore";
import type { UploadGateway, UploadInput } from "../../services/uploadGateway";
import type { FileRecord } from "../../types/fileTypes";

export interface FileApiServices {
  uploadGateway: UploadGateway;
  statusStore: StatusStore;
  deleter: FileDeleter;
}

const toFileJson = (r: FileRecord) => ({
  file_id: r.fileId,
  file_name: r.fileName,
  status: r.status,
  content_type: r.contentType,
  size: r.size,
  content_hash: r.contentHash,
  last_error: r.lastError,
  created_at: r.createdAt,
  updated_at: r.updatedAt,
});

const STATUS_PAGE_SIZE = 100;

const positiveInt = (value: unknown, fallback: number) => {
  const n = parseInt(typeof value === "string" ? value : "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

function uploadedFiles(req: UserRequest): UploadedFile[] {
  const field = req.files?.file ?? req.files?.files;
  if (!field) return [];
  return Array.isArray(field) ? field : [field];
}

export const fileApi = ({ uploadGateway, statusStore, deleter }: FileApiServices) => {
  //======================== file upload ==============================
  const uploadFiles = async (req: UserRequest, res: Response) => {
    try {
      const userId = userIdOf(req);
      const files = uploadedFiles(req);
      if (files.length === 0) {
        throw new AppError(ErrorKind.InvalidInput, "Please provide a file");
      }

      const inputs: UploadInput[] = files.map((f) => ({
        userId,
        bytes: f.data,
        fileName: f.name,
        contentType: f.mimetype,
      }));
      // reject the whole request before storing anything
      inputs.forEach((input) => uploadGateway.validate(input));

      const saved: FileRecord[] = [];
      for (const input of inputs) {
        saved.push(await uploadGateway.upload(input));
      }

      return res.status(200).json({
        status: true,
        message: "File uploaded and queued",
        data: {
          files: saved.map((r) => ({
            file_id: r.fileId,
            file_path: r.blobKey,
            filename: r.fileName,
            status: r.status,
          })),
        },
      });
    } catch (err) {
      return sendError(res, err, "UPLOAD_ERR");
    }
  };

  //================ GET ALL UPLOADED FILES LIST =========================
  const listFiles = async (req: UserRequest, res: Response) => {
    try {
      const userId = userIdOf(req);
      const page = positiveInt(req.query.page, 1);
      const limit = Math.min(100, positiveInt(req.query.limit, 10));
      const q = typeof req.query.q === "string" ? req.query.q : "";

      const { records, total } = await statusStore.listByUser(userId, {
        page,
        limit,
        q,
      });

      return res.status(200).json({
        status: true,
        data: records.map(toFileJson),
        meta: { page, limit, total, totalPages: Math.ceil(total / limit) },
      });
    } catch (err) {
      return sendError(res, err, "GET_USER_FILES_ERR");
    }
  };

  const filesStatus = async (req: UserRequest, res: Response) => {
    try {
      const userId = userIdOf(req);
      const records: FileRecord[] = [];
      for (let page = 1; ; page++) {
        const batch = await statusStore.listByUser(userId, {
          page,
          limit: STATUS_PAGE_SIZE,
        });
        records.push(...batch.records);
        if (batch.records.length === 0 || records.length >= batch.total) break;
      }
      return res.status(200).json({
        status: true,
        data: records.map((r) => ({
          file_id: r.fileId,
          file_name: r.fileName,
          status: r.status,
        })),
      });
    } catch (err) {
      return sendError(res, err, "GET_FILES_STATUS_ERR");
    }
  };

  //================ single file =========================
  const getFile = async (req: UserRequest, res: Response) => {
    try {
      const userId = userIdOf(req);
      const record = await statusStore.findOne(userId, req.params.fileId);
      if (!record) {
        throw new AppError(ErrorKind.NotFound, "File not found");
      }
      return res.status(200).json({ status: true, data: toFileJson(record) });
    } catch (err) {
      return sendError(res, err, "GET_FILE_ERR");
    }
  };

  //================ delete =========================
  const removeFiles = async (req: UserRequest, res: Response) => {
    try {
      const userId = userIdOf(req);
      const body: unknown = req.body;
      const ids =
        body && typeof body === "object" && "file_ids" in body
          ? body.file_ids
          : undefined;
      if (
        !Array.isArray(ids) ||
        ids.length === 0 ||
        !ids.every((id): id is string => typeof id === "string" && id.length > 0)
      ) {
        throw new AppError(ErrorKind.InvalidInput, "file_ids must be a non-empty list");
      }

      const result = await deleter.deleteFiles(userId, ids);
      return res.status(200).json({
        status: true,
        message: "Files deleted",
        data: {
          deleted: result.deleted.map((d) => ({
            file_id: d.fileId,
            prior_status: d.priorStatus,
          })),
          not_found: result.notFound,
        },
      });
    } catch (err) {
      return sendError(res, err, "DELETE_FILES_ERR");
    }
  };

  return { uploadFiles, listFiles, filesStatus, getFile, removeFiles };
};
