import express from "express";

import { fileApi, FileApiServices } from "../controllers/fileCtrl/fileApi";
import { requireUserId } from "../middi/userAuth";

export const fileRouter = (services: FileApiServices) => {
  const { uploadFiles, listFiles, filesStatus, getFile, removeFiles } =
    fileApi(services);

  const router = express.Router();

  router
    .route("/upload/files")
    .post(requireUserId, uploadFiles)
    .get(requireUserId, listFiles);

  router.route("/upload/files/status").get(requireUserId, filesStatus);

  router.route("/upload/files/:fileId").get(requireUserId, getFile);

  router.route("/upload/remove").post(requireUserId, removeFiles);

  return router;
};
