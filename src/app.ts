// src/app.ts

import express from "express";
import cors from "cors";
import fileUpload from "express-fileupload";

import { errorHandler } from "./middi/errorHandler";
import { fileRouter } from "./route/fileRoute";
import type { FileApiServices } from "./controllers/fileCtrl/fileApi";

export interface AppOptions {
  corsOrigins: string[];
  maxUploadBytes: number;
}

export const createApp = (services: FileApiServices, options: AppOptions) => {
  const app = express();
  app.set("trust proxy", true);

  // CORS
  app.use(
    cors({
      origin: options.corsOrigins,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "X-User-Id"],
      credentials: true,
      preflightContinue: false,
      optionsSuccessStatus: 204,
    })
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(
    fileUpload({
      limits: { fileSize: options.maxUploadBytes },
      abortOnLimit: true,
      responseOnLimit: "File too large",
      useTempFiles: false,
    })
  );

  // routes
  app.use("/", fileRouter(services));

  // health
  app.get("/", (req, res) =>
    res.status(200).json({ message: "App is working perfect" })
  );

  app.use(errorHandler);

  return app;
};
