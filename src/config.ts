import "dotenv/config";
import os from "os";
import path from "path";

const num = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isFinite(parsed)
    ? parsed
    : fallback;
};

const _configEnv = {
  PORT: num(process.env.PORT, 3000),
  NODE_ENV: process.env.NODE_ENV || "development",
  CORS_ORIGINS: (process.env.CORS_ORIGINS || "http://localhost:3000")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean),

  MONGODB_URL: process.env.MONGODB_URL || "mongodb://localhost:27017/docchat",

  REDIS_URL: process.env.REDIS_URL,
  REDIS_HOST: process.env.REDIS_HOST || "localhost",
  REDIS_PORT: num(process.env.REDIS_PORT, 6379),
  REDIS_PASSWORD: process.env.REDIS_PASSWORD,
  QUEUE_NAME: process.env.QUEUE_NAME || "file-index-queue",
  WORKER_CONCURRENCY: num(process.env.WORKER_CONCURRENCY, 5),
  JOB_ATTEMPTS: num(process.env.JOB_ATTEMPTS, 5),

  QDRANT_URL: process.env.QDRANT_URL || "http://localhost:6333",
  API_KEY_QDRANT: process.env.API_KEY_QDRANT,
  VECTOR_COLLECTION: process.env.VECTOR_COLLECTION || "file-chunks",
  // must match EMBEDDING_MODEL's output size
  EMBEDDING_SIZE: num(process.env.EMBEDDING_SIZE, 1536),

  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || "text-embedding-3-small",
  CHAT_MODEL: process.env.CHAT_MODEL || "gpt-4o-mini",
  CHAT_MAX_TOKENS: num(process.env.CHAT_MAX_TOKENS, 1000),

  S3_BUCKET: process.env.S3_BUCKET,
  S3_REGION: process.env.S3_REGION || "us-east-1",
  S3_ENDPOINT: process.env.S3_ENDPOINT,
  LOCAL_FILES_PATH:
    process.env.LOCAL_FILES_PATH || path.join(os.tmpdir(), "rag-files"),
  MAX_UPLOAD_BYTES: num(process.env.MAX_UPLOAD_BYTES, 9 * 1024 * 1024),

  CHUNK_SIZE: num(process.env.CHUNK_SIZE, 1000),
  CHUNK_OVERLAP: num(process.env.CHUNK_OVERLAP, 250),
  RETRIEVAL_TOP_K: num(process.env.RETRIEVAL_TOP_K, 4),
  HISTORY_MAX_TOKENS: num(process.env.HISTORY_MAX_TOKENS, 4000),
  CONTEXT_MAX_TOKENS: num(process.env.CONTEXT_MAX_TOKENS, 8000),
  CHAT_HISTORY_TURNS: num(process.env.CHAT_HISTORY_TURNS, 30),

  PENDING_TIMEOUT_MS: num(process.env.PENDING_TIMEOUT_MS, 10 * 60 * 1000),
  PROCESSING_TIMEOUT_MS: num(process.env.PROCESSING_TIMEOUT_MS, 30 * 60 * 1000),
  SWEEP_INTERVAL_MS: num(process.env.SWEEP_INTERVAL_MS, 60 * 1000),
  SWEEP_BATCH_SIZE: num(process.env.SWEEP_BATCH_SIZE, 100),
};

export const configEnv = _configEnv;
export type ConfigEnv = typeof _configEnv;
