import { QdrantClient } from "@qdrant/js-client-rest";

import { BullJobQueue } from "./clients/bullJobQueue";
import { LocalBlobStore } from "./clients/localBlobStore";
import {
  OpenAIEmbeddingProvider,
  OpenAIGenerationProvider,
} from "./clients/openAiProviders";
import { QdrantVectorIndex } from "./clients/qdrantVectorIndex";
import { S3BlobStore } from "./clients/s3BlobStore";
import { configEnv, ConfigEnv } from "./config";
import { createRedisConnection } from "./redis";
import { ChatSessionManager } from "./services/chatSessionManager";
import { FileDeleter } from "./services/fileDeleter";
import { Indexer } from "./services/indexer";
import { Reconciler } from "./services/reconciler";
import { MongoStatusStore } from "./services/statusStore";
import { UploadGateway } from "./services/uploadGateway";
import type { BlobStore } from "./types/providerTypes";

function createBlobStore(config: ConfigEnv): BlobStore {
  if (config.S3_BUCKET) {
    return new S3BlobStore({
      bucket: config.S3_BUCKET,
      region: config.S3_REGION,
      endpoint: config.S3_ENDPOINT,
    });
  }
  console.log("[Storage] S3_BUCKET not set, using", config.LOCAL_FILES_PATH);
  return new LocalBlobStore(config.LOCAL_FILES_PATH);
}

/**
 * Builds every service from configuration. The API and the worker process
 * share this; each uses the parts it needs.
 */
export function createServices(config: ConfigEnv = configEnv) {
  const connection = createRedisConnection();
  const statusStore = new MongoStatusStore();
  const blobStore = createBlobStore(config);
  const queue = new BullJobQueue(config.QUEUE_NAME, connection, config.JOB_ATTEMPTS);
  const vectorIndex = new QdrantVectorIndex(
    new QdrantClient({ url: config.QDRANT_URL, apiKey: config.API_KEY_QDRANT }),
    config.EMBEDDING_SIZE
  );
  const embeddings = new OpenAIEmbeddingProvider(
    config.OPENAI_API_KEY,
    config.EMBEDDING_MODEL
  );
  const generation = new OpenAIGenerationProvider(
    config.OPENAI_API_KEY,
    config.CHAT_MODEL,
    config.CHAT_MAX_TOKENS
  );
  const collection = config.VECTOR_COLLECTION;

  const uploadGateway = new UploadGateway({
    statusStore,
    blobStore,
    queue,
    maxBytes: config.MAX_UPLOAD_BYTES,
  });
  const deleter = new FileDeleter({ statusStore, blobStore, vectorIndex, collection });
  const indexer = new Indexer({
    statusStore,
    blobStore,
    vectorIndex,
    embeddings,
    collection,
    chunking: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
  });
  const reconciler = new Reconciler({
    statusStore,
    queue,
    vectorIndex,
    deleter,
    collection,
    pendingTimeoutMs: config.PENDING_TIMEOUT_MS,
    processingTimeoutMs: config.PROCESSING_TIMEOUT_MS,
    batchSize: config.SWEEP_BATCH_SIZE,
  });
  const chatManager = new ChatSessionManager({
    statusStore,
    vectorIndex,
    embeddings,
    generation,
    collection,
    topK: config.RETRIEVAL_TOP_K,
    limits: {
      historyMaxTokens: config.HISTORY_MAX_TOKENS,
      contextMaxTokens: config.CONTEXT_MAX_TOKENS,
    },
    maxTurns: config.CHAT_HISTORY_TURNS,
  });

  const close = async () => {
    reconciler.stop();
    chatManager.closeAll();
    await queue.close();
    await connection.quit();
  };

  return {
    statusStore,
    blobStore,
    queue,
    vectorIndex,
    uploadGateway,
    deleter,
    indexer,
    reconciler,
    chatManager,
    close,
  };
}

export type Services = ReturnType<typeof createServices>;
