// worker.ts
import { Worker, Job } from "bullmq";

import { createServices } from "../bootstrap";
import { configEnv } from "../config";
import connectDB, { disconnectDB } from "../db";
import { createRedisConnection } from "../redis";
import { processIndexJob } from "./processIndexJob";

const startWorker = async () => {
  await connectDB();
  const services = createServices();

  // ---------- Worker ----------
  const worker = new Worker(
    configEnv.QUEUE_NAME,
    (job: Job) => processIndexJob(services.indexer, job.data, job.id),
    {
      connection: createRedisConnection(),
      concurrency: configEnv.WORKER_CONCURRENCY,
    }
  );

  worker.on("failed", (job, err) => {
    console.error(`Job ${job?.id} failed:`, err.message);
  });
  worker.on("error", (err) => {
    console.error("[Worker] error:", err.message);
  });

  services.reconciler.start(configEnv.SWEEP_INTERVAL_MS);
  console.log(
    `[Worker] listening on ${configEnv.QUEUE_NAME} (concurrency ${configEnv.WORKER_CONCURRENCY})`
  );

  const shutdown = async (signal: string) => {
    console.log(`[Worker] ${signal} received, shutting down`);
    try {
      await worker.close();
      await services.close();
      await disconnectDB();
      process.exit(0);
    } catch (err) {
      console.error("[Worker] shutdown failed:", err);
      process.exit(1);
    }
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
};

startWorker().catch((err) => {
  console.error("[Worker] failed to start:", err);
  process.exit(1);
});
