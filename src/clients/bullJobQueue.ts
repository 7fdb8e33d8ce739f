import { Queue } from "bullmq";
import type Redis from "ioredis";

import type { IndexJob } from "../types/fileTypes";
import type { JobQueue } from "../types/providerTypes";

export const INDEX_JOB_NAME = "file-ready";

export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<IndexJob>;

  constructor(
    queueName: string,
    connection: Redis,
    private readonly attempts: number
  ) {
    this.queue = new Queue<IndexJob>(queueName, { connection });
  }

  async enqueue(job: IndexJob): Promise<void> {
    // redelivery with backoff is the only automatic retry for indexing
    await this.queue.add(INDEX_JOB_NAME, job, {
      attempts: this.attempts,
      backoff: { type: "exponential", delay: 5000 },
      removeOnComplete: true,
      removeOnFail: 1000,
    });
  }

  close(): Promise<void> {
    return this.queue.close();
  }
}

/**
 * Job payloads come from Redis; never trust their shape.
 */
export function parseIndexJob(data: unknown): IndexJob | null {
  if (!data || typeof data !== "object") return null;

  const fileId = "fileId" in data ? data.fileId : undefined;
  const userId = "userId" in data ? data.userId : undefined;
  const blobKey = "blobKey" in data ? data.blobKey : undefined;
  const fileName = "fileName" in data ? data.fileName : undefined;

  if (
    typeof fileId !== "string" ||
    !fileId ||
    typeof userId !== "string" ||
    !userId ||
    typeof blobKey !== "string" ||
    !blobKey ||
    typeof fileName !== "string"
  ) {
    return null;
  }
  return { fileId, userId, blobKey, fileName };
}
