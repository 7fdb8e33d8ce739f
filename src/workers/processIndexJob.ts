import type { Indexer, IndexOutcome } from "../services/indexer";
import { parseIndexJob } from "../clients/bullJobQueue";

/**
 * Payloads that fail validation are dropped: redelivering them cannot help.
 */
export async function processIndexJob(
  indexer: Indexer,
  data: unknown,
  jobId?: string
): Promise<IndexOutcome | "invalid"> {
  const job = parseIndexJob(data);
  if (!job) {
    console.error("[Worker] invalid job payload, dropping:", jobId);
    return "invalid";
  }
  return indexer.handle(job);
}
