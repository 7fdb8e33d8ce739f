import { errorMessage } from "../helper/appError";
import type { FileDeleter } from "./fileDeleter";
import type { StatusStore } from "./statusStore";
import type { JobQueue, VectorIndex } from "../types/providerTypes";

export interface ReconcilerDeps {
  statusStore: StatusStore;
  queue: JobQueue;
  vectorIndex: VectorIndex;
  deleter: FileDeleter;
  collection: string;
  pendingTimeoutMs: number;
  processingTimeoutMs: number;
  batchSize: number;
  now?: () => Date;
}

export interface SweepReport {
  requeued: number;
  timedOut: number;
  purged: number;
}

/**
 * Periodic repair of records the happy path left behind:
 *  - pending too long (enqueue failed)      -> enqueue again
 *  - processing too long (worker died)      -> failed, vectors removed
 *  - deleted but not purged (cleanup failed) -> cleanup again
 */
export class Reconciler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly deps: ReconcilerDeps) {}

  private now() {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async sweep(): Promise<SweepReport> {
    const report: SweepReport = { requeued: 0, timedOut: 0, purged: 0 };
    const { statusStore, batchSize } = this.deps;
    const now = this.now().getTime();

    const stalePending = await statusStore.findStale(
      "pending",
      new Date(now - this.deps.pendingTimeoutMs),
      batchSize
    );
    for (const record of stalePending) {
      // same-state CAS bumps updatedAt so the row waits another full timeout
      const touched = await statusStore.transition(record.fileId, ["pending"], "pending");
      if (!touched) continue;
      try {
        await this.deps.queue.enqueue({
          fileId: record.fileId,
          userId: record.userId,
          blobKey: record.blobKey,
          fileName: record.fileName,
        });
        report.requeued++;
      } catch (err) {
        console.error("[Sweep] re-enqueue failed:", record.fileId, errorMessage(err));
      }
    }

    const staleProcessing = await statusStore.findStale(
      "processing",
      new Date(now - this.deps.processingTimeoutMs),
      batchSize
    );
    for (const record of staleProcessing) {
      const failed = await statusStore.transition(
        record.fileId,
        ["processing"],
        "failed",
        { lastError: "indexing timed out" }
      );
      if (!failed) continue;
      report.timedOut++;
      try {
        await this.deps.vectorIndex.delete(this.deps.collection, {
          fileId: record.fileId,
        });
      } catch (err) {
        console.error("[Sweep] vector cleanup failed:", record.fileId, errorMessage(err));
      }
    }

    // deleted rows are purged right away unless cleanup failed, so any age will do
    const leftovers = await statusStore.findStale("deleted", new Date(now), batchSize);
    for (const record of leftovers) {
      if (await this.deps.deleter.cleanup(record)) report.purged++;
    }

    if (report.requeued || report.timedOut || report.purged) {
      console.log("[Sweep]", report);
    }
    return report;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = true;
      this.sweep()
        .catch((err) => console.error("[Sweep] failed:", errorMessage(err)))
        .finally(() => {
          this.running = false;
        });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
