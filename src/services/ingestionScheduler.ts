import { SourceBusyError } from "../domain/errors.js";
import { Logger, getLogger } from "../infra/log/logger.js";
import { IngestionJob } from "./ingestionWorkflow.js";

export type JobRunner = (job: IngestionJob) => Promise<unknown>;

/**
 * Bounded-concurrency queue of ingestion jobs. A source holds a slot from the moment
 * it is claimed until its job settles, so at most one run per source exists at a time.
 */
export class IngestionScheduler {
  private readonly claimed = new Set<string>();
  private readonly queue: IngestionJob[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly log: Logger;

  constructor(
    private readonly runJob: JobRunner,
    private readonly concurrency: number,
    logger: Logger = getLogger({ module: "scheduler" }),
  ) {
    this.log = logger;
  }

  isBusy(sourceId: string): boolean {
    return this.claimed.has(sourceId);
  }

  /**
   * Claims `sourceId`, awaits `prepare` and enqueues the job it returns. A null job
   * releases the claim without running anything.
   */
  async submit(
    sourceId: string,
    prepare: () => Promise<IngestionJob | null>,
  ): Promise<IngestionJob | null> {
    if (this.claimed.has(sourceId)) {
      throw new SourceBusyError(sourceId);
    }
    this.claimed.add(sourceId);

    let job: IngestionJob | null;
    try {
      job = await prepare();
    } catch (error) {
      this.release(sourceId);
      throw error;
    }
    if (!job) {
      this.release(sourceId);
      return null;
    }

    this.queue.push(job);
    this.drain();
    return job;
  }

  /** Resolves once nothing is queued or running. */
  whenIdle(): Promise<void> {
    if (this.claimed.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      this.running += 1;
      this.execute(job).catch((error: unknown) => {
        this.log.error({ err: error, sourceId: job.sourceId }, "scheduler bookkeeping failed");
      });
    }
  }

  private async execute(job: IngestionJob): Promise<void> {
    try {
      await this.runJob(job);
    } catch (error) {
      this.log.error({ err: error, sourceId: job.sourceId }, "ingestion job failed");
    } finally {
      this.running -= 1;
      this.release(job.sourceId);
      this.drain();
    }
  }

  private release(sourceId: string): void {
    this.claimed.delete(sourceId);
    if (this.claimed.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
