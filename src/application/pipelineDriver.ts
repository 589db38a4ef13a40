import { randomUUID } from "node:crypto";
import os from "node:os";
import { StoreConflictError } from "../domain/errors";
import { isRunnable, RUNNABLE_STAGES } from "../domain/stages";
import type { JobError, JobRecord, PipelineStage, StageResult } from "../domain/types";
import type { ClockPort, JobRepositoryPort, LoggerPort } from "../interfaces/ports";
import { backoffDelayMs, isExhausted, type RetryPolicy } from "./retryPolicy";
import type { StageExecutor } from "./stageExecutor";

export interface PipelineDriverOptions {
  batchSize: number;
  concurrency: number;
  leaseTtlMs: number;
  pollIntervalMs: number;
  retry: RetryPolicy;
  holderId?: string;
}

export interface DriverDependencies {
  repo: JobRepositoryPort;
  executor: StageExecutor;
  logger: LoggerPort;
  clock?: ClockPort;
  random?: () => number;
}

export interface IterationSummary {
  fetched: number;
  leased: number;
  advanced: number;
  retried: number;
  failed: number;
  conflicts: number;
  errors: number;
}

const emptySummary = (): IterationSummary => ({
  fetched: 0,
  leased: 0,
  advanced: 0,
  retried: 0,
  failed: 0,
  conflicts: 0,
  errors: 0
});

function accumulate(total: IterationSummary, summary: IterationSummary) {
  total.fetched += summary.fetched;
  total.leased += summary.leased;
  total.advanced += summary.advanced;
  total.retried += summary.retried;
  total.failed += summary.failed;
  total.conflicts += summary.conflicts;
  total.errors += summary.errors;
}

export function defaultHolderId() {
  return `${os.hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
}

export class PipelineDriver {
  readonly holderId: string;
  private readonly clock: ClockPort;
  private readonly random: () => number;
  private loop: Promise<void> | null = null;
  private stopping = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly deps: DriverDependencies,
    private readonly options: PipelineDriverOptions
  ) {
    this.holderId = options.holderId ?? defaultHolderId();
    this.clock = deps.clock ?? { now: () => new Date() };
    this.random = deps.random ?? Math.random;
  }

  /**
   * One fetch/dispatch cycle. Each lane leases a candidate only when it is
   * about to run it, so a job queued behind others never holds a lease.
   */
  async runOnce(): Promise<IterationSummary> {
    const summary = emptySummary();
    const candidates = await this.deps.repo.listRunnable(RUNNABLE_STAGES, this.options.batchSize);
    summary.fetched = candidates.length;

    await runPool(candidates, this.options.concurrency, async (candidate) => {
      const job = await this.acquire(candidate.id);
      if (!job) {
        return;
      }
      summary.leased += 1;
      await this.process(job, summary);
    });
    return summary;
  }

  /** Runs iterations until one leases nothing, or `maxIterations` is reached. */
  async drain(maxIterations = 100): Promise<IterationSummary> {
    const total = emptySummary();
    for (let i = 0; i < maxIterations; i += 1) {
      const summary = await this.runOnce();
      accumulate(total, summary);
      if (summary.leased === 0) {
        break;
      }
    }
    return total;
  }

  start() {
    if (this.loop) {
      return;
    }
    this.stopping = false;
    this.loop = this.runLoop();
  }

  /** Stops polling and waits for jobs already dispatched to finish. */
  async stop() {
    this.stopping = true;
    this.wake?.();
    await this.loop;
    this.loop = null;
  }

  get running() {
    return this.loop !== null && !this.stopping;
  }

  private async runLoop() {
    while (!this.stopping) {
      let busy = false;
      try {
        const summary = await this.runOnce();
        busy = summary.leased > 0;
      } catch (error) {
        console.error("Pipeline iteration failed", error);
      }
      if (!busy && !this.stopping) {
        await this.sleep(this.options.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number) {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  /** Leases a job and re-reads it, so work starts from the stage actually stored. */
  private async acquire(jobId: string): Promise<JobRecord | null> {
    const { repo } = this.deps;
    if (!(await repo.lease(jobId, this.holderId, this.options.leaseTtlMs))) {
      return null;
    }
    const job = await repo.find(jobId);
    if (!job || !isRunnable(job.stage)) {
      await repo.release(jobId, this.holderId);
      return null;
    }
    return job;
  }

  private async process(job: JobRecord, summary: IterationSummary) {
    const { repo, logger } = this.deps;
    try {
      const result = await this.deps.executor.execute(job);
      await this.apply(job, result, summary);
    } catch (error) {
      if (error instanceof StoreConflictError) {
        summary.conflicts += 1;
        await logger.warn(job.id, error.message);
      } else {
        summary.errors += 1;
        const message = error instanceof Error ? error.message : "Unknown error";
        await logger.error(job.id, `Driver error at ${job.stage}: ${message}`);
      }
    } finally {
      await repo.release(job.id, this.holderId);
    }
  }

  private async apply(job: JobRecord, result: StageResult, summary: IterationSummary) {
    const { repo, logger } = this.deps;
    const stage = currentStage(job);

    if (result.kind === "advanced") {
      const ok = await repo.compareAndAdvance(job.id, this.holderId, stage, result.nextStage, result.patch);
      if (!ok) {
        throw new StoreConflictError(job.id, "advance");
      }
      summary.advanced += 1;
      await logger.info(job.id, `${stage} -> ${result.nextStage}`);
      return;
    }

    if (result.kind === "fatal") {
      await this.fail(job.id, stage, result.error);
      summary.failed += 1;
      await logger.error(job.id, `${result.error.operation} failed permanently: ${result.error.message}`);
      return;
    }

    const attempt = job.attemptCount + 1;
    if (isExhausted(attempt, this.options.retry)) {
      await this.fail(job.id, stage, { ...result.error, kind: "retries_exhausted", attempt });
      summary.failed += 1;
      await logger.error(
        job.id,
        `${result.error.operation} failed ${attempt} times, giving up: ${result.error.message}`
      );
      return;
    }

    const delay = backoffDelayMs(attempt, this.options.retry, this.random);
    const availableAt = new Date(this.clock.now().getTime() + delay);
    const ok = await repo.recordRetry(job.id, this.holderId, stage, { ...result.error, attempt }, availableAt);
    if (!ok) {
      throw new StoreConflictError(job.id, "retry");
    }
    summary.retried += 1;
    await logger.warn(
      job.id,
      `${result.error.operation} attempt ${attempt} failed, retrying in ${delay}ms: ${result.error.message}`
    );
  }

  private async fail(jobId: string, stage: PipelineStage, error: JobError) {
    const ok = await this.deps.repo.markFailed(jobId, this.holderId, stage, error);
    if (!ok) {
      throw new StoreConflictError(jobId, "failure");
    }
  }
}

function currentStage(job: JobRecord): PipelineStage {
  if (job.stage === "FAILED") {
    throw new Error(`Job ${job.id} is FAILED and cannot be applied to.`);
  }
  return job.stage;
}

async function runPool<T>(items: T[], size: number, worker: (item: T) => Promise<void>) {
  let next = 0;
  const lanes = Array.from({ length: Math.min(Math.max(1, size), items.length) }, async () => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      await worker(item);
    }
  });
  await Promise.all(lanes);
}
