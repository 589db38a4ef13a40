import { JobNotFailedError } from "../domain/errors";
import type { JobEvent, JobRecord, JobStage, NewJobInput, PipelineStage } from "../domain/types";
import type { JobListFilter, JobRepositoryPort, LoggerPort } from "../interfaces/ports";

export interface JobDependencies {
  repo: JobRepositoryPort;
  logger: LoggerPort;
}

export type JobStatus = "in_progress" | "complete" | "failed";

export interface JobSummary {
  id: string;
  stage: JobStage;
  status: JobStatus;
  sourceRef: string;
  title: string | null;
  attemptCount: number;
  failureStage: JobStage | null;
  targetStage: PipelineStage | null;
  lastError: string | null;
  updatedAt: string;
}

export interface JobDetail {
  job: JobRecord;
  status: JobStatus;
  history: JobEvent[];
}

export function statusOf(job: Pick<JobRecord, "stage">): JobStatus {
  if (job.stage === "PACKAGED") {
    return "complete";
  }
  if (job.stage === "FAILED") {
    return "failed";
  }
  return "in_progress";
}

export function summarizeJob(job: JobRecord): JobSummary {
  return {
    id: job.id,
    stage: job.stage,
    status: statusOf(job),
    sourceRef: job.payload.sourceRef,
    title: job.payload.title ?? null,
    attemptCount: job.attemptCount,
    failureStage: job.failureStage,
    targetStage: job.lastError?.targetStage ?? null,
    lastError: job.lastError?.message ?? null,
    updatedAt: job.updatedAt.toISOString()
  };
}

/** Entry point for discovery: registers a clip in DISCOVERED. */
export async function createJob(input: NewJobInput, deps: JobDependencies) {
  const id = await deps.repo.create(input);
  await deps.logger.info(id, `Discovered ${input.sourceRef}.`);
  return deps.repo.get(id);
}

export async function listJobs(filter: JobListFilter, deps: JobDependencies) {
  const jobs = await deps.repo.list(filter);
  return jobs.map(summarizeJob);
}

export async function inspectJob(jobId: string, deps: JobDependencies): Promise<JobDetail> {
  const job = await deps.repo.get(jobId);
  const history = await deps.repo.history(jobId);
  return { job, status: statusOf(job), history };
}

/**
 * Operator recovery: puts a FAILED job back at the stage it failed in with a
 * fresh attempt budget. Returns `reset: false` when a worker still holds a
 * live lease on it.
 */
export async function resetFailedJob(jobId: string, deps: JobDependencies) {
  const job = await deps.repo.get(jobId);
  if (job.stage !== "FAILED") {
    throw new JobNotFailedError(jobId, job.stage);
  }
  const reset = await deps.repo.resetFailed(jobId);
  if (reset) {
    await deps.logger.info(jobId, `Operator reset from FAILED to ${job.failureStage ?? "unknown"}.`);
  }
  return { reset, job: await deps.repo.get(jobId) };
}

export async function pipelineStatus(deps: JobDependencies) {
  return deps.repo.countByStage();
}
