import type { JobStage } from "./types";

export class PipelineError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Collaborator failure worth retrying: network trouble, busy resources, a temporary subprocess failure. */
export class TransientError extends PipelineError {
  constructor(message: string, code = "TRANSIENT", options?: { cause?: unknown }) {
    super(message, code, options);
  }
}

/** Collaborator failure that will not go away on retry: malformed input, unsupported media. */
export class FatalError extends PipelineError {
  constructor(message: string, code = "FATAL", options?: { cause?: unknown }) {
    super(message, code, options);
  }
}

export class CollaboratorTimeoutError extends PipelineError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
  }
}

export class StoreConflictError extends PipelineError {
  constructor(jobId: string, action: string) {
    super(`Stale ${action} for job ${jobId}: stage or lease changed underneath.`, "STORE_CONFLICT");
  }
}

export class NotFoundError extends PipelineError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found.`, "NOT_FOUND");
  }
}

export class DuplicateError extends PipelineError {
  constructor(jobId: string) {
    super(`Job ${jobId} already exists.`, "DUPLICATE");
  }
}

export class IllegalTransitionError extends PipelineError {
  constructor(from: JobStage, to: JobStage) {
    super(`Illegal stage transition ${from} -> ${to}.`, "ILLEGAL_TRANSITION");
  }
}

export class PayloadOwnershipError extends PipelineError {
  constructor(stage: JobStage, keys: string[]) {
    super(`Stage ${stage} may not write payload keys: ${keys.join(", ")}.`, "PAYLOAD_OWNERSHIP");
  }
}

export class JobNotFailedError extends PipelineError {
  constructor(jobId: string, stage: JobStage) {
    super(`Job ${jobId} is ${stage}; only FAILED jobs can be reset.`, "NOT_FAILED");
  }
}
