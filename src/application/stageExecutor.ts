import { CollaboratorTimeoutError, FatalError, IllegalTransitionError } from "../domain/errors";
import type { CollaboratorOperation, JobRecord, PayloadPatch, PipelineStage, StageResult } from "../domain/types";
import type { CollaboratorContext, Collaborators } from "../interfaces/ports";
import { classifyFailure } from "./errorClassification";

type WorkStage = Exclude<PipelineStage, "PACKAGED">;

type StageStrategy = {
  operation: CollaboratorOperation;
  next: PipelineStage;
  run(job: JobRecord, collaborators: Collaborators, ctx: CollaboratorContext): Promise<PayloadPatch>;
};

const STRATEGIES: Record<WorkStage, StageStrategy> = {
  DISCOVERED: {
    operation: "download",
    next: "DOWNLOADED",
    async run(job, { downloader }, ctx) {
      const localPath = await downloader.download(job.payload.sourceRef, ctx);
      return { localPath };
    }
  },
  DOWNLOADED: {
    operation: "transcribe",
    next: "TRANSCRIBED",
    async run(job, { transcriber }, ctx) {
      const localPath = requireInput(job, "localPath", job.payload.localPath);
      const transcript = await transcriber.transcribe(localPath, ctx);
      return { transcript };
    }
  },
  TRANSCRIBED: {
    operation: "decide",
    next: "DECIDED",
    async run(job, { decider }, ctx) {
      const transcript = requireInput(job, "transcript", job.payload.transcript);
      const editDecisions = await decider.decide(transcript, ctx);
      return { editDecisions };
    }
  },
  DECIDED: {
    operation: "render",
    next: "RENDERED",
    async run(job, { renderer }, ctx) {
      const localPath = requireInput(job, "localPath", job.payload.localPath);
      const editDecisions = requireInput(job, "editDecisions", job.payload.editDecisions);
      const renderedPath = await renderer.render(localPath, editDecisions, ctx);
      return { renderedPath };
    }
  },
  RENDERED: {
    operation: "package",
    next: "PACKAGED",
    async run(job, { packager }, ctx) {
      const renderedPath = requireInput(job, "renderedPath", job.payload.renderedPath);
      const packagePath = await packager.package(renderedPath, job.payload, ctx);
      return { packagePath };
    }
  }
};

function requireInput<T>(job: JobRecord, key: string, value: T | undefined): T {
  if (value === undefined) {
    throw new FatalError(`Job ${job.id} at ${job.stage} is missing payload.${key}.`, "MISSING_INPUT");
  }
  return value;
}

export function operationFor(stage: PipelineStage): CollaboratorOperation | null {
  return stage === "PACKAGED" ? null : STRATEGIES[stage].operation;
}

export interface StageExecutorOptions {
  timeoutMs: number;
}

/**
 * Runs the collaborator for a job's current stage and reports what should
 * happen next. It never writes to the store; the driver applies the result.
 */
export class StageExecutor {
  constructor(
    private readonly collaborators: Collaborators,
    private readonly options: StageExecutorOptions
  ) {}

  async execute(job: JobRecord, signal?: AbortSignal): Promise<StageResult> {
    if (job.stage === "FAILED" || job.stage === "PACKAGED") {
      throw new IllegalTransitionError(job.stage, job.stage);
    }
    const strategy = STRATEGIES[job.stage];
    const attempt = job.attemptCount + 1;

    try {
      const patch = await withTimeout(
        strategy.operation,
        this.options.timeoutMs,
        (callSignal) => strategy.run(job, this.collaborators, { jobId: job.id, signal: callSignal }),
        signal
      );
      return { kind: "advanced", nextStage: strategy.next, patch };
    } catch (error) {
      const classified = classifyFailure(strategy.operation, error);
      const jobError = {
        kind: classified.class,
        message: classified.message,
        operation: strategy.operation,
        code: classified.code,
        attempt,
        targetStage: strategy.next
      };
      return classified.class === "retryable"
        ? { kind: "retryable", error: { ...jobError, kind: "retryable" } }
        : { kind: "fatal", error: { ...jobError, kind: "fatal" } };
    }
  }
}

async function withTimeout<T>(
  operation: CollaboratorOperation,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", forwardAbort, { once: true });
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new CollaboratorTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  const task = run(controller.signal);
  // the race below observes the rejection; this only keeps a late one from going unhandled
  task.catch(() => undefined);
  try {
    return await Promise.race([task, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    outer?.removeEventListener("abort", forwardAbort);
  }
}
