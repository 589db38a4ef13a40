import type { CollaboratorOperation, EditDecisions, JobPayload, Transcript } from "../../src/domain/types";
import type { ClockPort, CollaboratorContext, Collaborators, LoggerPort } from "../../src/interfaces/ports";

export class FakeClock implements ClockPort {
  private current: number;

  constructor(start = Date.UTC(2024, 0, 1, 12, 0, 0)) {
    this.current = start;
  }

  now() {
    return new Date(this.current);
  }

  advance(ms: number) {
    this.current += ms;
  }
}

export type LoggedLine = { level: "info" | "warn" | "error"; jobId: string; message: string };

export class MemoryLogger implements LoggerPort {
  lines: LoggedLine[] = [];

  async info(jobId: string, message: string) {
    this.lines.push({ level: "info", jobId, message });
  }

  async warn(jobId: string, message: string) {
    this.lines.push({ level: "warn", jobId, message });
  }

  async error(jobId: string, message: string) {
    this.lines.push({ level: "error", jobId, message });
  }
}

export const sampleTranscript: Transcript = {
  language: "en",
  segments: [{ start: 0, end: 4.5, text: "that was the play of the night" }]
};

export const sampleDecisions: EditDecisions = {
  segment: { start: 0, end: 4.5 },
  layout: "center_crop",
  captions: true
};

/** What a scripted call does instead of succeeding: throw the error, or hang until aborted. */
export type ScriptedStep = Error | "hang";

/**
 * Collaborators that succeed with canned values unless a step is queued for
 * the operation, in which case the next queued step runs first.
 */
export class ScriptedCollaborators {
  readonly calls: CollaboratorOperation[] = [];
  packagedMetadata: JobPayload | null = null;
  private readonly queues = new Map<CollaboratorOperation, ScriptedStep[]>();

  fail(operation: CollaboratorOperation, ...steps: ScriptedStep[]) {
    this.queues.set(operation, [...(this.queues.get(operation) ?? []), ...steps]);
    return this;
  }

  asCollaborators(): Collaborators {
    return {
      downloader: {
        download: (sourceRef, ctx) => this.call("download", ctx, () => `/media/${sourceRef}.mp4`)
      },
      transcriber: {
        transcribe: (_localPath, ctx) => this.call("transcribe", ctx, () => sampleTranscript)
      },
      decider: {
        decide: (_transcript, ctx) => this.call("decide", ctx, () => sampleDecisions)
      },
      renderer: {
        render: (_localPath, _decisions, ctx) => this.call("render", ctx, () => `/renders/${ctx.jobId}.mp4`)
      },
      packager: {
        package: (_renderedPath, metadata, ctx) =>
          this.call("package", ctx, () => {
            this.packagedMetadata = metadata;
            return `/packages/${ctx.jobId}`;
          })
      }
    };
  }

  private async call<T>(operation: CollaboratorOperation, ctx: CollaboratorContext, succeed: () => T): Promise<T> {
    this.calls.push(operation);
    const step = this.queues.get(operation)?.shift();
    if (step === "hang") {
      return new Promise<T>((_, reject) => {
        ctx.signal.addEventListener("abort", () => reject(ctx.signal.reason), { once: true });
      });
    }
    if (step) {
      throw step;
    }
    return succeed();
  }
}
