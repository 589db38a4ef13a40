import type {
  EditDecisions,
  JobError,
  JobEvent,
  JobPayload,
  JobRecord,
  JobStage,
  NewJobInput,
  PayloadPatch,
  PipelineStage,
  Transcript
} from "../domain/types";

export interface CollaboratorContext {
  jobId: string;
  signal: AbortSignal;
}

export interface DownloadPort {
  download(sourceRef: string, ctx: CollaboratorContext): Promise<string>;
}

export interface TranscriptionPort {
  transcribe(localPath: string, ctx: CollaboratorContext): Promise<Transcript>;
}

export interface DecisionPort {
  decide(transcript: Transcript, ctx: CollaboratorContext): Promise<EditDecisions>;
}

export interface RenderPort {
  render(localPath: string, editDecisions: EditDecisions, ctx: CollaboratorContext): Promise<string>;
}

export interface PackagePort {
  package(renderedPath: string, metadata: JobPayload, ctx: CollaboratorContext): Promise<string>;
}

export interface Collaborators {
  downloader: DownloadPort;
  transcriber: TranscriptionPort;
  decider: DecisionPort;
  renderer: RenderPort;
  packager: PackagePort;
}

export interface JobListFilter {
  stages?: readonly JobStage[];
  limit?: number;
}

export interface JobRepositoryPort {
  create(input: NewJobInput): Promise<string>;
  get(jobId: string): Promise<JobRecord>;
  find(jobId: string): Promise<JobRecord | null>;
  list(filter?: JobListFilter): Promise<JobRecord[]>;
  listRunnable(stages: readonly PipelineStage[], limit: number): Promise<JobRecord[]>;
  countByStage(): Promise<Record<JobStage, number>>;
  history(jobId: string): Promise<JobEvent[]>;

  lease(jobId: string, holder: string, ttlMs: number): Promise<boolean>;
  release(jobId: string, holder: string): Promise<boolean>;

  compareAndAdvance(
    jobId: string,
    holder: string,
    expectedStage: PipelineStage,
    newStage: PipelineStage,
    patch: PayloadPatch
  ): Promise<boolean>;
  recordRetry(jobId: string, holder: string, expectedStage: PipelineStage, error: JobError, availableAt: Date): Promise<boolean>;
  markFailed(jobId: string, holder: string, expectedStage: PipelineStage, error: JobError): Promise<boolean>;
  resetFailed(jobId: string): Promise<boolean>;

  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface LoggerPort {
  info(jobId: string, message: string): Promise<void>;
  warn(jobId: string, message: string): Promise<void>;
  error(jobId: string, message: string): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}
