export const PIPELINE_STAGES = [
  "DISCOVERED",
  "DOWNLOADED",
  "TRANSCRIBED",
  "DECIDED",
  "RENDERED",
  "PACKAGED"
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];
export type JobStage = PipelineStage | "FAILED";

export const JOB_STAGES: readonly JobStage[] = [...PIPELINE_STAGES, "FAILED"];

export const COLLABORATOR_OPERATIONS = ["download", "transcribe", "decide", "render", "package"] as const;

export type CollaboratorOperation = (typeof COLLABORATOR_OPERATIONS)[number];

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface Transcript {
  language: string;
  segments: TranscriptSegment[];
}

export type LayoutMode = "center_crop" | "face_track" | "pip";

export interface EditDecisions {
  segment: { start: number; end: number };
  layout: LayoutMode;
  captions: boolean;
  title?: string;
  hashtags?: string[];
}

export interface JobPayload {
  sourceRef: string;
  platform?: string;
  title?: string;
  creator?: string;
  metadata?: Record<string, unknown>;
  localPath?: string;
  transcript?: Transcript;
  editDecisions?: EditDecisions;
  renderedPath?: string;
  packagePath?: string;
}

export type PayloadKey = keyof JobPayload;
export type PayloadPatch = Partial<JobPayload>;

export type JobErrorKind = "retryable" | "fatal" | "retries_exhausted";

export interface JobError {
  kind: JobErrorKind;
  message: string;
  operation: CollaboratorOperation;
  code?: string | null;
  attempt: number;
  /** The stage the failed operation would have advanced the job to. */
  targetStage?: PipelineStage;
}

export interface JobRecord {
  id: string;
  stage: JobStage;
  failureStage: PipelineStage | null;
  lastError: JobError | null;
  attemptCount: number;
  payload: JobPayload;
  createdAt: Date;
  updatedAt: Date;
  availableAt: Date;
  leaseHolder: string | null;
  leaseExpiresAt: Date | null;
}

export type JobEventType = "created" | "advanced" | "retry_scheduled" | "failed" | "reset";

export interface JobEvent {
  id: number;
  jobId: string;
  at: Date;
  type: JobEventType;
  fromStage: JobStage | null;
  toStage: JobStage;
  detail: Record<string, unknown> | null;
}

export interface NewJobInput {
  id?: string;
  sourceRef: string;
  platform?: string;
  title?: string;
  creator?: string;
  metadata?: Record<string, unknown>;
}

export type StageResult =
  | { kind: "advanced"; nextStage: PipelineStage; patch: PayloadPatch }
  | { kind: "retryable"; error: JobError }
  | { kind: "fatal"; error: JobError };
