import { z } from "zod";
import { COLLABORATOR_OPERATIONS, PIPELINE_STAGES, type EditDecisions, type JobError, type JobPayload, type Transcript } from "./types";

export const transcriptSchema: z.ZodType<Transcript> = z.object({
  language: z.string().min(1),
  segments: z.array(
    z.object({
      start: z.number().min(0),
      end: z.number().min(0),
      text: z.string()
    })
  )
});

export const editDecisionsSchema: z.ZodType<EditDecisions> = z.object({
  segment: z
    .object({ start: z.number().min(0), end: z.number().min(0) })
    .refine((segment) => segment.end > segment.start, "segment end must be after start"),
  layout: z.enum(["center_crop", "face_track", "pip"]),
  captions: z.boolean(),
  title: z.string().optional(),
  hashtags: z.array(z.string()).optional()
});

export const jobPayloadSchema: z.ZodType<JobPayload> = z.object({
  sourceRef: z.string().min(1),
  platform: z.string().optional(),
  title: z.string().optional(),
  creator: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  localPath: z.string().optional(),
  transcript: transcriptSchema.optional(),
  editDecisions: editDecisionsSchema.optional(),
  renderedPath: z.string().optional(),
  packagePath: z.string().optional()
});

export const jobErrorSchema: z.ZodType<JobError> = z.object({
  kind: z.enum(["retryable", "fatal", "retries_exhausted"]),
  message: z.string(),
  operation: z.enum(COLLABORATOR_OPERATIONS),
  code: z.string().nullable().optional(),
  attempt: z.number().int().min(0),
  targetStage: z.enum(PIPELINE_STAGES).optional()
});

export const eventDetailSchema = z.record(z.unknown());
