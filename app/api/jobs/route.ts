import { NextResponse } from "next/server";
import { z } from "zod";
import { createJob, listJobs } from "../../../src/application/jobService";
import { isJobStage } from "../../../src/domain/stages";
import type { JobStage } from "../../../src/domain/types";
import { getDependencies } from "../../../src/infrastructure/container";
import { errorResponse, limitRequest } from "../../../lib/http";

export const runtime = "nodejs";

const createSchema = z.object({
  id: z.string().min(1).max(200).optional(),
  sourceRef: z.string().min(1),
  platform: z.string().optional(),
  title: z.string().optional(),
  creator: z.string().optional(),
  metadata: z.record(z.unknown()).optional()
});

const listSchema = z.object({
  stage: z
    .string()
    .transform((value) => value.split(",").map((stage) => stage.trim().toUpperCase()))
    .refine((stages): stages is JobStage[] => stages.every(isJobStage), { message: "Unknown stage" })
    .optional(),
  limit: z.coerce.number().int().positive().max(1000).default(50)
});

export async function GET(request: Request) {
  const limited = limitRequest(request, "jobs-read", 60);
  if (!limited.ok) {
    return limited.response;
  }
  const url = new URL(request.url);
  const parsed = listSchema.safeParse({
    stage: url.searchParams.get("stage") ?? undefined,
    limit: url.searchParams.get("limit") ?? undefined
  });
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid query" }, { ...limited.init, status: 400 });
  }
  try {
    const jobs = await listJobs({ stages: parsed.data.stage, limit: parsed.data.limit }, getDependencies());
    return NextResponse.json({ jobs }, limited.init);
  } catch (error) {
    return errorResponse(error, limited.init);
  }
}

export async function POST(request: Request) {
  const limited = limitRequest(request, "jobs-create", 20);
  if (!limited.ok) {
    return limited.response;
  }
  const payload = await request.json().catch(() => null);
  const parsed = createSchema.safeParse(payload);
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid payload" }, { ...limited.init, status: 400 });
  }
  try {
    const job = await createJob(parsed.data, getDependencies());
    return NextResponse.json({ jobId: job.id, stage: job.stage }, { ...limited.init, status: 201 });
  } catch (error) {
    return errorResponse(error, limited.init);
  }
}
