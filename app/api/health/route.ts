import { NextResponse } from "next/server";
import { getDependencies } from "../../../src/infrastructure/container";
import { limitRequest } from "../../../lib/http";

export const runtime = "nodejs";

type CheckResult = {
  status: "ok" | "error";
  latency_ms: number;
  error?: string;
};

const DEFAULT_TIMEOUT_MS = 1500;

function parseTimeout(value: string | undefined) {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

async function checkDatabase(timeoutMs: number): Promise<CheckResult> {
  const started = Date.now();
  try {
    await withTimeout(getDependencies().repo.ping(), timeoutMs, "Database check");
    return { status: "ok", latency_ms: Date.now() - started };
  } catch (error) {
    return {
      status: "error",
      latency_ms: Date.now() - started,
      error: error instanceof Error ? error.message : "Unknown database error"
    };
  }
}

export async function GET(request: Request) {
  const limited = limitRequest(request, "health", 120);
  if (!limited.ok) {
    return limited.response;
  }
  const timeoutMs = parseTimeout(process.env.HEALTHCHECK_TIMEOUT_MS);
  const start = Date.now();
  const database = await checkDatabase(timeoutMs);
  const hasError = database.status === "error";

  return NextResponse.json(
    {
      status: hasError ? "error" : "ok",
      timestamp: new Date().toISOString(),
      uptime_s: Math.floor(process.uptime()),
      duration_ms: Date.now() - start,
      checks: { database }
    },
    { ...limited.init, status: hasError ? 503 : 200 }
  );
}
