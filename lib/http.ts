import { NextResponse } from "next/server";
import {
  DuplicateError,
  IllegalTransitionError,
  JobNotFailedError,
  NotFoundError,
  PayloadOwnershipError,
  PipelineError
} from "../src/domain/errors";
import { bucketOptions, rateLimitRequest, type RateLimitResult, withRateLimitHeaders } from "./rateLimit";

export function statusForError(error: unknown) {
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof DuplicateError || error instanceof JobNotFailedError) {
    return 409;
  }
  if (error instanceof IllegalTransitionError || error instanceof PayloadOwnershipError) {
    return 422;
  }
  return 500;
}

export function errorResponse(error: unknown, init?: ResponseInit) {
  const status = statusForError(error);
  if (status === 500) {
    console.error("Request failed", error);
    return NextResponse.json({ error: "Internal error" }, { ...init, status });
  }
  const code = error instanceof PipelineError ? error.code : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return NextResponse.json({ error: message, code }, { ...init, status });
}

type Limited = { ok: true; rate: RateLimitResult; init: ResponseInit } | { ok: false; response: NextResponse };

/** Applies the named rate-limit bucket; on rejection returns the 429 to send back. */
export function limitRequest(request: Request, bucket: string, max: number): Limited {
  const rate = rateLimitRequest(request, bucketOptions(bucket, { max }));
  const init = withRateLimitHeaders(undefined, rate, { retryAfter: !rate.ok });
  if (!rate.ok) {
    return { ok: false, response: NextResponse.json({ error: "Rate limit exceeded" }, { ...init, status: 429 }) };
  }
  return { ok: true, rate, init };
}
