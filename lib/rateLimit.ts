const DEFAULT_WINDOW_MS = 60_000;
const DEFAULT_MAX_REQUESTS = 30;

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  max?: number;
  windowMs?: number;
  bucket?: string;
};

export type RateLimitResult = {
  ok: boolean;
  remaining: number;
  limit: number;
  resetAt: number;
};

function parseNumber(value: string | undefined, fallback: number) {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toEnvKey(bucket: string) {
  return bucket.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

export function bucketOptions(
  bucket: string,
  defaults?: { max?: number; windowMs?: number },
  env: NodeJS.ProcessEnv = process.env
): RateLimitOptions {
  const key = toEnvKey(bucket);
  const globalMax = parseNumber(env.RATE_LIMIT_MAX, DEFAULT_MAX_REQUESTS);
  const globalWindow = parseNumber(env.RATE_LIMIT_WINDOW_MS, DEFAULT_WINDOW_MS);
  const max = parseNumber(env[`RATE_LIMIT_${key}_MAX`], defaults?.max ?? globalMax);
  const windowMs = parseNumber(env[`RATE_LIMIT_${key}_WINDOW_MS`], defaults?.windowMs ?? globalWindow);
  return { bucket, max, windowMs };
}

/**
 * Fixed-window counter kept in process memory. The operator API runs in a
 * single process next to the SQLite file, so there is nothing to share.
 */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();

  constructor(private now: () => number = Date.now) {}

  check(key: string, options?: RateLimitOptions): RateLimitResult {
    const max = options?.max ?? DEFAULT_MAX_REQUESTS;
    const windowMs = options?.windowMs ?? DEFAULT_WINDOW_MS;
    const bucketKey = `${options?.bucket ?? "api"}:${key}`;

    const now = this.now();
    const bucket = this.buckets.get(bucketKey);
    if (!bucket || bucket.resetAt <= now) {
      this.buckets.set(bucketKey, { count: 1, resetAt: now + windowMs });
      return { ok: true, remaining: Math.max(0, max - 1), resetAt: now + windowMs, limit: max };
    }
    if (bucket.count >= max) {
      return { ok: false, remaining: 0, resetAt: bucket.resetAt, limit: max };
    }
    bucket.count += 1;
    return { ok: true, remaining: Math.max(0, max - bucket.count), resetAt: bucket.resetAt, limit: max };
  }
}

const limiter = new RateLimiter();

export function clientKey(request: Request) {
  const forwarded = request.headers.get("x-forwarded-for");
  return forwarded?.split(",")[0]?.trim() || request.headers.get("x-real-ip") || "local";
}

export function rateLimitRequest(request: Request, options?: RateLimitOptions): RateLimitResult {
  return limiter.check(clientKey(request), options);
}

export function withRateLimitHeaders(
  init: ResponseInit | undefined,
  rate: RateLimitResult,
  options?: { retryAfter?: boolean; now?: number }
): ResponseInit {
  const headers = new Headers(init?.headers ?? {});
  headers.set("X-RateLimit-Limit", rate.limit.toString());
  headers.set("X-RateLimit-Remaining", rate.remaining.toString());
  headers.set("X-RateLimit-Reset", Math.ceil(rate.resetAt / 1000).toString());
  if (options?.retryAfter) {
    const now = options.now ?? Date.now();
    const retryAfter = Math.max(0, Math.ceil((rate.resetAt - now) / 1000));
    headers.set("Retry-After", retryAfter.toString());
  }
  return { ...init, headers };
}
