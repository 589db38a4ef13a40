import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import { DuplicateError, NotFoundError } from "../../domain/errors";
import { eventDetailSchema, jobErrorSchema, jobPayloadSchema } from "../../domain/schemas";
import { assertPayloadOwnership, assertTransition, isJobStage, isPipelineStage } from "../../domain/stages";
import {
  JOB_STAGES,
  type JobError,
  type JobEvent,
  type JobEventType,
  type JobPayload,
  type JobRecord,
  type JobStage,
  type NewJobInput,
  type PayloadPatch,
  type PipelineStage
} from "../../domain/types";
import type { ClockPort, JobListFilter, JobRepositoryPort } from "../../interfaces/ports";
import { openDatabase } from "./database";

type JobRow = {
  id: string;
  stage: string;
  failure_stage: string | null;
  last_error: string | null;
  attempt_count: number;
  payload: string;
  created_at: number;
  updated_at: number;
  available_at: number;
  lease_holder: string | null;
  lease_expires_at: number | null;
};

type EventRow = {
  id: number;
  job_id: string;
  at: number;
  type: JobEventType;
  from_stage: string | null;
  to_stage: string;
  detail: string | null;
};

const DEFAULT_LIST_LIMIT = 100;

export const systemClock: ClockPort = { now: () => new Date() };

function parseStage(value: string, jobId: string): JobStage {
  if (!isJobStage(value)) {
    throw new Error(`Job ${jobId} has unknown stage ${value}.`);
  }
  return value;
}

const toJobRecord = (row: JobRow): JobRecord => {
  const failureStage = row.failure_stage ? parseStage(row.failure_stage, row.id) : null;
  return {
    id: row.id,
    stage: parseStage(row.stage, row.id),
    failureStage: failureStage && isPipelineStage(failureStage) ? failureStage : null,
    lastError: row.last_error ? jobErrorSchema.parse(JSON.parse(row.last_error)) : null,
    attemptCount: row.attempt_count,
    payload: jobPayloadSchema.parse(JSON.parse(row.payload)),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    availableAt: new Date(row.available_at),
    leaseHolder: row.lease_holder,
    leaseExpiresAt: row.lease_expires_at === null ? null : new Date(row.lease_expires_at)
  };
};

const toJobEvent = (row: EventRow): JobEvent => ({
  id: row.id,
  jobId: row.job_id,
  at: new Date(row.at),
  type: row.type,
  fromStage: row.from_stage ? parseStage(row.from_stage, row.job_id) : null,
  toStage: parseStage(row.to_stage, row.job_id),
  detail: row.detail ? eventDetailSchema.parse(JSON.parse(row.detail)) : null
});

function placeholders(count: number) {
  return Array.from({ length: count }, () => "?").join(", ");
}

/**
 * SQLite-backed entity store.
 *
 * Every write runs in an immediate transaction and re-checks the expected
 * stage and lease ownership in the UPDATE itself, so a writer holding a stale
 * view or an expired lease changes nothing and gets `false` back.
 */
export class SqliteJobRepository implements JobRepositoryPort {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: ClockPort = systemClock
  ) {}

  async create(input: NewJobInput): Promise<string> {
    const id = input.id ?? randomUUID();
    const payload: JobPayload = {
      sourceRef: input.sourceRef,
      platform: input.platform,
      title: input.title,
      creator: input.creator,
      metadata: input.metadata
    };
    jobPayloadSchema.parse(payload);

    this.db
      .transaction(() => {
        const existing = this.db.prepare<[string], { id: string }>("SELECT id FROM jobs WHERE id = ?").get(id);
        if (existing) {
          throw new DuplicateError(id);
        }
        const now = this.now();
        this.db
          .prepare(
            `INSERT INTO jobs (id, stage, attempt_count, payload, created_at, updated_at, available_at)
             VALUES (@id, 'DISCOVERED', 0, @payload, @now, @now, @now)`
          )
          .run({ id, payload: JSON.stringify(payload), now });
        this.appendEvent(id, now, "created", null, "DISCOVERED", { sourceRef: input.sourceRef });
      })
      .immediate();

    return id;
  }

  async get(jobId: string): Promise<JobRecord> {
    const job = await this.find(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  async find(jobId: string): Promise<JobRecord | null> {
    const row = this.selectRow(jobId);
    return row ? toJobRecord(row) : null;
  }

  async list(filter: JobListFilter = {}): Promise<JobRecord[]> {
    const stages = filter.stages ?? JOB_STAGES;
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
    if (!stages.length) {
      return [];
    }
    const rows = this.db
      .prepare<unknown[], JobRow>(
        `SELECT * FROM jobs WHERE stage IN (${placeholders(stages.length)})
         ORDER BY updated_at DESC, id ASC LIMIT ?`
      )
      .all(...stages, limit);
    return rows.map(toJobRecord);
  }

  async listRunnable(stages: readonly PipelineStage[], limit: number): Promise<JobRecord[]> {
    if (!stages.length || limit <= 0) {
      return [];
    }
    const now = this.now();
    const rows = this.db
      .prepare<unknown[], JobRow>(
        `SELECT * FROM jobs
         WHERE stage IN (${placeholders(stages.length)})
           AND available_at <= ?
           AND (lease_holder IS NULL OR lease_expires_at <= ?)
         ORDER BY updated_at ASC, id ASC
         LIMIT ?`
      )
      .all(...stages, now, now, limit);
    return rows.map(toJobRecord);
  }

  async countByStage(): Promise<Record<JobStage, number>> {
    const counts: Record<JobStage, number> = {
      DISCOVERED: 0,
      DOWNLOADED: 0,
      TRANSCRIBED: 0,
      DECIDED: 0,
      RENDERED: 0,
      PACKAGED: 0,
      FAILED: 0
    };
    const rows = this.db
      .prepare<[], { stage: string; total: number }>("SELECT stage, COUNT(*) AS total FROM jobs GROUP BY stage")
      .all();
    for (const row of rows) {
      if (isJobStage(row.stage)) {
        counts[row.stage] = row.total;
      }
    }
    return counts;
  }

  async history(jobId: string): Promise<JobEvent[]> {
    const rows = this.db
      .prepare<[string], EventRow>("SELECT * FROM job_events WHERE job_id = ? ORDER BY id ASC")
      .all(jobId);
    return rows.map(toJobEvent);
  }

  async lease(jobId: string, holder: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    const result = this.db
      .prepare(
        `UPDATE jobs SET lease_holder = @holder, lease_expires_at = @expires
         WHERE id = @jobId AND stage <> 'PACKAGED' AND (lease_holder IS NULL OR lease_expires_at <= @now)`
      )
      .run({ jobId, holder, expires: now + ttlMs, now });
    return result.changes > 0;
  }

  async release(jobId: string, holder: string): Promise<boolean> {
    const result = this.db
      .prepare(
        `UPDATE jobs SET lease_holder = NULL, lease_expires_at = NULL
         WHERE id = @jobId AND lease_holder = @holder`
      )
      .run({ jobId, holder });
    return result.changes > 0;
  }

  async compareAndAdvance(
    jobId: string,
    holder: string,
    expectedStage: PipelineStage,
    newStage: PipelineStage,
    patch: PayloadPatch
  ): Promise<boolean> {
    assertTransition(expectedStage, newStage);
    assertPayloadOwnership(newStage, patch);

    return this.db
      .transaction(() => {
        const now = this.now();
        const row = this.selectOwnedRow(jobId, holder, expectedStage, now);
        if (!row) {
          return false;
        }
        const payload: JobPayload = { ...jobPayloadSchema.parse(JSON.parse(row.payload)), ...patch };
        const result = this.db
          .prepare(
            `UPDATE jobs SET stage = @newStage, payload = @payload, attempt_count = 0, last_error = NULL,
               updated_at = @now, available_at = @now
             WHERE id = @jobId AND stage = @expectedStage AND lease_holder = @holder AND lease_expires_at > @now`
          )
          .run({ jobId, holder, expectedStage, newStage, payload: JSON.stringify(payload), now });
        if (result.changes === 0) {
          return false;
        }
        this.appendEvent(jobId, now, "advanced", expectedStage, newStage, { keys: Object.keys(patch) });
        return true;
      })
      .immediate();
  }

  async recordRetry(
    jobId: string,
    holder: string,
    expectedStage: PipelineStage,
    error: JobError,
    availableAt: Date
  ): Promise<boolean> {
    assertTransition(expectedStage, "FAILED");

    return this.db
      .transaction(() => {
        const now = this.now();
        const result = this.db
          .prepare(
            `UPDATE jobs SET attempt_count = attempt_count + 1, last_error = @error,
               updated_at = @now, available_at = @availableAt
             WHERE id = @jobId AND stage = @expectedStage AND lease_holder = @holder AND lease_expires_at > @now`
          )
          .run({
            jobId,
            holder,
            expectedStage,
            error: JSON.stringify(error),
            availableAt: availableAt.getTime(),
            now
          });
        if (result.changes === 0) {
          return false;
        }
        this.appendEvent(jobId, now, "retry_scheduled", expectedStage, expectedStage, {
          error,
          availableAt: availableAt.toISOString()
        });
        return true;
      })
      .immediate();
  }

  async markFailed(jobId: string, holder: string, expectedStage: PipelineStage, error: JobError): Promise<boolean> {
    assertTransition(expectedStage, "FAILED");

    return this.db
      .transaction(() => {
        const now = this.now();
        const result = this.db
          .prepare(
            `UPDATE jobs SET stage = 'FAILED', failure_stage = @expectedStage, last_error = @error,
               attempt_count = @attempt, updated_at = @now
             WHERE id = @jobId AND stage = @expectedStage AND lease_holder = @holder AND lease_expires_at > @now`
          )
          .run({ jobId, holder, expectedStage, error: JSON.stringify(error), attempt: error.attempt, now });
        if (result.changes === 0) {
          return false;
        }
        this.appendEvent(jobId, now, "failed", expectedStage, "FAILED", { error });
        return true;
      })
      .immediate();
  }

  async resetFailed(jobId: string): Promise<boolean> {
    return this.db
      .transaction(() => {
        const now = this.now();
        const row = this.selectRow(jobId);
        if (!row) {
          throw new NotFoundError(jobId);
        }
        if (row.stage !== "FAILED" || !row.failure_stage) {
          return false;
        }
        const result = this.db
          .prepare(
            `UPDATE jobs SET stage = failure_stage, failure_stage = NULL, last_error = NULL, attempt_count = 0,
               updated_at = @now, available_at = @now
             WHERE id = @jobId AND stage = 'FAILED' AND (lease_holder IS NULL OR lease_expires_at <= @now)`
          )
          .run({ jobId, now });
        if (result.changes === 0) {
          return false;
        }
        this.appendEvent(jobId, now, "reset", "FAILED", parseStage(row.failure_stage, jobId), {
          previousAttemptCount: row.attempt_count
        });
        return true;
      })
      .immediate();
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private now() {
    return this.clock.now().getTime();
  }

  private selectRow(jobId: string) {
    return this.db.prepare<[string], JobRow>("SELECT * FROM jobs WHERE id = ?").get(jobId);
  }

  private selectOwnedRow(jobId: string, holder: string, expectedStage: PipelineStage, now: number) {
    return this.db
      .prepare<[string, string, string, number], JobRow>(
        `SELECT * FROM jobs WHERE id = ? AND stage = ? AND lease_holder = ? AND lease_expires_at > ?`
      )
      .get(jobId, expectedStage, holder, now);
  }

  private appendEvent(
    jobId: string,
    at: number,
    type: JobEventType,
    fromStage: JobStage | null,
    toStage: JobStage,
    detail: Record<string, unknown> | null
  ) {
    this.db
      .prepare(
        `INSERT INTO job_events (job_id, at, type, from_stage, to_stage, detail)
         VALUES (@jobId, @at, @type, @fromStage, @toStage, @detail)`
      )
      .run({ jobId, at, type, fromStage, toStage, detail: detail ? JSON.stringify(detail) : null });
  }
}

export function openJobRepository(dbPath: string, clock: ClockPort = systemClock) {
  return new SqliteJobRepository(openDatabase(dbPath), clock);
}
