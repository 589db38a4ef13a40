import { CollaboratorTimeoutError, FatalError, PipelineError, TransientError } from "../domain/errors";
import type { CollaboratorOperation } from "../domain/types";

export type FailureClass = "retryable" | "fatal";

export interface ClassificationTable {
  /** Whether a TransientError from this collaborator is honoured as retryable. */
  transient: boolean;
  /** errno-style codes (`err.code`) and their class. */
  codes: Record<string, FailureClass>;
  /** HTTP-like status ranges, checked in order. */
  statuses: Array<{ min: number; max: number; class: FailureClass }>;
  fallback: FailureClass;
}

const NETWORK_CODES: Record<string, FailureClass> = {
  ETIMEDOUT: "retryable",
  ECONNRESET: "retryable",
  ECONNREFUSED: "retryable",
  EAI_AGAIN: "retryable",
  EPIPE: "retryable",
  EAGAIN: "retryable",
  EBUSY: "retryable",
  ENOENT: "fatal",
  EACCES: "fatal"
};

const HTTP_STATUSES: ClassificationTable["statuses"] = [
  { min: 408, max: 408, class: "retryable" },
  { min: 425, max: 425, class: "retryable" },
  { min: 429, max: 429, class: "retryable" },
  { min: 400, max: 499, class: "fatal" },
  { min: 500, max: 599, class: "retryable" }
];

export const CLASSIFICATION_TABLES: Record<CollaboratorOperation, ClassificationTable> = {
  download: { transient: true, codes: NETWORK_CODES, statuses: HTTP_STATUSES, fallback: "retryable" },
  transcribe: {
    transient: true,
    codes: { ...NETWORK_CODES, ENOMEM: "retryable" },
    statuses: HTTP_STATUSES,
    fallback: "retryable"
  },
  decide: { transient: false, codes: {}, statuses: [], fallback: "fatal" },
  render: {
    transient: true,
    codes: { EAGAIN: "retryable", EBUSY: "retryable", ENOMEM: "retryable", ENOENT: "fatal", EACCES: "fatal" },
    statuses: [],
    fallback: "retryable"
  },
  package: { transient: false, codes: { ENOSPC: "fatal" }, statuses: [], fallback: "fatal" }
};

export interface Classification {
  class: FailureClass;
  message: string;
  code: string | null;
}

/**
 * Maps a collaborator failure onto retryable/fatal. Timeouts are always
 * retryable; everything else goes through the operation's table.
 */
export function classifyFailure(operation: CollaboratorOperation, error: unknown): Classification {
  const table = CLASSIFICATION_TABLES[operation];
  const message = error instanceof Error ? error.message : String(error);
  const code = readCode(error);

  if (error instanceof CollaboratorTimeoutError) {
    return { class: "retryable", message, code };
  }
  if (error instanceof FatalError) {
    return { class: "fatal", message, code };
  }
  if (error instanceof TransientError) {
    return { class: table.transient ? "retryable" : "fatal", message, code };
  }

  if (code && table.codes[code]) {
    return { class: table.codes[code], message, code };
  }

  const status = readStatus(error);
  if (status !== null) {
    const match = table.statuses.find((range) => status >= range.min && status <= range.max);
    if (match) {
      return { class: match.class, message, code: code ?? String(status) };
    }
  }

  return { class: table.fallback, message, code };
}

function readCode(error: unknown): string | null {
  if (error instanceof PipelineError) {
    return error.code;
  }
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function readStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return null;
}
