import { spawn } from "node:child_process";
import { FatalError, TransientError } from "../../domain/errors";

/** sysexits.h EX_TEMPFAIL: the command asks to be retried later. */
export const EXIT_TEMPFAIL = 75;

/** Only the trailing stdout is kept; the result is its last line. */
export const MAX_STDOUT_CHARS = 1024 * 1024;

const RETRYABLE_SPAWN_CODES = new Set(["EAGAIN", "EMFILE", "ENFILE", "EBUSY"]);

export type CommandRunner = (command: string, request: unknown, signal: AbortSignal) => Promise<unknown>;

/** Splits a command line on whitespace, honouring single and double quotes. */
export function parseCommand(command: string): { program: string; args: string[] } {
  const parts: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of command.matchAll(pattern)) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  const [program, ...args] = parts;
  if (!program) {
    throw new FatalError("Collaborator command is empty.", "NOT_CONFIGURED");
  }
  return { program, args };
}

export function exitError(program: string, code: number | null, tail: string) {
  const suffix = tail ? `\n${tail}` : "";
  if (code === EXIT_TEMPFAIL) {
    return new TransientError(`${program} asked to retry (exit ${code}).${suffix}`, "EX_TEMPFAIL");
  }
  return new FatalError(`${program} exited with code ${code ?? "unknown"}.${suffix}`, "EXIT_NONZERO");
}

export function parseOutput(program: string, stdout: string): unknown {
  const lastLine = stdout.trim().split(/\r?\n/).at(-1) ?? "";
  try {
    return JSON.parse(lastLine);
  } catch {
    throw new FatalError(`${program} did not print a JSON result.`, "INVALID_OUTPUT");
  }
}

export function appendBounded(buffer: string, chunk: string, maxChars = MAX_STDOUT_CHARS) {
  const next = buffer + chunk;
  return next.length > maxChars ? next.slice(next.length - maxChars) : next;
}

/**
 * Runs an external collaborator: the request goes in as JSON on stdin, the
 * last stdout line is read back as JSON. Aborting the signal kills the child.
 */
export const runJsonCommand: CommandRunner = (command, request, signal) => {
  const { program, args } = parseCommand(command);
  return new Promise<unknown>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    let stdout = "";
    const tail = createLogTail();
    const proc = spawn(program, args, { stdio: ["pipe", "pipe", "pipe"] });
    const onAbort = () => proc.kill("SIGTERM");
    signal.addEventListener("abort", onAbort, { once: true });

    proc.stdout.on("data", (data: Buffer) => {
      stdout = appendBounded(stdout, data.toString("utf8"));
    });
    proc.stderr.on("data", (data: Buffer) => tail.push(data, program));
    proc.stdin.on("error", () => undefined);
    proc.stdin.end(JSON.stringify(request));

    proc.on("error", (error: NodeJS.ErrnoException) => {
      signal.removeEventListener("abort", onAbort);
      const code = error.code ?? "SPAWN_FAILED";
      const message = `${program} failed to start: ${error.message}`;
      reject(RETRYABLE_SPAWN_CODES.has(code) ? new TransientError(message, code) : new FatalError(message, code));
    });
    proc.on("close", (code) => {
      signal.removeEventListener("abort", onAbort);
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      if (code !== 0) {
        reject(exitError(program, code, tail.toString()));
        return;
      }
      try {
        resolve(parseOutput(program, stdout));
      } catch (error) {
        reject(error);
      }
    });
  });
};

function createLogTail(maxLines = 40) {
  const lines: string[] = [];
  return {
    push(chunk: Buffer, tag: string) {
      for (const line of chunk.toString("utf8").split(/\r?\n/)) {
        if (!line) continue;
        lines.push(`[${tag}] ${line}`);
        if (lines.length > maxLines) {
          lines.shift();
        }
      }
    },
    toString() {
      return lines.join("\n");
    }
  };
}
