import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { LocalLogger, safeFileName } from "../../src/infrastructure/logger/localLogger";

describe("LocalLogger", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("appends one JSON line per entry to the job's log file", async () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), "clipforge-logs-"));
    dirs.push(dir);
    const logger = new LocalLogger(path.join(dir, "logs"));

    await logger.info("job-1", "DISCOVERED -> DOWNLOADED");
    await logger.error("job-1", "render failed permanently: unsupported codec");

    const lines = readFileSync(logger.logPath("job-1"), "utf-8").trim().split("\n").map((line) => JSON.parse(line));
    expect(lines.map((line) => [line.level, line.jobId, line.message])).toEqual([
      ["info", "job-1", "DISCOVERED -> DOWNLOADED"],
      ["error", "job-1", "render failed permanently: unsupported codec"]
    ]);
  });

  it("keeps job ids from escaping the log directory", () => {
    expect(safeFileName("../etc/passwd")).toBe(".._etc_passwd");
    expect(new LocalLogger("/var/log/clipforge").logPath("a/b c")).toBe("/var/log/clipforge/a_b_c.log");
  });
});
