import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PipelineDriver } from "../../src/application/pipelineDriver";
import { StageExecutor } from "../../src/application/stageExecutor";
import { FatalError } from "../../src/domain/errors";
import { openDatabase } from "../../src/infrastructure/repo/database";
import { SqliteJobRepository } from "../../src/infrastructure/repo/jobRepository";
import { type CliContext, parseArgs, runCommand } from "../../scripts/operatorCommands";
import { FakeClock, MemoryLogger, ScriptedCollaborators } from "../support/fakes";

describe("operator commands", () => {
  let repo: SqliteJobRepository;
  let logger: MemoryLogger;
  let scripted: ScriptedCollaborators;
  let output: string[];
  let ctx: CliContext;

  const run = (...argv: string[]) => runCommand(parseArgs(argv), ctx);

  beforeEach(() => {
    const clock = new FakeClock();
    repo = new SqliteJobRepository(openDatabase(":memory:"), clock);
    logger = new MemoryLogger();
    scripted = new ScriptedCollaborators();
    output = [];
    ctx = {
      deps: { repo, logger },
      out: (line) => output.push(line),
      createDriver: () =>
        new PipelineDriver(
          { repo, logger, clock, executor: new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 }) },
          {
            batchSize: 10,
            concurrency: 1,
            leaseTtlMs: 60_000,
            pollIntervalMs: 10,
            retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 0 },
            holderId: "cli-test"
          }
        )
    };
  });

  afterEach(async () => {
    await repo.close();
  });

  it("parses flags and positionals", () => {
    expect(parseArgs(["list", "--stage=FAILED,packaged", "--limit=5"])).toEqual({
      command: "list",
      positionals: [],
      flags: { stage: "FAILED,packaged", limit: "5" }
    });
    expect(parseArgs(["run", "--once"]).flags).toEqual({ once: true });
    expect(parseArgs(["inspect", "job-1"]).positionals).toEqual(["job-1"]);
    expect(parseArgs([]).command).toBe("help");
  });

  it("creates a job and lists it", async () => {
    expect(await run("create", "--source=clip-7", "--id=job-7", "--title=Last second")).toBe(0);
    expect(output).toEqual(["Created job job-7 (DISCOVERED) for clip-7"]);
    expect(logger.lines).toEqual([{ level: "info", jobId: "job-7", message: "Discovered clip-7." }]);

    output = [];
    expect(await run("list", "--stage=discovered")).toBe(0);
    expect(output).toEqual(["job-7  DISCOVERED   clip-7  attempts=0"]);
  });

  it("rejects bad flags", async () => {
    expect(await run("create", "--title=No source")).toBe(2);
    expect(output).toEqual(["--source: Required"]);
    expect(await run("list", "--stage=ARCHIVED")).toBe(2);
  });

  it("reports store errors without a stack trace", async () => {
    await run("create", "--source=clip-7", "--id=job-7");
    output = [];
    expect(await run("create", "--source=clip-8", "--id=job-7")).toBe(1);
    expect(await run("reset", "job-7")).toBe(1);
    expect(await run("inspect", "nope")).toBe(1);
    expect(output).toEqual([
      "Job job-7 already exists.",
      "Job job-7 is DISCOVERED; only FAILED jobs can be reset.",
      "Job nope not found."
    ]);
  });

  it("runs the pipeline once, lists the failure and resets it", async () => {
    scripted.fail("decide", new FatalError("no highlight found", "EMPTY"));
    await run("create", "--source=clip-7", "--id=job-7");
    output = [];

    expect(await run("run", "--once")).toBe(0);
    expect(await run("list", "--stage=FAILED")).toBe(0);
    expect(await run("reset", "job-7")).toBe(0);
    expect(output).toEqual([
      "advanced=2 retried=0 failed=1 conflicts=0 errors=0",
      "job-7  FAILED       clip-7  failed at TRANSCRIBED -> DECIDED: no highlight found",
      "Reset job-7 to TRANSCRIBED"
    ]);
  });

  it("prints stage counts", async () => {
    await run("create", "--source=clip-7");
    output = [];
    expect(await run("status")).toBe(0);
    expect(output).toEqual([
      "DISCOVERED  1",
      "DOWNLOADED  0",
      "TRANSCRIBED 0",
      "DECIDED     0",
      "RENDERED    0",
      "PACKAGED    0",
      "FAILED      0"
    ]);
  });

  it("prints the job and its history on inspect", async () => {
    await run("create", "--source=clip-7", "--id=job-7");
    output = [];
    expect(await run("inspect", "job-7")).toBe(0);
    const detail = JSON.parse(output[0]);
    expect(detail.status).toBe("in_progress");
    expect(detail.job.payload).toEqual({ sourceRef: "clip-7" });
    expect(detail.history).toHaveLength(1);
  });

  it("rejects unknown commands", async () => {
    expect(await run("explode")).toBe(2);
    expect(output[0]).toMatch(/^Unknown command: explode/);
  });
});
