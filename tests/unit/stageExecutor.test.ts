import { describe, expect, it } from "vitest";
import { operationFor, StageExecutor } from "../../src/application/stageExecutor";
import { FatalError, IllegalTransitionError, TransientError } from "../../src/domain/errors";
import type { JobRecord } from "../../src/domain/types";
import { sampleDecisions, sampleTranscript, ScriptedCollaborators } from "../support/fakes";

const at = new Date(Date.UTC(2024, 0, 1));

function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: "job-1",
    stage: "DISCOVERED",
    failureStage: null,
    lastError: null,
    attemptCount: 0,
    payload: { sourceRef: "clip-1" },
    createdAt: at,
    updatedAt: at,
    availableAt: at,
    leaseHolder: "worker-test",
    leaseExpiresAt: new Date(at.getTime() + 60_000),
    ...overrides
  };
}

describe("StageExecutor", () => {
  it("returns the next stage and the patch the collaborator produced", async () => {
    const executor = new StageExecutor(new ScriptedCollaborators().asCollaborators(), { timeoutMs: 1000 });
    await expect(executor.execute(makeJob())).resolves.toEqual({
      kind: "advanced",
      nextStage: "DOWNLOADED",
      patch: { localPath: "/media/clip-1.mp4" }
    });
  });

  it("hands the packager the whole accumulated payload", async () => {
    const scripted = new ScriptedCollaborators();
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 });
    const payload = {
      sourceRef: "clip-1",
      title: "Buzzer beater",
      localPath: "/media/clip-1.mp4",
      transcript: sampleTranscript,
      editDecisions: sampleDecisions,
      renderedPath: "/renders/job-1.mp4"
    };
    const result = await executor.execute(makeJob({ stage: "RENDERED", payload }));
    expect(result).toEqual({ kind: "advanced", nextStage: "PACKAGED", patch: { packagePath: "/packages/job-1" } });
    expect(scripted.packagedMetadata).toEqual(payload);
  });

  it("reports a retryable failure with the next attempt number", async () => {
    const scripted = new ScriptedCollaborators().fail("transcribe", new TransientError("gpu busy"));
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 });
    const job = makeJob({ stage: "DOWNLOADED", attemptCount: 1, payload: { sourceRef: "clip-1", localPath: "/m.mp4" } });
    await expect(executor.execute(job)).resolves.toEqual({
      kind: "retryable",
      error: { kind: "retryable", message: "gpu busy", operation: "transcribe", code: "TRANSIENT", attempt: 2, targetStage: "TRANSCRIBED" }
    });
  });

  it("reports a fatal failure from render", async () => {
    const scripted = new ScriptedCollaborators().fail("render", new FatalError("unsupported codec", "UNSUPPORTED"));
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 });
    const job = makeJob({
      stage: "DECIDED",
      payload: { sourceRef: "clip-1", localPath: "/m.mp4", transcript: sampleTranscript, editDecisions: sampleDecisions }
    });
    const result = await executor.execute(job);
    expect(result).toEqual({
      kind: "fatal",
      error: { kind: "fatal", message: "unsupported codec", operation: "render", code: "UNSUPPORTED", attempt: 1, targetStage: "RENDERED" }
    });
  });

  it("fails fatally when an earlier stage's output is missing", async () => {
    const scripted = new ScriptedCollaborators();
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 });
    const result = await executor.execute(makeJob({ stage: "DOWNLOADED" }));
    expect(result).toEqual({
      kind: "fatal",
      error: {
        kind: "fatal",
        message: "Job job-1 at DOWNLOADED is missing payload.localPath.",
        operation: "transcribe",
        code: "MISSING_INPUT",
        attempt: 1,
        targetStage: "TRANSCRIBED"
      }
    });
    expect(scripted.calls).toEqual([]);
  });

  it("aborts a collaborator that runs past the timeout and retries it", async () => {
    const scripted = new ScriptedCollaborators().fail("download", "hang");
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 20 });
    const result = await executor.execute(makeJob());
    expect(result).toEqual({
      kind: "retryable",
      error: {
        kind: "retryable",
        message: "download timed out after 20ms",
        operation: "download",
        code: "TIMEOUT",
        attempt: 1,
        targetStage: "DOWNLOADED"
      }
    });
  });

  it("forwards an outer abort to the running collaborator", async () => {
    const scripted = new ScriptedCollaborators().fail("download", "hang");
    const executor = new StageExecutor(scripted.asCollaborators(), { timeoutMs: 1000 });
    const outer = new AbortController();
    const pending = executor.execute(makeJob(), outer.signal);
    outer.abort(new TransientError("worker stopping", "ABORTED"));
    await expect(pending).resolves.toEqual({
      kind: "retryable",
      error: {
        kind: "retryable",
        message: "worker stopping",
        operation: "download",
        code: "ABORTED",
        attempt: 1,
        targetStage: "DOWNLOADED"
      }
    });
  });

  it("refuses jobs with no work left", async () => {
    const executor = new StageExecutor(new ScriptedCollaborators().asCollaborators(), { timeoutMs: 1000 });
    await expect(executor.execute(makeJob({ stage: "PACKAGED" }))).rejects.toBeInstanceOf(IllegalTransitionError);
    await expect(executor.execute(makeJob({ stage: "FAILED", failureStage: "DECIDED" }))).rejects.toBeInstanceOf(
      IllegalTransitionError
    );
  });

  it("names the collaborator for each working stage", () => {
    expect(operationFor("DISCOVERED")).toBe("download");
    expect(operationFor("DECIDED")).toBe("render");
    expect(operationFor("PACKAGED")).toBeNull();
  });
});
