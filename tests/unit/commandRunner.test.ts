import { describe, expect, it } from "vitest";
import { FatalError, TransientError } from "../../src/domain/errors";
import {
  appendBounded,
  exitError,
  parseCommand,
  parseOutput,
  runJsonCommand
} from "../../src/infrastructure/collaborators/commandRunner";

function nodeScript(script: string) {
  return `"${process.execPath}" -e "${script}"`;
}

function run(command: string, request: unknown = {}, signal = new AbortController().signal) {
  return runJsonCommand(command, request, signal);
}

describe("command runner helpers", () => {
  it("splits a command line and keeps quoted arguments together", () => {
    expect(parseCommand(`render-clip --preset "vertical 9:16" 'safe area'`)).toEqual({
      program: "render-clip",
      args: ["--preset", "vertical 9:16", "safe area"]
    });
  });

  it("rejects an empty command", () => {
    expect(() => parseCommand("   ")).toThrow(FatalError);
  });

  it("turns EX_TEMPFAIL into a transient error and other exits into fatal ones", () => {
    const temp = exitError("transcribe", 75, "");
    expect(temp).toBeInstanceOf(TransientError);
    expect(temp.code).toBe("EX_TEMPFAIL");
    expect(temp.message).toBe("transcribe asked to retry (exit 75).");

    const fatal = exitError("render", 1, "[render] no such codec");
    expect(fatal).toBeInstanceOf(FatalError);
    expect(fatal.code).toBe("EXIT_NONZERO");
    expect(fatal.message).toBe("render exited with code 1.\n[render] no such codec");
  });

  it("reads the last stdout line as the result", () => {
    expect(parseOutput("download", `progress 40%\nprogress 100%\n{"localPath":"/media/a.mp4"}\n`)).toEqual({
      localPath: "/media/a.mp4"
    });
    expect(() => parseOutput("download", "done")).toThrow("download did not print a JSON result.");
  });

  it("keeps only the trailing characters of a long buffer", () => {
    expect(appendBounded("abc", "def", 4)).toBe("cdef");
    expect(appendBounded("ab", "c", 4)).toBe("abc");
  });
});

describe("runJsonCommand", () => {
  it("sends the request on stdin and parses the last stdout line", async () => {
    const command = nodeScript(
      "let d='';process.stdin.on('data',c=>d+=c);process.stdin.on('end',()=>{const r=JSON.parse(d);" +
        "console.log('working');console.log(JSON.stringify({localPath:'/media/'+r.sourceRef+'.mp4'}))})"
    );
    await expect(run(command, { sourceRef: "clip-1" })).resolves.toEqual({ localPath: "/media/clip-1.mp4" });
  });

  it("still finds the result after a flood of progress output", async () => {
    const command = nodeScript(
      "process.stdout.write('progress\\n'.repeat(200000));console.log(JSON.stringify({done:true}))"
    );
    await expect(run(command)).resolves.toEqual({ done: true });
  });

  it("treats exit 75 as a transient failure", async () => {
    const error = await run(nodeScript("process.stderr.write('busy');process.exit(75)")).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ code: "EX_TEMPFAIL" });
  });

  it("treats any other non-zero exit as fatal", async () => {
    const error = await run(nodeScript("process.exit(3)")).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FatalError);
    expect(error).toMatchObject({ code: "EXIT_NONZERO" });
  });

  it("reports a missing program as a fatal spawn error", async () => {
    const error = await run("clipforge-missing-collaborator-binary --version").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FatalError);
    expect(error).toMatchObject({ code: "ENOENT" });
  });

  it("kills the child and rejects with the abort reason", async () => {
    const controller = new AbortController();
    const reason = new Error("stage timed out");
    const pending = run(nodeScript("setInterval(()=>{},1000)"), {}, controller.signal);
    setTimeout(() => controller.abort(reason), 50);
    await expect(pending).rejects.toBe(reason);
  });

  it("rejects at once when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(run(nodeScript("console.log('{}')"), {}, controller.signal)).rejects.toThrow("cancelled");
  });
});
