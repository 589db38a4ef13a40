import { z } from "zod";
import {
  createJob,
  inspectJob,
  type JobDependencies,
  type JobSummary,
  listJobs,
  pipelineStatus,
  resetFailedJob
} from "../src/application/jobService";
import type { PipelineDriver } from "../src/application/pipelineDriver";
import { PipelineError } from "../src/domain/errors";
import { isJobStage } from "../src/domain/stages";
import { JOB_STAGES, type JobStage } from "../src/domain/types";

export type ParsedArgs = {
  command: string;
  positionals: string[];
  flags: Record<string, string | boolean>;
};

export interface CliContext {
  deps: JobDependencies;
  out: (line: string) => void;
  createDriver: () => PipelineDriver;
}

export const USAGE = [
  "Usage: clipforge <command> [options]",
  "",
  "  create --source=<ref> [--id=<id>] [--title=] [--platform=] [--creator=]",
  "  list [--stage=FAILED,PACKAGED] [--limit=50]",
  "  inspect <jobId>",
  "  reset <jobId>",
  "  status",
  "  run [--once]"
].join("\n");

export function parseArgs(argv: string[]): ParsedArgs {
  const [command = "help", ...rest] = argv;
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (const arg of rest) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      flags[m[1]] = m[3] ?? true;
    } else {
      positionals.push(arg);
    }
  }
  return { command, positionals, flags };
}

const createSchema = z.object({
  source: z.string().min(1),
  id: z.string().min(1).optional(),
  title: z.string().optional(),
  platform: z.string().optional(),
  creator: z.string().optional()
});

const stageList = z
  .string()
  .transform((value) => value.split(",").map((stage) => stage.trim().toUpperCase()))
  .refine((stages): stages is JobStage[] => stages.every(isJobStage), {
    message: `stage must be a comma-separated list of ${JOB_STAGES.join(", ")}`
  });

const listSchema = z.object({
  stage: stageList.optional(),
  limit: z.coerce.number().int().positive().max(1000).default(50)
});

export function formatJobLine(job: JobSummary) {
  let detail = `attempts=${job.attemptCount}`;
  if (job.status === "complete") {
    detail = "complete";
  } else if (job.status === "failed") {
    const target = job.targetStage ? ` -> ${job.targetStage}` : "";
    detail = `failed at ${job.failureStage ?? "?"}${target}: ${job.lastError ?? "no error recorded"}`;
  }
  return `${job.id}  ${job.stage.padEnd(11)}  ${job.sourceRef}  ${detail}`;
}

function flagError(error: z.ZodError) {
  return error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("\n");
}

/** Runs one operator command and returns the process exit code. */
export async function runCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const { deps, out } = ctx;
  try {
    switch (args.command) {
      case "create": {
        const parsed = createSchema.safeParse(args.flags);
        if (!parsed.success) {
          out(flagError(parsed.error));
          return 2;
        }
        const { source, ...rest } = parsed.data;
        const job = await createJob({ sourceRef: source, ...rest }, deps);
        out(`Created job ${job.id} (${job.stage}) for ${job.payload.sourceRef}`);
        return 0;
      }
      case "list": {
        const parsed = listSchema.safeParse(args.flags);
        if (!parsed.success) {
          out(flagError(parsed.error));
          return 2;
        }
        const jobs = await listJobs({ stages: parsed.data.stage, limit: parsed.data.limit }, deps);
        if (!jobs.length) {
          out("No jobs.");
        }
        jobs.forEach((job) => out(formatJobLine(job)));
        return 0;
      }
      case "inspect": {
        const jobId = args.positionals[0];
        if (!jobId) {
          out("inspect needs a job id");
          return 2;
        }
        out(JSON.stringify(await inspectJob(jobId, deps), null, 2));
        return 0;
      }
      case "reset": {
        const jobId = args.positionals[0];
        if (!jobId) {
          out("reset needs a job id");
          return 2;
        }
        const { reset, job } = await resetFailedJob(jobId, deps);
        if (!reset) {
          out(`Job ${jobId} is still leased by a worker; try again once the lease expires.`);
          return 1;
        }
        out(`Reset ${jobId} to ${job.stage}`);
        return 0;
      }
      case "status": {
        const counts = await pipelineStatus(deps);
        for (const stage of JOB_STAGES) {
          out(`${stage.padEnd(11)} ${counts[stage]}`);
        }
        return 0;
      }
      case "run": {
        const driver = ctx.createDriver();
        if (args.flags.once) {
          const summary = await driver.drain();
          out(
            `advanced=${summary.advanced} retried=${summary.retried} failed=${summary.failed} conflicts=${summary.conflicts} errors=${summary.errors}`
          );
          return 0;
        }
        driver.start();
        await new Promise<void>((resolve) => {
          process.once("SIGINT", resolve);
          process.once("SIGTERM", resolve);
        });
        await driver.stop();
        return 0;
      }
      case "help":
        out(USAGE);
        return 0;
      default:
        out(`Unknown command: ${args.command}\n\n${USAGE}`);
        return 2;
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      out(error.message);
      return 1;
    }
    throw error;
  }
}
