import { z } from "zod";
import { FatalError } from "../../domain/errors";
import { editDecisionsSchema, transcriptSchema } from "../../domain/schemas";
import { COLLABORATOR_OPERATIONS, type CollaboratorOperation, type EditDecisions, type JobPayload, type Transcript } from "../../domain/types";
import type {
  CollaboratorContext,
  Collaborators,
  DecisionPort,
  DownloadPort,
  PackagePort,
  RenderPort,
  TranscriptionPort
} from "../../interfaces/ports";
import { type CommandRunner, runJsonCommand } from "./commandRunner";

const localPathSchema = z.object({ localPath: z.string().min(1) });
const renderedPathSchema = z.object({ renderedPath: z.string().min(1) });
const packagePathSchema = z.object({ packagePath: z.string().min(1) });

/**
 * Collaborators backed by external commands, one per operation, configured
 * through `CLIPFORGE_<OPERATION>_CMD`. Each command reads
 * `{ operation, jobId, storagePath, ...input }` on stdin and prints its result
 * as a single JSON line on stdout.
 */
export class CommandCollaborators implements DownloadPort, TranscriptionPort, DecisionPort, RenderPort, PackagePort {
  constructor(
    private readonly commands: Record<CollaboratorOperation, string | null>,
    private readonly storagePath: string,
    private readonly run: CommandRunner = runJsonCommand
  ) {}

  async download(sourceRef: string, ctx: CollaboratorContext): Promise<string> {
    const result = await this.invoke("download", { sourceRef }, localPathSchema, ctx);
    return result.localPath;
  }

  async transcribe(localPath: string, ctx: CollaboratorContext): Promise<Transcript> {
    return this.invoke("transcribe", { localPath }, transcriptSchema, ctx);
  }

  async decide(transcript: Transcript, ctx: CollaboratorContext): Promise<EditDecisions> {
    return this.invoke("decide", { transcript }, editDecisionsSchema, ctx);
  }

  async render(localPath: string, editDecisions: EditDecisions, ctx: CollaboratorContext): Promise<string> {
    const result = await this.invoke("render", { localPath, editDecisions }, renderedPathSchema, ctx);
    return result.renderedPath;
  }

  async package(renderedPath: string, metadata: JobPayload, ctx: CollaboratorContext): Promise<string> {
    const result = await this.invoke("package", { renderedPath, metadata }, packagePathSchema, ctx);
    return result.packagePath;
  }

  asCollaborators(): Collaborators {
    return { downloader: this, transcriber: this, decider: this, renderer: this, packager: this };
  }

  unconfigured(): CollaboratorOperation[] {
    return COLLABORATOR_OPERATIONS.filter((operation) => !this.commands[operation]);
  }

  private async invoke<T>(
    operation: CollaboratorOperation,
    input: Record<string, unknown>,
    schema: z.ZodType<T>,
    ctx: CollaboratorContext
  ): Promise<T> {
    const command = this.commands[operation];
    if (!command) {
      throw new FatalError(`No command configured for ${operation}.`, "NOT_CONFIGURED");
    }
    const output = await this.run(
      command,
      { operation, jobId: ctx.jobId, storagePath: this.storagePath, ...input },
      ctx.signal
    );
    const parsed = schema.safeParse(output);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "result"}: ${issue.message}`);
      throw new FatalError(`${operation} returned an invalid result: ${issues.join("; ")}`, "INVALID_OUTPUT");
    }
    return parsed.data;
  }
}
