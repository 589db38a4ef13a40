import type { JobDependencies } from "../application/jobService";
import { PipelineDriver } from "../application/pipelineDriver";
import { StageExecutor } from "../application/stageExecutor";
import { CommandCollaborators } from "./collaborators/commandCollaborators";
import { type AppConfig, loadConfig } from "./config";
import { LocalLogger } from "./logger/localLogger";
import { openJobRepository, type SqliteJobRepository } from "./repo/jobRepository";

export interface AppDependencies extends JobDependencies {
  config: AppConfig;
  repo: SqliteJobRepository;
  logger: LocalLogger;
  collaborators: CommandCollaborators;
}

let cached: AppDependencies | null = null;

export function createDependencies(config: AppConfig = loadConfig()): AppDependencies {
  return {
    config,
    repo: openJobRepository(config.dbPath),
    logger: new LocalLogger(config.logsPath, config.logToConsole),
    collaborators: new CommandCollaborators(config.commands, config.storagePath)
  };
}

/** Process-wide instance for the HTTP route handlers, opened on first use. */
export function getDependencies(): AppDependencies {
  if (cached) {
    return cached;
  }
  cached = createDependencies();
  return cached;
}

export function createDriver(deps: AppDependencies, holderId?: string) {
  const executor = new StageExecutor(deps.collaborators.asCollaborators(), {
    timeoutMs: deps.config.collaboratorTimeoutMs
  });
  return new PipelineDriver(
    { repo: deps.repo, executor, logger: deps.logger },
    { ...deps.config.driver, retry: deps.config.retry, holderId }
  );
}
