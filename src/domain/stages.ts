import { IllegalTransitionError, PayloadOwnershipError } from "./errors";
import { JOB_STAGES, type JobStage, type PayloadKey, type PayloadPatch, type PipelineStage, PIPELINE_STAGES } from "./types";

/** Stages the driver picks work from. PACKAGED is done and FAILED waits for an operator. */
export const RUNNABLE_STAGES: readonly PipelineStage[] = PIPELINE_STAGES.slice(0, -1);

const PAYLOAD_OWNERS: Record<PipelineStage, readonly PayloadKey[]> = {
  DISCOVERED: ["sourceRef", "platform", "title", "creator", "metadata"],
  DOWNLOADED: ["localPath"],
  TRANSCRIBED: ["transcript"],
  DECIDED: ["editDecisions"],
  RENDERED: ["renderedPath"],
  PACKAGED: ["packagePath"]
};

const jobStageNames: readonly string[] = JOB_STAGES;
const pipelineStageNames: readonly string[] = PIPELINE_STAGES;
const runnableStages: readonly JobStage[] = RUNNABLE_STAGES;

export function isJobStage(value: string): value is JobStage {
  return jobStageNames.includes(value);
}

export function isPipelineStage(value: string): value is PipelineStage {
  return pipelineStageNames.includes(value);
}

export function isTerminal(stage: JobStage) {
  return stage === "PACKAGED";
}

export function isRunnable(stage: JobStage) {
  return runnableStages.includes(stage);
}

export function nextStageOf(stage: PipelineStage): PipelineStage | null {
  const index = PIPELINE_STAGES.indexOf(stage);
  return PIPELINE_STAGES[index + 1] ?? null;
}

/** Forward by exactly one stage, or sideways into FAILED from a non-terminal stage. */
export function canTransition(from: JobStage, to: JobStage) {
  if (from === "FAILED" || isTerminal(from)) {
    return false;
  }
  if (to === "FAILED") {
    return true;
  }
  return nextStageOf(from) === to;
}

export function assertTransition(from: JobStage, to: JobStage) {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}

export function assertPayloadOwnership(stage: PipelineStage, patch: PayloadPatch) {
  const allowed: readonly string[] = PAYLOAD_OWNERS[stage];
  const foreign = Object.keys(patch).filter((key) => !allowed.includes(key));
  if (foreign.length) {
    throw new PayloadOwnershipError(stage, foreign);
  }
}
