export * from "./types";
export { TotoSimulationEngine } from "./engine";
export type { TotoSimulationEngineOptions } from "./engine";
export { PROGRESS_STEPS, ProgressTracker } from "./progress";
export { drawTrials, foldTrials } from "./trials";
export type { TrialFold } from "./trials";
export { summarizeTiers } from "./breakdown";
export { replayDraw, verifyDraw } from "./verify";
export type { DrawVerificationParams } from "./verify";
