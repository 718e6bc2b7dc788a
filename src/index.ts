export * from "./types.js";
export * from "./errors.js";
export * from "./coordinates.js";
export { classify, matchRegion, DEFAULT_BANDS, KNOWN_INPUT_REGIONS } from "./region-classifier.js";
export type { RegionLabel, RegionBands, RegionMatch, ClassifierOptions, Box } from "./region-classifier.js";
export * from "./state-tracker.js";
export { interpretReply, parseReply, DEFAULT_ACTION } from "./response-interpreter.js";
export type { Interpretation, InferenceRule } from "./response-interpreter.js";
export * from "./stuck.js";
export { runRecovery } from "./recovery.js";
export type { RecoveryContext, RecoveryOutcome, RecoveryStrategy } from "./recovery.js";
export { runAgentLoop, runStep, createRun, DEFAULT_LOOP_SETTINGS } from "./loop.js";
export type { AgentLoopOptions, AgentResult, LoopSettings, RunState, StepContext, RunFailure } from "./loop.js";
export { AdbDevice, executeAction } from "./actions.js";
export type { Device, AdbDeviceOptions, CommandRunner, ExecuteOptions } from "./actions.js";
export { OpenAIPlanner, BedrockPlanner, getPlanner } from "./llm-providers.js";
export type { Planner } from "./llm-providers.js";
export type { PlanRequest } from "./prompts.js";
export { loadConfig, validateConfig } from "./config.js";
export type { AgentConfig } from "./config.js";
export { logger, SessionLogger } from "./logger.js";
export { runWorkflow, loadWorkflow, parseWorkflow } from "./workflow.js";
export type { Workflow, WorkflowResult } from "./workflow.js";
