/**
 * Agent loop for touchpilot.
 *
 * Core flow per step:
 *  1. Capture device state (screen size, screenshot, foreground app, keyboard)
 *  2. Compare the stall signature with the previous one; recover or fail on a stall
 *  3. Ask the planner for the next action and interpret the reply
 *  4. success / failure end the run
 *  5. Enforce the per-type request ceiling
 *  6. Admit the action through the state tracker (a veto is a failed step)
 *  7. Execute on the device and record the step
 *  8. Repeat until a terminal status, the step budget, or an abort
 *
 * `runStep` is a function of (context, run) -> run; `runAgentLoop` owns the
 * run value and everything between steps (delay, pause hook, abort).
 */

import { callDevice, executeAction, KEY_CODES, type Device } from "./actions.js";
import {
  DEFAULT_DEVICE_TIMEOUT_MS,
  DEFAULT_HISTORY_WINDOW,
  DEFAULT_MAX_ACTIONS_PER_TYPE,
  DEFAULT_MAX_CAPTURE_FAILURES,
  DEFAULT_MAX_RECOVERY_EPISODES,
  DEFAULT_MAX_STEPS,
  DEFAULT_MAX_SWIPE_DURATION_MS,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_PLANNER_TIMEOUT_MS,
  DEFAULT_RECOVERY_LOOKBACK,
  DEFAULT_RECOVERY_PLACEHOLDER_TEXT,
  DEFAULT_RECOVERY_SETTLE_MS,
  DEFAULT_STEP_DELAY,
  MIN_SCREEN_DIMENSION,
} from "./constants.js";
import type { AgentConfig } from "./config.js";
import {
  AgentError,
  ConfigurationError,
  DriverError,
  errorMessage,
  PlannerError,
  RunawayRepetitionError,
  StallError,
  type ErrorKind,
} from "./errors.js";
import type { Planner } from "./llm-providers.js";
import { logger, type SessionLogger } from "./logger.js";
import { describeAction, mergeInstructions } from "./prompts.js";
import { runRecovery } from "./recovery.js";
import { interpretReply } from "./response-interpreter.js";
import {
  admit,
  createTracker,
  DEFAULT_TRACKER_LIMITS,
  observeForeground,
  setKeyboardVisible,
  type TrackerState,
} from "./state-tracker.js";
import {
  advanceStall,
  clearStall,
  computeStallSignature,
  createStallState,
  DEFAULT_STALL_SETTINGS,
  isStalled,
  recentActionsShareType,
  stallThreshold,
  type StallState,
} from "./stuck.js";
import { sleep, withTimeout } from "./timeout.js";
import {
  advanceStatus,
  isTerminalStatus,
  type Action,
  type ActionCounts,
  type DeviceState,
  type GoalStatus,
  type Step,
} from "./types.js";

// ─── Public Types ───────────────────────────────────────────────

/** The parts of AgentConfig a run reads. */
export type LoopSettings = Pick<
  AgentConfig,
  | "maxSteps"
  | "stepDelay"
  | "historyWindow"
  | "maxActionsPerType"
  | "stallThreshold"
  | "browserStallMultiplier"
  | "homeStallMultiplier"
  | "stallTimeBucketMs"
  | "recoveryLookback"
  | "maxRecoveryEpisodes"
  | "recoverySettleMs"
  | "recoveryPlaceholderText"
  | "maxCaptureFailures"
  | "sameTapSoftLimit"
  | "sameTapHardLimit"
  | "repeatAttemptCeiling"
  | "maxWaitMs"
  | "maxSwipeDurationMs"
  | "deviceTimeoutMs"
  | "plannerTimeoutMs"
>;

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  maxSteps: DEFAULT_MAX_STEPS,
  stepDelay: DEFAULT_STEP_DELAY,
  historyWindow: DEFAULT_HISTORY_WINDOW,
  maxActionsPerType: DEFAULT_MAX_ACTIONS_PER_TYPE,
  ...DEFAULT_STALL_SETTINGS,
  recoveryLookback: DEFAULT_RECOVERY_LOOKBACK,
  maxRecoveryEpisodes: DEFAULT_MAX_RECOVERY_EPISODES,
  recoverySettleMs: DEFAULT_RECOVERY_SETTLE_MS,
  recoveryPlaceholderText: DEFAULT_RECOVERY_PLACEHOLDER_TEXT,
  maxCaptureFailures: DEFAULT_MAX_CAPTURE_FAILURES,
  ...DEFAULT_TRACKER_LIMITS,
  maxWaitMs: DEFAULT_MAX_WAIT_MS,
  maxSwipeDurationMs: DEFAULT_MAX_SWIPE_DURATION_MS,
  deviceTimeoutMs: DEFAULT_DEVICE_TIMEOUT_MS,
  plannerTimeoutMs: DEFAULT_PLANNER_TIMEOUT_MS,
};

export interface AgentLoopOptions {
  goal: string;
  context?: string;
  /** Extra planner instructions; the defaults are appended unless already present */
  instructions?: string[];
  device: Device;
  planner: Planner;
  settings?: Partial<LoopSettings>;
  /** Cancellation, checked between steps */
  signal?: AbortSignal;
  /** Awaited between steps, e.g. to wait for the operator */
  pause?: () => Promise<void>;
  sessionLogger?: SessionLogger;
  onStep?: (step: Step, index: number) => void;
  /** Clock for capture timestamps */
  now?: () => number;
}

export type FailureKind = ErrorKind | "goal_failed" | "step_budget";

export interface RunFailure {
  kind: FailureKind;
  message: string;
}

/** Everything a run carries from one step to the next. */
export interface RunState {
  status: GoalStatus;
  history: Step[];
  tracker: TrackerState;
  stall: StallState;
  /** Planner requests per action type, terminal ones included */
  actionCounts: ActionCounts;
  recoveryEpisodes: number;
  captureFailures: number;
  /** Planner calls made */
  stepsUsed: number;
  failure?: RunFailure;
}

export interface AgentResult {
  status: GoalStatus;
  history: Step[];
  actionCounts: ActionCounts;
  stepsUsed: number;
  failure?: RunFailure;
}

export interface StepContext {
  goal: string;
  context?: string;
  instructions: string[];
  device: Device;
  planner: Planner;
  settings: LoopSettings;
  now: () => number;
  record: (step: Step, index: number) => void;
  /** Run cancellation; only cuts waits short, never a device call */
  signal?: AbortSignal;
}

export function createRun(): RunState {
  return {
    status: "initial",
    history: [],
    tracker: createTracker(),
    stall: createStallState(),
    actionCounts: {},
    recoveryEpisodes: 0,
    captureFailures: 0,
    stepsUsed: 0,
  };
}

// ─── Step Pieces ────────────────────────────────────────────────

function fail(run: RunState, kind: FailureKind, message: string): RunState {
  if (isTerminalStatus(run.status)) return run;
  logger.error(`Run failed (${kind}): ${message}`);
  return { ...run, status: advanceStatus(run.status, "failed"), failure: { kind, message } };
}

function failWith(run: RunState, err: AgentError): RunState {
  return fail(run, err.kind, err.message);
}

function appendSteps(ctx: StepContext, run: RunState, steps: Step[]): RunState {
  const history = [...run.history];
  for (const step of steps) {
    history.push(step);
    ctx.record(step, history.length);
  }
  return { ...run, history };
}

function plannerSteps(history: readonly Step[]): number {
  return history.filter((step) => !step.synthetic).length;
}

async function captureState(ctx: StepContext): Promise<{ state: DeviceState; keyboardVisible: boolean }> {
  const { device, settings } = ctx;
  const timeout = settings.deviceTimeoutMs;
  const size = await callDevice("screen size", (signal) => device.screenSize(signal), timeout);
  if (size.width < MIN_SCREEN_DIMENSION || size.height < MIN_SCREEN_DIMENSION) {
    throw new DriverError(`Unusable screen size ${size.width}x${size.height}`);
  }
  const screenshot = await callDevice("screenshot", (signal) => device.captureScreenshot(signal), timeout);
  const foregroundApp = await callDevice("foreground app", (signal) => device.foregroundAppId(signal), timeout);

  let keyboardVisible = false;
  try {
    keyboardVisible = await callDevice("keyboard state", (signal) => device.keyboardVisible(signal), timeout);
  } catch (err) {
    logger.warn(`Keyboard state unavailable, assuming hidden: ${errorMessage(err)}`);
  }

  const state: DeviceState = Object.freeze({
    screenshot,
    width: size.width,
    height: size.height,
    foregroundApp,
    capturedAt: ctx.now(),
  });
  return { state, keyboardVisible };
}

interface PlannedAction {
  action: Action;
  /** Set when the planner itself failed and the action is the stand-in failure */
  error?: PlannerError;
}

async function requestAction(
  ctx: StepContext,
  run: RunState,
  state: DeviceState,
  keyboardVisible: boolean
): Promise<PlannedAction> {
  const { settings } = ctx;
  try {
    const reply = await withTimeout(
      ctx.planner.planAction({
        goal: ctx.goal,
        context: ctx.context,
        instructions: ctx.instructions,
        state,
        keyboardVisible,
        history: run.history.slice(-settings.historyWindow),
        actionCounts: run.actionCounts,
        stepNumber: run.stepsUsed,
        maxSteps: settings.maxSteps,
      }),
      settings.plannerTimeoutMs,
      "planner"
    );
    if (typeof reply !== "string") return { action: reply };
    if (reply.trim() === "") throw new PlannerError("empty reply");

    const interpreted = interpretReply(reply);
    if (interpreted.phase !== "structured") {
      logger.warn(`Planner reply ${interpreted.phase}${interpreted.phase === "inferred" ? ` by ${interpreted.rule}` : ""}: ${interpreted.issue ?? ""}`);
    }
    return { action: interpreted.action };
  } catch (err) {
    const error = err instanceof PlannerError ? err : new PlannerError(`planner error: ${errorMessage(err)}`, { cause: err });
    logger.error(error.message);
    return { action: { type: "failure", reason: error.message }, error };
  }
}

// ─── Step Function ──────────────────────────────────────────────

export async function runStep(ctx: StepContext, start: RunState): Promise<RunState> {
  if (isTerminalStatus(start.status)) return start;
  const { settings, device } = ctx;
  let run = start;

  // ── 1. Capture ──────────────────────────────────────────
  let captured: { state: DeviceState; keyboardVisible: boolean };
  try {
    captured = await captureState(ctx);
  } catch (err) {
    const captureFailures = run.captureFailures + 1;
    logger.warn(`Capture failed (${captureFailures}/${settings.maxCaptureFailures}): ${errorMessage(err)}`);
    run = { ...run, captureFailures };
    if (captureFailures >= settings.maxCaptureFailures) {
      return fail(run, "driver", `Device capture failed ${captureFailures} times in a row: ${errorMessage(err)}`);
    }
    return run;
  }
  const { state, keyboardVisible } = captured;
  let tracker = setKeyboardVisible(observeForeground(run.tracker, state.foregroundApp), keyboardVisible);
  run = { ...run, captureFailures: 0, tracker };

  // ── 2. Stall signature ──────────────────────────────────
  const stall = advanceStall(run.stall, computeStallSignature(state, tracker.homeDwell, settings));
  run = { ...run, stall };

  // ── 3. Stall handling ───────────────────────────────────
  if (isStalled(stall, state.foregroundApp, settings)) {
    const sameType = recentActionsShareType(run.history, settings.recoveryLookback);
    if (!sameType || run.recoveryEpisodes >= settings.maxRecoveryEpisodes) {
      return failWith(
        run,
        new StallError(
          `No progress on ${state.foregroundApp} for ${stall.repeat} captures` +
            (sameType ? ` after ${run.recoveryEpisodes} recovery episodes` : "")
        )
      );
    }
    logger.warn(
      `Stall on ${state.foregroundApp} (${stall.repeat} >= ${stallThreshold(state.foregroundApp, settings)}), starting recovery`
    );
    const outcome = await runRecovery({
      device,
      state,
      history: run.history,
      tracker,
      goal: ctx.goal,
      context: ctx.context,
      settleMs: settings.recoverySettleMs,
      placeholderText: settings.recoveryPlaceholderText,
      deviceTimeoutMs: settings.deviceTimeoutMs,
    });
    run = appendSteps(ctx, run, outcome.steps);
    return { ...run, stall: clearStall(run.stall), recoveryEpisodes: run.recoveryEpisodes + 1 };
  }

  // ── 4. Plan ─────────────────────────────────────────────
  run = { ...run, stepsUsed: run.stepsUsed + 1 };
  const { action, error: plannerError } = await requestAction(ctx, run, state, keyboardVisible);
  const actionCounts = { ...run.actionCounts, [action.type]: (run.actionCounts[action.type] ?? 0) + 1 };
  run = { ...run, actionCounts };
  logger.info(`Step ${run.stepsUsed}: ${describeAction(action)}${action.reason ? ` (${action.reason})` : ""}`);

  // ── 5. Terminal actions ─────────────────────────────────
  if (action.type === "success") {
    return { ...run, status: advanceStatus(run.status, "success") };
  }
  if (plannerError) return failWith(run, plannerError);
  if (action.type === "failure") {
    return fail(run, "goal_failed", action.reason ?? "Planner reported failure");
  }
  run = { ...run, status: advanceStatus(run.status, "running") };

  // ── 6. Runaway guard ────────────────────────────────────
  const requested = actionCounts[action.type] ?? 0;
  if (requested > settings.maxActionsPerType) {
    return failWith(
      run,
      new RunawayRepetitionError(`${action.type} requested ${requested} times (limit ${settings.maxActionsPerType})`)
    );
  }

  // ── 7. Admission ────────────────────────────────────────
  const admission = admit(tracker, action, { screen: state, foregroundApp: state.foregroundApp }, {
    sameTapSoftLimit: settings.sameTapSoftLimit,
    sameTapHardLimit: settings.sameTapHardLimit,
    repeatAttemptCeiling: settings.repeatAttemptCeiling,
  });
  tracker = admission.tracker;
  run = { ...run, tracker };
  if (admission.warning) logger.warn(admission.warning);

  let step: Step;
  if (!admission.admitted) {
    step = {
      state,
      action,
      success: false,
      vetoed: true,
      synthetic: false,
      message: `vetoed (${admission.rule}): ${admission.warning ?? ""}`,
    };
  } else {
    // ── 8. Execute ────────────────────────────────────────
    try {
      const result = await executeAction(device, action, state, {
        timeoutMs: settings.deviceTimeoutMs,
        maxWaitMs: settings.maxWaitMs,
        maxSwipeDurationMs: settings.maxSwipeDurationMs,
        signal: ctx.signal,
      });
      step = { state, action, success: result.success, vetoed: false, synthetic: false, message: result.message };
    } catch (err) {
      step = { state, action, success: false, vetoed: false, synthetic: false, message: errorMessage(err) };
    }
  }
  logger.info(`Step ${run.stepsUsed} result: ${step.success ? "OK" : "FAILED"}: ${step.message}`);
  run = appendSteps(ctx, run, [step]);

  // ── 9. Budget ───────────────────────────────────────────
  if (plannerSteps(run.history) >= settings.maxSteps) {
    return fail(run, "step_budget", `Step budget of ${settings.maxSteps} exhausted`);
  }
  return run;
}

// ─── Abort Cleanup ──────────────────────────────────────────────

async function cleanupAfterAbort(ctx: StepContext, run: RunState): Promise<void> {
  const timeout = ctx.settings.deviceTimeoutMs;
  const press = async (label: string, code: number) => {
    try {
      await callDevice(label, (signal) => ctx.device.pressKey(code, signal), timeout);
    } catch (err) {
      logger.warn(`Cleanup ${label} failed: ${errorMessage(err)}`);
    }
  };
  if (run.tracker.keyboardVisible) await press("dismiss keyboard", KEY_CODES.back);
  await press("press home", KEY_CODES.home);
}

// ─── Main Agent Loop ────────────────────────────────────────────

export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentResult> {
  const goal = options.goal.trim();
  if (!goal) throw new ConfigurationError("A goal is required");

  const settings: LoopSettings = { ...DEFAULT_LOOP_SETTINGS, ...options.settings };
  const { signal, pause, sessionLogger, onStep } = options;
  const ctx: StepContext = {
    goal,
    context: options.context,
    instructions: mergeInstructions(options.instructions),
    device: options.device,
    planner: options.planner,
    settings,
    now: options.now ?? Date.now,
    signal,
    record: (step, index) => {
      sessionLogger?.logStep(step);
      onStep?.(step, index);
    },
  };

  logger.info(`Goal: ${goal}`);
  let run = createRun();

  try {
    while (!isTerminalStatus(run.status)) {
      if (signal?.aborted) {
        logger.warn("Run aborted");
        await cleanupAfterAbort(ctx, run);
        run = fail(run, "aborted", "Run aborted");
        break;
      }

      run = await runStep(ctx, run);
      if (isTerminalStatus(run.status)) break;

      if (pause) await pause();
      await sleep(settings.stepDelay * 1000, signal);
    }
  } catch (err) {
    // runStep absorbs device and planner errors; anything else is a bug
    run = fail(run, "driver", `Unexpected loop error: ${errorMessage(err)}`);
  }

  const result: AgentResult = {
    status: run.status,
    history: run.history,
    actionCounts: run.actionCounts,
    stepsUsed: run.stepsUsed,
    failure: run.failure,
  };
  logger.info(`Run finished: ${result.status} after ${result.stepsUsed} planner steps`);
  sessionLogger?.finalize(result.status, result.actionCounts, result.failure);
  return result;
}
