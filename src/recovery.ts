/**
 * Recovery strategy selector.
 *
 * Runs when the loop sees a stall. Strategies are tried in order, each at
 * most once per episode, and the first one that works ends the episode.
 * Every attempt becomes a synthetic Step so the planner and the session log
 * see what was done on its behalf.
 */

import { callDevice, KEY_CODES, type Device } from "./actions.js";
import { findAppMention } from "./apps.js";
import { DEFAULT_DEVICE_TIMEOUT_MS, DEFAULT_RECOVERY_PLACEHOLDER_TEXT, DEFAULT_RECOVERY_SETTLE_MS } from "./constants.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { packageOf } from "./region-classifier.js";
import type { TrackerState } from "./state-tracker.js";
import { sleep } from "./timeout.js";
import type { Action, DeviceState, Step } from "./types.js";

export type RecoveryStrategy = "launch-target" | "keyboard-placeholder" | "direct-inject" | "press-back";

export interface RecoveryContext {
  device: Device;
  state: DeviceState;
  history: readonly Step[];
  tracker: TrackerState;
  goal: string;
  context?: string;
  settleMs?: number;
  placeholderText?: string;
  deviceTimeoutMs?: number;
}

export interface RecoveryOutcome {
  recovered: boolean;
  strategy?: RecoveryStrategy;
  steps: Step[];
}

interface Attempt {
  strategy: RecoveryStrategy;
  action: Action;
  run: () => Promise<boolean>;
}

/**
 * Package the run is trying to reach but is not in: the latest launch the
 * planner asked for, else an app named in the goal or context.
 */
export function stuckLaunchTarget(
  history: readonly Step[],
  foregroundApp: string,
  goal: string,
  context?: string
): string | null {
  const foreground = packageOf(foregroundApp);
  for (let i = history.length - 1; i >= 0; i--) {
    const step = history[i];
    if (step && !step.synthetic && step.action.type === "launch_app") {
      return step.action.packageId !== foreground ? step.action.packageId : null;
    }
  }
  const mentioned = findAppMention(context ? `${goal} ${context}` : goal);
  return mentioned && mentioned !== foreground ? mentioned : null;
}

async function planAttempts(ctx: RecoveryContext): Promise<Attempt[]> {
  const timeoutMs = ctx.deviceTimeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
  const placeholder = ctx.placeholderText ?? DEFAULT_RECOVERY_PLACEHOLDER_TEXT;
  const { device } = ctx;
  const attempts: Attempt[] = [];

  const target = stuckLaunchTarget(ctx.history, ctx.state.foregroundApp, ctx.goal, ctx.context);
  if (target) {
    attempts.push({
      strategy: "launch-target",
      action: { type: "launch_app", packageId: target, reason: "recovery: relaunch stuck target" },
      run: async () => {
        await callDevice("launch", (signal) => device.launchApp(target, undefined, signal), timeoutMs);
        await sleep(ctx.settleMs ?? DEFAULT_RECOVERY_SETTLE_MS);
        const now = await callDevice("foreground app", (signal) => device.foregroundAppId(signal), timeoutMs);
        return packageOf(now) === target;
      },
    });
  }

  let keyboard = false;
  try {
    keyboard = await callDevice("keyboard state", (signal) => device.keyboardVisible(signal), timeoutMs);
  } catch (err) {
    logger.warn(`Recovery could not read keyboard state: ${errorMessage(err)}`);
  }
  if (keyboard) {
    attempts.push({
      strategy: "keyboard-placeholder",
      action: { type: "type", text: placeholder, reason: "recovery: type into visible keyboard" },
      run: () => callDevice("type", (signal) => device.typeText(placeholder, signal), timeoutMs),
    });
  }

  const pixels = ctx.tracker.lastTapPixels;
  if (ctx.tracker.lastTapRegion === "input_likely" && pixels) {
    const [x, y] = pixels;
    attempts.push({
      strategy: "direct-inject",
      action: { type: "type", text: placeholder, reason: `recovery: direct text inject at (${x}, ${y})` },
      run: () => callDevice("direct inject", (signal) => device.directTextInject(placeholder, x, y, signal), timeoutMs),
    });
  }

  attempts.push({
    strategy: "press-back",
    action: { type: "press", key: "back", reason: "recovery: press back" },
    run: () => callDevice("press back", (signal) => device.pressKey(KEY_CODES.back, signal), timeoutMs),
  });

  return attempts;
}

export async function runRecovery(ctx: RecoveryContext): Promise<RecoveryOutcome> {
  const steps: Step[] = [];
  for (const attempt of await planAttempts(ctx)) {
    let ok = false;
    let message: string;
    try {
      ok = await attempt.run();
      message = `recovery ${attempt.strategy} ${ok ? "succeeded" : "did not help"}`;
    } catch (err) {
      message = `recovery ${attempt.strategy} failed: ${errorMessage(err)}`;
    }
    logger.info(message);
    steps.push({ state: ctx.state, action: attempt.action, success: ok, vetoed: false, synthetic: true, message });
    if (ok) return { recovered: true, strategy: attempt.strategy, steps };
  }
  return { recovered: false, steps };
}
