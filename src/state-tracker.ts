/**
 * Action admission for the agent loop.
 *
 * The tracker is a plain immutable value. `admit`, `setKeyboardVisible` and
 * `observeForeground` each return the next value; the loop owns the current
 * one for the length of a run and starts every run from `createTracker()`.
 *
 * Policy in short:
 *   - tap: veto once the same coordinate repeats past the hard limit
 *   - type: always admitted, the rule says why (typing blind is allowed,
 *     because vetoing a real type blocks all progress while a stray type
 *     into a non-input area is harmless)
 *   - everything else: veto once when one type runs past the attempt
 *     ceiling with nothing else in between, then start counting again
 */

import { isHomeScreen } from "./apps.js";
import {
  DEFAULT_REPEAT_ATTEMPT_CEILING,
  DEFAULT_SAME_TAP_HARD_LIMIT,
  DEFAULT_SAME_TAP_SOFT_LIMIT,
} from "./constants.js";
import { formatCoordinate, sameCoordinate, toPixels, toUnitPoint } from "./coordinates.js";
import {
  matchRegion,
  type ClassifierOptions,
  type RegionLabel,
  type RegionMatch,
} from "./region-classifier.js";
import type { Action, ActionCounts, ActionType, Coordinate, ScreenSize } from "./types.js";

export interface TrackerState {
  readonly lastAction: ActionType | null;
  /** Every action offered for admission, by type */
  readonly attempts: ActionCounts;
  /** Consecutive admissions of `lastAction` */
  readonly repeatRun: number;
  readonly sameTapCount: number;
  readonly lastTap: Coordinate | null;
  readonly lastTapPixels: readonly [number, number] | null;
  readonly lastTapRegion: RegionLabel | null;
  readonly inputBoxTapped: boolean;
  readonly mustTypeNext: boolean;
  readonly keyboardVisible: boolean;
  readonly typedBlind: boolean;
  /** Consecutive observations of a launcher or unknown foreground app */
  readonly homeDwell: number;
}

export interface TrackerLimits {
  sameTapSoftLimit: number;
  sameTapHardLimit: number;
  repeatAttemptCeiling: number;
  classifier?: ClassifierOptions;
}

export const DEFAULT_TRACKER_LIMITS: TrackerLimits = {
  sameTapSoftLimit: DEFAULT_SAME_TAP_SOFT_LIMIT,
  sameTapHardLimit: DEFAULT_SAME_TAP_HARD_LIMIT,
  repeatAttemptCeiling: DEFAULT_REPEAT_ATTEMPT_CEILING,
};

export type AdmissionRule =
  | "tap"
  | "tap-repeat-warning"
  | "tap-repeat-limit"
  | "keyboard-visible"
  | "input-focused"
  | "last-tap-input"
  | "typed-blind"
  | "repeat-ceiling"
  | "admitted";

export interface Admission {
  tracker: TrackerState;
  admitted: boolean;
  rule: AdmissionRule;
  warning?: string;
  /** Present for taps that got far enough to be classified */
  region?: RegionMatch;
}

export interface AdmissionContext {
  screen: ScreenSize;
  foregroundApp: string;
}

export function createTracker(): TrackerState {
  return {
    lastAction: null,
    attempts: {},
    repeatRun: 0,
    sameTapCount: 0,
    lastTap: null,
    lastTapPixels: null,
    lastTapRegion: null,
    inputBoxTapped: false,
    mustTypeNext: false,
    keyboardVisible: false,
    typedBlind: false,
    homeDwell: 0,
  };
}

export const resetTracker = createTracker;

function countAttempt(tracker: TrackerState, type: ActionType): ActionCounts {
  return { ...tracker.attempts, [type]: (tracker.attempts[type] ?? 0) + 1 };
}

function runLength(tracker: TrackerState, type: ActionType): number {
  return tracker.lastAction === type ? tracker.repeatRun + 1 : 1;
}

function admitTap(
  tracker: TrackerState,
  coordinate: Coordinate,
  context: AdmissionContext,
  limits: TrackerLimits
): Admission {
  const attempts = countAttempt(tracker, "tap");
  const repeated = sameCoordinate(tracker.lastTap, coordinate);
  const sameTapCount = repeated ? tracker.sameTapCount + 1 : 0;

  if (sameTapCount > limits.sameTapHardLimit) {
    return {
      tracker: { ...tracker, attempts, sameTapCount },
      admitted: false,
      rule: "tap-repeat-limit",
      warning: `Tapped ${formatCoordinate(coordinate)} ${sameTapCount + 1} times in a row, refusing to repeat it`,
    };
  }

  const region = matchRegion(
    toUnitPoint(coordinate, context.screen),
    context.foregroundApp,
    limits.classifier
  );
  const isInput = region.label === "input_likely";
  const overSoftLimit = sameTapCount > limits.sameTapSoftLimit;

  return {
    tracker: {
      ...tracker,
      attempts,
      lastAction: "tap",
      repeatRun: runLength(tracker, "tap"),
      sameTapCount,
      lastTap: coordinate,
      lastTapPixels: toPixels(coordinate, context.screen),
      lastTapRegion: region.label,
      // A non-input tap keeps the focus flags for one more action, the
      // classifier is coarse enough that the planner may have been right.
      inputBoxTapped: isInput || tracker.inputBoxTapped,
      mustTypeNext: isInput || tracker.mustTypeNext,
    },
    admitted: true,
    rule: overSoftLimit ? "tap-repeat-warning" : "tap",
    warning: overSoftLimit
      ? `Same tap position ${formatCoordinate(coordinate)} repeated ${sameTapCount} times`
      : undefined,
    region,
  };
}

function typeRule(tracker: TrackerState): AdmissionRule {
  if (tracker.keyboardVisible) return "keyboard-visible";
  if (tracker.inputBoxTapped) return "input-focused";
  if (tracker.lastTapRegion === "input_likely") return "last-tap-input";
  return "typed-blind";
}

function admitType(tracker: TrackerState): Admission {
  const rule = typeRule(tracker);
  const typedBlind = rule === "typed-blind";
  return {
    tracker: {
      ...tracker,
      attempts: countAttempt(tracker, "type"),
      lastAction: "type",
      repeatRun: runLength(tracker, "type"),
      inputBoxTapped: false,
      mustTypeNext: false,
      typedBlind,
    },
    admitted: true,
    rule,
    warning: typedBlind ? "Typing without a focused input field or visible keyboard" : undefined,
  };
}

function admitRepeatable(
  tracker: TrackerState,
  type: ActionType,
  limits: TrackerLimits
): Admission {
  const attempts = countAttempt(tracker, type);
  const run = runLength(tracker, type);

  if (run > limits.repeatAttemptCeiling) {
    return {
      tracker: { ...tracker, attempts, lastAction: type, repeatRun: 0 },
      admitted: false,
      rule: "repeat-ceiling",
      warning: `${type} repeated ${run} times in a row, skipping once`,
    };
  }

  return {
    tracker: { ...tracker, attempts, lastAction: type, repeatRun: run },
    admitted: true,
    rule: "admitted",
  };
}

/** Decides whether `action` may run, and returns the tracker that follows. */
export function admit(
  tracker: TrackerState,
  action: Action,
  context: AdmissionContext,
  limits: TrackerLimits = DEFAULT_TRACKER_LIMITS
): Admission {
  switch (action.type) {
    case "tap":
      return admitTap(tracker, action.coordinate, context, limits);
    case "type":
      return admitType(tracker);
    default:
      return admitRepeatable(tracker, action.type, limits);
  }
}

/** A visible keyboard is stronger evidence of focus than any tap position. */
export function setKeyboardVisible(tracker: TrackerState, visible: boolean): TrackerState {
  if (!visible) return { ...tracker, keyboardVisible: false };
  return { ...tracker, keyboardVisible: true, inputBoxTapped: true, mustTypeNext: true };
}

export function observeForeground(tracker: TrackerState, appId: string): TrackerState {
  return { ...tracker, homeDwell: isHomeScreen(appId) ? tracker.homeDwell + 1 : 0 };
}
