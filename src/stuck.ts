/**
 * Stall detection.
 *
 * A stall signature is a coarse fingerprint of what the device looks like:
 * foreground app, a wall-clock bucket, screen size and whether the launcher
 * is showing. The loop compares each capture's signature with the previous
 * one; a run of equal signatures longer than the context-scaled threshold
 * is a stall.
 */

import { appContextOf, type AppContext } from "./apps.js";
import {
  DEFAULT_BROWSER_STALL_MULTIPLIER,
  DEFAULT_HOME_STALL_MULTIPLIER,
  DEFAULT_STALL_THRESHOLD,
  DEFAULT_STALL_TIME_BUCKET_MS,
} from "./constants.js";
import type { DeviceState, Step } from "./types.js";

export interface StallSettings {
  stallThreshold: number;
  browserStallMultiplier: number;
  homeStallMultiplier: number;
  stallTimeBucketMs: number;
}

export const DEFAULT_STALL_SETTINGS: StallSettings = {
  stallThreshold: DEFAULT_STALL_THRESHOLD,
  browserStallMultiplier: DEFAULT_BROWSER_STALL_MULTIPLIER,
  homeStallMultiplier: DEFAULT_HOME_STALL_MULTIPLIER,
  stallTimeBucketMs: DEFAULT_STALL_TIME_BUCKET_MS,
};

export interface StallState {
  readonly signature: string | null;
  /** Consecutive captures that matched `signature` */
  readonly repeat: number;
}

export function createStallState(): StallState {
  return { signature: null, repeat: 0 };
}

/**
 * The home flag is min(dwell, 1) rather than the dwell count itself, which
 * would change on every capture and never let a launcher stall register.
 */
export function computeStallSignature(
  state: DeviceState,
  homeDwell: number,
  settings: StallSettings = DEFAULT_STALL_SETTINGS
): string {
  const bucket = Math.floor(state.capturedAt / settings.stallTimeBucketMs);
  const onHome = Math.min(homeDwell, 1);
  return `${state.foregroundApp}|${bucket}|${state.width}x${state.height}|${onHome}`;
}

export function advanceStall(stall: StallState, signature: string): StallState {
  if (stall.signature === signature) return { signature, repeat: stall.repeat + 1 };
  return { signature, repeat: 0 };
}

/** Clears the repeat count after a recovery episode, keeping the signature. */
export function clearStall(stall: StallState): StallState {
  return { signature: stall.signature, repeat: 0 };
}

export function stallMultiplier(context: AppContext, settings: StallSettings): number {
  switch (context) {
    case "browser":
      return settings.browserStallMultiplier;
    case "home":
      return settings.homeStallMultiplier;
    case "app":
      return 1;
  }
}

/** Browsers load slowly and the launcher is often a legitimate waypoint. */
export function stallThreshold(appId: string, settings: StallSettings = DEFAULT_STALL_SETTINGS): number {
  return settings.stallThreshold * stallMultiplier(appContextOf(appId), settings);
}

export function isStalled(stall: StallState, appId: string, settings: StallSettings = DEFAULT_STALL_SETTINGS): boolean {
  return stall.repeat >= stallThreshold(appId, settings);
}

/** True when the last `lookback` recorded actions all have one type. */
export function recentActionsShareType(history: readonly Step[], lookback: number): boolean {
  if (lookback <= 0 || history.length < lookback) return false;
  const recent = history.slice(-lookback);
  const first = recent[0];
  return first !== undefined && recent.every((step) => step.action.type === first.action.type);
}
