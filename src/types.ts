// ─── Coordinates ────────────────────────────────────────────────

/**
 * `fractional` coordinates were given as a fraction of the screen and are
 * stored scaled into the internal 0–1000 space. `absolute` coordinates are
 * device pixels.
 */
export type CoordinateMode = "fractional" | "absolute";

export interface Coordinate {
  x: number;
  y: number;
  mode: CoordinateMode;
}

/** A point in unit space, [0,1] on both axes. */
export interface UnitPoint {
  x: number;
  y: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

// ─── Actions ────────────────────────────────────────────────────

export type PressKey = "home" | "back" | "enter";

export type ActionVariant =
  | { type: "tap"; coordinate: Coordinate }
  | { type: "type"; text: string }
  | { type: "press"; key: PressKey }
  | { type: "swipe"; start: Coordinate; end: Coordinate; durationMs: number }
  | { type: "swipe_up" }
  | { type: "swipe_down" }
  | { type: "launch_app"; packageId: string; activity?: string }
  | { type: "wait"; durationMs: number }
  | { type: "screenshot" }
  | { type: "success" }
  | { type: "failure" };

export type Action = ActionVariant & { reason?: string };

export type ActionType = ActionVariant["type"];

export const ACTION_TYPES: readonly ActionType[] = [
  "tap",
  "type",
  "press",
  "swipe",
  "swipe_up",
  "swipe_down",
  "launch_app",
  "wait",
  "screenshot",
  "success",
  "failure",
];

export function isTerminalAction(action: Action): boolean {
  return action.type === "success" || action.type === "failure";
}

// ─── Device State & History ─────────────────────────────────────

export interface DeviceState {
  /** Base64-encoded PNG */
  readonly screenshot: string;
  readonly width: number;
  readonly height: number;
  readonly foregroundApp: string;
  /** Epoch milliseconds */
  readonly capturedAt: number;
}

export interface Step {
  state: DeviceState;
  action: Action;
  success: boolean;
  /** Refused by the state tracker, never sent to the device */
  vetoed: boolean;
  /** Issued by the recovery selector rather than the planner */
  synthetic: boolean;
  message: string;
}

// ─── Goal Status ────────────────────────────────────────────────

export type GoalStatus = "initial" | "running" | "success" | "failed";

export function isTerminalStatus(status: GoalStatus): boolean {
  return status === "success" || status === "failed";
}

/**
 * Moves a run to its next status. Terminal statuses are sticky and
 * nothing returns to "initial".
 */
export function advanceStatus(current: GoalStatus, next: GoalStatus): GoalStatus {
  if (isTerminalStatus(current)) return current;
  if (next === "initial") return current;
  return next;
}

export type ActionCounts = Partial<Record<ActionType, number>>;

export interface ActionResult {
  success: boolean;
  message: string;
}
