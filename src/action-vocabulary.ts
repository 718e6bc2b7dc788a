/**
 * Names planners use for actions and fields, as data.
 *
 * Replies drift between prompt versions and models: `action_type` vs
 * `action`, `x`/`y` vs `coordinates: [x, y]`, `package` vs `text`. The
 * interpreter reads payloads only through these tables.
 */

import type { PressKey } from "./types.js";

export type ActionName =
  | "tap"
  | "type"
  | "press"
  | "press_home"
  | "press_back"
  | "press_enter"
  | "swipe"
  | "swipe_up"
  | "swipe_down"
  | "scroll"
  | "launch_app"
  | "wait"
  | "screenshot"
  | "success"
  | "failure";

/** Keys that name the action type and nothing else. */
export const EXPLICIT_ACTION_KEYS = ["action_type", "actionType", "action_name"] as const;

/** Keys that usually hold the action type but may mean something else. */
export const AMBIGUOUS_ACTION_KEYS = ["action", "type", "command", "operation", "name"] as const;

/**
 * Canonical names, in match order. Exact matches are tried across the whole
 * table first, then substring matches in this order, so `swipe_up` is found
 * before `swipe` and `enter_text` before `enter`.
 */
export const ACTION_NAMES: ReadonlyArray<{ name: ActionName; aliases: readonly string[] }> = [
  { name: "success", aliases: ["success", "done", "complete", "completed", "finish", "finished"] },
  { name: "failure", aliases: ["failure", "fail", "failed", "abort", "give_up"] },
  { name: "swipe_up", aliases: ["swipe_up", "swipeup", "scroll_down"] },
  { name: "swipe_down", aliases: ["swipe_down", "swipedown", "scroll_up"] },
  { name: "launch_app", aliases: ["launch_app", "launch", "open_app", "start_app", "open"] },
  { name: "screenshot", aliases: ["screenshot", "screen_capture", "capture"] },
  { name: "swipe", aliases: ["swipe", "drag", "fling"] },
  { name: "scroll", aliases: ["scroll"] },
  { name: "type", aliases: ["type", "type_text", "input", "input_text", "enter_text", "write", "text"] },
  { name: "tap", aliases: ["tap", "click", "touch", "press_at"] },
  { name: "wait", aliases: ["wait", "sleep", "pause", "delay"] },
  { name: "press_home", aliases: ["home", "go_home", "press_home"] },
  { name: "press_back", aliases: ["back", "go_back", "press_back"] },
  { name: "press_enter", aliases: ["enter", "submit", "press_enter"] },
  { name: "press", aliases: ["press", "key", "keyevent", "key_event", "button"] },
];

export const PRESS_NAME_KEYS: Readonly<Partial<Record<ActionName, PressKey>>> = {
  press_home: "home",
  press_back: "back",
  press_enter: "enter",
};

/** Key names and Android key codes accepted in a `key` field. */
export const KEY_NAMES: Readonly<Record<string, PressKey>> = {
  home: "home",
  "3": "home",
  keycode_home: "home",
  back: "back",
  "4": "back",
  keycode_back: "back",
  enter: "enter",
  "66": "enter",
  keycode_enter: "enter",
  return: "enter",
};

export const FIELD_SYNONYMS = {
  x: ["x", "x1", "start_x", "startX"],
  y: ["y", "y1", "start_y", "startY"],
  endX: ["end_x", "endX", "x2", "to_x"],
  endY: ["end_y", "endY", "y2", "to_y"],
  /** Nested point for single-point actions: {x, y} or [x, y] */
  point: ["coordinate", "coordinates", "point", "position", "location", "target"],
  start: ["start", "from", "begin"],
  end: ["end", "to", "finish"],
  text: ["text", "value", "input", "content", "query", "message"],
  key: ["key", "button", "keycode", "key_code", "code"],
  packageId: ["package", "package_name", "packageName", "app", "app_id", "appId", "app_name"],
  activity: ["activity", "activity_name", "activityName"],
  duration: ["duration", "duration_ms", "durationMs", "ms", "time"],
  direction: ["direction", "dir"],
  reason: ["reason", "reasoning", "why", "explanation", "thought"],
} as const;

export type PayloadField = keyof typeof FIELD_SYNONYMS;

// ─── Free-text inference ────────────────────────────────────────

/** Whole replies (lower case, trimmed, no trailing punctuation) with a fixed meaning. */
export const EXACT_PHRASES: Readonly<Record<string, ActionName>> = {
  "go home": "press_home",
  "press home": "press_home",
  "home": "press_home",
  "go back": "press_back",
  "press back": "press_back",
  "navigate back": "press_back",
  "back": "press_back",
  "press enter": "press_enter",
  "submit": "press_enter",
  "task completed": "success",
  "task complete": "success",
  "goal achieved": "success",
  "goal reached": "success",
  "done": "success",
  "task failed": "failure",
  "goal failed": "failure",
  "scroll down": "swipe_up",
  "scroll up": "swipe_down",
  "take a screenshot": "screenshot",
  "screenshot": "screenshot",
  "wait": "wait",
};

export const SUCCESS_KEYWORDS = /\b(?:success(?:ful|fully)?|succeeded|done|complete[ds]?|completion|achieved)\b/i;
export const FAILURE_KEYWORDS = /\b(?:fail(?:s|ed|ure)?|cannot|can't|can not|unable|impossible)\b/i;
export const TYPING_VERBS = ["type", "input", "enter", "write"] as const;
export const TAP_VERBS = ["tap", "click", "touch"] as const;
export const LAUNCH_VERBS = ["launch", "open", "start"] as const;
