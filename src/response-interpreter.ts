/**
 * Turns a planner reply into an Action.
 *
 * Phase 1 reads the delimited payload block through the synonym tables in
 * action-vocabulary.ts. When there is no block, or it does not carry the
 * fields its action needs, phase 2 runs an ordered list of free-text rules
 * over the whole reply. `interpretReply` never throws: a ParseError from
 * phase 1 only moves on to phase 2, and the last rule is press(home), which
 * is always legal and easy to recover from.
 */

import {
  ACTION_NAMES,
  AMBIGUOUS_ACTION_KEYS,
  EXACT_PHRASES,
  EXPLICIT_ACTION_KEYS,
  FAILURE_KEYWORDS,
  FIELD_SYNONYMS,
  KEY_NAMES,
  LAUNCH_VERBS,
  PRESS_NAME_KEYS,
  SUCCESS_KEYWORDS,
  TAP_VERBS,
  TYPING_VERBS,
  type ActionName,
  type PayloadField,
} from "./action-vocabulary.js";
import { resolvePackage } from "./apps.js";
import { DEFAULT_SWIPE_DURATION_MS, DEFAULT_WAIT_MS } from "./constants.js";
import { fromRawPair } from "./coordinates.js";
import { errorMessage, ParseError } from "./errors.js";
import type { Action } from "./types.js";

type JsonRecord = Record<string, unknown>;
type Pair = [number, number];

/** Intermediate form of a structured payload: every field optional, every synonym folded. */
export interface ActionPayload {
  name: string | null;
  point: Pair | null;
  start: Pair | null;
  end: Pair | null;
  text: string | null;
  key: string | null;
  packageId: string | null;
  activity: string | null;
  durationMs: number | null;
  direction: string | null;
  reason: string | null;
}

export type InferenceRule =
  | "exact-phrase"
  | "outcome-keyword"
  | "navigation-word"
  | "quoted-type"
  | "tap-coordinates"
  | "swipe-coordinates"
  | "swipe-direction"
  | "quoted-launch";

export type Interpretation =
  | { phase: "structured"; action: Action }
  | { phase: "inferred"; action: Action; rule: InferenceRule; issue?: string }
  | { phase: "default"; action: Action; issue?: string };

export const DEFAULT_ACTION: Action = { type: "press", key: "home" };

// ─── Phase 1: payload block ─────────────────────────────────────

const FENCED_BLOCK = /```[ \t]*([A-Za-z_-]*)[^\n]*\n?([\s\S]*?)```/g;
const PAYLOAD_LABELS = new Set(["action", "json", ""]);

/** The one block the payload lives in, or null. */
export function extractPayloadBlock(reply: string): string | null {
  const fenced: Array<{ label: string; body: string }> = [];
  for (const match of reply.matchAll(FENCED_BLOCK)) {
    fenced.push({ label: (match[1] ?? "").toLowerCase(), body: match[2] ?? "" });
  }

  const labelled = fenced.find((b) => b.label !== "" && PAYLOAD_LABELS.has(b.label) && b.body.includes("{"));
  const unlabelled = fenced.find((b) => b.label === "" && b.body.includes("{"));
  const block = labelled ?? unlabelled;
  if (block) return block.body.trim();

  const open = reply.indexOf("{");
  const close = reply.lastIndexOf("}");
  if (open !== -1 && close > open) return reply.slice(open, close + 1);
  return null;
}

/**
 * Planners echo the prompt's commented template and leave trailing commas
 * and raw newlines in strings.
 */
function relaxJson(text: string): string {
  return text
    .replace(/(^|[\s,{[])\/\/[^\n]*/g, "$1")
    .replace(/,(\s*[}\]])/g, "$1")
    .replace(/[\r\n]+/g, " ");
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeRecord(block: string): JsonRecord | null {
  for (const candidate of [block, relaxJson(block)]) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isRecord(parsed)) return parsed;
    } catch {
      // next candidate
    }
  }
  return null;
}

function pick(record: JsonRecord, field: PayloadField): unknown {
  for (const key of FIELD_SYNONYMS[field]) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && /^\s*-?\d+(?:\.\d+)?\s*$/.test(value)) return Number(value);
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return null;
}

function toPair(value: unknown): Pair | null {
  if (Array.isArray(value) && value.length >= 2) {
    const x = toNumber(value[0]);
    const y = toNumber(value[1]);
    return x !== null && y !== null ? [x, y] : null;
  }
  if (isRecord(value)) {
    const x = toNumber(pick(value, "x"));
    const y = toNumber(pick(value, "y"));
    return x !== null && y !== null ? [x, y] : null;
  }
  if (typeof value === "string") {
    const numbers = value.match(/-?\d+(?:\.\d+)?/g);
    if (numbers && numbers.length >= 2) return [Number(numbers[0]), Number(numbers[1])];
  }
  return null;
}

function topLevelPair(record: JsonRecord, xField: PayloadField, yField: PayloadField): Pair | null {
  const x = toNumber(pick(record, xField));
  const y = toNumber(pick(record, yField));
  return x !== null && y !== null ? [x, y] : null;
}

function actionNameOf(record: JsonRecord): string | null {
  for (const keys of [EXPLICIT_ACTION_KEYS, AMBIGUOUS_ACTION_KEYS]) {
    for (const key of keys) {
      const value = record[key];
      if (typeof value === "string" && value.trim() !== "") return value;
    }
  }
  return null;
}

export function normalizePayload(record: JsonRecord): ActionPayload {
  const point = toPair(pick(record, "point")) ?? topLevelPair(record, "x", "y");
  const duration = toNumber(pick(record, "duration"));
  return {
    name: actionNameOf(record),
    point,
    start: toPair(pick(record, "start")) ?? point,
    end: toPair(pick(record, "end")) ?? topLevelPair(record, "endX", "endY"),
    text: toText(pick(record, "text")),
    key: toText(pick(record, "key"))?.trim().toLowerCase() ?? null,
    packageId: toText(pick(record, "packageId")),
    activity: toText(pick(record, "activity")),
    // Small durations are seconds
    durationMs: duration === null || duration <= 0 ? null : duration < 100 ? duration * 1000 : duration,
    direction: toText(pick(record, "direction"))?.trim().toLowerCase() ?? null,
    reason: toText(pick(record, "reason")),
  };
}

/** Case-insensitive; exact alias first, then substring in table order. */
export function matchActionName(raw: string): ActionName | null {
  const norm = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (!norm) return null;
  const exact = ACTION_NAMES.find((entry) => entry.aliases.includes(norm));
  if (exact) return exact.name;
  const partial = ACTION_NAMES.find((entry) => entry.aliases.some((alias) => norm.includes(alias)));
  return partial ? partial.name : null;
}

type BuildResult = { ok: true; action: Action } | { ok: false; issue: string };

function built(action: Action, reason: string | null): BuildResult {
  return { ok: true, action: reason ? { ...action, reason } : action };
}

function missing(field: string, name: ActionName): BuildResult {
  return { ok: false, issue: `${name} without a usable ${field}` };
}

function directionalSwipe(direction: string | null, scroll: boolean): Action | null {
  if (direction === "up") return { type: scroll ? "swipe_down" : "swipe_up" };
  if (direction === "down") return { type: scroll ? "swipe_up" : "swipe_down" };
  return null;
}

function buildSwipe(payload: ActionPayload, name: ActionName): BuildResult {
  const startPair = payload.start;
  const endPair = payload.end;
  if (startPair && endPair) {
    const start = fromRawPair(startPair[0], startPair[1]);
    const end = fromRawPair(endPair[0], endPair[1]);
    if (!start || !end) return missing("start/end", name);
    return built(
      { type: "swipe", start, end, durationMs: payload.durationMs ?? DEFAULT_SWIPE_DURATION_MS },
      payload.reason
    );
  }
  const directional = directionalSwipe(payload.direction, name === "scroll");
  return directional ? built(directional, payload.reason) : missing("start/end", name);
}

export function buildAction(payload: ActionPayload): BuildResult {
  if (!payload.name) return { ok: false, issue: "no action name" };
  const name = matchActionName(payload.name);
  if (!name) return { ok: false, issue: `unknown action "${payload.name}"` };

  const pressKey = PRESS_NAME_KEYS[name];
  if (pressKey) return built({ type: "press", key: pressKey }, payload.reason);

  switch (name) {
    case "tap": {
      const coordinate = payload.point ? fromRawPair(payload.point[0], payload.point[1]) : null;
      return coordinate ? built({ type: "tap", coordinate }, payload.reason) : missing("coordinate", name);
    }
    case "type":
      return payload.text ? built({ type: "type", text: payload.text }, payload.reason) : missing("text", name);
    case "press": {
      const key = KEY_NAMES[payload.key ?? payload.text?.trim().toLowerCase() ?? ""];
      return key ? built({ type: "press", key }, payload.reason) : missing("key", name);
    }
    case "swipe":
    case "scroll":
      return buildSwipe(payload, name);
    case "swipe_up":
    case "swipe_down":
    case "screenshot":
    case "success":
    case "failure":
      return built({ type: name }, payload.reason);
    case "launch_app": {
      const target = (payload.packageId ?? payload.text)?.trim();
      if (!target) return missing("package", name);
      const packageId = resolvePackage(target) ?? target;
      return built(
        payload.activity
          ? { type: "launch_app", packageId, activity: payload.activity }
          : { type: "launch_app", packageId },
        payload.reason
      );
    }
    case "wait":
      return built({ type: "wait", durationMs: payload.durationMs ?? DEFAULT_WAIT_MS }, payload.reason);
    default:
      return { ok: false, issue: `unhandled action "${name}"` };
  }
}

/** Phase 1 result, or a ParseError saying why the payload is unusable. */
export function parseStructured(reply: string): Action {
  const block = extractPayloadBlock(reply);
  if (block === null) throw new ParseError("no payload block");
  const record = decodeRecord(block);
  if (!record) throw new ParseError("payload block is not a JSON object");
  const result = buildAction(normalizePayload(record));
  if (!result.ok) throw new ParseError(result.issue);
  return result.action;
}

// ─── Phase 2: free-text inference ───────────────────────────────

const QUOTE_OPEN = `["'“‘]`;
const QUOTE_CLOSE = `["'”’]`;
const UNQUOTED = `[^"'“”‘’\\n]`;
const NUMBER = `(\\d+(?:\\.\\d+)?)`;

function verbs(list: readonly string[]): string {
  return `\\b(?:${list.join("|")})(?:s|ed|ing)?\\b`;
}

const QUOTED_TYPE = new RegExp(`${verbs(TYPING_VERBS)}${UNQUOTED}{0,60}?${QUOTE_OPEN}([^"'”’\\n]+)${QUOTE_CLOSE}`, "i");
const TAP_PAIR = new RegExp(`${verbs(TAP_VERBS)}[^\\d\\n]{0,40}?${NUMBER}[^\\d.\\n]{1,10}${NUMBER}`, "i");
const SWIPE_FROM_TO = new RegExp(
  `\\bswip(?:e|es|ed|ing)\\b[\\s\\S]*?\\bfrom\\b\\D*?${NUMBER}[^\\d.]+${NUMBER}\\D*?\\bto\\b\\D*?${NUMBER}[^\\d.]+${NUMBER}`,
  "i"
);
const QUOTED_LAUNCH = new RegExp(`${verbs(LAUNCH_VERBS)}${UNQUOTED}{0,40}?${QUOTE_OPEN}([^"'”’\\n]+)${QUOTE_CLOSE}`, "i");

function simpleAction(name: ActionName): Action | null {
  const key = PRESS_NAME_KEYS[name];
  if (key) return { type: "press", key };
  switch (name) {
    case "success":
    case "failure":
    case "swipe_up":
    case "swipe_down":
    case "screenshot":
      return { type: name };
    case "wait":
      return { type: "wait", durationMs: DEFAULT_WAIT_MS };
    default:
      return null;
  }
}

function normalizeWhole(reply: string): string {
  return reply.trim().toLowerCase().replace(/\s+/g, " ").replace(/[.!?]+$/, "");
}

export function inferAction(reply: string): { action: Action; rule: InferenceRule } | null {
  const phrase = EXACT_PHRASES[normalizeWhole(reply)];
  const phraseAction = phrase ? simpleAction(phrase) : null;
  if (phraseAction) return { action: phraseAction, rule: "exact-phrase" };

  if (SUCCESS_KEYWORDS.test(reply)) return { action: { type: "success" }, rule: "outcome-keyword" };
  if (FAILURE_KEYWORDS.test(reply)) return { action: { type: "failure" }, rule: "outcome-keyword" };

  if (/\bhome\b/i.test(reply)) return { action: { type: "press", key: "home" }, rule: "navigation-word" };
  if (/\bback\b/i.test(reply)) return { action: { type: "press", key: "back" }, rule: "navigation-word" };

  const typed = reply.match(QUOTED_TYPE);
  if (typed?.[1]) return { action: { type: "type", text: typed[1] }, rule: "quoted-type" };

  const tap = reply.match(TAP_PAIR);
  if (tap) {
    const coordinate = fromRawPair(Number(tap[1]), Number(tap[2]));
    if (coordinate) return { action: { type: "tap", coordinate }, rule: "tap-coordinates" };
  }

  const swipe = reply.match(SWIPE_FROM_TO);
  if (swipe) {
    const start = fromRawPair(Number(swipe[1]), Number(swipe[2]));
    const end = fromRawPair(Number(swipe[3]), Number(swipe[4]));
    if (start && end) {
      return {
        action: { type: "swipe", start, end, durationMs: DEFAULT_SWIPE_DURATION_MS },
        rule: "swipe-coordinates",
      };
    }
  }

  if (/\bswipe\s+up\b/i.test(reply)) return { action: { type: "swipe_up" }, rule: "swipe-direction" };
  if (/\bswipe\s+down\b/i.test(reply)) return { action: { type: "swipe_down" }, rule: "swipe-direction" };

  const launch = reply.match(QUOTED_LAUNCH);
  if (launch?.[1]) {
    const name = launch[1].trim();
    return { action: { type: "launch_app", packageId: resolvePackage(name) ?? name }, rule: "quoted-launch" };
  }

  return null;
}

// ─── Entry points ───────────────────────────────────────────────

export function interpretReply(reply: string): Interpretation {
  let issue: string;
  try {
    return { phase: "structured", action: parseStructured(reply) };
  } catch (err) {
    issue = errorMessage(err);
  }
  try {
    const inferred = inferAction(reply);
    if (inferred) return { phase: "inferred", action: inferred.action, rule: inferred.rule, issue };
  } catch (err) {
    issue = errorMessage(err);
  }
  return { phase: "default", action: DEFAULT_ACTION, issue };
}

export function parseReply(reply: string): Action {
  return interpretReply(reply).action;
}
