import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors.js";
import {
  decodeRecord,
  extractPayloadBlock,
  inferAction,
  interpretReply,
  matchActionName,
  parseReply,
  parseStructured,
} from "../src/response-interpreter.js";

const FENCED_REPLY = [
  "```observation",
  "Home screen with a row of app icons",
  "```",
  "",
  "```action",
  '{"action_type": "TAP", "x": 0.5, "y": 0.25}',
  "```",
  "",
  "```reasoning",
  "The search widget is at the top.",
  "```",
].join("\n");

describe("extractPayloadBlock", () => {
  it("picks the action block among several fenced blocks", () => {
    expect(extractPayloadBlock(FENCED_REPLY)).toBe('{"action_type": "TAP", "x": 0.5, "y": 0.25}');
  });

  it("falls back to the outermost braces", () => {
    expect(extractPayloadBlock('I will do {"action": "back"} now')).toBe('{"action": "back"}');
    expect(extractPayloadBlock("no payload here")).toBeNull();
  });
});

describe("decodeRecord", () => {
  it("tolerates comments, trailing commas and raw newlines", () => {
    const block = '{\n  "action_type": "TYPE", // what to do\n  "text": "hello world",\n}';
    expect(decodeRecord(block)).toEqual({ action_type: "TYPE", text: "hello world" });
  });

  it("keeps URLs inside strings intact", () => {
    expect(decodeRecord('{"action_type": "type", "text": "https://example.com"}')).toEqual({
      action_type: "type",
      text: "https://example.com",
    });
  });

  it("returns null for arrays and garbage", () => {
    expect(decodeRecord("[1, 2]")).toBeNull();
    expect(decodeRecord("{not json")).toBeNull();
  });
});

describe("matchActionName", () => {
  it("matches aliases exactly before substrings", () => {
    expect(matchActionName("SWIPE_UP")).toBe("swipe_up");
    expect(matchActionName("Scroll Down")).toBe("swipe_up");
    expect(matchActionName("click")).toBe("tap");
    expect(matchActionName("tap_element")).toBe("tap");
    expect(matchActionName("zzz")).toBeNull();
  });
});

describe("structured replies", () => {
  it("reads the fenced prompt layout", () => {
    expect(interpretReply(FENCED_REPLY)).toEqual({
      phase: "structured",
      action: { type: "tap", coordinate: { x: 500, y: 250, mode: "fractional" } },
    });
  });

  it("keeps pixel coordinates absolute", () => {
    expect(parseReply('{"action": "tap", "x": 540, "y": 1200}')).toEqual({
      type: "tap",
      coordinate: { x: 540, y: 1200, mode: "absolute" },
    });
  });

  it("reads nested coordinate arrays", () => {
    expect(parseReply('{"action": "click", "coordinates": [0.1, 0.9]}')).toEqual({
      type: "tap",
      coordinate: { x: 100, y: 900, mode: "fractional" },
    });
  });

  it("prefers explicit action keys over ambiguous ones", () => {
    expect(parseReply('{"action_type": "swipe_up", "action": "tap", "x": 1, "y": 1}')).toEqual({ type: "swipe_up" });
  });

  it("builds swipes from start and end fields", () => {
    expect(parseReply('{"action_type": "SWIPE", "x": 0.5, "y": 0.8, "end_x": 0.5, "end_y": 0.2}')).toEqual({
      type: "swipe",
      start: { x: 500, y: 800, mode: "fractional" },
      end: { x: 500, y: 200, mode: "fractional" },
      durationMs: 300,
    });
  });

  it("turns a downward scroll into an upward swipe", () => {
    expect(parseReply('{"action": "scroll", "direction": "down"}')).toEqual({ type: "swipe_up" });
    expect(parseReply('{"action": "swipe", "direction": "down"}')).toEqual({ type: "swipe_down" });
  });

  it("resolves app names for launches", () => {
    expect(parseReply('{"action_type": "LAUNCH_APP", "text": "YouTube"}')).toEqual({
      type: "launch_app",
      packageId: "com.google.android.youtube",
    });
    expect(parseReply('{"action": "open_app", "package": "com.example.notes", "reason": "notes live there"}')).toEqual({
      type: "launch_app",
      packageId: "com.example.notes",
      reason: "notes live there",
    });
  });

  it("maps key names and navigation actions to press", () => {
    expect(parseReply('{"action": "press", "key": "KEYCODE_BACK"}')).toEqual({ type: "press", key: "back" });
    expect(parseReply('{"action_type": "BACK"}')).toEqual({ type: "press", key: "back" });
    expect(parseReply('{"action_type": "ENTER"}')).toEqual({ type: "press", key: "enter" });
  });

  it("reads small durations as seconds", () => {
    expect(parseReply('{"action": "wait", "duration": 3}')).toEqual({ type: "wait", durationMs: 3000 });
    expect(parseReply('{"action": "wait", "duration": 450}')).toEqual({ type: "wait", durationMs: 450 });
    expect(parseReply('{"action": "wait"}')).toEqual({ type: "wait", durationMs: 2000 });
  });

  it("throws ParseError for unusable payloads", () => {
    expect(() => parseStructured('{"action_type": "tap"}')).toThrow(ParseError);
    expect(() => parseStructured('{"action_type": "tap"}')).toThrow("tap without a usable coordinate");
    expect(() => parseStructured("nothing")).toThrow("no payload block");
  });
});

describe("free-text inference", () => {
  it.each([
    ["go home", { type: "press", key: "home" }, "exact-phrase"],
    ["Task completed.", { type: "success" }, "exact-phrase"],
    ["The goal has been achieved", { type: "success" }, "outcome-keyword"],
    ["Task completed successfully; I cannot see any remaining steps.", { type: "success" }, "outcome-keyword"],
    ["I am unable to find the button", { type: "failure" }, "outcome-keyword"],
    ["I should press back now", { type: "press", key: "back" }, "navigation-word"],
    ['Type "coffee shops" into the search bar', { type: "type", text: "coffee shops" }, "quoted-type"],
    [
      "I will tap at (540, 1200) to open the menu",
      { type: "tap", coordinate: { x: 540, y: 1200, mode: "absolute" } },
      "tap-coordinates",
    ],
    ["click 0.3, 0.6", { type: "tap", coordinate: { x: 300, y: 600, mode: "fractional" } }, "tap-coordinates"],
    [
      "swipe from 0.5 0.8 to 0.5 0.2",
      {
        type: "swipe",
        start: { x: 500, y: 800, mode: "fractional" },
        end: { x: 500, y: 200, mode: "fractional" },
        durationMs: 300,
      },
      "swipe-coordinates",
    ],
    ["swipe up to see more", { type: "swipe_up" }, "swipe-direction"],
    ['Open "Google Maps"', { type: "launch_app", packageId: "com.google.android.apps.maps" }, "quoted-launch"],
  ])("infers %j", (reply, action, rule) => {
    expect(inferAction(reply)).toEqual({ action, rule });
  });

  it("reports the structured issue when it infers", () => {
    const result = interpretReply("swipe up to see more");
    expect(result).toEqual({ phase: "inferred", action: { type: "swipe_up" }, rule: "swipe-direction", issue: "no payload block" });
  });
});

describe("default action", () => {
  it("presses home when nothing matches", () => {
    expect(interpretReply("hmm, not sure")).toEqual({
      phase: "default",
      action: { type: "press", key: "home" },
      issue: "no payload block",
    });
    expect(interpretReply('{"action_type": "tap"}')).toEqual({
      phase: "default",
      action: { type: "press", key: "home" },
      issue: "tap without a usable coordinate",
    });
  });

  it("never throws", () => {
    expect(() => interpretReply("")).not.toThrow();
    expect(parseReply("")).toEqual({ type: "press", key: "home" });
  });
});
