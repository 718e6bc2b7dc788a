import { describe, expect, it } from "vitest";
import { fractional } from "../src/coordinates.js";
import {
  admit,
  createTracker,
  DEFAULT_TRACKER_LIMITS,
  observeForeground,
  setKeyboardVisible,
  type Admission,
  type TrackerState,
} from "../src/state-tracker.js";
import type { Action } from "../src/types.js";

const context = { screen: { width: 1080, height: 2400 }, foregroundApp: "com.example.notes/.MainActivity" };

function admitAll(actions: Action[], start: TrackerState = createTracker()): Admission[] {
  const results: Admission[] = [];
  let tracker = start;
  for (const action of actions) {
    const admission = admit(tracker, action, context);
    results.push(admission);
    tracker = admission.tracker;
  }
  return results;
}

const tapMiddle: Action = { type: "tap", coordinate: fractional(0.5, 0.5) };

describe("tap admission", () => {
  it("warns past the soft limit and vetoes past the hard limit", () => {
    const results = admitAll(Array.from({ length: 10 }, () => tapMiddle));
    expect(results.map((r) => r.rule)).toEqual([
      "tap",
      "tap",
      "tap",
      "tap",
      "tap",
      "tap",
      "tap-repeat-warning",
      "tap-repeat-warning",
      "tap-repeat-warning",
      "tap-repeat-limit",
    ]);
    expect(results[9]?.admitted).toBe(false);
    expect(results[9]?.warning).toBe("Tapped (500‰, 500‰) 10 times in a row, refusing to repeat it");
  });

  it("resets the count when the position changes", () => {
    const other: Action = { type: "tap", coordinate: fractional(0.5, 0.6) };
    const results = admitAll([tapMiddle, tapMiddle, other]);
    expect(results[1]?.tracker.sameTapCount).toBe(1);
    expect(results[2]?.tracker.sameTapCount).toBe(0);
  });

  it("records the region and pixels of an admitted tap", () => {
    const [first] = admitAll([tapMiddle]);
    expect(first?.region).toEqual({ label: "input_likely", rule: "middle" });
    expect(first?.tracker.lastTapPixels).toEqual([540, 1200]);
    expect(first?.tracker.inputBoxTapped).toBe(true);
    expect(first?.tracker.mustTypeNext).toBe(true);
  });

  it("keeps focus flags through one non-input tap", () => {
    const navBar: Action = { type: "tap", coordinate: fractional(0.5, 0.9) };
    const results = admitAll([tapMiddle, navBar]);
    expect(results[1]?.tracker.lastTapRegion).toBe("system_or_icon");
    expect(results[1]?.tracker.inputBoxTapped).toBe(true);
  });
});

describe("type admission", () => {
  const typeHello: Action = { type: "type", text: "hello" };

  it("admits blind typing with a warning", () => {
    const [result] = admitAll([typeHello]);
    expect(result?.admitted).toBe(true);
    expect(result?.rule).toBe("typed-blind");
    expect(result?.tracker.typedBlind).toBe(true);
    expect(result?.warning).toBe("Typing without a focused input field or visible keyboard");
  });

  it("prefers a visible keyboard as evidence", () => {
    const [result] = admitAll([typeHello], setKeyboardVisible(createTracker(), true));
    expect(result?.rule).toBe("keyboard-visible");
  });

  it("consumes the focus flags of an input tap", () => {
    const results = admitAll([tapMiddle, typeHello, typeHello]);
    expect(results[1]?.rule).toBe("input-focused");
    expect(results[1]?.tracker.inputBoxTapped).toBe(false);
    expect(results[1]?.tracker.mustTypeNext).toBe(false);
    expect(results[2]?.rule).toBe("last-tap-input");
  });
});

describe("repeat ceiling", () => {
  it("skips one attempt past the ceiling, then counts again", () => {
    const swipes: Action[] = Array.from({ length: 12 }, () => ({ type: "swipe_up" }));
    const results = admitAll(swipes);
    expect(results.slice(0, 10).every((r) => r.admitted)).toBe(true);
    expect(results[10]?.admitted).toBe(false);
    expect(results[10]?.rule).toBe("repeat-ceiling");
    expect(results[11]?.admitted).toBe(true);
    expect(results[11]?.tracker.repeatRun).toBe(1);
    expect(results[11]?.tracker.attempts.swipe_up).toBe(12);
  });

  it("resets the run when another action comes between", () => {
    const limits = { ...DEFAULT_TRACKER_LIMITS, repeatAttemptCeiling: 1 };
    let tracker = createTracker();
    tracker = admit(tracker, { type: "swipe_up" }, context, limits).tracker;
    tracker = admit(tracker, { type: "press", key: "back" }, context, limits).tracker;
    expect(admit(tracker, { type: "swipe_up" }, context, limits).admitted).toBe(true);
  });
});

describe("tracker values", () => {
  it("never mutates the tracker it is given", () => {
    const start = Object.freeze(createTracker());
    admit(start, tapMiddle, context);
    expect(start).toEqual(createTracker());
  });

  it("counts consecutive home screen observations", () => {
    let tracker = observeForeground(createTracker(), "com.android.launcher3/.Launcher");
    tracker = observeForeground(tracker, "unknown");
    expect(tracker.homeDwell).toBe(2);
    expect(observeForeground(tracker, "com.android.settings/.Settings").homeDwell).toBe(0);
  });

  it("marks focus when the keyboard shows and clears only visibility when it hides", () => {
    const shown = setKeyboardVisible(createTracker(), true);
    expect(shown).toMatchObject({ keyboardVisible: true, inputBoxTapped: true, mustTypeNext: true });
    expect(setKeyboardVisible(shown, false)).toMatchObject({ keyboardVisible: false, inputBoxTapped: true });
  });
});
