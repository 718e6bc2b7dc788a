import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import {
  createRun,
  DEFAULT_LOOP_SETTINGS,
  runAgentLoop,
  runStep,
  type AgentLoopOptions,
  type LoopSettings,
  type StepContext,
} from "../src/loop.js";
import { FakeDevice, ScriptedPlanner, SilentPlanner, steppingClock } from "./fakes.js";

const LAUNCHER = "com.android.launcher3/.Launcher";
const TAP_MIDDLE = '{"action_type": "TAP", "x": 0.5, "y": 0.5}';
const BACK = '{"action_type": "BACK"}';

const fast: Partial<LoopSettings> = { stepDelay: 0, recoverySettleMs: 0 };

function run(options: Partial<AgentLoopOptions> & Pick<AgentLoopOptions, "device" | "planner">) {
  return runAgentLoop({
    goal: "Write a note",
    now: () => 1_000,
    ...options,
    settings: { ...fast, ...options.settings },
  });
}

describe("runAgentLoop", () => {
  it("finishes when the planner reports success", async () => {
    const device = new FakeDevice();
    const planner = new ScriptedPlanner([
      '```action\n{"action_type": "TAP", "x": 0.5, "y": 0.3}\n```',
      '{"action_type": "SWIPE_UP"}',
      "Task completed.",
    ]);

    const result = await run({ device, planner });

    expect(result.status).toBe("success");
    expect(result.stepsUsed).toBe(3);
    expect(result.history).toHaveLength(2);
    expect(result.failure).toBeUndefined();
    expect(result.actionCounts).toEqual({ tap: 1, swipe_up: 1, success: 1 });
    expect(device.calls).toEqual(["tap 540 720", "swipe 540 1680 540 480 300"]);
  });

  it("gives the planner the run so far", async () => {
    const device = new FakeDevice();
    device.keyboard = true;
    const planner = new ScriptedPlanner([TAP_MIDDLE, "done"]);

    await run({ device, planner, context: "the notes app is open", instructions: ["Use the pen tool"] });

    const second = planner.requests[1];
    expect(second?.stepNumber).toBe(2);
    expect(second?.keyboardVisible).toBe(true);
    expect(second?.history).toHaveLength(1);
    expect(second?.actionCounts).toEqual({ tap: 1 });
    expect(second?.context).toBe("the notes app is open");
    expect(second?.instructions[0]).toBe("Use the pen tool");
  });

  it("fails on a launcher stall when recovery is not allowed", async () => {
    const device = new FakeDevice();
    device.foreground = LAUNCHER;
    const planner = new ScriptedPlanner([], BACK);

    const result = await run({ device, planner, settings: { maxRecoveryEpisodes: 0, maxActionsPerType: 50 } });

    expect(result.status).toBe("failed");
    expect(result.failure).toEqual({
      kind: "stall",
      message: `No progress on ${LAUNCHER} for 6 captures after 0 recovery episodes`,
    });
    expect(result.stepsUsed).toBe(6);
    expect(result.history).toHaveLength(6);
  });

  it("detects a launcher stall at a realistic step cadence", async () => {
    const device = new FakeDevice();
    device.foreground = LAUNCHER;
    const planner = new ScriptedPlanner([], BACK);

    const result = await run({
      device,
      planner,
      now: steppingClock(10_000),
      settings: { maxSteps: 40, maxRecoveryEpisodes: 0, maxActionsPerType: 50 },
    });

    expect(result.failure?.kind).toBe("stall");
    expect(result.stepsUsed).toBe(6);
  });

  it("records recovery steps and fails once episodes run out", async () => {
    const device = new FakeDevice();
    device.foreground = LAUNCHER;
    const planner = new ScriptedPlanner([], BACK);

    const result = await run({ device, planner, settings: { maxRecoveryEpisodes: 1, maxActionsPerType: 50 } });

    expect(result.failure?.kind).toBe("stall");
    expect(result.stepsUsed).toBe(11);
    expect(result.history).toHaveLength(12);
    expect(result.history[6]).toMatchObject({ synthetic: true, message: "recovery press-back succeeded" });
    expect(result.history[11]).toMatchObject({ vetoed: true, success: false });
    expect(device.calls.filter((c) => c === "key 4")).toHaveLength(11);
  });

  it("stops a runaway action type before executing it", async () => {
    const device = new FakeDevice();
    const planner = new ScriptedPlanner([], TAP_MIDDLE);

    const result = await run({ device, planner, now: steppingClock(), settings: { maxActionsPerType: 5 } });

    expect(result.failure).toEqual({ kind: "runaway_repetition", message: "tap requested 6 times (limit 5)" });
    expect(result.stepsUsed).toBe(6);
    expect(result.history).toHaveLength(5);
    expect(device.calls).toHaveLength(5);
  });

  it("records a vetoed tap as a failed step without touching the device", async () => {
    const device = new FakeDevice();
    const planner = new ScriptedPlanner([TAP_MIDDLE, TAP_MIDDLE, TAP_MIDDLE, TAP_MIDDLE, "done"]);

    const result = await run({
      device,
      planner,
      now: steppingClock(),
      settings: { sameTapSoftLimit: 1, sameTapHardLimit: 2 },
    });

    expect(result.status).toBe("success");
    expect(result.history).toHaveLength(4);
    expect(result.history[3]).toMatchObject({
      vetoed: true,
      success: false,
      message: "vetoed (tap-repeat-limit): Tapped (500‰, 500‰) 4 times in a row, refusing to repeat it",
    });
    expect(device.calls).toEqual(["tap 540 1200", "tap 540 1200", "tap 540 1200"]);
  });

  it("turns a device timeout into a failed step and carries on", async () => {
    const device = new FakeDevice();
    device.hanging.add("tap");
    const planner = new ScriptedPlanner([TAP_MIDDLE, "done"]);

    const result = await run({ device, planner, settings: { deviceTimeoutMs: 20 } });

    expect(result.status).toBe("success");
    expect(result.history[0]).toMatchObject({ success: false, message: "tap: tap timed out after 20ms" });
  });

  it("fails with a planner error when the planner times out", async () => {
    const result = await run({
      device: new FakeDevice(),
      planner: new SilentPlanner(),
      settings: { plannerTimeoutMs: 20 },
    });

    expect(result.status).toBe("failed");
    expect(result.failure).toEqual({ kind: "planner", message: "planner error: planner timed out after 20ms" });
    expect(result.actionCounts).toEqual({ failure: 1 });
    expect(result.history).toHaveLength(0);
  });

  it("fails with a planner error on an empty reply", async () => {
    const result = await run({ device: new FakeDevice(), planner: new ScriptedPlanner(["  "]) });
    expect(result.failure).toEqual({ kind: "planner", message: "empty reply" });
  });

  it("reports a planner-declared failure as goal_failed", async () => {
    const result = await run({ device: new FakeDevice(), planner: new ScriptedPlanner(["I cannot find the app"]) });
    expect(result.failure).toEqual({ kind: "goal_failed", message: "Planner reported failure" });
  });

  it("accepts actions the planner already built", async () => {
    const device = new FakeDevice();
    const planner = new ScriptedPlanner([{ type: "press", key: "enter" }, { type: "success" }]);

    const result = await run({ device, planner });

    expect(result.status).toBe("success");
    expect(device.calls).toEqual(["key 66"]);
  });

  it("fails after repeated capture failures without creating steps", async () => {
    const device = new FakeDevice();
    device.failing.add("screenSize");
    const planner = new ScriptedPlanner([], "done");

    const result = await run({ device, planner });

    expect(result.failure).toEqual({
      kind: "driver",
      message: "Device capture failed 3 times in a row: screen size: screenSize unavailable",
    });
    expect(result.history).toHaveLength(0);
    expect(planner.requests).toHaveLength(0);
  });

  it("rejects an unusable screen size", async () => {
    const device = new FakeDevice();
    device.size = { width: 1, height: 1 };

    const result = await run({ device, planner: new ScriptedPlanner([], "done") });

    expect(result.failure?.message).toBe("Device capture failed 3 times in a row: Unusable screen size 1x1");
  });

  it("assumes a hidden keyboard when its state cannot be read", async () => {
    const device = new FakeDevice();
    device.failing.add("keyboard");
    const planner = new ScriptedPlanner(["done"]);

    const result = await run({ device, planner });

    expect(result.status).toBe("success");
    expect(planner.requests[0]?.keyboardVisible).toBe(false);
  });

  it("ends the run when the step budget is spent", async () => {
    const device = new FakeDevice();
    const planner = new ScriptedPlanner([TAP_MIDDLE, '{"action": "tap", "x": 0.5, "y": 0.6}', "done"]);

    const result = await run({ device, planner, now: steppingClock(), settings: { maxSteps: 2 } });

    expect(result.failure).toEqual({ kind: "step_budget", message: "Step budget of 2 exhausted" });
    expect(result.history).toHaveLength(2);
  });

  it("cleans up the device when aborted", async () => {
    const device = new FakeDevice();
    device.keyboard = true;
    const controller = new AbortController();
    const seen: number[] = [];

    const result = await run({
      device,
      planner: new ScriptedPlanner([], TAP_MIDDLE),
      signal: controller.signal,
      onStep: (_step, index) => {
        seen.push(index);
        controller.abort();
      },
    });

    expect(result.failure).toEqual({ kind: "aborted", message: "Run aborted" });
    expect(seen).toEqual([1]);
    expect(device.calls).toEqual(["tap 540 1200", "key 4", "key 3"]);
  });

  it("does not sit out the step delay once aborted", async () => {
    const device = new FakeDevice();
    const controller = new AbortController();
    const started = Date.now();

    const result = await run({
      device,
      planner: new ScriptedPlanner([], TAP_MIDDLE),
      signal: controller.signal,
      settings: { stepDelay: 30 },
      onStep: () => controller.abort(),
    });

    expect(result.failure?.kind).toBe("aborted");
    expect(Date.now() - started).toBeLessThan(2_000);
  });

  it("awaits the pause hook between steps", async () => {
    let pauses = 0;
    await run({
      device: new FakeDevice(),
      planner: new ScriptedPlanner([TAP_MIDDLE, "done"]),
      pause: async () => {
        pauses += 1;
      },
    });
    expect(pauses).toBe(1);
  });

  it("requires a goal", async () => {
    await expect(
      runAgentLoop({ goal: "   ", device: new FakeDevice(), planner: new ScriptedPlanner([]) })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("runStep", () => {
  it("returns a finished run unchanged", async () => {
    const ctx: StepContext = {
      goal: "Write a note",
      instructions: [],
      device: new FakeDevice(),
      planner: new ScriptedPlanner([]),
      settings: DEFAULT_LOOP_SETTINGS,
      now: () => 0,
      record: () => undefined,
    };
    const finished = { ...createRun(), status: "success" as const };
    expect(await runStep(ctx, finished)).toBe(finished);
  });

  it("moves a fresh run to running after one admitted action", async () => {
    const ctx: StepContext = {
      goal: "Write a note",
      instructions: [],
      device: new FakeDevice(),
      planner: new ScriptedPlanner([TAP_MIDDLE]),
      settings: { ...DEFAULT_LOOP_SETTINGS, ...fast },
      now: () => 0,
      record: () => undefined,
    };
    const next = await runStep(ctx, createRun());
    expect(next.status).toBe("running");
    expect(next.stepsUsed).toBe(1);
    expect(next.stall).toEqual({ signature: "com.example.notes/.MainActivity|0|1080x2400|0", repeat: 0 });
  });
});
