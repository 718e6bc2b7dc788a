import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import type { AgentResult } from "../src/loop.js";
import { buildGoal, loadWorkflow, parseWorkflow, runWorkflow, type SubGoal } from "../src/workflow.js";
import { FakeDevice } from "./fakes.js";

function agentResult(overrides: Partial<AgentResult> = {}): AgentResult {
  return { status: "success", history: [], actionCounts: {}, stepsUsed: 2, ...overrides };
}

describe("parseWorkflow", () => {
  it("accepts a named list of sub-goals", () => {
    const workflow = parseWorkflow({ name: "Morning", steps: [{ goal: "Open settings", app: "settings" }] });
    expect(workflow.steps[0]).toEqual({ goal: "Open settings", app: "settings" });
  });

  it("rejects an empty step list", () => {
    expect(() => parseWorkflow({ name: "Empty", steps: [] })).toThrow(ConfigurationError);
  });

  it("names the offending field", () => {
    try {
      parseWorkflow({ name: "Bad", steps: [{ goal: "" }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) expect(err.issues[0]?.startsWith("steps.0.goal:")).toBe(true);
    }
  });
});

describe("loadWorkflow", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads a workflow file", () => {
    dir = mkdtempSync(join(tmpdir(), "touchpilot-workflow-"));
    const file = join(dir, "wf.json");
    writeFileSync(file, JSON.stringify({ name: "File", steps: [{ goal: "Check the clock" }] }));
    expect(loadWorkflow(file).name).toBe("File");
  });

  it("reports unreadable files as configuration errors", () => {
    dir = mkdtempSync(join(tmpdir(), "touchpilot-workflow-"));
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ not json");
    expect(() => loadWorkflow(file)).toThrow(ConfigurationError);
  });
});

describe("buildGoal", () => {
  it("appends form data", () => {
    expect(buildGoal({ goal: "Fill the form", formData: { Name: "Test User", City: "Springfield" } })).toBe(
      "Fill the form\n\nFORM DATA TO FILL:\n- Name: Test User\n- City: Springfield\n\n" +
        "Find each field on screen and enter the corresponding value."
    );
    expect(buildGoal({ goal: "Just this" })).toBe("Just this");
  });
});

describe("runWorkflow", () => {
  it("launches each app, runs every sub-goal and keeps going after a failure", async () => {
    const device = new FakeDevice();
    const seen: SubGoal[] = [];
    const workflow = parseWorkflow({
      name: "Evening",
      steps: [
        { goal: "Turn on dark mode", app: "settings", maxSteps: 8 },
        { goal: "Search the weather", app: "com.example.weather", context: "city is Springfield" },
        { goal: "Check the clock" },
      ],
    });

    const result = await runWorkflow(workflow, {
      device,
      launchDelayMs: 0,
      runGoal: async (subGoal) => {
        seen.push(subGoal);
        return seen.length === 2
          ? agentResult({ status: "failed", stepsUsed: 15, failure: { kind: "step_budget", message: "Step budget of 15 exhausted" } })
          : agentResult();
      },
    });

    expect(device.calls).toEqual(["launch com.android.settings", "launch com.example.weather"]);
    expect(seen).toEqual([
      { goal: "Turn on dark mode", context: undefined, maxSteps: 8 },
      { goal: "Search the weather", context: "city is Springfield", maxSteps: 15 },
      { goal: "Check the clock", context: undefined, maxSteps: 15 },
    ]);
    expect(result.success).toBe(false);
    expect(result.steps.map((s) => s.status)).toEqual(["success", "failed", "success"]);
    expect(result.steps[1]?.error).toBe("Step budget of 15 exhausted");
  });

  it("records a failed launch as a failed sub-goal", async () => {
    const device = new FakeDevice();
    device.failing.add("launch");
    const workflow = parseWorkflow({ name: "One", steps: [{ goal: "Open maps", app: "maps" }] });

    const result = await runWorkflow(workflow, { device, launchDelayMs: 0, runGoal: async () => agentResult() });

    expect(result.steps[0]).toEqual({
      goal: "Open maps",
      app: "maps",
      status: "failed",
      stepsUsed: 0,
      error: "launch: launch unavailable",
    });
  });

  it("stops at the first sub-goal after an abort without switching apps", async () => {
    const device = new FakeDevice();
    const controller = new AbortController();
    const workflow = parseWorkflow({
      name: "Interrupted",
      steps: [
        { goal: "Turn on dark mode", app: "com.android.settings" },
        { goal: "Open the news", app: "com.android.chrome" },
        { goal: "Check the clock" },
      ],
    });
    let runs = 0;

    const result = await runWorkflow(workflow, {
      device,
      launchDelayMs: 0,
      signal: controller.signal,
      runGoal: async () => {
        runs++;
        controller.abort();
        return agentResult({ status: "failed", stepsUsed: 1, failure: { kind: "aborted", message: "Run aborted" } });
      },
    });

    expect(runs).toBe(1);
    expect(device.calls).toEqual(["launch com.android.settings"]);
    expect(result.success).toBe(false);
    expect(result.steps.map((s) => [s.goal, s.status, s.error])).toEqual([
      ["Turn on dark mode", "failed", "Run aborted"],
      ["Open the news", "failed", "Workflow aborted"],
      ["Check the clock", "failed", "Workflow aborted"],
    ]);
  });

  it("touches nothing when aborted before it starts", async () => {
    const device = new FakeDevice();
    const controller = new AbortController();
    controller.abort();
    const workflow = parseWorkflow({ name: "Never", steps: [{ goal: "Open maps", app: "com.google.android.apps.maps" }] });

    const result = await runWorkflow(workflow, {
      device,
      launchDelayMs: 0,
      signal: controller.signal,
      runGoal: async () => agentResult(),
    });

    expect(device.calls).toEqual([]);
    expect(result.steps).toEqual([
      { goal: "Open maps", app: "com.google.android.apps.maps", status: "failed", stepsUsed: 0, error: "Workflow aborted" },
    ]);
  });
});
