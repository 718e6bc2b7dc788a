/**
 * Workflow orchestration.
 *
 * Executes a sequence of sub-goals, each optionally scoped to an app and
 * each a separate agent run with a fresh tracker and history.
 *
 * Usage:
 *   touchpilot --workflow examples/settings-workflow.json
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { callDevice, type Device } from "./actions.js";
import { resolvePackage } from "./apps.js";
import { DEFAULT_DEVICE_TIMEOUT_MS } from "./constants.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { AgentResult } from "./loop.js";
import { sleep } from "./timeout.js";
import type { GoalStatus } from "./types.js";

// ===========================================
// Types
// ===========================================

const workflowStepSchema = z.object({
  goal: z.string().min(1),
  app: z.string().min(1).optional(),
  context: z.string().optional(),
  maxSteps: z.number().int().positive().optional(),
  formData: z.record(z.string(), z.string()).optional(),
});

const workflowSchema = z.object({
  name: z.string().min(1),
  steps: z.array(workflowStepSchema).min(1),
});

export type WorkflowStep = z.infer<typeof workflowStepSchema>;
export type Workflow = z.infer<typeof workflowSchema>;

export interface StepResult {
  goal: string;
  app?: string;
  status: GoalStatus;
  stepsUsed: number;
  error?: string;
}

export interface WorkflowResult {
  name: string;
  steps: StepResult[];
  success: boolean;
}

export interface SubGoal {
  goal: string;
  context?: string;
  maxSteps: number;
}

export interface WorkflowDeps {
  device: Device;
  runGoal: (subGoal: SubGoal) => Promise<AgentResult>;
  launchDelayMs?: number;
  deviceTimeoutMs?: number;
  /** Cancellation; no sub-goal starts once it has fired */
  signal?: AbortSignal;
}

// ===========================================
// Loading
// ===========================================

export function parseWorkflow(raw: unknown): Workflow {
  const parsed = workflowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid workflow",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function loadWorkflow(path: string): Workflow {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read workflow ${path}`, [errorMessage(err)]);
  }
  return parseWorkflow(raw);
}

// ===========================================
// Workflow Engine
// ===========================================

const DEFAULT_STEP_LIMIT = 15;
const APP_LAUNCH_DELAY_MS = 2000;

/** Appends structured form data to the goal when present. */
export function buildGoal(step: WorkflowStep): string {
  let goal = step.goal;
  if (step.formData && Object.keys(step.formData).length > 0) {
    const lines = Object.entries(step.formData)
      .map(([key, value]) => `- ${key}: ${value}`)
      .join("\n");
    goal += `\n\nFORM DATA TO FILL:\n${lines}\n\nFind each field on screen and enter the corresponding value.`;
  }
  return goal;
}

/**
 * Executes a full workflow. A failed sub-goal is recorded and the next one
 * still runs. After an abort the remaining sub-goals are recorded as
 * failed without touching the device.
 */
export async function runWorkflow(workflow: Workflow, deps: WorkflowDeps): Promise<WorkflowResult> {
  logger.info(`Workflow: ${workflow.name} (${workflow.steps.length} steps)`);
  const results: StepResult[] = [];

  for (const [i, step] of workflow.steps.entries()) {
    if (deps.signal?.aborted) {
      logger.warn(`Workflow aborted, skipping ${workflow.steps.length - i} remaining steps`);
      for (const skipped of workflow.steps.slice(i)) {
        results.push({ goal: skipped.goal, app: skipped.app, status: "failed", stepsUsed: 0, error: "Workflow aborted" });
      }
      break;
    }
    logger.info(`--- Step ${i + 1}/${workflow.steps.length}: ${step.goal} ---`);

    let result: StepResult;
    try {
      if (step.app) {
        const packageId = resolvePackage(step.app) ?? step.app;
        logger.info(`Switching to app: ${packageId}`);
        await callDevice(
          "launch",
          (signal) => deps.device.launchApp(packageId, undefined, signal),
          deps.deviceTimeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS
        );
        await sleep(deps.launchDelayMs ?? APP_LAUNCH_DELAY_MS, deps.signal);
      }
      const agentResult = await deps.runGoal({
        goal: buildGoal(step),
        context: step.context,
        maxSteps: step.maxSteps ?? DEFAULT_STEP_LIMIT,
      });
      result = {
        goal: step.goal,
        app: step.app,
        status: agentResult.status,
        stepsUsed: agentResult.stepsUsed,
        error: agentResult.failure?.message,
      };
    } catch (err) {
      result = { goal: step.goal, app: step.app, status: "failed", stepsUsed: 0, error: errorMessage(err) };
    }

    results.push(result);
    logger.info(`Step ${i + 1} ${result.status} (${result.stepsUsed} steps used)`);
  }

  return { name: workflow.name, steps: results, success: results.every((r) => r.status === "success") };
}
