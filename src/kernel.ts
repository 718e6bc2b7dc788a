#!/usr/bin/env node
/**
 * touchpilot - command line entry point.
 *
 * Drives an Android device over adb toward a natural-language goal, asking
 * a vision LLM for one action per step.
 *
 * Usage:
 *   touchpilot "Open settings and turn on dark mode"
 *   touchpilot --workflow examples/settings-workflow.json
 *   touchpilot            (prompts for a goal)
 */

import { createInterface } from "readline/promises";
import { Command, InvalidArgumentError } from "commander";
import { AdbDevice } from "./actions.js";
import { getModel, loadConfig, type AgentConfig, type EnvInput } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { getPlanner, type Planner } from "./llm-providers.js";
import { logger, SessionLogger } from "./logger.js";
import { runAgentLoop, type AgentResult } from "./loop.js";
import { loadWorkflow, runWorkflow, type SubGoal } from "./workflow.js";

interface CliOptions {
  context?: string;
  instruction: string[];
  maxSteps?: string;
  pause?: boolean;
  screenshots?: string;
  provider?: string;
  serial?: string;
  workflow?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): string {
  if (!/^\d+$/.test(value) || Number(value) <= 0) throw new InvalidArgumentError("Not a positive integer.");
  return value;
}

/** CLI flags override environment values before validation. */
function cliOverrides(options: CliOptions): EnvInput {
  return {
    MAX_STEPS: options.maxSteps,
    PAUSE_BETWEEN_STEPS: options.pause ? "true" : undefined,
    SCREENSHOT_RETENTION: options.screenshots,
    LLM_PROVIDER: options.provider,
    ANDROID_SERIAL: options.serial,
  };
}

async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

function printResult(result: AgentResult): void {
  logger.info(`Status: ${result.status} (${result.stepsUsed} planner steps, ${result.history.length} recorded)`);
  if (result.failure) logger.info(`Reason: ${result.failure.kind}: ${result.failure.message}`);
  const usage = Object.entries(result.actionCounts)
    .map(([type, n]) => `${type}=${n}`)
    .join(", ");
  if (usage) logger.info(`Action usage: ${usage}`);
}

async function runGoal(
  config: AgentConfig,
  device: AdbDevice,
  planner: Planner,
  subGoal: SubGoal & { instructions: string[] },
  signal: AbortSignal
): Promise<AgentResult> {
  const sessionLogger = new SessionLogger({
    logDir: config.logDir,
    screenshotDir: config.screenshotDir,
    retention: config.screenshotRetention,
    goal: subGoal.goal,
    provider: planner.name,
    model: getModel(config),
  });
  return runAgentLoop({
    goal: subGoal.goal,
    context: subGoal.context,
    instructions: subGoal.instructions,
    device,
    planner,
    settings: { ...config, maxSteps: subGoal.maxSteps },
    signal,
    pause: config.pauseBetweenSteps
      ? async () => {
          await promptLine("Press Enter for the next step...");
        }
      : undefined,
    sessionLogger,
  });
}

async function main(goalWords: string[], options: CliOptions): Promise<number> {
  const config = loadConfig(withoutUndefined(cliOverrides(options)));
  logger.level = config.logLevel;
  const device = new AdbDevice({
    adbPath: config.adbPath,
    serial: config.deviceSerial,
    maxRetries: config.maxRetries,
    timeoutMs: config.deviceTimeoutMs,
  });
  await device.checkConnection();
  const planner = getPlanner(config);
  logger.info(`Planner: ${planner.name} (${getModel(config)})`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted, stopping after the current step");
    controller.abort();
  });

  if (options.workflow) {
    const workflow = loadWorkflow(options.workflow);
    const result = await runWorkflow(workflow, {
      device,
      deviceTimeoutMs: config.deviceTimeoutMs,
      signal: controller.signal,
      runGoal: (subGoal) => runGoal(config, device, planner, { ...subGoal, instructions: options.instruction }, controller.signal),
    });
    logger.info(`=== Workflow "${result.name}" ===`);
    for (const step of result.steps) {
      logger.info(`  [${step.status}] ${step.goal} (${step.stepsUsed} steps)${step.error ? `: ${step.error}` : ""}`);
    }
    return result.success ? 0 : 1;
  }

  const goal = goalWords.join(" ").trim() || (await promptLine("Enter your goal: "));
  if (!goal) throw new ConfigurationError("No goal provided");

  const result = await runGoal(
    config,
    device,
    planner,
    { goal, context: options.context, maxSteps: config.maxSteps, instructions: options.instruction },
    controller.signal
  );
  printResult(result);
  return result.status === "success" ? 0 : 1;
}

function withoutUndefined(env: EnvInput): EnvInput {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined));
}

const program = new Command();

program
  .name("touchpilot")
  .description("Drive an Android device toward a goal with a vision LLM")
  .version("0.3.0")
  .argument("[goal...]", "what to achieve on the device")
  .option("-c, --context <text>", "extra context for the planner")
  .option("-i, --instruction <text>", "extra planner instruction (repeatable)", collect, [])
  .option("-m, --max-steps <n>", "step budget", positiveInt)
  .option("-p, --pause", "wait for Enter between steps")
  .option("--screenshots <policy>", "keep screenshots: none, failures or all")
  .option("--provider <name>", "groq, openai, openrouter or bedrock")
  .option("-s, --serial <id>", "adb device serial")
  .option("-w, --workflow <file>", "run a JSON workflow of sub-goals")
  .action(async (goalWords: string[], options: CliOptions) => {
    try {
      process.exitCode = await main(goalWords, options);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        logger.error(`Configuration Error: ${err.message}`);
      } else {
        logger.error(`Fatal: ${errorMessage(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exitCode = 1;
});
