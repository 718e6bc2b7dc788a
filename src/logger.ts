/**
 * Logging for touchpilot.
 *
 * `logger` is the process-wide console logger. `SessionLogger` writes an
 * incremental .partial.json after each step (crash-safe), a final .json
 * summary at session end, and keeps step screenshots per the retention
 * policy.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import winston from "winston";
import type { ScreenshotRetention } from "./constants.js";
import type { Action, ActionCounts, GoalStatus, Step } from "./types.js";

const { combine, timestamp, printf, colorize } = winston.format;

const lineFormat = printf(({ level, message, timestamp }) => {
  return `${String(timestamp)} [${level}]: ${String(message)}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp({ format: "YYYY-MM-DD HH:mm:ss" }), colorize(), lineFormat),
  transports: [new winston.transports.Console()],
});

export interface StepLog {
  step: number;
  timestamp: string;
  foregroundApp: string;
  screen: { width: number; height: number };
  action: Action;
  success: boolean;
  vetoed: boolean;
  synthetic: boolean;
  message: string;
  screenshotFile?: string;
}

export interface SessionSummary {
  sessionId: string;
  goal: string;
  provider: string;
  model: string;
  startTime: string;
  endTime: string;
  totalSteps: number;
  successCount: number;
  failCount: number;
  status: GoalStatus;
  failure?: { kind: string; message: string };
  actionCounts: ActionCounts;
  steps: StepLog[];
}

export interface SessionLoggerOptions {
  logDir: string;
  screenshotDir: string;
  retention: ScreenshotRetention;
  goal: string;
  provider: string;
  model: string;
  sessionId?: string;
}

export class SessionLogger {
  readonly sessionId: string;
  private readonly options: SessionLoggerOptions;
  private readonly steps: StepLog[] = [];
  private readonly startTime: string;

  constructor(options: SessionLoggerOptions) {
    this.options = options;
    this.sessionId = options.sessionId ?? `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    this.startTime = new Date().toISOString();
    mkdirSync(options.logDir, { recursive: true });
  }

  get partialPath(): string {
    return join(this.options.logDir, `${this.sessionId}.partial.json`);
  }

  get finalPath(): string {
    return join(this.options.logDir, `${this.sessionId}.json`);
  }

  private shouldKeepScreenshot(step: Step): boolean {
    switch (this.options.retention) {
      case "all":
        return true;
      case "failures":
        return !step.success;
      case "none":
        return false;
    }
  }

  private saveScreenshot(index: number, step: Step): string | undefined {
    if (!step.state.screenshot || !this.shouldKeepScreenshot(step)) return undefined;
    const dir = join(this.options.screenshotDir, this.sessionId);
    mkdirSync(dir, { recursive: true });
    const file = join(dir, `step-${String(index).padStart(3, "0")}.png`);
    writeFileSync(file, Buffer.from(step.state.screenshot, "base64"));
    return file;
  }

  logStep(step: Step): void {
    const index = this.steps.length + 1;
    this.steps.push({
      step: index,
      timestamp: new Date(step.state.capturedAt).toISOString(),
      foregroundApp: step.state.foregroundApp,
      screen: { width: step.state.width, height: step.state.height },
      action: step.action,
      success: step.success,
      vetoed: step.vetoed,
      synthetic: step.synthetic,
      message: step.message,
      screenshotFile: this.saveScreenshot(index, step),
    });

    writeFileSync(this.partialPath, JSON.stringify(this.buildSummary("running", {}), null, 2));
  }

  finalize(
    status: GoalStatus,
    actionCounts: ActionCounts,
    failure?: { kind: string; message: string }
  ): SessionSummary {
    const summary = this.buildSummary(status, actionCounts, failure);
    writeFileSync(this.finalPath, JSON.stringify(summary, null, 2));
    logger.info(`Session log saved: ${this.finalPath}`);
    return summary;
  }

  private buildSummary(
    status: GoalStatus,
    actionCounts: ActionCounts,
    failure?: { kind: string; message: string }
  ): SessionSummary {
    return {
      sessionId: this.sessionId,
      goal: this.options.goal,
      provider: this.options.provider,
      model: this.options.model,
      startTime: this.startTime,
      endTime: new Date().toISOString(),
      totalSteps: this.steps.length,
      successCount: this.steps.filter((s) => s.success).length,
      failCount: this.steps.filter((s) => !s.success).length,
      status,
      failure,
      actionCounts,
      steps: this.steps,
    };
  }
}
