/**
 * Configuration management for touchpilot.
 * Values come from the environment (.env loaded by dotenv), typed defaults
 * live in constants.ts, and the whole set is validated with zod.
 */

import dotenv from "dotenv";
import { z } from "zod";
import {
  DEFAULT_BEDROCK_MODEL,
  DEFAULT_BROWSER_STALL_MULTIPLIER,
  DEFAULT_DEVICE_TIMEOUT_MS,
  DEFAULT_GROQ_MODEL,
  DEFAULT_HISTORY_WINDOW,
  DEFAULT_HOME_STALL_MULTIPLIER,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_ACTIONS_PER_TYPE,
  DEFAULT_MAX_CAPTURE_FAILURES,
  DEFAULT_MAX_RECOVERY_EPISODES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_STEPS,
  DEFAULT_MAX_SWIPE_DURATION_MS,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENROUTER_MODEL,
  DEFAULT_PLANNER_TIMEOUT_MS,
  DEFAULT_RECOVERY_LOOKBACK,
  DEFAULT_RECOVERY_PLACEHOLDER_TEXT,
  DEFAULT_RECOVERY_SETTLE_MS,
  DEFAULT_REPEAT_ATTEMPT_CEILING,
  DEFAULT_SAME_TAP_HARD_LIMIT,
  DEFAULT_SAME_TAP_SOFT_LIMIT,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_SCREENSHOT_RETENTION,
  DEFAULT_STALL_THRESHOLD,
  DEFAULT_STALL_TIME_BUCKET_MS,
  DEFAULT_STEP_DELAY,
} from "./constants.js";
import { ConfigurationError } from "./errors.js";

export const LLM_PROVIDERS = ["groq", "openai", "openrouter", "bedrock"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

const count = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    // ADB
    ADB_PATH: z.string().default("adb"),
    ANDROID_SERIAL: z.string().optional(),

    // Agent
    MAX_STEPS: count(DEFAULT_MAX_STEPS),
    STEP_DELAY: z.coerce.number().nonnegative().default(DEFAULT_STEP_DELAY),
    MAX_RETRIES: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
    HISTORY_WINDOW: count(DEFAULT_HISTORY_WINDOW),
    MAX_ACTIONS_PER_TYPE: count(DEFAULT_MAX_ACTIONS_PER_TYPE),
    PAUSE_BETWEEN_STEPS: flag(false),

    // Stall detection and recovery
    STALL_THRESHOLD: count(DEFAULT_STALL_THRESHOLD),
    BROWSER_STALL_MULTIPLIER: count(DEFAULT_BROWSER_STALL_MULTIPLIER),
    HOME_STALL_MULTIPLIER: count(DEFAULT_HOME_STALL_MULTIPLIER),
    STALL_TIME_BUCKET_MS: count(DEFAULT_STALL_TIME_BUCKET_MS),
    RECOVERY_LOOKBACK: count(DEFAULT_RECOVERY_LOOKBACK),
    MAX_RECOVERY_EPISODES: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_RECOVERY_EPISODES),
    RECOVERY_SETTLE_MS: millis(DEFAULT_RECOVERY_SETTLE_MS),
    RECOVERY_PLACEHOLDER_TEXT: z.string().min(1).default(DEFAULT_RECOVERY_PLACEHOLDER_TEXT),
    MAX_CAPTURE_FAILURES: count(DEFAULT_MAX_CAPTURE_FAILURES),

    // State tracker
    SAME_TAP_SOFT_LIMIT: count(DEFAULT_SAME_TAP_SOFT_LIMIT),
    SAME_TAP_HARD_LIMIT: count(DEFAULT_SAME_TAP_HARD_LIMIT),
    REPEAT_ATTEMPT_CEILING: count(DEFAULT_REPEAT_ATTEMPT_CEILING),

    // Gestures
    MAX_WAIT_MS: millis(DEFAULT_MAX_WAIT_MS),
    MAX_SWIPE_DURATION_MS: count(DEFAULT_MAX_SWIPE_DURATION_MS),

    // Timeouts
    DEVICE_TIMEOUT_MS: count(DEFAULT_DEVICE_TIMEOUT_MS),
    PLANNER_TIMEOUT_MS: count(DEFAULT_PLANNER_TIMEOUT_MS),

    // Logging
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    LOG_DIR: z.string().default(DEFAULT_LOG_DIR),
    SCREENSHOT_DIR: z.string().default(DEFAULT_SCREENSHOT_DIR),
    SCREENSHOT_RETENTION: z.enum(["none", "failures", "all"]).default(DEFAULT_SCREENSHOT_RETENTION),

    // LLM provider
    LLM_PROVIDER: z.enum(LLM_PROVIDERS).default("groq"),
    GROQ_API_KEY: z.string().optional(),
    GROQ_MODEL: z.string().default(DEFAULT_GROQ_MODEL),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default(DEFAULT_OPENAI_MODEL),
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_MODEL: z.string().default(DEFAULT_OPENROUTER_MODEL),
    AWS_REGION: z.string().default("us-east-1"),
    BEDROCK_MODEL: z.string().default(DEFAULT_BEDROCK_MODEL),
  })
  .superRefine((env, ctx) => {
    // Bedrock uses the AWS credential chain, no key to check
    const keys: Partial<Record<LlmProvider, [string, string | undefined]>> = {
      groq: ["GROQ_API_KEY", env.GROQ_API_KEY],
      openai: ["OPENAI_API_KEY", env.OPENAI_API_KEY],
      openrouter: ["OPENROUTER_API_KEY", env.OPENROUTER_API_KEY],
    };
    const required = keys[env.LLM_PROVIDER];
    if (required && !required[1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [required[0]],
        message: `required when LLM_PROVIDER is ${env.LLM_PROVIDER}`,
      });
    }
    if (env.SAME_TAP_SOFT_LIMIT > env.SAME_TAP_HARD_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SAME_TAP_SOFT_LIMIT"],
        message: "must not exceed SAME_TAP_HARD_LIMIT",
      });
    }
  });

export type EnvInput = Record<string, string | undefined>;

export interface AgentConfig {
  adbPath: string;
  deviceSerial?: string;

  maxSteps: number;
  /** Seconds between steps */
  stepDelay: number;
  maxRetries: number;
  historyWindow: number;
  maxActionsPerType: number;
  pauseBetweenSteps: boolean;

  stallThreshold: number;
  browserStallMultiplier: number;
  homeStallMultiplier: number;
  stallTimeBucketMs: number;
  recoveryLookback: number;
  maxRecoveryEpisodes: number;
  recoverySettleMs: number;
  recoveryPlaceholderText: string;
  maxCaptureFailures: number;

  sameTapSoftLimit: number;
  sameTapHardLimit: number;
  repeatAttemptCeiling: number;

  /** Upper bound for wait actions */
  maxWaitMs: number;
  maxSwipeDurationMs: number;

  deviceTimeoutMs: number;
  plannerTimeoutMs: number;

  logLevel: "error" | "warn" | "info" | "debug";
  logDir: string;
  screenshotDir: string;
  screenshotRetention: "none" | "failures" | "all";

  llmProvider: LlmProvider;
  groqApiKey?: string;
  groqModel: string;
  openaiApiKey?: string;
  openaiModel: string;
  openrouterApiKey?: string;
  openrouterModel: string;
  awsRegion: string;
  bedrockModel: string;
}

/** Unset and blank variables both fall back to their defaults. */
function withoutBlanks(env: EnvInput): EnvInput {
  const out: EnvInput = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function validateConfig(env: EnvInput): AgentConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ConfigurationError("Invalid configuration", issues);
  }
  const e = parsed.data;
  return {
    adbPath: e.ADB_PATH,
    deviceSerial: e.ANDROID_SERIAL,
    maxSteps: e.MAX_STEPS,
    stepDelay: e.STEP_DELAY,
    maxRetries: e.MAX_RETRIES,
    historyWindow: e.HISTORY_WINDOW,
    maxActionsPerType: e.MAX_ACTIONS_PER_TYPE,
    pauseBetweenSteps: e.PAUSE_BETWEEN_STEPS,
    stallThreshold: e.STALL_THRESHOLD,
    browserStallMultiplier: e.BROWSER_STALL_MULTIPLIER,
    homeStallMultiplier: e.HOME_STALL_MULTIPLIER,
    stallTimeBucketMs: e.STALL_TIME_BUCKET_MS,
    recoveryLookback: e.RECOVERY_LOOKBACK,
    maxRecoveryEpisodes: e.MAX_RECOVERY_EPISODES,
    recoverySettleMs: e.RECOVERY_SETTLE_MS,
    recoveryPlaceholderText: e.RECOVERY_PLACEHOLDER_TEXT,
    maxCaptureFailures: e.MAX_CAPTURE_FAILURES,
    sameTapSoftLimit: e.SAME_TAP_SOFT_LIMIT,
    sameTapHardLimit: e.SAME_TAP_HARD_LIMIT,
    repeatAttemptCeiling: e.REPEAT_ATTEMPT_CEILING,
    maxWaitMs: e.MAX_WAIT_MS,
    maxSwipeDurationMs: e.MAX_SWIPE_DURATION_MS,
    deviceTimeoutMs: e.DEVICE_TIMEOUT_MS,
    plannerTimeoutMs: e.PLANNER_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    logDir: e.LOG_DIR,
    screenshotDir: e.SCREENSHOT_DIR,
    screenshotRetention: e.SCREENSHOT_RETENTION,
    llmProvider: e.LLM_PROVIDER,
    groqApiKey: e.GROQ_API_KEY,
    groqModel: e.GROQ_MODEL,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    openrouterApiKey: e.OPENROUTER_API_KEY,
    openrouterModel: e.OPENROUTER_MODEL,
    awsRegion: e.AWS_REGION,
    bedrockModel: e.BEDROCK_MODEL,
  };
}

/**
 * Reads `.env` into process.env (existing variables win), applies
 * `overrides` on top and validates.
 */
export function loadConfig(overrides: EnvInput = {}): AgentConfig {
  dotenv.config();
  return validateConfig({ ...process.env, ...overrides });
}

export function getModel(config: AgentConfig): string {
  switch (config.llmProvider) {
    case "groq":
      return config.groqModel;
    case "bedrock":
      return config.bedrockModel;
    case "openrouter":
      return config.openrouterModel;
    case "openai":
      return config.openaiModel;
  }
}
