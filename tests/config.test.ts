import { describe, expect, it } from "vitest";
import { getModel, validateConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

function configError(env: Record<string, string>): ConfigurationError {
  try {
    validateConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("validateConfig", () => {
  it("fills every default", () => {
    const config = validateConfig({ LLM_PROVIDER: "bedrock" });
    expect(config).toMatchObject({
      adbPath: "adb",
      maxSteps: 50,
      stepDelay: 1,
      maxRetries: 2,
      historyWindow: 5,
      maxActionsPerType: 5,
      pauseBetweenSteps: false,
      stallThreshold: 3,
      maxRecoveryEpisodes: 3,
      sameTapSoftLimit: 5,
      sameTapHardLimit: 8,
      repeatAttemptCeiling: 10,
      stallTimeBucketMs: 600_000,
      maxWaitMs: 10_000,
      maxSwipeDurationMs: 5_000,
      screenshotRetention: "failures",
      logLevel: "info",
      awsRegion: "us-east-1",
    });
    expect(config.deviceSerial).toBeUndefined();
  });

  it("coerces numbers and flags", () => {
    const config = validateConfig({
      LLM_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      MAX_STEPS: "12",
      STEP_DELAY: "0.5",
      PAUSE_BETWEEN_STEPS: "1",
      ANDROID_SERIAL: "emulator-5554",
    });
    expect(config).toMatchObject({ maxSteps: 12, stepDelay: 0.5, pauseBetweenSteps: true, deviceSerial: "emulator-5554" });
    expect(getModel(config)).toBe("gpt-4o");
  });

  it("treats blank values as unset", () => {
    const config = validateConfig({ LLM_PROVIDER: "bedrock", MAX_STEPS: " ", ADB_PATH: "" });
    expect(config.maxSteps).toBe(50);
    expect(config.adbPath).toBe("adb");
  });

  it("requires the key of the selected provider", () => {
    expect(configError({}).issues).toEqual(["GROQ_API_KEY: required when LLM_PROVIDER is groq"]);
    expect(configError({ LLM_PROVIDER: "openrouter" }).issues).toEqual([
      "OPENROUTER_API_KEY: required when LLM_PROVIDER is openrouter",
    ]);
  });

  it("reports invalid values by variable name", () => {
    const error = configError({ LLM_PROVIDER: "bedrock", MAX_STEPS: "many", SCREENSHOT_RETENTION: "some" });
    expect(error.issues.map((issue) => issue.split(":")[0])).toEqual(["MAX_STEPS", "SCREENSHOT_RETENTION"]);
    expect(error.message.startsWith("Invalid configuration: MAX_STEPS:")).toBe(true);
  });

  it("rejects a soft tap limit above the hard one", () => {
    const error = configError({ LLM_PROVIDER: "bedrock", SAME_TAP_SOFT_LIMIT: "9", SAME_TAP_HARD_LIMIT: "4" });
    expect(error.issues).toEqual(["SAME_TAP_SOFT_LIMIT: must not exceed SAME_TAP_HARD_LIMIT"]);
  });

  it("rejects unknown providers", () => {
    expect(configError({ LLM_PROVIDER: "local" }).issues[0]?.startsWith("LLM_PROVIDER:")).toBe(true);
  });
});
