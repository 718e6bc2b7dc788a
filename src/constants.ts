/**
 * Constants for touchpilot.
 * All magic strings, thresholds, and fixed values in one place.
 */

// ===========================================
// API Endpoints
// ===========================================
export const GROQ_API_BASE_URL = "https://api.groq.com/openai/v1";
export const OPENROUTER_API_BASE_URL = "https://openrouter.ai/api/v1";

// ===========================================
// ADB Key Codes
// ===========================================
export const KEYCODE_HOME = 3;
export const KEYCODE_BACK = 4;
export const KEYCODE_ENTER = 66;

// ===========================================
// Coordinate Space
// ===========================================

/** Fractional coordinates are stored scaled into [0, INTERNAL_COORDINATE_SCALE]. */
export const INTERNAL_COORDINATE_SCALE = 1000;

/** Screens this small cannot be addressed meaningfully. */
export const MIN_SCREEN_DIMENSION = 2;

// ===========================================
// Gestures
// ===========================================
export const DEFAULT_SWIPE_DURATION_MS = 300;
export const DEFAULT_WAIT_MS = 2000;
export const DEFAULT_MAX_WAIT_MS = 10_000;
export const DEFAULT_MAX_SWIPE_DURATION_MS = 5_000;

// Vertical scroll gestures as fractions of screen height: [startY, endY]
export const SWIPE_UP_SPAN: [number, number] = [0.7, 0.2];
export const SWIPE_DOWN_SPAN: [number, number] = [0.3, 0.8];

// ===========================================
// Default Models
// ===========================================
export const DEFAULT_OPENAI_MODEL = "gpt-4o";
export const DEFAULT_GROQ_MODEL = "meta-llama/llama-4-scout-17b-16e-instruct";
export const DEFAULT_OPENROUTER_MODEL = "google/gemini-2.0-flash-001";
export const DEFAULT_BEDROCK_MODEL = "anthropic.claude-3-5-sonnet-20240620-v1:0";

export const BEDROCK_ANTHROPIC_MODELS = ["anthropic"];

// ===========================================
// Device Paths
// ===========================================
export const ADBKEYBOARD_INPUT_ACTION = "ADB_INPUT_TEXT";

// ===========================================
// Agent Defaults
// ===========================================
export const DEFAULT_MAX_STEPS = 50;
export const DEFAULT_STEP_DELAY = 1.0;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_HISTORY_WINDOW = 5;
export const DEFAULT_LOG_DIR = "logs";
export const DEFAULT_SCREENSHOT_DIR = "screenshots";

// Runaway guard: requests of one action type allowed per run
export const DEFAULT_MAX_ACTIONS_PER_TYPE = 5;

// Stall detection
export const DEFAULT_STALL_THRESHOLD = 3;
export const DEFAULT_BROWSER_STALL_MULTIPLIER = 3;
export const DEFAULT_HOME_STALL_MULTIPLIER = 2;
// A bucket spans many captures: the browser threshold (9) at 30s a step
// still fits inside one
export const DEFAULT_STALL_TIME_BUCKET_MS = 600_000;

// Recovery
export const DEFAULT_RECOVERY_LOOKBACK = 3;
export const DEFAULT_MAX_RECOVERY_EPISODES = 3;
export const DEFAULT_RECOVERY_SETTLE_MS = 2000;
export const DEFAULT_RECOVERY_PLACEHOLDER_TEXT = " ";
export const DEFAULT_MAX_CAPTURE_FAILURES = 3;

// State tracker
export const DEFAULT_SAME_TAP_SOFT_LIMIT = 5;
export const DEFAULT_SAME_TAP_HARD_LIMIT = 8;
export const DEFAULT_REPEAT_ATTEMPT_CEILING = 10;

// Timeouts
export const DEFAULT_DEVICE_TIMEOUT_MS = 15_000;
export const DEFAULT_PLANNER_TIMEOUT_MS = 60_000;

export type ScreenshotRetention = "none" | "failures" | "all";
export const DEFAULT_SCREENSHOT_RETENTION: ScreenshotRetention = "failures";

// ===========================================
// Default Planner Instructions
// ===========================================
export const DEFAULT_INSTRUCTIONS = [
  "Be precise with tap coordinates, ensuring they are within visible UI elements",
  "Wait for the keyboard to appear before attempting to type text",
  "If keyboard doesn't appear after tapping an input field, try tapping again",
  "If a tap doesn't produce the expected result, try a slightly different location",
  "When typing, make sure to press enter/search after completing input",
  "If stuck in a loop, try using the back button or going to home screen",
  "Be patient when waiting for apps to load or respond to actions",
  "Verify that actions produce visible changes before proceeding",
];
