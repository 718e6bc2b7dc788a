/**
 * Device access for touchpilot.
 * `Device` is what the loop and the recovery selector talk to; `AdbDevice`
 * implements it over the adb binary. `executeAction` maps an admitted
 * Action onto device calls.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import {
  ADBKEYBOARD_INPUT_ACTION,
  DEFAULT_DEVICE_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_SWIPE_DURATION_MS,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SWIPE_DURATION_MS,
  KEYCODE_BACK,
  KEYCODE_ENTER,
  KEYCODE_HOME,
  SWIPE_DOWN_SPAN,
  SWIPE_UP_SPAN,
} from "./constants.js";
import { toPixels } from "./coordinates.js";
import { ConfigurationError, DriverError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { sleep, withTimeout } from "./timeout.js";
import type { Action, ActionResult, PressKey, ScreenSize } from "./types.js";

/**
 * Every call takes an optional abort signal. Once it fires the call stops
 * retrying and no further command reaches the device.
 */
export interface Device {
  screenSize(signal?: AbortSignal): Promise<ScreenSize>;
  /** Base64-encoded PNG */
  captureScreenshot(signal?: AbortSignal): Promise<string>;
  foregroundAppId(signal?: AbortSignal): Promise<string>;
  keyboardVisible(signal?: AbortSignal): Promise<boolean>;
  tap(x: number, y: number, signal?: AbortSignal): Promise<boolean>;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs: number, signal?: AbortSignal): Promise<boolean>;
  typeText(text: string, signal?: AbortSignal): Promise<boolean>;
  pressKey(code: number, signal?: AbortSignal): Promise<boolean>;
  launchApp(packageId: string, activity?: string, signal?: AbortSignal): Promise<boolean>;
  /** Types through the ADBKeyBoard IME, tapping (x, y) first when given. */
  directTextInject(text: string, x?: number, y?: number, signal?: AbortSignal): Promise<boolean>;
}

export const KEY_CODES: Readonly<Record<PressKey, number>> = {
  home: KEYCODE_HOME,
  back: KEYCODE_BACK,
  enter: KEYCODE_ENTER,
};

/**
 * Runs one device call under a deadline. Whatever goes wrong, timeouts
 * included, comes out as a DriverError. The signal handed to `work` is
 * aborted when the call fails, so a timed-out command is cancelled rather
 * than left running next to the caller's next call.
 */
export async function callDevice<T>(
  label: string,
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  try {
    return await withTimeout(work(controller.signal), timeoutMs, label);
  } catch (err) {
    controller.abort();
    if (err instanceof DriverError) throw err;
    throw new DriverError(`${label}: ${errorMessage(err)}`, { cause: err });
  }
}

// ===========================================
// Output Parsers
// ===========================================

export function parseScreenSize(output: string): ScreenSize | null {
  // "Override size:" wins over "Physical size:"
  const match = output.match(/Override size:\s*(\d+)x(\d+)/) ?? output.match(/Physical size:\s*(\d+)x(\d+)/);
  if (!match?.[1] || !match[2]) return null;
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

/** "package/activity" from `dumpsys activity activities` or `dumpsys window`. */
export function parseForegroundApp(output: string): string | null {
  const match =
    output.match(/mResumedActivity.*?(\S+\/\S+)/) ??
    output.match(/topResumedActivity.*?(\S+\/\S+)/) ??
    output.match(/mCurrentFocus.*?(\S+\/\S+)/) ??
    output.match(/mFocusedApp.*?(\S+\/\S+)/);
  return match?.[1] ? match[1].replace(/}$/, "") : null;
}

export function parseKeyboardVisible(output: string): boolean {
  return /mInputShown=true/.test(output) || /mIsInputViewShown=true/.test(output);
}

export function parseConnectedSerials(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim().split(/\s+/))
    .filter((parts) => parts.length >= 2 && parts[1] === "device")
    .map((parts) => parts[0] ?? "")
    .filter((serial) => serial !== "");
}

/**
 * ADB requires %s for spaces, escape special shell characters.
 * Backslash must be escaped first to avoid double-escaping.
 */
export function escapeInputText(text: string): string {
  return text
    .replaceAll("\\", "\\\\")
    .replaceAll('"', '\\"')
    .replaceAll("'", "\\'")
    .replaceAll("`", "\\`")
    .replaceAll("$", "\\$")
    .replaceAll("!", "\\!")
    .replaceAll("?", "\\?")
    .replaceAll(" ", "%s")
    .replaceAll("&", "\\&")
    .replaceAll("|", "\\|")
    .replaceAll(";", "\\;")
    .replaceAll("(", "\\(")
    .replaceAll(")", "\\)")
    .replaceAll("[", "\\[")
    .replaceAll("]", "\\]")
    .replaceAll("{", "\\{")
    .replaceAll("}", "\\}")
    .replaceAll("<", "\\<")
    .replaceAll(">", "\\>");
}

/** Single-quoted for the device shell. */
function shellQuote(text: string): string {
  return `'${text.replaceAll("'", "'\\''")}'`;
}

// ===========================================
// ADB Device
// ===========================================

export interface CommandOutput {
  stdout: Buffer;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  timeoutMs: number,
  signal?: AbortSignal
) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

export const execRunner: CommandRunner = async (file, args, timeoutMs, signal) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: "buffer",
    timeout: timeoutMs,
    signal,
    maxBuffer: 64 * 1024 * 1024,
  });
  return { stdout, stderr: stderr.toString() };
};

export interface AdbDeviceOptions {
  adbPath?: string;
  serial?: string;
  maxRetries?: number;
  timeoutMs?: number;
  /** First retry delay; doubles on every further attempt */
  retryBaseMs?: number;
  runner?: CommandRunner;
}

export class AdbDevice implements Device {
  private readonly adbPath: string;
  private readonly serial?: string;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;
  private readonly runner: CommandRunner;

  constructor(options: AdbDeviceOptions = {}) {
    this.adbPath = options.adbPath ?? "adb";
    this.serial = options.serial;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.runner = options.runner ?? execRunner;
  }

  /**
   * Executes an adb command with retry support. Stderr mentioning an error
   * counts as a failed attempt. An aborted signal kills the running command
   * and stops any further attempt.
   */
  async run(args: string[], signal?: AbortSignal): Promise<Buffer> {
    const fullArgs = this.serial ? ["-s", this.serial, ...args] : args;
    let lastError = "";
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) throw new DriverError(`adb ${args.join(" ")} cancelled`);
      try {
        const { stdout, stderr } = await this.runner(this.adbPath, fullArgs, this.timeoutMs, signal);
        if (!stderr.toLowerCase().includes("error")) return stdout;
        lastError = stderr.trim();
      } catch (err) {
        lastError = errorMessage(err);
      }
      if (signal?.aborted) break;
      if (attempt < this.maxRetries) {
        const delay = Math.pow(2, attempt) * this.retryBaseMs;
        logger.warn(`ADB error (attempt ${attempt + 1}/${this.maxRetries + 1}): ${lastError}; retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }
    if (signal?.aborted) throw new DriverError(`adb ${args.join(" ")} cancelled`);
    throw new DriverError(`adb ${args.join(" ")} failed: ${lastError}`);
  }

  async shell(args: string[], signal?: AbortSignal): Promise<string> {
    const out = await this.run(["shell", ...args], signal);
    return out.toString("utf8").trim();
  }

  /** Throws ConfigurationError when no usable device is attached. */
  async checkConnection(): Promise<void> {
    let serials: string[];
    try {
      const out = await this.runner(this.adbPath, ["devices"], this.timeoutMs);
      serials = parseConnectedSerials(out.stdout.toString("utf8"));
    } catch (err) {
      throw new ConfigurationError(`Cannot run ${this.adbPath}`, [errorMessage(err)]);
    }
    if (serials.length === 0) throw new ConfigurationError("No Android device connected");
    if (this.serial && !serials.includes(this.serial)) {
      throw new ConfigurationError(`Device ${this.serial} is not connected`, [`attached: ${serials.join(", ")}`]);
    }
  }

  async screenSize(signal?: AbortSignal): Promise<ScreenSize> {
    const size = parseScreenSize(await this.shell(["wm", "size"], signal));
    if (!size) throw new DriverError("Could not read screen size");
    return size;
  }

  async captureScreenshot(signal?: AbortSignal): Promise<string> {
    const png = await this.run(["exec-out", "screencap", "-p"], signal);
    if (png.length === 0) throw new DriverError("Empty screenshot");
    return png.toString("base64");
  }

  async foregroundAppId(signal?: AbortSignal): Promise<string> {
    const activities = parseForegroundApp(await this.shell(["dumpsys", "activity", "activities"], signal));
    if (activities) return activities;
    return parseForegroundApp(await this.shell(["dumpsys", "window"], signal)) ?? "unknown";
  }

  async keyboardVisible(signal?: AbortSignal): Promise<boolean> {
    return parseKeyboardVisible(await this.shell(["dumpsys", "input_method"], signal));
  }

  async tap(x: number, y: number, signal?: AbortSignal): Promise<boolean> {
    await this.shell(["input", "tap", String(x), String(y)], signal);
    return true;
  }

  async swipe(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    durationMs: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    await this.shell(["input", "swipe", String(x1), String(y1), String(x2), String(y2), String(durationMs)], signal);
    return true;
  }

  async typeText(text: string, signal?: AbortSignal): Promise<boolean> {
    if (!text) return false;
    await this.shell(["input", "text", escapeInputText(text)], signal);
    return true;
  }

  async pressKey(code: number, signal?: AbortSignal): Promise<boolean> {
    await this.shell(["input", "keyevent", String(code)], signal);
    return true;
  }

  async launchApp(packageId: string, activity?: string, signal?: AbortSignal): Promise<boolean> {
    const out = activity
      ? await this.shell(["am", "start", "-n", `${packageId}/${activity}`], signal)
      : await this.shell(["monkey", "-p", packageId, "-c", "android.intent.category.LAUNCHER", "1"], signal);
    return !/No activities found|Error|Exception/i.test(out);
  }

  async directTextInject(text: string, x?: number, y?: number, signal?: AbortSignal): Promise<boolean> {
    if (x !== undefined && y !== undefined) {
      await this.tap(x, y, signal);
      await sleep(300, signal); // let focus register
    }
    const out = await this.shell(
      ["am", "broadcast", "-a", ADBKEYBOARD_INPUT_ACTION, "--es", "msg", shellQuote(text)],
      signal
    );
    return out.includes("Broadcast completed");
  }
}

// ===========================================
// Action Execution
// ===========================================

function verticalSwipe(screen: ScreenSize, span: readonly [number, number]): [number, number, number, number] {
  const x = Math.round(screen.width / 2);
  return [x, Math.round(screen.height * span[0]), x, Math.round(screen.height * span[1])];
}

export interface ExecuteOptions {
  timeoutMs?: number;
  maxWaitMs?: number;
  maxSwipeDurationMs?: number;
  /** Run cancellation; cuts a wait short */
  signal?: AbortSignal;
}

/**
 * Executes an admitted action. Device failures propagate as DriverError;
 * a device that reports `false` becomes an unsuccessful result. Wait and
 * swipe durations are clamped to their configured maximum.
 */
export async function executeAction(
  device: Device,
  action: Action,
  screen: ScreenSize,
  options: ExecuteOptions = {}
): Promise<ActionResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
  const call = <T>(label: string, work: (signal: AbortSignal) => Promise<T>) => callDevice(label, work, timeoutMs);
  const outcome = (ok: boolean, message: string): ActionResult => ({
    success: ok,
    message: ok ? message : `${message} (device reported failure)`,
  });

  switch (action.type) {
    case "tap": {
      const [x, y] = toPixels(action.coordinate, screen);
      return outcome(await call("tap", (signal) => device.tap(x, y, signal)), `Tapped (${x}, ${y})`);
    }
    case "type":
      return outcome(await call("type", (signal) => device.typeText(action.text, signal)), `Typed "${action.text}"`);
    case "press":
      return outcome(
        await call("press", (signal) => device.pressKey(KEY_CODES[action.key], signal)),
        `Pressed ${action.key}`
      );
    case "swipe": {
      const [x1, y1] = toPixels(action.start, screen);
      const [x2, y2] = toPixels(action.end, screen);
      const duration = Math.min(action.durationMs, options.maxSwipeDurationMs ?? DEFAULT_MAX_SWIPE_DURATION_MS);
      return outcome(
        await call("swipe", (signal) => device.swipe(x1, y1, x2, y2, duration, signal)),
        `Swiped (${x1}, ${y1}) -> (${x2}, ${y2})`
      );
    }
    case "swipe_up":
    case "swipe_down": {
      const [x1, y1, x2, y2] = verticalSwipe(screen, action.type === "swipe_up" ? SWIPE_UP_SPAN : SWIPE_DOWN_SPAN);
      return outcome(
        await call(action.type, (signal) => device.swipe(x1, y1, x2, y2, DEFAULT_SWIPE_DURATION_MS, signal)),
        `Swiped ${action.type === "swipe_up" ? "up" : "down"}`
      );
    }
    case "launch_app":
      return outcome(
        await call("launch", (signal) => device.launchApp(action.packageId, action.activity, signal)),
        `Launched ${action.packageId}`
      );
    case "wait": {
      const duration = Math.min(action.durationMs, options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS);
      await sleep(duration, options.signal);
      return { success: true, message: `Waited ${duration}ms` };
    }
    case "screenshot": {
      const png = await call("screenshot", (signal) => device.captureScreenshot(signal));
      return { success: true, message: `Captured screenshot (${png.length} base64 chars)` };
    }
    case "success":
    case "failure":
      return { success: true, message: `Goal reported ${action.type}` };
  }
}
