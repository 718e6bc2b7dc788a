/**
 * Prompt construction for planners. Provider classes only translate the
 * ChatMessage list built here into their own wire format.
 */

import { formatCoordinate } from "./coordinates.js";
import { DEFAULT_HISTORY_WINDOW, DEFAULT_INSTRUCTIONS } from "./constants.js";
import type { Action, ActionCounts, DeviceState, Step } from "./types.js";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; base64: string; mimeType: "image/png" | "image/jpeg" };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | ContentPart[];
}

export interface PlanRequest {
  goal: string;
  context?: string;
  instructions: string[];
  state: DeviceState;
  keyboardVisible: boolean;
  /** Trailing window of the run's history, oldest first */
  history: Step[];
  /** Requests per action type so far in the run */
  actionCounts: ActionCounts;
  stepNumber: number;
  maxSteps: number;
}

/** Caller instructions first, then every default not already present. */
export function mergeInstructions(extra: readonly string[] = []): string[] {
  const merged = [...extra];
  for (const instruction of DEFAULT_INSTRUCTIONS) {
    if (!merged.includes(instruction)) merged.push(instruction);
  }
  return merged;
}

const REPLY_FORMAT = `Reply in exactly this layout:
\`\`\`observation
What is on screen right now, briefly.
\`\`\`

\`\`\`action
{"action_type": "TAP", "x": 0.5, "y": 0.5, "end_x": null, "end_y": null, "text": null}
\`\`\`

\`\`\`reasoning
Why this action moves toward the goal.
\`\`\`

action_type is one of TAP, SWIPE, SWIPE_UP, SWIPE_DOWN, TYPE, BACK, HOME, ENTER, LAUNCH_APP, WAIT, SUCCESS, FAILURE.
x and y are the TAP point or SWIPE start as fractions of the screen (0-1); end_x and end_y are the SWIPE end.
text is the text to TYPE or the app (name or package) to LAUNCH_APP.`;

function historyWarnings(history: readonly Step[]): string[] {
  const warnings: string[] = [];
  const recent = history.slice(-3);
  if (recent.length === 3) {
    if (recent.every((s) => s.action.type === recent[0]?.action.type)) {
      warnings.push("WARNING: The last few actions were all the same type. Try a different approach.");
    }
    if (recent.every((s) => s.state.foregroundApp === recent[0]?.state.foregroundApp)) {
      warnings.push("WARNING: The device state hasn't changed in the last few actions. Try a different approach.");
    }
    if (recent.some((s) => s.vetoed)) {
      warnings.push("WARNING: A recent action was refused as a repeat. Do not request it again.");
    }
  }
  return warnings;
}

function actionStatistics(counts: ActionCounts): string | null {
  const lines = Object.entries(counts)
    .filter(([, n]) => n !== undefined && n > 0)
    .map(([type, n]) => `- ${type}: ${n} times`);
  if (lines.length === 0) return null;
  return [
    "Action statistics:",
    ...lines,
    "",
    "Based on the history, avoid repeating one action type many times and try a different approach when the current one is not working.",
  ].join("\n");
}

export function buildSystemPrompt(request: PlanRequest): string {
  const sections = [
    `You are operating an Android phone through screenshots. Work toward this goal:\n\nGOAL: ${request.goal}`,
  ];
  if (request.context) sections.push(`Context: ${request.context}`);
  if (request.instructions.length > 0) {
    sections.push(`Instructions:\n${request.instructions.map((i) => `* ${i}`).join("\n")}`);
  }
  sections.push(REPLY_FORMAT);
  sections.push(...historyWarnings(request.history));
  const stats = actionStatistics(request.actionCounts);
  if (stats) sections.push(stats);
  return sections.join("\n\n");
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case "tap":
      return `tap at ${formatCoordinate(action.coordinate)}`;
    case "swipe":
      return `swipe from ${formatCoordinate(action.start)} to ${formatCoordinate(action.end)}`;
    case "type":
      return `type '${action.text}'`;
    case "launch_app":
      return `launch_app ${action.packageId}`;
    case "press":
      return `press ${action.key}`;
    case "wait":
      return `wait ${action.durationMs}ms`;
    default:
      return action.type;
  }
}

export function formatHistory(history: readonly Step[], window = DEFAULT_HISTORY_WINDOW): string | null {
  const recent = history.slice(-window);
  if (recent.length === 0) return null;
  const lines = recent.map((step, i) => {
    const outcome = step.vetoed ? "REFUSED" : step.success ? "OK" : "FAILED";
    const origin = step.synthetic ? " [recovery]" : "";
    return `${i + 1}. ${describeAction(step.action)}${origin} -> ${outcome}, app: ${step.state.foregroundApp}`;
  });
  return `Previous actions and their outcomes:\n${lines.join("\n")}`;
}

export function buildUserContent(request: PlanRequest): ContentPart[] {
  const { state } = request;
  const parts: ContentPart[] = [];
  if (state.screenshot) parts.push({ type: "image", base64: state.screenshot, mimeType: "image/png" });
  parts.push({
    type: "text",
    text: `Device information: ${JSON.stringify({
      screen_width: state.width,
      screen_height: state.height,
      current_app: state.foregroundApp,
      keyboard_visible: request.keyboardVisible,
      step: `${request.stepNumber}/${request.maxSteps}`,
    })}`,
  });
  const history = formatHistory(request.history);
  if (history) parts.push({ type: "text", text: history });
  return parts;
}

export function buildMessages(request: PlanRequest): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt(request) },
    { role: "user", content: buildUserContent(request) },
  ];
}
