/**
 * Foreground-app knowledge: which packages are launchers or browsers, and
 * friendly names the planner or the goal may use for common apps.
 */

import { packageOf } from "./region-classifier.js";

export type AppContext = "home" | "browser" | "app";

const LAUNCHER_PACKAGES = new Set([
  "com.google.android.apps.nexuslauncher",
  "com.android.launcher",
  "com.android.launcher3",
  "com.sec.android.app.launcher",
  "com.miui.home",
  "com.huawei.android.launcher",
  "com.oppo.launcher",
  "net.oneplus.launcher",
]);

const BROWSER_PACKAGES = new Set([
  "com.android.chrome",
  "org.mozilla.firefox",
  "com.opera.browser",
  "com.brave.browser",
  "com.microsoft.emmx",
  "com.sec.android.app.sbrowser",
  "com.duckduckgo.mobile.android",
]);

export function appContextOf(appId: string): AppContext {
  const pkg = packageOf(appId).toLowerCase();
  if (!pkg || pkg === "unknown" || LAUNCHER_PACKAGES.has(pkg) || pkg.includes("launcher")) {
    return "home";
  }
  if (BROWSER_PACKAGES.has(pkg) || pkg.includes("browser")) return "browser";
  return "app";
}

export function isHomeScreen(appId: string): boolean {
  return appContextOf(appId) === "home";
}

/** Friendly name → package id. Keys are lower case. */
export const APP_ALIASES: Readonly<Record<string, string>> = {
  chrome: "com.android.chrome",
  gmail: "com.google.android.gm",
  messages: "com.google.android.apps.messaging",
  messaging: "com.android.messaging",
  settings: "com.android.settings",
  youtube: "com.google.android.youtube",
  maps: "com.google.android.apps.maps",
  "google maps": "com.google.android.apps.maps",
  "play store": "com.android.vending",
  camera: "com.android.camera2",
  calculator: "com.google.android.calculator",
  clock: "com.google.android.deskclock",
  calendar: "com.google.android.calendar",
  contacts: "com.google.android.contacts",
  photos: "com.google.android.apps.photos",
  whatsapp: "com.whatsapp",
  spotify: "com.spotify.music",
};

const PACKAGE_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/i;

export function looksLikePackage(value: string): boolean {
  return PACKAGE_PATTERN.test(value.trim());
}

/** Package id for a name the planner used, or null when unknown. */
export function resolvePackage(name: string): string | null {
  const trimmed = name.trim();
  if (looksLikePackage(trimmed)) return trimmed;
  return APP_ALIASES[trimmed.toLowerCase()] ?? null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * First app named in free text (goal, context), as a package id.
 * Longer aliases are tried first so "google maps" wins over "maps".
 */
export function findAppMention(text: string): string | null {
  const aliases = Object.keys(APP_ALIASES).sort((a, b) => b.length - a.length);
  for (const alias of aliases) {
    if (new RegExp(`\\b${escapeRegExp(alias)}\\b`, "i").test(text)) {
      return APP_ALIASES[alias] ?? null;
    }
  }
  const pkg = text.match(/\b(?:com|org|net|io)\.[a-z0-9_]+(?:\.[a-z0-9_]+)+\b/i);
  return pkg ? pkg[0] : null;
}
