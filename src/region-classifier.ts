/**
 * Positional guess at whether a screen point is a text input.
 *
 * Only a screenshot and the foreground package are known, so this works
 * from coarse layout priors plus a small per-app table of input regions
 * that the generic bands get wrong.
 */

import type { UnitPoint } from "./types.js";

export type RegionLabel = "input_likely" | "system_or_icon" | "ambiguous";

/** left, top, right, bottom in unit space, inclusive */
export type Box = readonly [number, number, number, number];

export interface RegionBands {
  /** y at or below this is the status bar */
  statusBarBottom: number;
  /** y at or above this is the navigation / dock strip */
  navigationTop: number;
  addressBar: Box;
  middle: Box;
  composer: Box;
}

export const DEFAULT_BANDS: RegionBands = {
  statusBarBottom: 0.08,
  navigationTop: 0.85,
  addressBar: [0.05, 0.05, 0.95, 0.2],
  middle: [0.05, 0.2, 0.95, 0.75],
  composer: [0.05, 0.75, 0.8, 0.95],
};

export const KNOWN_INPUT_REGIONS: Readonly<Record<string, readonly Box[]>> = {
  "com.android.chrome": [
    [0.05, 0.03, 0.95, 0.15], // URL bar
    [0.05, 0.2, 0.95, 0.4], // search box on the new tab page
    [0.05, 0.4, 0.95, 0.6], // forms in page content
  ],
  "com.google.android.gm": [
    [0.05, 0.1, 0.95, 0.3], // search bar
    [0.05, 0.3, 0.95, 0.9], // compose body
  ],
  "com.android.messaging": [[0.05, 0.8, 0.8, 0.95]],
  "com.google.android.apps.messaging": [[0.05, 0.8, 0.8, 0.95]],
  "com.google.android.googlequicksearchbox": [[0.05, 0.05, 0.95, 0.25]],
  "com.android.settings": [[0.05, 0.08, 0.95, 0.2]],
};

export type RegionRule =
  | "status-bar"
  | "navigation-strip"
  | "known-input"
  | "address-bar"
  | "middle"
  | "composer"
  | "none"
  | "out-of-range";

export interface RegionMatch {
  label: RegionLabel;
  rule: RegionRule;
}

export interface ClassifierOptions {
  bands?: RegionBands;
  knownInputs?: Readonly<Record<string, readonly Box[]>>;
}

function inBox(point: UnitPoint, box: Box): boolean {
  const [left, top, right, bottom] = box;
  return point.x >= left && point.x <= right && point.y >= top && point.y <= bottom;
}

function isUnitPoint(point: UnitPoint): boolean {
  return (
    Number.isFinite(point.x) &&
    Number.isFinite(point.y) &&
    point.x >= 0 &&
    point.x <= 1 &&
    point.y >= 0 &&
    point.y <= 1
  );
}

/** "com.android.chrome/org.chromium.Main" → "com.android.chrome" */
export function packageOf(appId: string): string {
  const slash = appId.indexOf("/");
  return (slash === -1 ? appId : appId.slice(0, slash)).trim();
}

/** Like `classify`, but also reports which rule decided. */
export function matchRegion(
  point: UnitPoint,
  foregroundAppId: string,
  options: ClassifierOptions = {}
): RegionMatch {
  const bands = options.bands ?? DEFAULT_BANDS;
  const knownInputs = options.knownInputs ?? KNOWN_INPUT_REGIONS;

  if (!isUnitPoint(point)) return { label: "ambiguous", rule: "out-of-range" };

  if (point.y >= bands.navigationTop) return { label: "system_or_icon", rule: "navigation-strip" };
  if (point.y <= bands.statusBarBottom) return { label: "system_or_icon", rule: "status-bar" };

  const appRegions = knownInputs[packageOf(foregroundAppId)] ?? [];
  if (appRegions.some((box) => inBox(point, box))) {
    return { label: "input_likely", rule: "known-input" };
  }

  if (inBox(point, bands.addressBar)) return { label: "input_likely", rule: "address-bar" };
  if (inBox(point, bands.middle)) return { label: "input_likely", rule: "middle" };
  if (inBox(point, bands.composer)) return { label: "input_likely", rule: "composer" };

  return { label: "ambiguous", rule: "none" };
}

export function classify(
  point: UnitPoint,
  foregroundAppId: string,
  options?: ClassifierOptions
): RegionLabel {
  return matchRegion(point, foregroundAppId, options).label;
}
