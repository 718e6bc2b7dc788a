/**
 * Coordinate handling. Mode is decided exactly once, in `fromRawPair`, when a
 * planner value enters the system. Everything downstream reads the tag.
 */

import { INTERNAL_COORDINATE_SCALE } from "./constants.js";
import type { Coordinate, ScreenSize, UnitPoint } from "./types.js";

function isUnit(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Tags a raw planner pair. Both components in [0,1] means fractions of the
 * screen, scaled into the internal space; any other non-negative pair is
 * taken as device pixels and kept as given. Negative or non-finite pairs
 * are rejected.
 */
export function fromRawPair(x: number, y: number): Coordinate | null {
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  if (x < 0 || y < 0) return null;
  if (isUnit(x) && isUnit(y)) {
    return {
      x: Math.round(x * INTERNAL_COORDINATE_SCALE),
      y: Math.round(y * INTERNAL_COORDINATE_SCALE),
      mode: "fractional",
    };
  }
  return { x, y, mode: "absolute" };
}

export function absolute(x: number, y: number): Coordinate {
  return { x, y, mode: "absolute" };
}

export function fractional(x: number, y: number): Coordinate {
  return {
    x: Math.round(x * INTERNAL_COORDINATE_SCALE),
    y: Math.round(y * INTERNAL_COORDINATE_SCALE),
    mode: "fractional",
  };
}

/** Device pixel position for a coordinate, clamped to the screen. */
export function toPixels(coord: Coordinate, screen: ScreenSize): [number, number] {
  let x = coord.x;
  let y = coord.y;
  if (coord.mode === "fractional") {
    x = (coord.x / INTERNAL_COORDINATE_SCALE) * screen.width;
    y = (coord.y / INTERNAL_COORDINATE_SCALE) * screen.height;
  }
  return [clamp(Math.round(x), 0, screen.width - 1), clamp(Math.round(y), 0, screen.height - 1)];
}

/** Position as fractions of the screen, for region classification. */
export function toUnitPoint(coord: Coordinate, screen: ScreenSize): UnitPoint {
  if (coord.mode === "fractional") {
    return {
      x: coord.x / INTERNAL_COORDINATE_SCALE,
      y: coord.y / INTERNAL_COORDINATE_SCALE,
    };
  }
  return { x: coord.x / screen.width, y: coord.y / screen.height };
}

export function sameCoordinate(a: Coordinate | null, b: Coordinate | null): boolean {
  if (!a || !b) return false;
  return a.mode === b.mode && a.x === b.x && a.y === b.y;
}

export function formatCoordinate(coord: Coordinate): string {
  return coord.mode === "fractional" ? `(${coord.x}‰, ${coord.y}‰)` : `(${coord.x}px, ${coord.y}px)`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
