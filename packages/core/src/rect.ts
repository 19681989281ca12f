import { ExtractError } from "./errors";
import type { Rect } from "./types";

/**
 * Create a rectangle, rejecting NaN and infinite components.
 */
export function rect(x: number, y: number, width: number, height: number): Rect {
  if (![x, y, width, height].every(Number.isFinite)) {
    throw new ExtractError(`Invalid rectangle: (${x}, ${y}, ${width}, ${height})`, "INVALID_RECT");
  }
  return { x, y, width, height };
}

/**
 * Flip negative sizes so that width and height are non-negative.
 */
export function standardizeRect(r: Rect): Rect {
  return {
    x: r.width < 0 ? r.x + r.width : r.x,
    y: r.height < 0 ? r.y + r.height : r.y,
    width: Math.abs(r.width),
    height: Math.abs(r.height),
  };
}

function isFiniteRect(r: Rect): boolean {
  return (
    Number.isFinite(r.x) &&
    Number.isFinite(r.y) &&
    Number.isFinite(r.width) &&
    Number.isFinite(r.height)
  );
}

/**
 * True when the interiors of both rectangles overlap.
 *
 * Rectangles that only touch along an edge do not intersect. A zero-size
 * rectangle intersects any rectangle it lies strictly inside.
 */
export function intersects(a: Rect, b: Rect): boolean {
  if (!isFiniteRect(a) || !isFiniteRect(b)) {
    return false;
  }

  const r1 = standardizeRect(a);
  const r2 = standardizeRect(b);

  return (
    r1.x < r2.x + r2.width &&
    r2.x < r1.x + r1.width &&
    r1.y < r2.y + r2.height &&
    r2.y < r1.y + r1.height
  );
}
