/**
 * Floor-plan geometry helpers.
 *
 * Coordinates use the image convention: x grows right, y grows down.
 */

import type { Coordinate, Direction } from "@checkpoint-guide/types";

/** Turns within this many degrees of straight ahead count as forward */
export const FORWARD_TOLERANCE_DEGREES = 30;
/** Turns at least this sharp count as turning around */
export const BACK_THRESHOLD_DEGREES = 150;

export function euclideanDistance(a: Coordinate, b: Coordinate): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/** Distance between two points converted to meters */
export function distanceMeters(a: Coordinate, b: Coordinate, metersPerUnit: number): number {
  return euclideanDistance(a, b) * metersPerUnit;
}

/**
 * Signed turn angle in degrees between the leg prev→current and the leg
 * current→next, in (-180, 180]. Positive is clockwise on screen.
 */
export function turnAngle(prev: Coordinate, current: Coordinate, next: Coordinate): number {
  const inX = current.x - prev.x;
  const inY = current.y - prev.y;
  const outX = next.x - current.x;
  const outY = next.y - current.y;
  const cross = inX * outY - inY * outX;
  const dot = inX * outX + inY * outY;
  return (Math.atan2(cross, dot) * 180) / Math.PI;
}

/**
 * Classify the heading change at `current`.
 *
 * Degenerate legs (zero length) are treated as forward.
 */
export function classifyDirection(
  prev: Coordinate,
  current: Coordinate,
  next: Coordinate,
): Direction {
  if (euclideanDistance(prev, current) === 0 || euclideanDistance(current, next) === 0) {
    return "forward";
  }
  const angle = turnAngle(prev, current, next);
  const magnitude = Math.abs(angle);
  if (magnitude <= FORWARD_TOLERANCE_DEGREES) return "forward";
  if (magnitude >= BACK_THRESHOLD_DEGREES) return "back";
  // y-down: a positive cross product is a clockwise (rightward) turn
  return angle > 0 ? "right" : "left";
}
