/**
 * Route value helpers.
 */

import type { NavigationInstruction, Route } from "@checkpoint-guide/types";

/**
 * Structural validity: non-empty path whose ends match the declared start
 * and end, non-negative totals, and instructions for any real movement.
 */
export function isValidRoute(route: Route): boolean {
  const path = route.pathLocationIds;
  if (path.length === 0) return false;
  if (path[0] !== route.startLocationId) return false;
  if (path[path.length - 1] !== route.endLocationId) return false;
  if (!(route.estimatedDistanceMeters >= 0) || !(route.estimatedDurationSeconds >= 0)) return false;
  if (path.length > 1 && route.instructions.length === 0) return false;
  return true;
}

export function routeContainsLocation(route: Route, locationId: string): boolean {
  return route.pathLocationIds.includes(locationId);
}

/** Position of a location in the route path, or -1 */
export function getLocationIndex(route: Route, locationId: string): number {
  return route.pathLocationIds.indexOf(locationId);
}

/** Sum of the per-leg instruction distances */
export function totalInstructionDistance(route: Route): number {
  return route.instructions.reduce((sum, instruction) => sum + instruction.distanceMeters, 0);
}

/**
 * Instruction to follow when standing at `locationId`: the first one
 * that leaves from it. Undefined at the end of a multi-node route.
 */
export function getNextInstruction(
  route: Route,
  locationId: string,
): NavigationInstruction | undefined {
  return route.instructions.find((instruction) => instruction.fromLocationId === locationId);
}
