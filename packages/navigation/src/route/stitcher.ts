/**
 * Splices a short return route onto the remainder of an active route.
 *
 * Used for minor deviations: rather than replanning the whole journey,
 * walk back to the nearest on-route checkpoint and pick the old route
 * up from there.
 */

import { v4 as uuidv4 } from "uuid";
import type { Route } from "@checkpoint-guide/types";
import { getLocationIndex } from "./route.js";

/**
 * Combine `returnRoute` (ending at `rejoinLocationId`) with the part of
 * `originalRoute` after that location.
 *
 * Totals take the full return route plus the original totals scaled by
 * the share of path nodes that remain after the rejoin point. This is an
 * estimate: use `totalInstructionDistance` for the exact leg sum.
 *
 * Returns undefined when the rejoin location is not on the original path.
 */
export function combineRoutes(
  returnRoute: Route,
  originalRoute: Route,
  rejoinLocationId: string,
): Route | undefined {
  const rejoinIndex = getLocationIndex(originalRoute, rejoinLocationId);
  if (rejoinIndex === -1) return undefined;

  const originalPath = originalRoute.pathLocationIds;
  const remainingShare = (originalPath.length - rejoinIndex - 1) / originalPath.length;

  const remainingInstructions = originalRoute.instructions.filter(
    (instruction) => originalPath.indexOf(instruction.fromLocationId) > rejoinIndex,
  );

  return {
    id: `route_${uuidv4()}`,
    startLocationId: returnRoute.startLocationId,
    endLocationId: originalRoute.endLocationId,
    pathLocationIds: [...returnRoute.pathLocationIds, ...originalPath.slice(rejoinIndex + 1)],
    estimatedDistanceMeters:
      returnRoute.estimatedDistanceMeters + originalRoute.estimatedDistanceMeters * remainingShare,
    estimatedDurationSeconds:
      returnRoute.estimatedDurationSeconds + originalRoute.estimatedDurationSeconds * remainingShare,
    instructions: [...returnRoute.instructions, ...remainingInstructions],
  };
}
