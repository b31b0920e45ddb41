/**
 * Deviation classification for off-route checkpoint readings.
 *
 * Distances here are floor-plan units, the same units the thresholds
 * are configured in.
 */

import type { Location, LocationGraph, Route } from "@checkpoint-guide/types";
import { euclideanDistance } from "../graph/geometry.js";
import type { DeviationConfig } from "../config/navigation-config.js";

export type DeviationSeverity = "minor" | "moderate" | "major" | "unknown";

export type DeviationThresholds = Pick<DeviationConfig, "minorThreshold" | "moderateThreshold">;

const DEFAULT_THRESHOLDS: DeviationThresholds = { minorThreshold: 50, moderateThreshold: 200 };

/** Severity from the distance to the nearest on-route checkpoint */
export function classifyDeviation(
  distance: number | undefined,
  thresholds: DeviationThresholds = DEFAULT_THRESHOLDS,
): DeviationSeverity {
  if (distance === undefined || Number.isNaN(distance)) return "unknown";
  if (distance < thresholds.minorThreshold) return "minor";
  if (distance < thresholds.moderateThreshold) return "moderate";
  return "major";
}

export interface NearestRouteLocation {
  location: Location;
  distance: number;
}

/**
 * Closest checkpoint on the route to `from`. Path ids that no longer
 * resolve are skipped; the first of equally close checkpoints wins.
 */
export async function findNearestRouteLocation(
  graph: LocationGraph,
  route: Route,
  from: Location,
): Promise<NearestRouteLocation | undefined> {
  let nearest: NearestRouteLocation | undefined;
  for (const id of route.pathLocationIds) {
    const location = await graph.getLocation(id);
    if (!location) continue;
    const distance = euclideanDistance(from.coordinate, location.coordinate);
    if (!nearest || distance < nearest.distance) {
      nearest = { location, distance };
    }
  }
  return nearest;
}

/**
 * Whether moving from `from` to `to` between two readings is physically
 * plausible: a declared adjacency, or a jump no longer than `proximity`.
 */
export function isPlausibleTransition(from: Location, to: Location, proximity: number): boolean {
  if (from.adjacentIds.includes(to.id)) return true;
  return euclideanDistance(from.coordinate, to.coordinate) <= proximity;
}
