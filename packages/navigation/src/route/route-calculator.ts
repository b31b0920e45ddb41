/**
 * Shortest-path route calculation over the location graph.
 *
 * Dijkstra over declared adjacency with Euclidean edge weights, using the
 * quadratic "scan for the closest unvisited node" variant. Ties go to the
 * node that comes first in catalog order.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  Location,
  LocationGraph,
  NavigationInstruction,
  Route,
} from "@checkpoint-guide/types";
import { distanceMeters } from "../graph/geometry.js";
import { arrivalInstruction, buildInstructions, markRerouted } from "./instructions.js";
import { getNextInstruction } from "./route.js";
import { errorMessage } from "../errors.js";
import {
  getDefaultNavigationConfig,
  type NavigationConfig,
} from "../config/navigation-config.js";

/** Route calculation contract consumed by the navigation engine */
export interface RouteCalculator {
  calculateRoute(fromId: string, toId: string): Promise<Route | undefined>;
  /** Same as calculateRoute, with the first instruction marked as a reroute */
  recalculateFromCurrent(currentId: string, destinationId: string): Promise<Route | undefined>;
  getNextInstruction(route: Route, locationId: string): NavigationInstruction | undefined;
}

/** Multiplier applied to edges of already-found paths when searching for alternatives */
const ALTERNATIVE_EDGE_PENALTY = 3;
/** Candidates sharing more than this fraction of nodes with an earlier route are rejected */
const ALTERNATIVE_SIMILARITY_LIMIT = 0.7;

export class ShortestPathCalculator implements RouteCalculator {
  private readonly metersPerUnit: number;
  private readonly walkingSpeedMetersPerMinute: number;
  private readonly checkpointDelaySeconds: number;

  constructor(
    private readonly graph: LocationGraph,
    config: NavigationConfig = getDefaultNavigationConfig(),
  ) {
    this.metersPerUnit = config.distance.metersPerUnit;
    this.walkingSpeedMetersPerMinute = config.timing.walkingSpeedMetersPerMinute;
    this.checkpointDelaySeconds = config.timing.checkpointDelaySeconds;
  }

  async calculateRoute(fromId: string, toId: string): Promise<Route | undefined> {
    try {
      const locations = await this.graph.getAllLocations();
      const byId = new Map(locations.map((l) => [l.id, l]));
      const from = byId.get(fromId);
      if (!from || !byId.has(toId)) return undefined;

      if (fromId === toId) return this.zeroLengthRoute(from);

      const path = this.shortestPath(fromId, toId, locations, byId, []);
      if (!path) {
        console.log(`[route-calc] No path from ${fromId} to ${toId}`);
        return undefined;
      }
      return this.buildRoute(path);
    } catch (err) {
      console.error(`[route-calc] Route search ${fromId} -> ${toId} failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  async recalculateFromCurrent(
    currentId: string,
    destinationId: string,
  ): Promise<Route | undefined> {
    const route = await this.calculateRoute(currentId, destinationId);
    if (!route || route.pathLocationIds.length < 2) return route;
    return { ...route, instructions: markRerouted(route.instructions) };
  }

  getNextInstruction(route: Route, locationId: string): NavigationInstruction | undefined {
    return getNextInstruction(route, locationId);
  }

  async areLocationsConnected(fromId: string, toId: string): Promise<boolean> {
    return (await this.calculateRoute(fromId, toId)) !== undefined;
  }

  /**
   * Up to `maxAlternatives` distinct routes, shortest first.
   *
   * Each round re-runs the search with edges of the routes found so far
   * made 3x more expensive. The search stops at the first candidate that
   * overlaps an earlier route by more than 70% of its nodes.
   */
  async findAlternativeRoutes(
    fromId: string,
    toId: string,
    maxAlternatives: number = 3,
  ): Promise<Route[]> {
    const alternatives: Route[] = [];
    try {
      const locations = await this.graph.getAllLocations();
      const byId = new Map(locations.map((l) => [l.id, l]));
      if (!byId.has(fromId) || !byId.has(toId) || fromId === toId) return alternatives;

      for (let attempt = 0; attempt < maxAlternatives; attempt++) {
        const excluded = alternatives.map((r) => r.pathLocationIds);
        const path = this.shortestPath(fromId, toId, locations, byId, excluded);
        if (!path) break;

        const ids = path.map((l) => l.id);
        if (excluded.some((other) => pathSimilarity(ids, other) > ALTERNATIVE_SIMILARITY_LIMIT)) {
          break;
        }
        alternatives.push(this.buildRoute(path));
      }
    } catch (err) {
      console.error(`[route-calc] Alternative search ${fromId} -> ${toId} failed: ${errorMessage(err)}`);
    }
    return alternatives;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private shortestPath(
    startId: string,
    endId: string,
    locations: readonly Location[],
    byId: ReadonlyMap<string, Location>,
    excludedPaths: readonly (readonly string[])[],
  ): Location[] | undefined {
    const distances = new Map<string, number>();
    const previous = new Map<string, string>();
    const unvisited = new Set<string>();
    for (const location of locations) {
      distances.set(location.id, Infinity);
      unvisited.add(location.id);
    }
    distances.set(startId, 0);

    while (unvisited.size > 0) {
      // Set iteration follows catalog order, so the first minimum wins ties
      let currentId: string | undefined;
      let minDistance = Infinity;
      for (const id of unvisited) {
        const d = distances.get(id) ?? Infinity;
        if (d < minDistance) {
          minDistance = d;
          currentId = id;
        }
      }
      if (currentId === undefined || currentId === endId) break;
      unvisited.delete(currentId);

      const current = byId.get(currentId);
      if (!current) continue;
      for (const neighbourId of current.adjacentIds) {
        if (!unvisited.has(neighbourId)) continue;
        const neighbour = byId.get(neighbourId);
        if (!neighbour) continue;

        let weight = distanceMeters(current.coordinate, neighbour.coordinate, this.metersPerUnit);
        for (const excluded of excludedPaths) {
          if (usesEdge(excluded, currentId, neighbourId)) weight *= ALTERNATIVE_EDGE_PENALTY;
        }

        const candidate = minDistance + weight;
        if (candidate < (distances.get(neighbourId) ?? Infinity)) {
          distances.set(neighbourId, candidate);
          previous.set(neighbourId, currentId);
        }
      }
    }

    if ((distances.get(endId) ?? Infinity) === Infinity) return undefined;

    const path: Location[] = [];
    let cursor: string | undefined = endId;
    while (cursor !== undefined) {
      const location = byId.get(cursor);
      if (!location) return undefined;
      path.unshift(location);
      cursor = previous.get(cursor);
    }
    return path;
  }

  private pathDistance(path: readonly Location[]): number {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
      total += distanceMeters(path[i - 1]!.coordinate, path[i]!.coordinate, this.metersPerUnit);
    }
    return total;
  }

  private estimateDurationSeconds(distance: number, hops: number): number {
    return (distance / this.walkingSpeedMetersPerMinute) * 60 + hops * this.checkpointDelaySeconds;
  }

  private buildRoute(path: readonly Location[]): Route {
    const id = `route_${uuidv4()}`;
    const start = path[0]!;
    const end = path[path.length - 1]!;
    const distance = this.pathDistance(path);
    return {
      id,
      startLocationId: start.id,
      endLocationId: end.id,
      pathLocationIds: path.map((l) => l.id),
      estimatedDistanceMeters: distance,
      estimatedDurationSeconds: this.estimateDurationSeconds(distance, path.length - 1),
      instructions: buildInstructions(id, path, this.metersPerUnit),
    };
  }

  private zeroLengthRoute(location: Location): Route {
    const id = `route_${uuidv4()}`;
    return {
      id,
      startLocationId: location.id,
      endLocationId: location.id,
      pathLocationIds: [location.id],
      estimatedDistanceMeters: 0,
      estimatedDurationSeconds: 0,
      instructions: [arrivalInstruction(id, location)],
    };
  }
}

function usesEdge(path: readonly string[], fromId: string, toId: string): boolean {
  const index = path.indexOf(fromId);
  return index >= 0 && index < path.length - 1 && path[index + 1] === toId;
}

/** Shared nodes over the longer path's length */
function pathSimilarity(a: readonly string[], b: readonly string[]): number {
  const common = a.filter((id) => b.includes(id)).length;
  return common / Math.max(a.length, b.length);
}
