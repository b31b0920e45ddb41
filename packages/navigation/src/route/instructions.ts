/**
 * Turn-by-turn instruction generation.
 *
 * One instruction per hop. The first hop starts the walk, the last arrives,
 * and intermediate hops are worded from the heading change at their start.
 */

import type { Direction, Location, NavigationInstruction } from "@checkpoint-guide/types";
import { classifyDirection, distanceMeters } from "../graph/geometry.js";

export const REROUTE_PREFIX = "Route recalculated. ";

function describeTurn(direction: Direction, toName: string): string {
  switch (direction) {
    case "forward":
      return `Continue straight to ${toName}`;
    case "left":
      return `Turn left to ${toName}`;
    case "right":
      return `Turn right to ${toName}`;
    case "back":
      return `Turn around to ${toName}`;
  }
}

/** Instruction for a zero-length route */
export function arrivalInstruction(routeId: string, location: Location): NavigationInstruction {
  return {
    id: `${routeId}_step_0`,
    kind: "destination",
    description: `You are already at ${location.name}`,
    fromLocationId: location.id,
    toLocationId: location.id,
    direction: "forward",
    distanceMeters: 0,
  };
}

/**
 * Build the instructions for a path of at least two locations.
 */
export function buildInstructions(
  routeId: string,
  path: readonly Location[],
  metersPerUnit: number,
): NavigationInstruction[] {
  const instructions: NavigationInstruction[] = [];
  const hops = path.length - 1;

  for (let i = 0; i < hops; i++) {
    const from = path[i]!;
    const to = path[i + 1]!;
    const prev = i > 0 ? path[i - 1] : undefined;
    const direction: Direction = prev
      ? classifyDirection(prev.coordinate, from.coordinate, to.coordinate)
      : "forward";
    const base = {
      id: `${routeId}_step_${i}`,
      fromLocationId: from.id,
      toLocationId: to.id,
      direction,
      distanceMeters: distanceMeters(from.coordinate, to.coordinate, metersPerUnit),
    };

    if (hops === 1) {
      instructions.push({ ...base, kind: "destination", description: `Go directly to ${to.name}` });
    } else if (i === 0) {
      instructions.push({ ...base, kind: "start", description: `Start at ${from.name} toward ${to.name}` });
    } else if (i === hops - 1) {
      instructions.push({ ...base, kind: "destination", description: `Arrive at ${to.name}` });
    } else {
      instructions.push({
        ...base,
        kind: direction === "forward" ? "straight" : "turn",
        description: describeTurn(direction, to.name),
      });
    }
  }

  return instructions;
}

/** Re-tag the first instruction of a recalculated route */
export function markRerouted(
  instructions: readonly NavigationInstruction[],
): NavigationInstruction[] {
  return instructions.map((instruction, i): NavigationInstruction =>
    i === 0
      ? {
          ...instruction,
          id: `${instruction.id}_reroute`,
          kind: "reroute",
          description: `${REROUTE_PREFIX}${instruction.description}`,
        }
      : instruction,
  );
}
