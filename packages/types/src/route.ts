/**
 * Route results - the output of the route calculator.
 *
 * A route is an ordered list of location ids plus derived distance, time
 * and one instruction per hop. Routes are value objects: a recalculation
 * produces a new route rather than editing the old one.
 */

/** What an instruction asks the user to do */
export type InstructionKind = "start" | "turn" | "straight" | "destination" | "reroute";

/** Heading change at the start of a leg, relative to the previous leg */
export type Direction = "forward" | "left" | "right" | "back";

/** One hop of a route */
export interface NavigationInstruction {
  id: string;
  kind: InstructionKind;
  description: string;
  fromLocationId: string;
  toLocationId: string;
  direction: Direction;
  /** Leg length in meters */
  distanceMeters: number;
}

/** A complete route */
export interface Route {
  id: string;
  startLocationId: string;
  endLocationId: string;
  /** First element is the start, last is the end. One element = already there. */
  pathLocationIds: readonly string[];
  estimatedDistanceMeters: number;
  estimatedDurationSeconds: number;
  instructions: readonly NavigationInstruction[];
}
