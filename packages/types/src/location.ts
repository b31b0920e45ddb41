/**
 * Indoor location graph model.
 *
 * Locations are the checkpoints of a facility: rooms, hallway junctions,
 * entrances and offices. Each one declares the ids it connects to directly.
 * Adjacency is per node and is NOT symmetric unless the catalog mirrors it.
 */

/** Position on the facility floor plan, in map units (y grows downward) */
export interface Coordinate {
  x: number;
  y: number;
}

/** Location category */
export type LocationCategory = "room" | "hallway" | "entrance" | "office";

export const LOCATION_CATEGORIES: readonly LocationCategory[] = [
  "room",
  "hallway",
  "entrance",
  "office",
];

/** A checkpoint in the indoor graph */
export interface Location {
  /** Unique key, also written into checkpoint tags */
  id: string;
  name: string;
  description: string;
  coordinate: Coordinate;
  /** Ids reachable in one step from this location */
  adjacentIds: readonly string[];
  category: LocationCategory;
  /** Serial number of the physical tag mounted at this location */
  tagSerial?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Read-only query surface over the location catalog.
 *
 * Unknown ids never throw: lookups return undefined, lists come back empty.
 */
export interface LocationGraph {
  getLocation(id: string): Promise<Location | undefined>;
  /** All locations, in catalog order */
  getAllLocations(): Promise<Location[]>;
  /** Declared neighbours of a location that resolve to known locations */
  getAdjacentLocations(id: string): Promise<Location[]>;
  hasLocation(id: string): Promise<boolean>;
  getLocationByTagSerial(serial: string): Promise<Location | undefined>;
}

export function isLocationCategory(value: unknown): value is LocationCategory {
  return LOCATION_CATEGORIES.some((category) => category === value);
}
