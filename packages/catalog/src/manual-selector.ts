/**
 * Manual location selection, the fallback when the tag reader is
 * unavailable: the user picks where they are (or where they are going)
 * from a filtered list instead of scanning.
 */

import {
  LOCATION_CATEGORIES,
  type Location,
  type LocationCategory,
  type LocationGraph,
} from "@checkpoint-guide/types";

export interface LocationQuery {
  /** Case-insensitive match against name, description and id */
  search?: string;
  category?: LocationCategory;
  /** Typically the current location when choosing a destination */
  excludeId?: string;
  /** Leave out hallway checkpoints, which are waypoints rather than places */
  destinationsOnly?: boolean;
}

export interface LocationGroup {
  category: LocationCategory;
  locations: Location[];
}

function byName(a: Location, b: Location): number {
  return a.name.localeCompare(b.name);
}

export function matchesQuery(location: Location, query: LocationQuery): boolean {
  if (query.excludeId !== undefined && location.id === query.excludeId) return false;
  if (query.category !== undefined && location.category !== query.category) return false;
  if (query.destinationsOnly && location.category === "hallway") return false;

  const needle = query.search?.trim().toLowerCase() ?? "";
  if (needle.length === 0) return true;
  return (
    location.name.toLowerCase().includes(needle) ||
    location.description.toLowerCase().includes(needle) ||
    location.id.toLowerCase().includes(needle)
  );
}

export class ManualLocationSelector {
  constructor(private readonly graph: LocationGraph) {}

  /** Matching locations sorted by name */
  async findLocations(query: LocationQuery = {}): Promise<Location[]> {
    const locations = await this.graph.getAllLocations();
    return locations.filter((location) => matchesQuery(location, query)).sort(byName);
  }

  /** Matching locations grouped by category; empty groups are omitted */
  async groupByCategory(query: LocationQuery = {}): Promise<LocationGroup[]> {
    const matches = await this.findLocations(query);
    const groups: LocationGroup[] = [];
    for (const category of LOCATION_CATEGORIES) {
      const locations = matches.filter((location) => location.category === category);
      if (locations.length > 0) groups.push({ category, locations });
    }
    return groups;
  }

  /** Resolve a picked id; undefined when the catalog does not know it */
  async select(id: string): Promise<Location | undefined> {
    const location = await this.graph.getLocation(id);
    if (!location) console.warn(`[catalog] Manual selection of unknown location ${id}`);
    return location;
  }
}
