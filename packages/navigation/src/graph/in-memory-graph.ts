/**
 * Map-backed LocationGraph for tests, scripts and small facilities that
 * fit in memory.
 */

import type { Location, LocationGraph } from "@checkpoint-guide/types";
import { ValidationError } from "../errors.js";

export class InMemoryLocationGraph implements LocationGraph {
  private readonly locations = new Map<string, Location>();
  private readonly bySerial = new Map<string, Location>();

  constructor(locations: Iterable<Location>) {
    for (const location of locations) {
      if (this.locations.has(location.id)) {
        throw new ValidationError(`Duplicate location id: ${location.id}`, location.id);
      }
      this.locations.set(location.id, location);
      if (location.tagSerial) this.bySerial.set(location.tagSerial, location);
    }
  }

  get size(): number {
    return this.locations.size;
  }

  async getLocation(id: string): Promise<Location | undefined> {
    return this.locations.get(id);
  }

  async getAllLocations(): Promise<Location[]> {
    return [...this.locations.values()];
  }

  async getAdjacentLocations(id: string): Promise<Location[]> {
    const location = this.locations.get(id);
    if (!location) return [];
    const adjacent: Location[] = [];
    for (const adjacentId of location.adjacentIds) {
      const neighbour = this.locations.get(adjacentId);
      if (neighbour) adjacent.push(neighbour);
    }
    return adjacent;
  }

  async hasLocation(id: string): Promise<boolean> {
    return this.locations.has(id);
  }

  async getLocationByTagSerial(serial: string): Promise<Location | undefined> {
    return this.bySerial.get(serial);
  }
}
