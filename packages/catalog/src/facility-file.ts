/**
 * Facility files: a JSON description of a building's checkpoints.
 *
 * ```json
 * {
 *   "name": "Sample Middle School",
 *   "metersPerUnit": 0.05,
 *   "locations": [
 *     { "id": "gym", "name": "Gym", "description": "...",
 *       "coordinate": { "x": 378, "y": 296 }, "adjacentIds": ["cp1"],
 *       "category": "room", "tagSerial": "04:00:00:00:00:00:01" }
 *   ]
 * }
 * ```
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  LOCATION_CATEGORIES,
  isLocationCategory,
  type Coordinate,
  type Location,
} from "@checkpoint-guide/types";

const __dirname = dirname(fileURLToPath(import.meta.url));

export class FacilityFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FacilityFileError";
  }
}

export interface Facility {
  name: string;
  /** Real-world scale of the floor plan, when the file declares one */
  metersPerUnit?: number;
  locations: Location[];
}

/** Path of the bundled sample facility */
export function sampleFacilityPath(): string {
  return join(__dirname, "..", "data", "facilities", "sample-school.json");
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new FacilityFileError(`${where} must be a non-empty string`);
  }
  return value;
}

function parseCoordinate(value: unknown, where: string): Coordinate {
  if (!isRecord(value)) throw new FacilityFileError(`${where} must be an object`);
  const { x, y } = value;
  if (typeof x !== "number" || !Number.isFinite(x) || typeof y !== "number" || !Number.isFinite(y)) {
    throw new FacilityFileError(`${where} must have finite numeric x and y`);
  }
  return { x, y };
}

function parseLocation(value: unknown, where: string): Location {
  if (!isRecord(value)) throw new FacilityFileError(`${where} must be an object`);

  const id = requireString(value.id, `${where}.id`);
  const name = requireString(value.name, `${where}.name`);
  const description = typeof value.description === "string" ? value.description : "";

  const category = value.category;
  if (!isLocationCategory(category)) {
    throw new FacilityFileError(
      `${where}.category must be one of ${LOCATION_CATEGORIES.join(", ")}`,
    );
  }

  const adjacent = value.adjacentIds ?? [];
  if (!Array.isArray(adjacent)) {
    throw new FacilityFileError(`${where}.adjacentIds must be an array`);
  }
  const adjacentIds = adjacent.map((adjacentId: unknown, i: number) =>
    requireString(adjacentId, `${where}.adjacentIds[${i}]`),
  );

  const location: Location = {
    id,
    name,
    description,
    coordinate: parseCoordinate(value.coordinate, `${where}.coordinate`),
    adjacentIds,
    category,
  };
  if (value.tagSerial !== undefined) {
    location.tagSerial = requireString(value.tagSerial, `${where}.tagSerial`);
  }
  if (value.metadata !== undefined) {
    if (!isRecord(value.metadata)) {
      throw new FacilityFileError(`${where}.metadata must be an object`);
    }
    location.metadata = value.metadata;
  }
  return location;
}

/**
 * Validate parsed JSON as a facility. Duplicate ids and tag serials are
 * rejected; neighbours that name no known location are kept but logged,
 * since graph queries skip them.
 */
export function parseFacility(json: unknown, source = "facility"): Facility {
  if (!isRecord(json)) throw new FacilityFileError(`${source}: expected a JSON object`);

  const name = requireString(json.name, `${source}: name`);

  const metersPerUnit = json.metersPerUnit;
  if (metersPerUnit !== undefined && (typeof metersPerUnit !== "number" || !(metersPerUnit > 0))) {
    throw new FacilityFileError(`${source}: metersPerUnit must be a positive number`);
  }

  if (!Array.isArray(json.locations)) {
    throw new FacilityFileError(`${source}: locations must be an array`);
  }

  const locations: Location[] = [];
  const ids = new Set<string>();
  const serials = new Set<string>();
  json.locations.forEach((raw: unknown, i: number) => {
    const location = parseLocation(raw, `${source}: locations[${i}]`);
    if (ids.has(location.id)) {
      throw new FacilityFileError(`${source}: duplicate location id "${location.id}"`);
    }
    if (location.tagSerial !== undefined) {
      if (serials.has(location.tagSerial)) {
        throw new FacilityFileError(`${source}: duplicate tag serial "${location.tagSerial}"`);
      }
      serials.add(location.tagSerial);
    }
    ids.add(location.id);
    locations.push(location);
  });

  for (const location of locations) {
    for (const adjacentId of location.adjacentIds) {
      if (!ids.has(adjacentId)) {
        console.warn(`[catalog] ${source}: ${location.id} lists unknown neighbour ${adjacentId}`);
      }
    }
  }

  return metersPerUnit === undefined ? { name, locations } : { name, metersPerUnit, locations };
}

/** Read and validate a facility file */
export function loadFacilityFile(filePath: string): Facility {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new FacilityFileError(`Cannot read facility file ${filePath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FacilityFileError(`Facility file ${filePath} is not valid JSON`, { cause: err });
  }

  const facility = parseFacility(json, filePath);
  console.log(`[catalog] Loaded ${facility.locations.length} locations from ${facility.name}`);
  return facility;
}

/**
 * Make every declared adjacency two-way: if A lists B, B lists A.
 * Unknown neighbours are left alone. Returns new location objects.
 */
export function mirrorAdjacency(locations: readonly Location[]): Location[] {
  const adjacency = new Map<string, string[]>();
  for (const location of locations) adjacency.set(location.id, [...location.adjacentIds]);

  for (const location of locations) {
    for (const adjacentId of location.adjacentIds) {
      const reverse = adjacency.get(adjacentId);
      if (reverse && !reverse.includes(location.id)) reverse.push(location.id);
    }
  }

  return locations.map((location) => ({
    ...location,
    adjacentIds: adjacency.get(location.id) ?? [...location.adjacentIds],
  }));
}
