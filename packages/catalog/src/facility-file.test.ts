import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Location } from "@checkpoint-guide/types";
import {
  FacilityFileError,
  loadFacilityFile,
  mirrorAdjacency,
  parseFacility,
  sampleFacilityPath,
} from "./facility-file.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function rawLocation(id: string, adjacentIds: unknown[], extra: Record<string, unknown> = {}) {
  return {
    id,
    name: id.toUpperCase(),
    description: `${id} description`,
    coordinate: { x: 0, y: 0 },
    adjacentIds,
    category: "hallway",
    ...extra,
  };
}

function makeLocation(id: string, adjacentIds: string[]): Location {
  return {
    id,
    name: id,
    description: "",
    coordinate: { x: 0, y: 0 },
    adjacentIds,
    category: "hallway",
  };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("parseFacility", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses a valid facility", () => {
    const facility = parseFacility({
      name: "Annex",
      metersPerUnit: 0.5,
      locations: [
        rawLocation("a", ["b"], { tagSerial: "serial-a", metadata: { floor: 1 } }),
        rawLocation("b", ["a"]),
      ],
    });

    expect(facility.name).toBe("Annex");
    expect(facility.metersPerUnit).toBe(0.5);
    expect(facility.locations).toEqual([
      {
        id: "a",
        name: "A",
        description: "a description",
        coordinate: { x: 0, y: 0 },
        adjacentIds: ["b"],
        category: "hallway",
        tagSerial: "serial-a",
        metadata: { floor: 1 },
      },
      {
        id: "b",
        name: "B",
        description: "b description",
        coordinate: { x: 0, y: 0 },
        adjacentIds: ["a"],
        category: "hallway",
      },
    ]);
  });

  it("leaves metersPerUnit out when the file has none", () => {
    const facility = parseFacility({ name: "Annex", locations: [] });
    expect("metersPerUnit" in facility).toBe(false);
  });

  it.each<[unknown, string]>([
    [[], "facility: expected a JSON object"],
    [{ locations: [] }, "facility: name must be a non-empty string"],
    [{ name: "x", metersPerUnit: -1, locations: [] }, "facility: metersPerUnit must be a positive number"],
    [{ name: "x" }, "facility: locations must be an array"],
    [
      { name: "x", locations: [rawLocation("a", [], { category: "closet" })] },
      "facility: locations[0].category must be one of room, hallway, entrance, office",
    ],
    [
      { name: "x", locations: [rawLocation("a", [], { coordinate: { x: 1 } })] },
      "facility: locations[0].coordinate must have finite numeric x and y",
    ],
    [
      { name: "x", locations: [rawLocation("a", [7])] },
      "facility: locations[0].adjacentIds[0] must be a non-empty string",
    ],
    [
      { name: "x", locations: [rawLocation("a", []), rawLocation("a", [])] },
      'facility: duplicate location id "a"',
    ],
    [
      {
        name: "x",
        locations: [rawLocation("a", [], { tagSerial: "s" }), rawLocation("b", [], { tagSerial: "s" })],
      },
      'facility: duplicate tag serial "s"',
    ],
  ])("rejects %j", (json, message) => {
    expect(() => parseFacility(json)).toThrow(FacilityFileError);
    expect(() => parseFacility(json)).toThrow(message);
  });

  it("warns about neighbours that do not exist", () => {
    const facility = parseFacility({ name: "x", locations: [rawLocation("a", ["ghost"])] });
    expect(facility.locations[0]?.adjacentIds).toEqual(["ghost"]);
    expect(console.warn).toHaveBeenCalledWith("[catalog] facility: a lists unknown neighbour ghost");
  });
});

describe("loadFacilityFile", () => {
  let testDir: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    testDir = mkdtempSync(join(tmpdir(), "facility-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it("loads the bundled sample facility", () => {
    const facility = loadFacilityFile(sampleFacilityPath());
    expect(facility.name).toBe("Sample Middle School");
    expect(facility.metersPerUnit).toBe(0.05);
    expect(facility.locations).toHaveLength(22);

    const ids = new Set(facility.locations.map((l) => l.id));
    for (const location of facility.locations) {
      for (const adjacentId of location.adjacentIds) expect(ids.has(adjacentId)).toBe(true);
    }
  });

  it("fails on a missing file", () => {
    expect(() => loadFacilityFile(join(testDir, "missing.json"))).toThrow(FacilityFileError);
  });

  it("fails on malformed JSON", () => {
    const filePath = join(testDir, "broken.json");
    writeFileSync(filePath, "{ not json");
    expect(() => loadFacilityFile(filePath)).toThrow(`Facility file ${filePath} is not valid JSON`);
  });
});

describe("mirrorAdjacency", () => {
  it("adds the reverse of every declared adjacency", () => {
    const input = [makeLocation("a", ["b"]), makeLocation("b", []), makeLocation("c", ["a", "ghost"])];
    const mirrored = mirrorAdjacency(input);

    expect(mirrored.map((l) => [l.id, l.adjacentIds])).toEqual([
      ["a", ["b", "c"]],
      ["b", ["a"]],
      ["c", ["a", "ghost"]],
    ]);
    expect(input[1]?.adjacentIds).toEqual([]);
  });

  it("does not duplicate existing reverse edges", () => {
    const mirrored = mirrorAdjacency([makeLocation("a", ["b"]), makeLocation("b", ["a"])]);
    expect(mirrored.map((l) => l.adjacentIds)).toEqual([["b"], ["a"]]);
  });
});
