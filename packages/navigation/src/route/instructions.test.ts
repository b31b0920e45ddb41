import { describe, it, expect } from "vitest";
import type { Location } from "@checkpoint-guide/types";
import { arrivalInstruction, buildInstructions, markRerouted } from "./instructions.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeLocation(id: string, x: number, y: number): Location {
  return {
    id,
    name: id.toUpperCase(),
    description: "",
    coordinate: { x, y },
    adjacentIds: [],
    category: "hallway",
  };
}

/**
 *   S
 *   │
 *   A ── B ── C
 *             │
 *             D
 */
const S = makeLocation("s", 0, 0);
const A = makeLocation("a", 0, 100);
const B = makeLocation("b", 100, 100);
const C = makeLocation("c", 200, 100);
const D = makeLocation("d", 200, 200);

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("buildInstructions", () => {
  it("words each hop from the heading change at its start", () => {
    const instructions = buildInstructions("r1", [S, A, B, C, D], 0.5);

    expect(instructions.map((i) => [i.id, i.kind, i.direction, i.description])).toEqual([
      ["r1_step_0", "start", "forward", "Start at S toward A"],
      ["r1_step_1", "turn", "left", "Turn left to B"],
      ["r1_step_2", "straight", "forward", "Continue straight to C"],
      ["r1_step_3", "destination", "right", "Arrive at D"],
    ]);
    expect(instructions.map((i) => i.distanceMeters)).toEqual([50, 50, 50, 50]);
  });

  it("uses a single destination instruction for one hop", () => {
    const [only, ...rest] = buildInstructions("r2", [A, B], 1);
    expect(rest).toEqual([]);
    expect(only).toEqual({
      id: "r2_step_0",
      kind: "destination",
      description: "Go directly to B",
      fromLocationId: "a",
      toLocationId: "b",
      direction: "forward",
      distanceMeters: 100,
    });
  });

  it("returns nothing for a single location", () => {
    expect(buildInstructions("r3", [A], 1)).toEqual([]);
  });
});

describe("arrivalInstruction", () => {
  it("describes a zero-length route", () => {
    expect(arrivalInstruction("r4", A)).toMatchObject({
      id: "r4_step_0",
      kind: "destination",
      description: "You are already at A",
      fromLocationId: "a",
      toLocationId: "a",
      distanceMeters: 0,
    });
  });
});

describe("markRerouted", () => {
  it("re-tags only the first instruction", () => {
    const original = buildInstructions("r5", [S, A, B], 1);
    const rerouted = markRerouted(original);

    expect(rerouted[0]).toMatchObject({
      id: "r5_step_0_reroute",
      kind: "reroute",
      description: "Route recalculated. Start at S toward A",
    });
    expect(rerouted[1]).toBe(original[1]);
    expect(original[0]?.kind).toBe("start");
  });
});
