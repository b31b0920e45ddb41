/**
 * Walk a navigation session through the sample facility by simulating
 * checkpoint scans along the route.
 * Usage: npx tsx scripts/simulate-walk.ts [--from main-entrance] [--to gym] [--detour cp9] [--profile accessible]
 */
import {
  FacilityFileError,
  loadFacilityFile,
  mirrorAdjacency,
  sampleFacilityPath,
} from "@checkpoint-guide/catalog";
import type { NavigationSession } from "@checkpoint-guide/types";
import { InMemoryLocationGraph } from "../src/graph/in-memory-graph.js";
import { loadNavigationConfig, withOverrides } from "../src/config/navigation-config.js";
import { NavigationEngine } from "../src/session/navigation-engine.js";
import { SimulatedTagReader } from "../src/tag/simulated-reader.js";
import { errorMessage } from "../src/errors.js";

const MAX_SCANS = 50;

const args = process.argv.slice(2);

function getArgValue(flag: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith(`--${flag}=`)) return arg.slice(flag.length + 3);
    const next = args[i + 1];
    if (arg === `--${flag}` && next !== undefined && !next.startsWith("--")) return next;
  }
  return undefined;
}

const from = getArgValue("from") ?? "main-entrance";
const to = getArgValue("to") ?? "gym";
const detour = getArgValue("detour");
const profile = getArgValue("profile");

function describe(session: NavigationSession): string {
  const parts = [`state=${session.state}`];
  if (session.currentLocationId) parts.push(`at=${session.currentLocationId}`);
  if (session.currentInstruction) parts.push(`"${session.currentInstruction.description}"`);
  if (session.errorMessage) parts.push(`error=${session.errorMessage}`);
  return parts.join(" ");
}

async function main() {
  const facility = loadFacilityFile(sampleFacilityPath());
  const graph = new InMemoryLocationGraph(mirrorAdjacency(facility.locations));

  const base = loadNavigationConfig(profile);
  const config =
    facility.metersPerUnit === undefined
      ? base
      : withOverrides({ distance: { metersPerUnit: facility.metersPerUnit } }, base);

  const reader = new SimulatedTagReader({ maxPayloadBytes: config.tags.maxPayloadBytes });
  const engine = new NavigationEngine({ graph, reader, config });
  engine.subscribe((session, previous) => {
    if (session.state !== previous.state) {
      console.log(`  ${previous.state} -> ${session.state}`);
    }
  });

  try {
    await engine.setCurrentLocation(from);
    const planned = await engine.setDestination(to);
    const route = planned.activeRoute;
    if (!route) {
      console.log(`No route: ${describe(planned)}`);
      return;
    }
    console.log(
      `Route ${route.pathLocationIds.join(" -> ")} ` +
        `(${route.estimatedDistanceMeters.toFixed(1)} m, ~${Math.round(route.estimatedDurationSeconds)} s)`,
    );

    let session = await engine.startNavigation();
    let detourPending = detour !== undefined;
    let scans = 0;

    while (session.state === "navigating" && scans < MAX_SCANS) {
      const path = session.activeRoute?.pathLocationIds ?? [];
      let next = path[session.currentStepIndex + 1];
      if (detourPending && detour !== undefined && scans === 1) {
        next = detour;
        detourPending = false;
      }
      if (next === undefined) break;

      console.log(`Scan ${next}`);
      reader.scanLocation(next);
      session = await engine.whenIdle();
      console.log(`  ${describe(session)}`);
      scans++;
    }

    console.log(`Finished: ${describe(session)}`);
  } finally {
    await engine.dispose();
  }
}

main().catch((err: unknown) => {
  if (err instanceof FacilityFileError) {
    console.error(`Facility error: ${err.message}`);
  } else {
    console.error(`Simulation failed: ${errorMessage(err)}`);
  }
  process.exit(1);
});
