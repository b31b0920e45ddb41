/**
 * @checkpoint-guide/navigation
 *
 * Checkpoint-based indoor navigation. Users confirm their position by
 * scanning proximity tags mounted at fixed locations; the engine computes
 * routes over the location graph, emits turn-by-turn instructions, detects
 * deviation and reroutes.
 *
 * Flow:
 * 1. Load a facility -> LocationGraph
 * 2. Set current location and destination -> Route
 * 3. Start navigation; tag scans advance or reroute the session
 */

export * from "./errors.js";
export * from "./config/navigation-config.js";

// Graph
export * from "./graph/geometry.js";
export * from "./graph/in-memory-graph.js";

// Routes
export * from "./route/route.js";
export * from "./route/instructions.js";
export * from "./route/route-calculator.js";
export * from "./route/stitcher.js";

// Session
export * from "./session/session.js";
export * from "./session/deviation.js";
export * from "./session/navigation-engine.js";

// Tags
export * from "./tag/payload.js";
export * from "./tag/codec.js";
export * from "./tag/reader-errors.js";
export * from "./tag/simulated-reader.js";
