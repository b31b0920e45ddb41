/**
 * Navigation engine: the session state machine.
 *
 *   idle → selectingDestination → calculating → navigating → arrived
 *                         (error reachable from anywhere)
 *
 * Public operations and reader events are applied one at a time through a
 * single-slot queue, so every mutation sees the session left by the one
 * before it. Failures never escape an operation: they become the session's
 * error state.
 */

import pLimit from "p-limit";
import type {
  Location,
  LocationGraph,
  NavigationSession,
  Route,
  SessionListener,
  TagPayload,
  TagReader,
} from "@checkpoint-guide/types";
import {
  NavigationError,
  NoRouteFoundError,
  TransitionRejectedError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import {
  getDefaultNavigationConfig,
  type NavigationConfig,
} from "../config/navigation-config.js";
import { ShortestPathCalculator, type RouteCalculator } from "../route/route-calculator.js";
import { getLocationIndex, isValidRoute, routeContainsLocation } from "../route/route.js";
import { combineRoutes } from "../route/stitcher.js";
import { isValidPayload } from "../tag/payload.js";
import { describeReaderError } from "../tag/reader-errors.js";
import {
  classifyDeviation,
  findNearestRouteLocation,
  isPlausibleTransition,
} from "./deviation.js";
import { INITIAL_SESSION, errorSession, isActive, patchSession } from "./session.js";

export interface NavigationEngineOptions {
  graph: LocationGraph;
  reader: TagReader;
  /** Defaults to a ShortestPathCalculator over `graph` */
  calculator?: RouteCalculator;
  config?: NavigationConfig;
}

export class NavigationEngine {
  private readonly graph: LocationGraph;
  private readonly reader: TagReader;
  private readonly calculator: RouteCalculator;
  private readonly config: NavigationConfig;

  private session: NavigationSession = INITIAL_SESSION;
  private readonly listeners = new Set<SessionListener>();
  private readonly limit = pLimit(1);
  /** Last queued operation; resolves once everything before it has run */
  private tail: Promise<NavigationSession> = Promise.resolve(INITIAL_SESSION);
  private readonly unsubscribeReader: () => void;

  /** Tag events waiting in the queue */
  private pendingTagEvents = 0;
  /** Tag events accepted so far; lets a reroute notice it was overtaken */
  private receivedTagEvents = 0;
  /** Whether the current scan session was started by this engine */
  private ownsScanning = false;
  private disposed = false;

  constructor(options: NavigationEngineOptions) {
    this.graph = options.graph;
    this.reader = options.reader;
    this.config = options.config ?? getDefaultNavigationConfig();
    this.calculator = options.calculator ?? new ShortestPathCalculator(this.graph, this.config);
    this.unsubscribeReader = this.reader.subscribe({
      onTag: (payload) => this.receiveTag(payload),
      onError: (error) => this.receiveReaderError(error),
    });
  }

  /** The most recently published session */
  get current(): NavigationSession {
    return this.session;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Public operations
  // -------------------------------------------------------------------------

  /** Set the user's position by hand. Clears any error. */
  setCurrentLocation(locationId: string): Promise<NavigationSession> {
    return this.run(async () => {
      if (!(await this.graph.hasLocation(locationId))) {
        throw new ValidationError(`Invalid location: ${locationId}`, locationId);
      }
      const state = this.session.state === "error" ? "idle" : this.session.state;
      this.publish(patchSession(this.session, { currentLocationId: locationId, state }));
    });
  }

  /** Choose a destination; calculates a route when the position is known. */
  setDestination(locationId: string): Promise<NavigationSession> {
    return this.run(async () => {
      if (!(await this.graph.hasLocation(locationId))) {
        throw new ValidationError(`Invalid destination: ${locationId}`, locationId);
      }
      this.publish(
        patchSession(this.session, {
          destinationLocationId: locationId,
          state: "selectingDestination",
        }),
      );

      const currentId = this.session.currentLocationId;
      if (currentId === undefined) return;

      this.publish(patchSession(this.session, { state: "calculating" }));
      let route: Route | undefined;
      try {
        route = await this.calculator.calculateRoute(currentId, locationId);
      } catch (err) {
        this.publish(
          errorSession(this.session, `Route calculation failed: ${errorMessage(err)}`, "InternalError"),
        );
        return;
      }
      if (!route || !isValidRoute(route)) {
        throw new NoRouteFoundError("No route found to destination");
      }
      this.publish(
        patchSession(this.session, {
          activeRoute: route,
          state: "idle",
          currentInstruction: undefined,
          currentStepIndex: 0,
        }),
      );
    });
  }

  startNavigation(): Promise<NavigationSession> {
    return this.run(async () => {
      const route = this.session.activeRoute;
      if (!route) throw new ValidationError("No route available to start navigation");
      const currentId = this.session.currentLocationId;
      if (currentId === undefined) throw new ValidationError("Current location not set");

      if (!this.reader.isScanning) {
        try {
          await this.reader.startScanning();
        } catch (err) {
          const report = describeReaderError(err);
          console.warn(`[navigation] Could not start scanning: ${report.message}`);
          this.publish(
            errorSession(
              this.session,
              `Failed to start navigation: ${report.userMessage}`,
              "ReaderError",
            ),
          );
          return;
        }
        this.ownsScanning = true;
      }

      console.log(`[navigation] Navigating ${route.startLocationId} -> ${route.endLocationId}`);
      this.publish(
        patchSession(this.session, {
          state: "navigating",
          currentInstruction: this.calculator.getNextInstruction(route, currentId),
          currentStepIndex: 0,
        }),
      );
    });
  }

  /** Stop guiding and halt the reader. Destination and route are kept for a restart. */
  stopNavigation(): Promise<NavigationSession> {
    return this.run(async () => {
      this.publish(
        patchSession(this.session, {
          state: "idle",
          currentInstruction: undefined,
          currentStepIndex: 0,
        }),
      );
      await this.haltScanning();
    });
  }

  /** Force a full reroute from the current position. No-op unless navigating. */
  triggerRerouting(): Promise<NavigationSession> {
    return this.run(async () => {
      const { state, currentLocationId, destinationLocationId, activeRoute } = this.session;
      if (state !== "navigating" || !currentLocationId || !destinationLocationId || !activeRoute) {
        return;
      }
      await this.fullReroute(currentLocationId);
    });
  }

  clearRoute(): Promise<NavigationSession> {
    return this.run(async () => {
      this.publish(
        patchSession(this.session, {
          activeRoute: undefined,
          currentInstruction: undefined,
          currentStepIndex: 0,
          state: "idle",
        }),
      );
    });
  }

  clearError(): Promise<NavigationSession> {
    return this.run(async () => {
      if (this.session.state !== "error") return;
      this.publish(patchSession(this.session, { state: "idle" }));
    });
  }

  clearSession(): Promise<NavigationSession> {
    return this.run(async () => {
      this.publish(INITIAL_SESSION);
    });
  }

  /**
   * Distance from a location to the nearest checkpoint of the active route:
   * 0 when on the route, undefined without a route or for an unknown id.
   */
  async getDeviationDistance(locationId: string): Promise<number | undefined> {
    const route = this.session.activeRoute;
    if (!route) return undefined;
    if (routeContainsLocation(route, locationId)) return 0;
    const location = await this.graph.getLocation(locationId);
    if (!location) return undefined;
    return (await findNearestRouteLocation(this.graph, route, location))?.distance;
  }

  /** Resolves once every queued operation and event has been applied */
  async whenIdle(): Promise<NavigationSession> {
    let tail: Promise<NavigationSession>;
    do {
      tail = this.tail;
      await tail;
    } while (tail !== this.tail);
    return this.session;
  }

  /** Detach from the reader and release scanning. Later operations are ignored. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.unsubscribeReader();
    await this.limit(async () => {
      this.disposed = true;
      this.listeners.clear();
      await this.releaseScanning();
    });
  }

  // -------------------------------------------------------------------------
  // Reader events
  // -------------------------------------------------------------------------

  private receiveTag(payload: TagPayload): void {
    if (this.disposed) return;
    if (!isValidPayload(payload)) {
      console.warn(`[navigation] Dropping tag for ${payload.locationId}: checksum mismatch`);
      return;
    }
    if (this.pendingTagEvents >= this.config.events.queueCapacity) {
      console.warn(
        `[navigation] Tag queue full (${this.config.events.queueCapacity}), dropping ${payload.locationId}`,
      );
      return;
    }
    this.pendingTagEvents++;
    this.receivedTagEvents++;
    this.enqueue(async () => {
      this.pendingTagEvents--;
      await this.handleTag(payload.locationId);
    });
  }

  private receiveReaderError(error: unknown): void {
    if (this.disposed) return;
    this.enqueue(async () => {
      const report = describeReaderError(error);
      console.warn(`[navigation] Reader error (${report.type}): ${report.message}`);
      this.publish(errorSession(this.session, report.userMessage, "ReaderError"));
    });
  }

  private enqueue(op: () => Promise<void>): void {
    this.run(op).catch((err: unknown) => {
      console.error(`[navigation] Event handling failed: ${errorMessage(err)}`);
    });
  }

  private async handleTag(locationId: string): Promise<void> {
    const location = await this.graph.getLocation(locationId);
    if (!location) {
      throw new ValidationError(`Invalid location detected: ${locationId}`, locationId);
    }

    const route = this.session.activeRoute;
    if (this.session.state !== "navigating" || !route) {
      this.publish(patchSession(this.session, { currentLocationId: location.id }));
      return;
    }

    if (routeContainsLocation(route, location.id)) {
      await this.advanceOnRoute(location, route);
    } else {
      await this.handleDeviation(location, route);
    }
  }

  // -------------------------------------------------------------------------
  // Progress and deviation
  // -------------------------------------------------------------------------

  private async advanceOnRoute(location: Location, route: Route): Promise<void> {
    const index = getLocationIndex(route, location.id);
    if (index < this.session.currentStepIndex) {
      console.log(`[navigation] Moved back to step ${index} at ${location.name}`);
    }

    if (location.id === route.endLocationId) {
      console.log(`[navigation] Arrived at ${location.name}`);
      this.publish(
        patchSession(this.session, {
          currentLocationId: location.id,
          currentStepIndex: index,
          currentInstruction: undefined,
          state: "arrived",
        }),
      );
      await this.haltScanning();
      return;
    }

    this.publish(
      patchSession(this.session, {
        currentLocationId: location.id,
        currentStepIndex: index,
        currentInstruction: this.calculator.getNextInstruction(route, location.id),
      }),
    );
  }

  private async handleDeviation(location: Location, route: Route): Promise<void> {
    const previousId = this.session.currentLocationId;
    if (previousId !== undefined) {
      const previous = await this.graph.getLocation(previousId);
      if (
        !previous ||
        !isPlausibleTransition(previous, location, this.config.deviation.transitionProximity)
      ) {
        throw new TransitionRejectedError(
          "Invalid location transition detected. Please scan a valid checkpoint tag.",
          previousId,
          location.id,
        );
      }
    }

    this.publish(patchSession(this.session, { currentLocationId: location.id }));

    const nearest = await findNearestRouteLocation(this.graph, route, location);
    const severity = classifyDeviation(nearest?.distance, this.config.deviation);
    console.log(
      `[navigation] Off route at ${location.name}: ${severity}` +
        (nearest ? ` (${nearest.distance.toFixed(1)} from ${nearest.location.name})` : ""),
    );

    if (severity === "minor" && nearest) {
      const rejoined = await this.rejoinRoute(location, route, nearest.location.id);
      if (rejoined) {
        this.adoptRoute(rejoined, "Rejoined route");
        return;
      }
    }
    await this.fullReroute(location.id);
  }

  /** Short walk back to the route spliced onto its remainder */
  private async rejoinRoute(
    location: Location,
    route: Route,
    rejoinId: string,
  ): Promise<Route | undefined> {
    try {
      const back = await this.calculator.calculateRoute(location.id, rejoinId);
      if (!back) return undefined;
      // Deviation bounds are in map units, route distances in meters
      const returnUnits = back.estimatedDistanceMeters / this.config.distance.metersPerUnit;
      if (returnUnits >= this.config.deviation.minorReturnMaxDistance) return undefined;
      return combineRoutes(back, route, rejoinId);
    } catch (err) {
      console.warn(`[navigation] Rejoin search failed, replanning instead: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async fullReroute(fromId: string): Promise<void> {
    const destinationId = this.session.destinationLocationId;
    if (destinationId === undefined) return;

    this.publish(patchSession(this.session, { state: "calculating" }));
    const receivedBefore = this.receivedTagEvents;

    let route: Route | undefined;
    try {
      route = await this.calculator.recalculateFromCurrent(fromId, destinationId);
    } catch (err) {
      this.publish(
        errorSession(this.session, `Route recalculation failed: ${errorMessage(err)}`, "InternalError"),
      );
      return;
    }

    if (this.receivedTagEvents !== receivedBefore) {
      // A newer checkpoint is queued; judge it against the route we had
      console.log("[navigation] Discarding reroute overtaken by a newer checkpoint");
      this.publish(patchSession(this.session, { state: "navigating" }));
      return;
    }

    if (!route || !isValidRoute(route)) {
      const [from, to] = await Promise.all([
        this.graph.getLocation(fromId),
        this.graph.getLocation(destinationId),
      ]);
      throw new NoRouteFoundError(
        from && to
          ? `No route found from ${from.name} to ${to.name}. Please navigate to a connected location and try again.`
          : "Unable to calculate route from current location to destination.",
      );
    }

    this.adoptRoute(route, "Rerouted");
  }

  private adoptRoute(route: Route, label: string): void {
    console.log(
      `[navigation] ${label}: ${route.pathLocationIds.length} stops, ` +
        `${route.estimatedDistanceMeters.toFixed(1)} m, ~${Math.round(route.estimatedDurationSeconds / 60)} min`,
    );
    this.publish(
      patchSession(this.session, {
        activeRoute: route,
        state: "navigating",
        currentInstruction: route.instructions[0],
        currentStepIndex: 0,
      }),
    );
  }

  // -------------------------------------------------------------------------
  // Plumbing
  // -------------------------------------------------------------------------

  private run(op: () => Promise<void>): Promise<NavigationSession> {
    const result = this.limit(async () => {
      if (this.disposed) return this.session;
      try {
        await op();
      } catch (err) {
        this.fail(err);
      } finally {
        await this.releaseScanning();
      }
      return this.session;
    });
    this.tail = result;
    return result;
  }

  private fail(err: unknown): void {
    if (err instanceof NoRouteFoundError) {
      this.publish(
        errorSession(this.session, err.message, err.kind, {
          activeRoute: undefined,
          currentInstruction: undefined,
          currentStepIndex: 0,
        }),
      );
    } else if (err instanceof NavigationError) {
      this.publish(errorSession(this.session, err.message, err.kind));
    } else {
      console.error(`[navigation] Unexpected failure: ${errorMessage(err)}`);
      this.publish(errorSession(this.session, `Navigation failed: ${errorMessage(err)}`, "InternalError"));
    }
  }

  /** Stop a scan session we started once nothing needs it */
  private async releaseScanning(): Promise<void> {
    if (!this.ownsScanning) return;
    if (!this.disposed && isActive(this.session)) return;
    this.ownsScanning = false;
    try {
      await this.reader.stopScanning();
    } catch (err) {
      console.warn(`[navigation] Failed to stop scanning: ${errorMessage(err)}`);
    }
  }

  /** Stop the reader whoever started it */
  private async haltScanning(): Promise<void> {
    this.ownsScanning = false;
    try {
      await this.reader.stopScanning();
    } catch (err) {
      console.warn(`[navigation] Failed to stop scanning: ${errorMessage(err)}`);
    }
  }

  private publish(next: NavigationSession): void {
    const previous = this.session;
    this.session = next;
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        console.error(`[navigation] Session listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
