/**
 * Navigation session - the live state of one user journey.
 *
 * The engine replaces the session object on every transition, so listeners
 * can compare old and new values by reference.
 */

import type { NavigationInstruction, Route } from "./route.js";

export type NavigationState =
  | "idle"
  | "selectingDestination"
  | "calculating"
  | "navigating"
  | "arrived"
  | "error";

/** Failure categories surfaced through the error state */
export type NavigationErrorKind =
  | "ValidationError"
  | "TransitionRejected"
  | "NoRouteFound"
  | "ReaderError"
  | "InternalError";

export interface NavigationSession {
  readonly currentLocationId?: string;
  readonly destinationLocationId?: string;
  readonly activeRoute?: Route;
  readonly state: NavigationState;
  readonly currentInstruction?: NavigationInstruction;
  /** Index of the current location in the active route's path */
  readonly currentStepIndex: number;
  /** Only set in the error state */
  readonly errorMessage?: string;
  /** Only set in the error state */
  readonly errorKind?: NavigationErrorKind;
}

export type SessionListener = (
  session: NavigationSession,
  previous: NavigationSession,
) => void;
