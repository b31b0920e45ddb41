/**
 * Immutable session transitions.
 *
 * Every change produces a new session object. The error fields only
 * survive while the state is "error".
 */

import type { NavigationErrorKind, NavigationSession } from "@checkpoint-guide/types";

export const INITIAL_SESSION: NavigationSession = {
  state: "idle",
  currentStepIndex: 0,
};

export type SessionPatch = Partial<NavigationSession>;

export function patchSession(session: NavigationSession, patch: SessionPatch): NavigationSession {
  const next: NavigationSession = { ...session, ...patch };
  if (next.state === "error") return next;
  const { errorMessage: _message, errorKind: _kind, ...rest } = next;
  return rest;
}

export function errorSession(
  session: NavigationSession,
  message: string,
  kind: NavigationErrorKind,
  patch: SessionPatch = {},
): NavigationSession {
  return { ...session, ...patch, state: "error", errorMessage: message, errorKind: kind };
}

/** States in which the engine keeps the reader scanning */
export function isActive(session: NavigationSession): boolean {
  return session.state === "navigating" || session.state === "calculating";
}
