/**
 * Error taxonomy for the navigation engine.
 *
 * The engine never lets these escape a public operation: they are turned
 * into the session's error state. The tag codec throws DecodeError and
 * ChecksumMismatchError at the boundary, before a payload reaches the engine.
 */

import type { NavigationErrorKind } from "@checkpoint-guide/types";

/** Base class for failures that map onto the session error state */
export abstract class NavigationError extends Error {
  abstract readonly kind: NavigationErrorKind;
}

/** An unknown location id was supplied to an entry point */
export class ValidationError extends NavigationError {
  readonly kind = "ValidationError" as const;

  constructor(message: string, readonly locationId?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A checkpoint reading implies a physically implausible jump */
export class TransitionRejectedError extends NavigationError {
  readonly kind = "TransitionRejected" as const;

  constructor(
    message: string,
    readonly fromLocationId: string,
    readonly toLocationId: string,
  ) {
    super(message);
    this.name = "TransitionRejectedError";
  }
}

/** The route search exhausted the graph without reaching the target */
export class NoRouteFoundError extends NavigationError {
  readonly kind = "NoRouteFound" as const;

  constructor(message: string) {
    super(message);
    this.name = "NoRouteFoundError";
  }
}

/** Tag bytes could not be parsed into a payload */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/** A decoded payload failed its integrity check */
export class ChecksumMismatchError extends Error {
  constructor(
    readonly locationId: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Tag integrity check failed for ${locationId}`);
    this.name = "ChecksumMismatchError";
  }
}

/** Render an unknown thrown value for an error message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
