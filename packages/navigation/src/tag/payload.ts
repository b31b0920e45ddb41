/**
 * Checkpoint tag payload model.
 *
 * A payload names the location a tag is mounted at and carries a short
 * integrity checksum: the first 16 hex chars of SHA-256 over
 * `locationId + timestamp + canonicalJson(additionalData)`.
 */

import { createHash } from "node:crypto";
import type { TagDataValue, TagPayload } from "@checkpoint-guide/types";
import { ChecksumMismatchError, ValidationError } from "../errors.js";

const CHECKSUM_LENGTH = 16;

export interface CreateTagPayloadInput {
  locationId: string;
  /** Defaults to now; sub-millisecond precision is dropped */
  timestamp?: number | Date;
  additionalData?: Record<string, TagDataValue>;
}

/** JSON with object keys in sorted order */
export function canonicalJson(data: Readonly<Record<string, TagDataValue>>): string {
  const keys = Object.keys(data).sort();
  const members = keys.map((key) => `${JSON.stringify(key)}:${JSON.stringify(data[key] ?? null)}`);
  return `{${members.join(",")}}`;
}

export function computeChecksum(
  locationId: string,
  timestamp: number,
  additionalData: Readonly<Record<string, TagDataValue>>,
): string {
  return createHash("sha256")
    .update(`${locationId}${timestamp}${canonicalJson(additionalData)}`)
    .digest("hex")
    .slice(0, CHECKSUM_LENGTH);
}

/**
 * Values that survive a JSON round trip unchanged: NaN and the infinities
 * encode as null, -0 as 0.
 */
export function isTagDataValue(value: unknown): value is TagDataValue {
  if (typeof value === "number") return Number.isFinite(value) && !Object.is(value, -0);
  return value === null || typeof value === "string" || typeof value === "boolean";
}

/** Milliseconds since epoch that JSON carries exactly */
export function isValidTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function toMillis(timestamp: number | Date | undefined): number {
  if (timestamp === undefined) return Date.now();
  return Math.trunc(timestamp instanceof Date ? timestamp.getTime() : timestamp);
}

/** Build a payload with a freshly computed checksum */
export function createTagPayload(input: CreateTagPayloadInput): TagPayload {
  const timestamp = toMillis(input.timestamp);
  if (!isValidTimestamp(timestamp)) {
    throw new ValidationError(`Invalid tag timestamp: ${timestamp}`, input.locationId);
  }
  const additionalData = { ...(input.additionalData ?? {}) };
  for (const [key, value] of Object.entries(additionalData)) {
    if (!isTagDataValue(value)) {
      throw new ValidationError(`Invalid tag data value for ${key}: ${String(value)}`, input.locationId);
    }
  }
  return {
    locationId: input.locationId,
    checksum: computeChecksum(input.locationId, timestamp, additionalData),
    timestamp,
    additionalData,
  };
}

/** Payload with only the required fields */
export function createMinimalPayload(locationId: string, timestamp?: number | Date): TagPayload {
  return createTagPayload({ locationId, timestamp });
}

export function isValidPayload(payload: TagPayload): boolean {
  return (
    payload.checksum ===
    computeChecksum(payload.locationId, payload.timestamp, payload.additionalData)
  );
}

/** Copy of the payload with its checksum recomputed from the current fields */
export function refreshChecksum(payload: TagPayload): TagPayload {
  return {
    ...payload,
    checksum: computeChecksum(payload.locationId, payload.timestamp, payload.additionalData),
  };
}

export function isExpired(payload: TagPayload, maxAgeMs: number, now: number = Date.now()): boolean {
  return now - payload.timestamp > maxAgeMs;
}

/** Throws ChecksumMismatchError unless the payload is intact */
export function verifyPayload(payload: TagPayload): TagPayload {
  const expected = computeChecksum(payload.locationId, payload.timestamp, payload.additionalData);
  if (payload.checksum !== expected) {
    throw new ChecksumMismatchError(payload.locationId, expected, payload.checksum);
  }
  return payload;
}

export function payloadsEqual(a: TagPayload, b: TagPayload): boolean {
  if (a.locationId !== b.locationId || a.checksum !== b.checksum || a.timestamp !== b.timestamp) {
    return false;
  }
  return canonicalJson(a.additionalData) === canonicalJson(b.additionalData);
}
