/**
 * Byte encoding for checkpoint tags: UTF-8 JSON.
 */

import type { TagDataValue, TagPayload } from "@checkpoint-guide/types";
import { DecodeError, errorMessage } from "../errors.js";
import { createTagPayload, isTagDataValue, isValidTimestamp } from "./payload.js";

/** Typical NDEF capacity ceiling */
export const MAX_TAG_BYTES = 8192;

export const REQUIRED_FIELDS = ["locationId", "checksum", "timestamp"] as const;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function encodeTagPayload(payload: TagPayload): Uint8Array {
  return encoder.encode(
    JSON.stringify({
      locationId: payload.locationId,
      checksum: payload.checksum,
      timestamp: payload.timestamp,
      additionalData: payload.additionalData,
    }),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Required fields absent from a decoded JSON object */
export function missingRequiredFields(json: Record<string, unknown>): string[] {
  return REQUIRED_FIELDS.filter((field) => !(field in json));
}

/**
 * Parse tag bytes. Throws DecodeError on malformed UTF-8, malformed JSON or
 * a structure that is not a payload. The checksum is not verified here.
 */
export function decodeTagPayload(bytes: Uint8Array): TagPayload {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch (err) {
    throw new DecodeError(`Tag bytes are not valid UTF-8: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`Tag content is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  if (!isRecord(json)) throw new DecodeError("Tag content is not a JSON object");

  const missing = missingRequiredFields(json);
  if (missing.length > 0) {
    throw new DecodeError(`Tag is missing required fields: ${missing.join(", ")}`);
  }

  const { locationId, checksum, timestamp, additionalData } = json;
  if (typeof locationId !== "string" || locationId.length === 0) {
    throw new DecodeError("Tag field locationId must be a non-empty string");
  }
  if (typeof checksum !== "string") {
    throw new DecodeError("Tag field checksum must be a string");
  }
  if (!isValidTimestamp(timestamp)) {
    throw new DecodeError("Tag field timestamp must be a non-negative safe integer");
  }

  const data: Record<string, TagDataValue> = {};
  if (additionalData !== undefined && additionalData !== null) {
    if (!isRecord(additionalData)) {
      throw new DecodeError("Tag field additionalData must be an object");
    }
    for (const [key, value] of Object.entries(additionalData)) {
      if (!isTagDataValue(value)) {
        throw new DecodeError(`Tag field additionalData.${key} must be a string, finite number, boolean or null`);
      }
      data[key] = value;
    }
  }

  return { locationId, checksum, timestamp, additionalData: data };
}

export function isValidFormat(bytes: Uint8Array): boolean {
  try {
    decodeTagPayload(bytes);
    return true;
  } catch {
    return false;
  }
}

export function fitsInTag(bytes: Uint8Array, maxBytes: number = MAX_TAG_BYTES): boolean {
  return bytes.byteLength <= maxBytes;
}

/** Encoded size in bytes */
export function estimateSize(payload: TagPayload): number {
  return encodeTagPayload(payload).byteLength;
}

export interface MaximalPayloadOptions {
  timestamp?: number | Date;
  maxBytes?: number;
}

/**
 * Largest payload that still fits the tag: auxiliary entries are dropped
 * oldest first (insertion order) until the encoding fits. If even the bare
 * payload is too large it is returned as is; check with `fitsInTag`.
 */
export function createMaximalPayload(
  locationId: string,
  additionalData: Readonly<Record<string, TagDataValue>>,
  options: MaximalPayloadOptions = {},
): TagPayload {
  const maxBytes = options.maxBytes ?? MAX_TAG_BYTES;
  const entries = Object.entries(additionalData);
  let payload = createTagPayload({
    locationId,
    timestamp: options.timestamp,
    additionalData: Object.fromEntries(entries),
  });

  while (!fitsInTag(encodeTagPayload(payload), maxBytes) && entries.length > 0) {
    entries.shift();
    payload = createTagPayload({
      locationId,
      timestamp: payload.timestamp,
      additionalData: Object.fromEntries(entries),
    });
  }
  return payload;
}
