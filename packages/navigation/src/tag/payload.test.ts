import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import {
  canonicalJson,
  computeChecksum,
  createMinimalPayload,
  createTagPayload,
  isExpired,
  isValidPayload,
  payloadsEqual,
  refreshChecksum,
  verifyPayload,
} from "./payload.js";
import { ChecksumMismatchError, ValidationError } from "../errors.js";

const TIMESTAMP = 1_700_000_000_000;

describe("canonicalJson", () => {
  it("sorts keys", () => {
    expect(canonicalJson({ wing: "east", floor: 1, open: true, note: null })).toBe(
      '{"floor":1,"note":null,"open":true,"wing":"east"}',
    );
  });

  it("encodes an empty bag as {}", () => {
    expect(canonicalJson({})).toBe("{}");
  });
});

describe("computeChecksum", () => {
  it("is the first 16 hex chars of SHA-256 over id, timestamp and sorted data", () => {
    const expected = createHash("sha256")
      .update(`cp1${TIMESTAMP}{"floor":1,"wing":"east"}`)
      .digest("hex")
      .slice(0, 16);
    expect(computeChecksum("cp1", TIMESTAMP, { wing: "east", floor: 1 })).toBe(expected);
  });

  it("does not depend on key insertion order", () => {
    expect(computeChecksum("cp1", TIMESTAMP, { a: 1, b: 2 })).toBe(
      computeChecksum("cp1", TIMESTAMP, { b: 2, a: 1 }),
    );
  });
});

describe("createTagPayload", () => {
  it("creates a valid payload", () => {
    const payload = createTagPayload({ locationId: "gym", timestamp: TIMESTAMP, additionalData: { floor: 1 } });
    expect(payload.checksum).toMatch(/^[0-9a-f]{16}$/);
    expect(isValidPayload(payload)).toBe(true);
  });

  it("truncates timestamps to whole milliseconds", () => {
    expect(createTagPayload({ locationId: "gym", timestamp: TIMESTAMP + 0.75 }).timestamp).toBe(TIMESTAMP);
    expect(createTagPayload({ locationId: "gym", timestamp: new Date(TIMESTAMP) }).timestamp).toBe(TIMESTAMP);
  });

  it("copies the auxiliary data", () => {
    const data = { floor: 1 };
    const payload = createTagPayload({ locationId: "gym", additionalData: data });
    data.floor = 2;
    expect(payload.additionalData).toEqual({ floor: 1 });
  });

  it.each([
    ["NaN", Number.NaN],
    ["Infinity", Number.POSITIVE_INFINITY],
    ["negative zero", -0],
  ])("rejects %s in auxiliary data", (_label, value) => {
    expect(() => createTagPayload({ locationId: "gym", additionalData: { offset: value } })).toThrow(
      ValidationError,
    );
  });

  it("rejects timestamps JSON cannot carry exactly", () => {
    expect(() => createTagPayload({ locationId: "gym", timestamp: -1 })).toThrow("Invalid tag timestamp: -1");
    expect(() => createTagPayload({ locationId: "gym", timestamp: 2 ** 60 })).toThrow(ValidationError);
  });

  it("creates a minimal payload without auxiliary data", () => {
    const payload = createMinimalPayload("gym", TIMESTAMP);
    expect(payload.additionalData).toEqual({});
    expect(isValidPayload(payload)).toBe(true);
  });
});

describe("integrity", () => {
  const payload = createTagPayload({ locationId: "cp1", timestamp: TIMESTAMP, additionalData: { wing: "east" } });

  it.each([
    ["locationId", { ...payload, locationId: "cp2" }],
    ["timestamp", { ...payload, timestamp: TIMESTAMP + 1 }],
    ["additionalData", { ...payload, additionalData: { wing: "west" } }],
  ])("is invalidated by changing %s", (_field, mutated) => {
    expect(isValidPayload(mutated)).toBe(false);
    expect(isValidPayload(refreshChecksum(mutated))).toBe(true);
  });

  it("verifyPayload throws on mismatch", () => {
    const broken = { ...payload, checksum: "0000000000000000" };
    expect(() => verifyPayload(broken)).toThrow(ChecksumMismatchError);
    expect(() => verifyPayload(broken)).toThrow("Tag integrity check failed for cp1");
    expect(verifyPayload(payload)).toBe(payload);
  });

  it("compares payloads by value", () => {
    const reordered = { ...payload, additionalData: { ...payload.additionalData } };
    expect(payloadsEqual(payload, reordered)).toBe(true);
    expect(payloadsEqual(payload, refreshChecksum({ ...payload, timestamp: 1 }))).toBe(false);
  });
});

describe("isExpired", () => {
  const payload = createMinimalPayload("cp1", 1000);

  it("expires once older than the max age", () => {
    expect(isExpired(payload, 500, 1600)).toBe(true);
  });

  it("is not expired at exactly the max age", () => {
    expect(isExpired(payload, 500, 1500)).toBe(false);
  });
});
