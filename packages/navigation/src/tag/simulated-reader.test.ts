import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { TagReaderListener } from "@checkpoint-guide/types";
import { SimulatedTagReader } from "./simulated-reader.js";
import { ReaderError } from "./reader-errors.js";
import { MAX_TAG_BYTES, encodeTagPayload } from "./codec.js";
import { createTagPayload } from "./payload.js";
import { ChecksumMismatchError, DecodeError } from "../errors.js";

function recordingListener() {
  const listener = { onTag: vi.fn(), onError: vi.fn() } satisfies TagReaderListener;
  return listener;
}

describe("SimulatedTagReader", () => {
  let reader: SimulatedTagReader;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    reader = new SimulatedTagReader();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts and stops scanning", async () => {
    await reader.startScanning();
    await reader.startScanning();
    expect(reader.isScanning).toBe(true);
    expect(reader.startCount).toBe(1);

    await reader.stopScanning();
    expect(reader.isScanning).toBe(false);
  });

  it("refuses to scan when the reader is disabled", async () => {
    reader.setAvailability("disabled");
    expect(await reader.checkAvailability()).toBe("disabled");
    await expect(reader.startScanning()).rejects.toBeInstanceOf(ReaderError);
    await expect(reader.startScanning()).rejects.toMatchObject({ code: "disabled" });
    expect(reader.isScanning).toBe(false);
  });

  it("stops scanning when the reader becomes unavailable", async () => {
    await reader.startScanning();
    reader.setAvailability("unsupported");
    expect(reader.isScanning).toBe(false);
    await expect(reader.startScanning()).rejects.toMatchObject({ code: "unsupported" });
  });

  it("delivers scanned locations to subscribers", async () => {
    const listener = recordingListener();
    reader.subscribe(listener);
    await reader.startScanning();

    expect(reader.scanLocation("gym", { floor: 1 })).toBe(true);
    expect(listener.onTag).toHaveBeenCalledTimes(1);
    expect(listener.onTag.mock.calls[0]?.[0]).toMatchObject({
      locationId: "gym",
      additionalData: { floor: 1 },
    });
  });

  it("ignores scans while not scanning", () => {
    const listener = recordingListener();
    reader.subscribe(listener);

    expect(reader.scanLocation("gym")).toBe(false);
    expect(listener.onTag).not.toHaveBeenCalled();
    expect(listener.onError).not.toHaveBeenCalled();
  });

  it("reports undecodable bytes on the error channel", async () => {
    const listener = recordingListener();
    reader.subscribe(listener);
    await reader.startScanning();

    expect(reader.scanBytes(new TextEncoder().encode("garbage"))).toBe(false);
    expect(listener.onError.mock.calls[0]?.[0]).toBeInstanceOf(DecodeError);
  });

  it("reports tampered tags on the error channel", async () => {
    const listener = recordingListener();
    reader.subscribe(listener);
    await reader.startScanning();

    const tampered = { ...createTagPayload({ locationId: "gym", timestamp: 1000 }), locationId: "cafeteria" };
    expect(reader.scanBytes(encodeTagPayload(tampered))).toBe(false);
    expect(listener.onTag).not.toHaveBeenCalled();
    expect(listener.onError.mock.calls[0]?.[0]).toBeInstanceOf(ChecksumMismatchError);
  });

  it("reports tags over the configured capacity", async () => {
    reader = new SimulatedTagReader({ maxPayloadBytes: 64 });
    const listener = recordingListener();
    reader.subscribe(listener);
    await reader.startScanning();

    expect(reader.scanBytes(new Uint8Array(65))).toBe(false);
    const error: unknown = listener.onError.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toHaveProperty("message", "Tag content is 65 bytes, over the 64-byte capacity");
  });

  it("trims scanned auxiliary data to the tag capacity", async () => {
    reader = new SimulatedTagReader({ maxPayloadBytes: 128 });
    const listener = recordingListener();
    reader.subscribe(listener);
    await reader.startScanning();

    expect(reader.scanLocation("gym", { note: "x".repeat(200) })).toBe(true);
    expect(listener.onTag.mock.calls[0]?.[0]).toMatchObject({ locationId: "gym", additionalData: {} });
  });

  it("defaults to the standard tag capacity", () => {
    expect(reader.maxPayloadBytes).toBe(MAX_TAG_BYTES);
  });

  it("stops delivering after unsubscribe", async () => {
    const listener = recordingListener();
    const unsubscribe = reader.subscribe(listener);
    await reader.startScanning();
    unsubscribe();

    reader.scanLocation("gym");
    expect(listener.onTag).not.toHaveBeenCalled();
  });

  it("emits payloads as is", () => {
    const listener = recordingListener();
    reader.subscribe(listener);
    const payload = { locationId: "gym", checksum: "bogus", timestamp: 1, additionalData: {} };

    reader.emitTag(payload);
    expect(listener.onTag).toHaveBeenCalledWith(payload);
  });
});
