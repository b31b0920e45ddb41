/**
 * In-process TagReader.
 *
 * Stands in for reader hardware in tests and the walk simulation: scans are
 * injected as raw bytes or location ids and pushed to subscribers the same
 * way a hardware reader would deliver them.
 */

import type {
  ReaderAvailability,
  TagDataValue,
  TagPayload,
  TagReader,
  TagReaderListener,
} from "@checkpoint-guide/types";
import { DecodeError } from "../errors.js";
import {
  MAX_TAG_BYTES,
  createMaximalPayload,
  decodeTagPayload,
  encodeTagPayload,
  fitsInTag,
} from "./codec.js";
import { verifyPayload } from "./payload.js";
import { ReaderError } from "./reader-errors.js";

export interface SimulatedTagReaderOptions {
  /** Tag capacity; usually `config.tags.maxPayloadBytes` */
  maxPayloadBytes?: number;
}

export class SimulatedTagReader implements TagReader {
  readonly maxPayloadBytes: number;
  private availability: ReaderAvailability = "available";
  private scanning = false;
  private readonly listeners = new Set<TagReaderListener>();
  private scanSessions = 0;

  constructor(options: SimulatedTagReaderOptions = {}) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? MAX_TAG_BYTES;
  }

  get isScanning(): boolean {
    return this.scanning;
  }

  /** Number of times scanning has been started */
  get startCount(): number {
    return this.scanSessions;
  }

  setAvailability(availability: ReaderAvailability): void {
    this.availability = availability;
    if (availability !== "available") this.scanning = false;
  }

  async checkAvailability(): Promise<ReaderAvailability> {
    return this.availability;
  }

  async startScanning(): Promise<void> {
    switch (this.availability) {
      case "available":
        break;
      case "disabled":
        throw new ReaderError("disabled", "Tag reader is disabled");
      case "unsupported":
        throw new ReaderError("unsupported", "Tag reader is not supported on this device");
      case "unknown":
        throw new ReaderError("read-failed", "Tag reader state could not be determined");
    }
    if (!this.scanning) {
      this.scanning = true;
      this.scanSessions++;
      console.log("[tag-reader] Scanning started");
    }
  }

  async stopScanning(): Promise<void> {
    if (this.scanning) {
      this.scanning = false;
      console.log("[tag-reader] Scanning stopped");
    }
  }

  subscribe(listener: TagReaderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Simulate reading raw tag bytes. Oversized, undecodable and tampered
   * tags go to the error channel. Returns whether a payload was delivered.
   */
  scanBytes(bytes: Uint8Array): boolean {
    if (!this.scanning) {
      console.warn("[tag-reader] Ignoring scan while not scanning");
      return false;
    }
    if (!fitsInTag(bytes, this.maxPayloadBytes)) {
      this.emitError(
        new DecodeError(`Tag content is ${bytes.byteLength} bytes, over the ${this.maxPayloadBytes}-byte capacity`),
      );
      return false;
    }
    let payload: TagPayload;
    try {
      payload = verifyPayload(decodeTagPayload(bytes));
    } catch (err) {
      this.emitError(err);
      return false;
    }
    this.emitTag(payload);
    return true;
  }

  /**
   * Simulate reading a freshly written tag for a location. Auxiliary data
   * is trimmed to what the tag can hold, as a tag writer would.
   */
  scanLocation(locationId: string, additionalData: Record<string, TagDataValue> = {}): boolean {
    const payload = createMaximalPayload(locationId, additionalData, {
      maxBytes: this.maxPayloadBytes,
    });
    return this.scanBytes(encodeTagPayload(payload));
  }

  /** Push a payload to subscribers as is, bypassing decode and verification */
  emitTag(payload: TagPayload): void {
    for (const listener of this.listeners) listener.onTag(payload);
  }

  emitError(error: unknown): void {
    for (const listener of this.listeners) listener.onError(error);
  }
}
