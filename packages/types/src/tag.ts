/**
 * Checkpoint tag data and the tag reader boundary.
 */

/** Values allowed in a tag's auxiliary data */
export type TagDataValue = string | number | boolean | null;

/** Decoded contents of a checkpoint tag */
export interface TagPayload {
  locationId: string;
  /** Truncated SHA-256 over locationId, timestamp and auxiliary data */
  checksum: string;
  /** Milliseconds since epoch */
  timestamp: number;
  additionalData: Record<string, TagDataValue>;
}

/** Reader hardware availability, consulted by the presentation layer */
export type ReaderAvailability = "available" | "disabled" | "unsupported" | "unknown";

/** Consumer side of the reader's event channel */
export interface TagReaderListener {
  onTag(payload: TagPayload): void;
  onError(error: unknown): void;
}

/** A proximity-tag reader that pushes decoded payloads */
export interface TagReader {
  readonly isScanning: boolean;
  startScanning(): Promise<void>;
  stopScanning(): Promise<void>;
  checkAvailability(): Promise<ReaderAvailability>;
  /** Register the event consumer; returns the release function */
  subscribe(listener: TagReaderListener): () => void;
}
