/**
 * Tag reader failures and their user-facing classification.
 */

import { ChecksumMismatchError, DecodeError, errorMessage } from "../errors.js";

export type ReaderErrorCode =
  | "unsupported"
  | "disabled"
  | "permission-denied"
  | "scan-timeout"
  | "read-failed";

/** Failure reported by a TagReader implementation */
export class ReaderError extends Error {
  constructor(
    readonly code: ReaderErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReaderError";
  }
}

export type ReaderErrorType =
  | "hardwareUnavailable"
  | "permissionDenied"
  | "readerDisabled"
  | "scanTimeout"
  | "tagReadError"
  | "unknown";

export interface ReaderErrorReport {
  type: ReaderErrorType;
  /** Technical description for logs */
  message: string;
  /** Short sentence for the presentation layer */
  userMessage: string;
  recoverySuggestions: string[];
}

const MANUAL_SELECTION = "Use manual location selection instead";

const REPORTS: Record<ReaderErrorCode, Omit<ReaderErrorReport, "message">> = {
  unsupported: {
    type: "hardwareUnavailable",
    userMessage: "This device cannot read checkpoint tags",
    recoverySuggestions: ["Check the device specifications for tag reader support", MANUAL_SELECTION],
  },
  disabled: {
    type: "readerDisabled",
    userMessage: "The tag reader is turned off on this device",
    recoverySuggestions: ["Turn the tag reader on in the device settings", MANUAL_SELECTION],
  },
  "permission-denied": {
    type: "permissionDenied",
    userMessage: "Permission to use the tag reader was denied",
    recoverySuggestions: [
      "Grant tag reader permission in the app settings",
      "Restart the app and allow tag reader access",
      MANUAL_SELECTION,
    ],
  },
  "scan-timeout": {
    type: "scanTimeout",
    userMessage: "No checkpoint tag was detected in time",
    recoverySuggestions: ["Hold the device closer to the tag", "Try scanning again"],
  },
  "read-failed": {
    type: "tagReadError",
    userMessage: "Failed to read the checkpoint tag",
    recoverySuggestions: ["Hold the device closer to the tag", "Try scanning again", MANUAL_SELECTION],
  },
};

/** Classify any reader-side failure into a report */
export function describeReaderError(err: unknown): ReaderErrorReport {
  if (err instanceof ReaderError) {
    return { ...REPORTS[err.code], message: err.message };
  }
  if (err instanceof DecodeError) {
    return {
      type: "tagReadError",
      message: err.message,
      userMessage: "This tag is not compatible with the navigation system",
      recoverySuggestions: [
        "Try scanning a different tag",
        "Make sure you are scanning a checkpoint tag",
      ],
    };
  }
  if (err instanceof ChecksumMismatchError) {
    return {
      type: "tagReadError",
      message: err.message,
      userMessage: "The checkpoint tag data appears to be corrupted",
      recoverySuggestions: ["Try scanning the tag again", "Report this tag for replacement"],
    };
  }
  return {
    type: "unknown",
    message: `Unknown error: ${errorMessage(err)}`,
    userMessage: "An unexpected error occurred while reading tags",
    recoverySuggestions: ["Try again in a moment", "Restart the app", MANUAL_SELECTION],
  };
}

/** Reader is unusable: steer the user to picking their location by hand */
export function shouldOfferManualSelection(report: ReaderErrorReport): boolean {
  return (
    report.type === "hardwareUnavailable" ||
    report.type === "permissionDenied" ||
    report.type === "readerDisabled"
  );
}

/** Transient failure: another scan may succeed */
export function shouldOfferRetry(report: ReaderErrorReport): boolean {
  return report.type === "tagReadError" || report.type === "scanTimeout";
}

/** User message followed by numbered suggestions */
export function formatReaderError(report: ReaderErrorReport): string {
  const lines = [report.userMessage];
  if (report.recoverySuggestions.length > 0) {
    lines.push("", "What you can try:");
    report.recoverySuggestions.forEach((suggestion, i) => lines.push(`${i + 1}. ${suggestion}`));
  }
  return lines.join("\n");
}
