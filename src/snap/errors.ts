import type { CorrectedTrack } from "@/snap/types";

export type SnapErrorCode =
  | "INVALID_FORMAT"
  | "EMPTY_TRACK"
  | "INVALID_COORDINATE"
  | "AUTH_FAILED"
  | "CONFIG_INVALID"
  | "WRITE_FAILED"
  | "CANCELLED";

export class SnapError extends Error {
  readonly code: SnapErrorCode;

  constructor(code: SnapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FormatError extends SnapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_FORMAT", message, options);
  }
}

export class EmptyTrackError extends SnapError {
  readonly pointCount: number;

  constructor(pointCount: number) {
    super("EMPTY_TRACK", `Track has ${pointCount} point(s); at least 2 are required.`);
    this.pointCount = pointCount;
  }
}

export class InvalidCoordinateError extends SnapError {
  readonly index: number;

  constructor(index: number, detail: string) {
    super("INVALID_COORDINATE", `Point ${index}: ${detail}`);
    this.index = index;
  }
}

export class AuthError extends SnapError {
  readonly status: number;

  constructor(status: number, body: string) {
    super(
      "AUTH_FAILED",
      `Map matching API rejected the API key (HTTP ${status}). Check GEOAPIFY_API_KEY in your config.${body ? ` ${body}` : ""}`
    );
    this.status = status;
  }
}

export class ConfigError extends SnapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export class WriteError extends SnapError {
  readonly targetPath: string;
  /** The finished track, kept so the write can be retried without new API calls. */
  readonly track: CorrectedTrack;

  constructor(targetPath: string, track: CorrectedTrack, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("WRITE_FAILED", `Could not write ${targetPath}: ${reason}. Check the directory is writable or choose another output directory.`, {
      cause
    });
    this.targetPath = targetPath;
    this.track = track;
  }
}

export class CancelledError extends SnapError {
  readonly completedBatches: number;

  constructor(completedBatches: number) {
    super("CANCELLED", `Cancelled after ${completedBatches} batch(es); nothing was written.`);
    this.completedBatches = completedBatches;
  }
}
