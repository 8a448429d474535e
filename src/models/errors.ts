import type { ZodError } from "zod";

export type CaptureErrorCode =
  | "capture.invalid_dimensions"
  | "capture.invalid_request"
  | "capture.cancelled"
  | "capture.busy"
  | "merge.tile_geometry_mismatch"
  | "merge.tile_missing"
  | "merge.channel_mismatch"
  | "codec.encode_failed"
  | "codec.decode_failed"
  | "render.resource_exhausted"
  | "render.failed";

export interface CaptureErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every failure raised while planning, capturing or merging.
 * `code` is stable and safe to branch on; messages are for humans.
 */
export class CaptureError extends Error {
  readonly code: CaptureErrorCode;

  constructor(
    message: string,
    code: CaptureErrorCode,
    options: CaptureErrorOptions = {},
  ) {
    super(message, options);
    this.name = "CaptureError";
    this.code = code;
  }
}

export class InvalidDimensionsError extends CaptureError {
  constructor(
    readonly width: number,
    readonly height: number,
    message = `Image dimensions must be positive integers, received ${width}x${height}`,
  ) {
    super(message, "capture.invalid_dimensions");
    this.name = "InvalidDimensionsError";
  }
}

export class InvalidCaptureRequestError extends CaptureError {
  constructor(readonly issues: ZodError["issues"]) {
    super("Capture request validation failed", "capture.invalid_request");
    this.name = "InvalidCaptureRequestError";
  }
}

export class TileGeometryMismatchError extends CaptureError {
  constructor(message: string, code: CaptureErrorCode = "merge.tile_geometry_mismatch") {
    super(message, code);
    this.name = "TileGeometryMismatchError";
  }
}

export class TileMissingError extends TileGeometryMismatchError {
  constructor(
    readonly tileX: number,
    readonly tileY: number,
  ) {
    super(`Tile (${tileX}, ${tileY}) has not been captured`, "merge.tile_missing");
    this.name = "TileMissingError";
  }
}

export class ChannelMismatchError extends CaptureError {
  constructor(
    readonly tileX: number,
    readonly tileY: number,
    readonly channels: number,
    readonly expected: number,
  ) {
    super(
      `Tile (${tileX}, ${tileY}) decodes to ${channels} channels, expected ${expected}`,
      "merge.channel_mismatch",
    );
    this.name = "ChannelMismatchError";
  }
}

export class EncodeFailureError extends CaptureError {
  constructor(message: string, options: CaptureErrorOptions = {}) {
    super(message, "codec.encode_failed", options);
    this.name = "EncodeFailureError";
  }
}

export class DecodeFailureError extends CaptureError {
  constructor(message: string, options: CaptureErrorOptions = {}) {
    super(message, "codec.decode_failed", options);
    this.name = "DecodeFailureError";
  }
}

export class ResourceExhaustionError extends CaptureError {
  constructor(message: string, options: CaptureErrorOptions = {}) {
    super(message, "render.resource_exhausted", options);
    this.name = "ResourceExhaustionError";
  }
}

export class RenderFailureError extends CaptureError {
  constructor(message: string, options: CaptureErrorOptions = {}) {
    super(message, "render.failed", options);
    this.name = "RenderFailureError";
  }
}

export class CancelledError extends CaptureError {
  constructor(message = "Capture was cancelled", options: CaptureErrorOptions = {}) {
    super(message, "capture.cancelled", options);
    this.name = "CancelledError";
  }
}

export class CaptureBusyError extends CaptureError {
  constructor() {
    super("A capture is already running on this context", "capture.busy");
    this.name = "CaptureBusyError";
  }
}

const ALLOCATION_CODES = new Set([
  "ERR_OUT_OF_MEMORY",
  "ERR_BUFFER_TOO_LARGE",
  "ENOMEM",
]);

const ALLOCATION_MESSAGE = /out of memory|allocation|too large|invalid array length/i;

/**
 * True when a renderer or resampler failure looks like it could not get the
 * memory or surface it asked for.
 */
export const isAllocationFailure = (error: unknown): boolean => {
  if (error instanceof RangeError) {
    return true;
  }

  if (!error || typeof error !== "object") {
    return false;
  }

  if ("code" in error && typeof error.code === "string" && ALLOCATION_CODES.has(error.code)) {
    return true;
  }

  return (
    "message" in error &&
    typeof error.message === "string" &&
    ALLOCATION_MESSAGE.test(error.message)
  );
};
