import { MAX_SCAN_WINDOW } from "./constants.js";
import { formatByte, formatBytes, formatHex } from "./format.js";

/**
 * Error codes for ID3 tag size repair
 */
export enum Id3RepairErrorCode {
  BAD_MAGIC = "BAD_MAGIC",
  UNSUPPORTED_VERSION = "UNSUPPORTED_VERSION",
  UNSUPPORTED_FLAGS = "UNSUPPORTED_FLAGS",
  HIGH_BIT_SET = "HIGH_BIT_SET",
  NO_SYNC = "NO_SYNC",
  UNSUPPORTED_MPEG_VERSION = "UNSUPPORTED_MPEG_VERSION",
  UNSUPPORTED_LAYER = "UNSUPPORTED_LAYER",
  FRAME_NOT_FOUND = "FRAME_NOT_FOUND",
  VALUE_TOO_LARGE = "VALUE_TOO_LARGE",
  INVALID_WINDOW = "INVALID_WINDOW",
  IO_ERROR = "IO_ERROR",
  PATCH_WRITE_FAILED = "PATCH_WRITE_FAILED",
}

/**
 * Base class for every failure raised while repairing a file
 */
export class Id3RepairError extends Error {
  constructor(
    public readonly code: Id3RepairErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "Id3RepairError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class BadMagicError extends Id3RepairError {
  constructor(public readonly found: Buffer) {
    super(
      Id3RepairErrorCode.BAD_MAGIC,
      `File starts with ${formatBytes(found)} instead of "ID3"`,
    );
    this.name = "BadMagicError";
  }
}

export class UnsupportedVersionError extends Id3RepairError {
  constructor(public readonly majorVersion: number) {
    super(
      Id3RepairErrorCode.UNSUPPORTED_VERSION,
      `Unsupported ID3 major version ${majorVersion} (only 3 and 4 are supported)`,
    );
    this.name = "UnsupportedVersionError";
  }
}

export class UnsupportedFlagsError extends Id3RepairError {
  constructor(public readonly flags: number) {
    super(
      Id3RepairErrorCode.UNSUPPORTED_FLAGS,
      `Unsupported ID3 header flags ${formatByte(flags)}`,
    );
    this.name = "UnsupportedFlagsError";
  }
}

export class HighBitSetError extends Id3RepairError {
  constructor(public readonly bytes: Buffer) {
    super(
      Id3RepairErrorCode.HIGH_BIT_SET,
      `High bit(s) set in synchsafe size ${formatBytes(bytes)}`,
    );
    this.name = "HighBitSetError";
  }
}

export class ValueTooLargeError extends Id3RepairError {
  constructor(public readonly value: number) {
    super(
      Id3RepairErrorCode.VALUE_TOO_LARGE,
      `Value ${value} does not fit in a 28-bit synchsafe integer`,
    );
    this.name = "ValueTooLargeError";
  }
}

/**
 * Frame header check failures carry the offset and the field value read there
 */
export class FrameHeaderError extends Id3RepairError {
  constructor(
    code:
      | Id3RepairErrorCode.NO_SYNC
      | Id3RepairErrorCode.UNSUPPORTED_MPEG_VERSION
      | Id3RepairErrorCode.UNSUPPORTED_LAYER,
    public readonly offset: number,
    public readonly actual: number | null,
    message: string,
  ) {
    super(code, message);
    this.name = "FrameHeaderError";
  }
}

export class NoSyncError extends FrameHeaderError {
  constructor(offset: number, actual: number | null) {
    super(
      Id3RepairErrorCode.NO_SYNC,
      offset,
      actual,
      actual === null
        ? `Missing sync at ${formatHex(offset)} (end of file)`
        : `Missing sync at ${formatHex(offset)} (got ${formatHex(actual)})`,
    );
    this.name = "NoSyncError";
  }
}

export class UnsupportedMpegVersionError extends FrameHeaderError {
  constructor(offset: number, actual: number) {
    super(
      Id3RepairErrorCode.UNSUPPORTED_MPEG_VERSION,
      offset,
      actual,
      `Unsupported MPEG audio version at ${formatHex(offset)} (got ${formatHex(actual)})`,
    );
    this.name = "UnsupportedMpegVersionError";
  }
}

export class UnsupportedLayerError extends FrameHeaderError {
  constructor(offset: number, actual: number) {
    super(
      Id3RepairErrorCode.UNSUPPORTED_LAYER,
      offset,
      actual,
      `Unsupported layer at ${formatHex(offset)} (got ${formatHex(actual)})`,
    );
    this.name = "UnsupportedLayerError";
  }
}

export class FrameNotFoundError extends Id3RepairError {
  constructor(
    public readonly start: number,
    public readonly windowLength: number,
  ) {
    super(
      Id3RepairErrorCode.FRAME_NOT_FOUND,
      `Didn't find MP3 frame in ${windowLength} bytes from ${formatHex(start)} to ${formatHex(start + windowLength)}`,
    );
    this.name = "FrameNotFoundError";
  }
}

export class InvalidWindowError extends Id3RepairError {
  constructor(public readonly windowLength: number) {
    super(
      Id3RepairErrorCode.INVALID_WINDOW,
      `Scan window must be an integer from 1 to ${MAX_SCAN_WINDOW} (got ${windowLength})`,
    );
    this.name = "InvalidWindowError";
  }
}

export class IoError extends Id3RepairError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(Id3RepairErrorCode.IO_ERROR, message, options);
    this.name = "IoError";
  }
}

/**
 * Raised when the size field could not be written. The file may hold a
 * partially written size field and should be checked by hand.
 */
export class PatchWriteError extends Id3RepairError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(Id3RepairErrorCode.PATCH_WRITE_FAILED, message, options);
    this.name = "PatchWriteError";
  }
}
