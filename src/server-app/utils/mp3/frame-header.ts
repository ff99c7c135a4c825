import { consoleLog, type Log } from "../log.js";
import {
  NoSyncError,
  UnsupportedLayerError,
  UnsupportedMpegVersionError,
} from "./errors.js";
import { formatHex } from "./format.js";
import { readUInt32BE, type OpenFile } from "./read.js";
import {
  FRAME_SYNC,
  FRAME_SYNC_FIELD,
  LAYER_FIELD,
  LAYER_III,
  VERSION_FIELD,
  VERSION_MPEG_1,
} from "./constants.js";

interface BitField {
  /** Position of the field's first bit, counting from the most significant bit */
  start: number;
  length: number;
}

/**
 * A possible frame start found while scanning
 */
export interface FrameCandidate {
  offset: number;
  header: number;
}

/**
 * Extract a bit field from a 32-bit header
 */
const getField = (header: number, { start, length }: BitField): number => {
  const shift = 32 - start - length;
  const mask = (1 << length) - 1;
  return (header >>> shift) & mask;
};

/**
 * Check that a 32-bit big-endian word is an MPEG-1 Layer III frame header.
 *
 * Only the sync, version and layer fields are checked; bitrate, sample rate,
 * padding and channel mode are ignored.
 */
export function validateFrameHeader(header: number, offset: number): void {
  const sync = getField(header, FRAME_SYNC_FIELD);
  if (sync !== FRAME_SYNC) {
    throw new NoSyncError(offset, sync);
  }

  const version = getField(header, VERSION_FIELD);
  if (version !== VERSION_MPEG_1) {
    throw new UnsupportedMpegVersionError(offset, version);
  }

  const layer = getField(header, LAYER_FIELD);
  if (layer !== LAYER_III) {
    throw new UnsupportedLayerError(offset, layer);
  }
}

export async function readFrameHeader(
  file: OpenFile,
  offset: number,
): Promise<FrameCandidate | null> {
  const header = await readUInt32BE(file, offset);
  return header === null ? null : { offset, header };
}

/**
 * Read the 4 bytes at `offset` and validate them as a frame header
 */
export async function checkFrameAt(
  file: OpenFile,
  offset: number,
  log: Log = consoleLog,
): Promise<FrameCandidate> {
  const candidate = await readFrameHeader(file, offset);
  if (!candidate) {
    throw new NoSyncError(offset, null);
  }

  validateFrameHeader(candidate.header, offset);
  log(`Read MP3 frame at ${formatHex(offset)}`);
  return candidate;
}
