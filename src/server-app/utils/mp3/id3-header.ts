import { consoleLog, type Log } from "../log.js";
import {
  BadMagicError,
  IoError,
  UnsupportedFlagsError,
  UnsupportedVersionError,
} from "./errors.js";
import { formatHex } from "./format.js";
import { readAt, type OpenFile } from "./read.js";
import { decodeSynchsafe } from "./synchsafe.js";
import {
  ID3_FLAGS_OFFSET,
  ID3_HEADER_SIZE,
  ID3_MAJOR_VERSION_OFFSET,
  ID3_MINOR_VERSION_OFFSET,
  ID3_SIZE_OFFSET,
  ID3_TAG_IDENTIFIER,
  SUPPORTED_MAJOR_VERSIONS,
} from "./constants.js";

export interface TagHeader {
  majorVersion: number;
  minorVersion: number;
  flags: number;
  /** Synchsafe-decoded size of the tag, excluding the 10-byte header */
  declaredSize: number;
  /** Absolute offset where the tag claims to end: declaredSize + 10 */
  totalHeaderSize: number;
}

const isSupportedVersion = (
  version: number,
): version is (typeof SUPPORTED_MAJOR_VERSIONS)[number] =>
  SUPPORTED_MAJOR_VERSIONS.some((supported) => supported === version);

/**
 * Parse the ID3v2 header at the start of the file
 *
 * ID3v2 header layout (10 bytes total):
 *
 * Byte index:
 *  0–2  : ASCII "ID3" identifier
 *  3–4  : Version (major + revision)
 *  5    : Flags
 *  6–9  : Tag size (synchsafe 28-bit integer)
 *
 * Checks run in that order and the first failure is thrown.
 */
export async function parseHeader(
  file: OpenFile,
  log: Log = consoleLog,
): Promise<TagHeader> {
  const buffer = await readAt(file, 0, ID3_HEADER_SIZE);
  if (buffer.length < ID3_HEADER_SIZE) {
    throw new IoError(
      `File is ${buffer.length} bytes, too short for a ${ID3_HEADER_SIZE}-byte ID3 header`,
    );
  }

  const magic = buffer.subarray(0, ID3_TAG_IDENTIFIER.length);
  if (magic.toString("latin1") !== ID3_TAG_IDENTIFIER) {
    throw new BadMagicError(Buffer.from(magic));
  }

  const majorVersion = buffer[ID3_MAJOR_VERSION_OFFSET];
  const minorVersion = buffer[ID3_MINOR_VERSION_OFFSET];
  if (!isSupportedVersion(majorVersion)) {
    throw new UnsupportedVersionError(majorVersion);
  }
  log(`ID3 v2.${majorVersion}.${minorVersion}`);

  // Unsynchronisation, extended header and experimental flags are not handled
  const flags = buffer[ID3_FLAGS_OFFSET];
  if (flags !== 0) {
    throw new UnsupportedFlagsError(flags);
  }

  const declaredSize = decodeSynchsafe(
    buffer.subarray(ID3_SIZE_OFFSET, ID3_HEADER_SIZE),
  );
  const totalHeaderSize = declaredSize + ID3_HEADER_SIZE;
  log(`Tag size is ${formatHex(declaredSize)}`);
  log(`Header size is ${formatHex(totalHeaderSize)}`);

  return { majorVersion, minorVersion, flags, declaredSize, totalHeaderSize };
}
