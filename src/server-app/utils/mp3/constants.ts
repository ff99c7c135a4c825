/**
 * ID3v2 header and MPEG-1 Layer III frame header constants
 * Reference: https://id3.org/id3v2.4.0-structure
 */

export const UINT32_SIZE = 4;

export const ID3_HEADER_SIZE = 10;

export const ID3_TAG_IDENTIFIER = "ID3";

export const SUPPORTED_MAJOR_VERSIONS = [3, 4] as const;

// Byte offsets inside the 10-byte ID3v2 header
export const ID3_MAJOR_VERSION_OFFSET = 3;
export const ID3_MINOR_VERSION_OFFSET = 4;
export const ID3_FLAGS_OFFSET = 5;
export const ID3_SIZE_OFFSET = 6;

export const SYNCHSAFE_MASK = 0x7f;

export const SYNCHSAFE_HIGH_BIT = 0x80;

export const SYNCHSAFE_BITS_PER_BYTE = 7;

// 4 bytes * 7 usable bits
export const SYNCHSAFE_MAX = 2 ** 28;

export const FRAME_SYNC_BYTE = 0xff;

/**
 * Frame header bit fields, counted from the most significant bit:
 *
 * AAAAAAAA AAABBCC. ........ ........
 *
 * A (11 bits): Frame sync (all 1s)
 * B (2 bits):  MPEG version
 * C (2 bits):  Layer
 */
export const FRAME_SYNC_FIELD = { start: 0, length: 11 } as const;
export const VERSION_FIELD = { start: 11, length: 2 } as const;
export const LAYER_FIELD = { start: 13, length: 2 } as const;

// 0x7ff = 2047 = 0b11111111111 (11 ones)
export const FRAME_SYNC = 0x7ff;

export const VERSION_MPEG_1 = 0b11;

export const LAYER_III = 0b01;

// Bytes scanned past the claimed tag end when the frame is not there
export const DEFAULT_SCAN_WINDOW = 2048;

// Upper bound for a caller-supplied window (1 MiB)
export const MAX_SCAN_WINDOW = 1024 * 1024;
