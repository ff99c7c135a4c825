import type { open } from "node:fs/promises";
import { IoError } from "./errors.js";
import { formatHex } from "./format.js";
import { UINT32_SIZE } from "./constants.js";

export type OpenFile = Awaited<ReturnType<typeof open>>;

/**
 * Read up to `length` bytes at an absolute position.
 * The returned buffer is shorter than `length` when the file ends first.
 */
export async function readAt(
  file: OpenFile,
  position: number,
  length: number,
): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  try {
    const { bytesRead } = await file.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } catch (err) {
    throw new IoError(
      `Failed to read ${length} bytes at ${formatHex(position)}`,
      { cause: err },
    );
  }
}

export async function fileSize(file: OpenFile): Promise<number> {
  try {
    const { size } = await file.stat();
    return size;
  } catch (err) {
    throw new IoError("Failed to stat file", { cause: err });
  }
}

/**
 * Read a 32-bit unsigned integer (big-endian) from file
 * Returns null when fewer than 4 bytes remain
 */
export async function readUInt32BE(
  file: OpenFile,
  position: number,
): Promise<number | null> {
  const buffer = await readAt(file, position, UINT32_SIZE);
  return buffer.length === UINT32_SIZE ? buffer.readUInt32BE(0) : null;
}
