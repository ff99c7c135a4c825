import { constants } from "node:fs";
import { open } from "node:fs/promises";
import { consoleLog, type Log } from "../log.js";
import { PatchWriteError } from "./errors.js";
import { formatBytes, formatHex } from "./format.js";
import { encodeSynchsafe } from "./synchsafe.js";
import { ID3_HEADER_SIZE, ID3_SIZE_OFFSET, UINT32_SIZE } from "./constants.js";

export interface PatchResult {
  /** Tag size that makes the tag end at the located frame */
  correctedSize: number;
  /** The 4 synchsafe bytes to write */
  sizeBytes: Buffer;
  /** Absolute file offset of the size field */
  offset: number;
}

/**
 * Work out the size field for a tag that should end at `trueFrameOffset`.
 * The size field excludes the 10-byte header itself.
 */
export function planTagSizePatch(trueFrameOffset: number): PatchResult {
  const correctedSize = trueFrameOffset - ID3_HEADER_SIZE;
  return {
    correctedSize,
    sizeBytes: encodeSynchsafe(correctedSize),
    offset: ID3_SIZE_OFFSET,
  };
}

/**
 * Overwrite bytes 6–9 of the file with the corrected tag size.
 *
 * Uses its own write-only handle (no create, no truncate), closed as soon as
 * the single write completes. Every other byte of the file is left alone.
 */
export async function patchTagSize(
  filePath: string,
  trueFrameOffset: number,
  log: Log = consoleLog,
): Promise<PatchResult> {
  const patch = planTagSizePatch(trueFrameOffset);
  log(
    `Writing tag size ${formatHex(patch.correctedSize)} as ${formatBytes(patch.sizeBytes)}`,
  );

  try {
    const file = await open(filePath, constants.O_WRONLY);
    try {
      const { bytesWritten } = await file.write(
        patch.sizeBytes,
        0,
        UINT32_SIZE,
        patch.offset,
      );
      if (bytesWritten !== UINT32_SIZE) {
        throw new PatchWriteError(
          `Wrote ${bytesWritten} of ${UINT32_SIZE} size bytes to ${filePath}`,
        );
      }
    } finally {
      await file.close();
    }
  } catch (err) {
    if (err instanceof PatchWriteError) throw err;
    throw new PatchWriteError(
      `Failed to write updated tag size to ${filePath}`,
      { cause: err },
    );
  }

  return patch;
}
