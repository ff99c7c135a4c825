/**
 * Repairs the declared size of an ID3v2 tag so it ends where the audio starts.
 *
 * Algorithm:
 * 1. Parse the 10-byte ID3v2 header
 * 2. Check for an MPEG-1 Layer III frame where the tag claims to end
 * 3. If there is none, scan a bounded window after that offset for one
 * 4. Rewrite the synchsafe size field so the tag ends at the frame found
 *    (only when `apply` is set)
 */

import { open } from "node:fs/promises";
import { consoleLog, type Log } from "../log.js";
import { checkFrameAt } from "./frame-header.js";
import { FrameHeaderError, IoError } from "./errors.js";
import { parseHeader, type TagHeader } from "./id3-header.js";
import {
  patchTagSize,
  planTagSizePatch,
  type PatchResult,
} from "./patch-tag-size.js";
import { assertWindowLength, scanForFrame } from "./scan-for-frame.js";
import { DEFAULT_SCAN_WINDOW } from "./constants.js";

export interface RepairOptions {
  /** Bytes to scan after the claimed tag end (default 2048) */
  windowLength?: number;
  /** Write the corrected size; otherwise only report it */
  apply?: boolean;
  log?: Log;
}

export type RepairOutcome =
  | {
      status: "already-correct";
      header: TagHeader;
      frameOffset: number;
    }
  | {
      status: "corrected";
      header: TagHeader;
      frameOffset: number;
      patch: PatchResult;
      applied: boolean;
    };

export async function repair(
  filePath: string,
  {
    windowLength = DEFAULT_SCAN_WINDOW,
    apply = false,
    log = consoleLog,
  }: RepairOptions = {},
): Promise<RepairOutcome> {
  assertWindowLength(windowLength);
  log(`Reading ${filePath}`);

  const file = await open(filePath, "r").catch((err: unknown) => {
    throw new IoError(`Failed to open ${filePath}`, { cause: err });
  });

  let header: TagHeader;
  let frameOffset: number;
  try {
    header = await parseHeader(file, log);

    try {
      await checkFrameAt(file, header.totalHeaderSize, log);
      return {
        status: "already-correct",
        header,
        frameOffset: header.totalHeaderSize,
      };
    } catch (err) {
      if (!(err instanceof FrameHeaderError)) throw err;
      log(`Failed to read frame: ${err.message}`);
    }

    frameOffset = await scanForFrame(
      file,
      header.totalHeaderSize,
      windowLength,
      log,
    );
  } finally {
    await file.close();
  }

  if (!apply) {
    const patch = planTagSizePatch(frameOffset);
    log(
      `Would change tag size from ${header.declaredSize} to ${patch.correctedSize}`,
    );
    return { status: "corrected", header, frameOffset, patch, applied: false };
  }

  const patch = await patchTagSize(filePath, frameOffset, log);
  return { status: "corrected", header, frameOffset, patch, applied: true };
}
