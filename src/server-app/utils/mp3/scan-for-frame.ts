import { consoleLog, type Log } from "../log.js";
import { checkFrameAt } from "./frame-header.js";
import {
  FrameHeaderError,
  FrameNotFoundError,
  InvalidWindowError,
} from "./errors.js";
import { formatHex } from "./format.js";
import { fileSize, readAt, type OpenFile } from "./read.js";
import { FRAME_SYNC_BYTE, MAX_SCAN_WINDOW } from "./constants.js";

export const isValidWindowLength = (windowLength: number) =>
  Number.isInteger(windowLength) &&
  windowLength > 0 &&
  windowLength <= MAX_SCAN_WINDOW;

export function assertWindowLength(windowLength: number): void {
  if (!isValidWindowLength(windowLength)) {
    throw new InvalidWindowError(windowLength);
  }
}

/**
 * Find the first MPEG-1 Layer III frame header in [start, start + windowLength).
 *
 * The window is read once; each offset holding 0xFF is then checked with its
 * own 4-byte read so a candidate near the end of the window can extend past it.
 * The lowest matching offset wins. If the file ends inside the window only the
 * bytes that exist are scanned.
 */
export async function scanForFrame(
  file: OpenFile,
  start: number,
  windowLength: number,
  log: Log = consoleLog,
): Promise<number> {
  assertWindowLength(windowLength);
  log(
    `Scanning for first MP3 frame in ${windowLength} bytes from ${formatHex(start)}`,
  );
  const remaining = Math.max(0, (await fileSize(file)) - start);
  const window = await readAt(file, start, Math.min(windowLength, remaining));

  for (let i = 0; i < window.length; i++) {
    if (window[i] !== FRAME_SYNC_BYTE) continue;

    const offset = start + i;
    try {
      await checkFrameAt(file, offset, log);
      log(`Found MP3 frame at ${formatHex(offset)}`);
      return offset;
    } catch (err) {
      if (!(err instanceof FrameHeaderError)) throw err;
    }
  }

  throw new FrameNotFoundError(start, windowLength);
}
