import { parseArgs } from "node:util";
import { parsePositiveInt } from "./server-app/config.js";
import { consoleLog, type Log } from "./server-app/utils/log.js";
import { DEFAULT_SCAN_WINDOW } from "./server-app/utils/mp3/constants.js";
import { Id3RepairError, PatchWriteError } from "./server-app/utils/mp3/errors.js";
import { formatBytes, formatHex } from "./server-app/utils/mp3/format.js";
import { repair, type RepairOutcome } from "./server-app/utils/mp3/repair.js";
import { isValidWindowLength } from "./server-app/utils/mp3/scan-for-frame.js";

export const USAGE = "usage: id3-size-repair [--force] [--window BYTES] FILENAME";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FAILED = 2;

export function describeOutcome(outcome: RepairOutcome): string {
  if (outcome.status === "already-correct") {
    return `Tag size is already correct (frame at ${formatHex(outcome.frameOffset)})`;
  }
  const { correctedSize, sizeBytes } = outcome.patch;
  return outcome.applied
    ? `Corrected tag size to ${correctedSize} (${formatBytes(sizeBytes)})`
    : `Would correct tag size to ${correctedSize} (${formatBytes(sizeBytes)}); rerun with --force to apply`;
}

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      force: { type: "boolean", default: false },
      window: { type: "string" },
    },
  });

/**
 * Dry-run by default; `--force` writes the corrected size.
 * Returns the process exit code.
 */
export async function main(
  argv: string[],
  log: Log = consoleLog,
  logError: Log = (message) => console.error(message),
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    logError(err instanceof Error ? err.message : String(err));
    logError(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (positionals.length !== 1) {
    logError(USAGE);
    return EXIT_USAGE;
  }

  const windowLength = parsePositiveInt(values.window) ?? DEFAULT_SCAN_WINDOW;
  if (!isValidWindowLength(windowLength)) {
    logError(`Invalid --window: ${values.window}`);
    return EXIT_USAGE;
  }

  try {
    const outcome = await repair(positionals[0], {
      windowLength,
      apply: values.force,
      log,
    });
    log(describeOutcome(outcome));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof PatchWriteError) {
      logError(`${err.message}; the size field may be partially written`);
      return EXIT_FAILED;
    }
    if (err instanceof Id3RepairError) {
      logError(`${err.code}: ${err.message}`);
      return EXIT_FAILED;
    }
    throw err;
  }
}
