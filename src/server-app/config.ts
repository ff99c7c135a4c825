import { DEFAULT_SCAN_WINDOW } from "./utils/mp3/constants.js";
import { isValidWindowLength } from "./utils/mp3/scan-for-frame.js";

export interface Config {
  port: number;
  /** Default scan window for requests that don't pass `window` */
  scanWindow: number;
}

/**
 * Parse a positive integer, e.g. from an env var or query string.
 * Returns undefined for missing or blank values and NaN for anything invalid.
 */
export function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : Number.NaN;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = parsePositiveInt(env.PORT) ?? 3000;
  const scanWindow = parsePositiveInt(env.SCAN_WINDOW_BYTES) ?? DEFAULT_SCAN_WINDOW;

  if (Number.isNaN(port)) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }
  if (!isValidWindowLength(scanWindow)) {
    throw new Error(`Invalid SCAN_WINDOW_BYTES: ${env.SCAN_WINDOW_BYTES}`);
  }

  return { port, scanWindow };
}
