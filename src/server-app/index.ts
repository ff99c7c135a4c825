import { Hono } from "hono";
import { logger } from "hono/logger";
import { readFile, rm } from "node:fs/promises";
import { parsePositiveInt, type Config } from "./config.js";
import { consoleLog, type Log } from "./utils/log.js";
import { Id3RepairError, Id3RepairErrorCode } from "./utils/mp3/errors.js";
import { repair, type RepairOutcome } from "./utils/mp3/repair.js";
import { isValidWindowLength } from "./utils/mp3/scan-for-frame.js";
import { streamUploadToDisk, UploadError } from "./utils/upload.js";

export interface RepairReport {
  status: RepairOutcome["status"];
  version: string;
  declaredSize: number;
  frameOffset: number;
  correctedSize: number | null;
  sizeBytes: number[] | null;
}

export function toReport(outcome: RepairOutcome): RepairReport {
  const { header } = outcome;
  const patch = outcome.status === "corrected" ? outcome.patch : null;
  return {
    status: outcome.status,
    version: `2.${header.majorVersion}.${header.minorVersion}`,
    declaredSize: header.declaredSize,
    frameOffset: outcome.frameOffset,
    correctedSize: patch ? patch.correctedSize : null,
    sizeBytes: patch ? Array.from(patch.sizeBytes) : null,
  };
}

const isTruthy = (value: string | undefined) =>
  value === "true" || value === "1";

export function createApp(
  { scanWindow }: Pick<Config, "scanWindow">,
  log: Log = consoleLog,
  logError: Log = (message) => console.error(message),
) {
  const app = new Hono();

  app.use(logger(log));

  app.get("/health", (c) => c.body("server is running 👍"));

  app.post("/repair", async (c) => {
    const windowLength = parsePositiveInt(c.req.query("window")) ?? scanWindow;
    if (!isValidWindowLength(windowLength)) {
      return c.json(
        {
          error: `Invalid window: ${c.req.query("window")}`,
          code: Id3RepairErrorCode.INVALID_WINDOW,
        },
        400,
      );
    }
    const apply = isTruthy(c.req.query("apply"));

    let filepath: string | undefined;
    try {
      filepath = await streamUploadToDisk(c.req.raw);
      const outcome = await repair(filepath, { windowLength, apply, log });

      if (!apply) return c.json(toReport(outcome));

      const repaired = await readFile(filepath);
      return c.body(new Uint8Array(repaired), 200, {
        "Content-Type": "audio/mpeg",
        "X-Repair-Status": outcome.status,
      });
    } catch (err) {
      if (err instanceof UploadError) {
        return c.json({ error: err.message }, 400);
      }
      if (err instanceof Id3RepairError) {
        return c.json({ error: err.message, code: err.code }, 422);
      }
      throw err;
    } finally {
      if (filepath) await rm(filepath, { force: true });
    }
  });

  app.onError((err, c) => {
    logError(err.stack ?? err.message);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
