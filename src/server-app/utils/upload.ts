import Busboy from "busboy";
import { randomUUID } from "node:crypto";
import { createWriteStream, type WriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadError";
  }
}

const errorMessage = (err: unknown) =>
  err instanceof Error ? err.message : String(err);

/**
 * Streams the first uploaded file to a temp disk location.
 * Returns filepath for processing; the caller removes it.
 * A partially written file is removed before the promise rejects.
 */
export async function streamUploadToDisk(
  request: Request,
  dir: string = tmpdir(),
): Promise<string> {
  return new Promise((resolve, reject) => {
    let sawFile = false;
    let settled = false;
    let upload: { filepath: string; writeStream: WriteStream } | undefined;

    const fail = (err: unknown) => {
      if (settled) return;
      settled = true;
      const error =
        err instanceof UploadError ? err : new UploadError(errorMessage(err));
      if (!upload) {
        reject(error);
        return;
      }

      const { filepath, writeStream } = upload;
      const removeFile = () => {
        rm(filepath, { force: true }).then(
          () => reject(error),
          () => reject(error),
        );
      };
      writeStream.destroy();
      if (writeStream.closed) removeFile();
      else writeStream.once("close", removeFile);
    };

    let busboy: Busboy.Busboy;
    try {
      busboy = Busboy({
        headers: { "content-type": request.headers.get("content-type") || "" },
        limits: { files: 1 },
      });
    } catch (err) {
      fail(err);
      return;
    }

    busboy.on("file", (_name, file) => {
      sawFile = true;
      const filepath = join(dir, `${randomUUID()}.mp3`);
      const writeStream = createWriteStream(filepath);
      upload = { filepath, writeStream };

      file.on("error", fail);
      file.pipe(writeStream);

      writeStream.on("finish", () => {
        if (settled) return;
        settled = true;
        resolve(filepath);
      });
      writeStream.on("error", fail);
    });

    busboy.on("close", () => {
      if (!sawFile) fail(new UploadError("No file uploaded"));
    });

    busboy.on("error", fail);

    if (!request.body) {
      fail(new UploadError("No file uploaded"));
      return;
    }

    Readable.fromWeb(request.body).pipe(busboy);
  });
}
