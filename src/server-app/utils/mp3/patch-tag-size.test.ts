import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import {
  buildMp3,
  createTempDir,
  removeTempDir,
  writeTempFile,
} from "../../__fixtures__/mp3.js";
import { silentLog } from "../log.js";
import {
  Id3RepairErrorCode,
  PatchWriteError,
  ValueTooLargeError,
} from "./errors.js";
import { patchTagSize, planTagSizePatch } from "./patch-tag-size.js";

describe("Tag size patching", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await createTempDir();
  });

  afterAll(async () => {
    if (tempDir) await removeTempDir(tempDir);
  });

  it("plans a size that excludes the 10-byte header", () => {
    const patch = planTagSizePatch(267);

    expect(patch.correctedSize).toBe(257);
    expect([...patch.sizeBytes]).toEqual([0x00, 0x00, 0x02, 0x01]);
    expect(patch.offset).toBe(6);
    expect(planTagSizePatch(10).correctedSize).toBe(0);
  });

  it("refuses offsets that can't be expressed as a synchsafe size", () => {
    expect(() => planTagSizePatch(2 ** 28 + 10)).toThrow(ValueTooLargeError);
    expect(() => planTagSizePatch(4)).toThrow(ValueTooLargeError);
  });

  it("rewrites bytes 6–9 and nothing else", async () => {
    const original = buildMp3({ declaredSize: 12, tagLength: 200 });
    const filePath = await writeTempFile(tempDir, "patch.mp3", original);
    const log = vi.fn();

    const patch = await patchTagSize(filePath, 210, log);
    const patched = await readFile(filePath);

    expect(patch.correctedSize).toBe(200);
    expect(patched.length).toBe(original.length);
    expect([...patched.subarray(6, 10)]).toEqual([0x00, 0x00, 0x01, 0x48]);
    expect(patched.subarray(0, 6).equals(original.subarray(0, 6))).toBe(true);
    expect(patched.subarray(10).equals(original.subarray(10))).toBe(true);
    expect(log).toHaveBeenCalledWith(
      "Writing tag size 0xc8 as 0x00 0x00 0x01 0x48",
    );
  });

  it("reports write failures distinctly and never creates the file", async () => {
    const missing = join(tempDir, "missing.mp3");

    await expect(patchTagSize(missing, 30, silentLog)).rejects.toBeInstanceOf(
      PatchWriteError,
    );
    await expect(patchTagSize(missing, 30, silentLog)).rejects.toMatchObject({
      code: Id3RepairErrorCode.PATCH_WRITE_FAILED,
      message: `Failed to write updated tag size to ${missing}`,
    });
    await expect(readFile(missing)).rejects.toMatchObject({ code: "ENOENT" });
  });
});
