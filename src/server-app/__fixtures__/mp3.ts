import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

// MPEG-1 Layer III, no CRC, 128 kbps, 44.1 kHz
export const FRAME_HEADER = [0xff, 0xfb, 0x90, 0x64] as const;

export const encodeSize = (size: number) => [
  (size >>> 21) & 0x7f,
  (size >>> 14) & 0x7f,
  (size >>> 7) & 0x7f,
  size & 0x7f,
];

export const buildId3Header = ({
  magic = "ID3",
  majorVersion = 3,
  minorVersion = 0,
  flags = 0,
  size = 0,
  sizeBytes = encodeSize(size),
}: {
  magic?: string;
  majorVersion?: number;
  minorVersion?: number;
  flags?: number;
  size?: number;
  sizeBytes?: number[];
} = {}) =>
  Buffer.concat([
    Buffer.from(magic, "latin1"),
    Buffer.from([majorVersion, minorVersion, flags, ...sizeBytes]),
  ]);

/**
 * ID3 header + `tagLength` zero bytes of tag body + two MPEG frame headers
 * with zeroed payloads. The audio starts at offset 10 + tagLength.
 */
export const buildMp3 = ({
  declaredSize,
  tagLength,
}: {
  declaredSize: number;
  tagLength: number;
}) =>
  Buffer.concat([
    buildId3Header({ size: declaredSize }),
    Buffer.alloc(tagLength),
    Buffer.from(FRAME_HEADER),
    Buffer.alloc(60),
    Buffer.from(FRAME_HEADER),
    Buffer.alloc(60),
  ]);

export const createTempDir = () => mkdtemp(join(tmpdir(), "id3-size-repair-"));

export const removeTempDir = (dir: string) =>
  rm(dir, { recursive: true, force: true });

export async function writeTempFile(
  dir: string,
  name: string,
  contents: Buffer,
): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, contents);
  return filePath;
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
