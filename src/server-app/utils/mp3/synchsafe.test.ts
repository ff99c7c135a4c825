import { describe, expect, it } from "vitest";
import { captureError } from "../../__fixtures__/mp3.js";
import {
  HighBitSetError,
  Id3RepairErrorCode,
  ValueTooLargeError,
} from "./errors.js";
import { decodeSynchsafe, encodeSynchsafe } from "./synchsafe.js";

describe("Synchsafe integers", () => {
  it("decodes 7 bits per byte, most significant first", () => {
    expect(decodeSynchsafe(Buffer.from([0x00, 0x00, 0x02, 0x01]))).toBe(257);
    expect(decodeSynchsafe(Buffer.from([0x00, 0x00, 0x00, 0x00]))).toBe(0);
    expect(decodeSynchsafe(Buffer.from([0x7f, 0x7f, 0x7f, 0x7f]))).toBe(
      2 ** 28 - 1,
    );
    expect(decodeSynchsafe(Buffer.from([0x01, 0x00, 0x00, 0x00]))).toBe(
      2 ** 21,
    );
  });

  it("encodes into 4 bytes with the high bit clear", () => {
    expect([...encodeSynchsafe(257)]).toEqual([0x00, 0x00, 0x02, 0x01]);
    expect([...encodeSynchsafe(2 ** 28 - 1)]).toEqual([0x7f, 0x7f, 0x7f, 0x7f]);
    expect([...encodeSynchsafe(128)]).toEqual([0x00, 0x00, 0x01, 0x00]);
  });

  it("decodes what it encodes", () => {
    [0, 1, 127, 128, 16383, 16384, 2097151, 2097152, 2 ** 28 - 1].forEach(
      (value) => {
        expect(decodeSynchsafe(encodeSynchsafe(value))).toBe(value);
      },
    );
  });

  it("rejects any byte with the high bit set", () => {
    [0, 1, 2, 3].forEach((index) => {
      const bytes = Buffer.alloc(4);
      bytes[index] = 0x80;
      expect(() => decodeSynchsafe(bytes)).toThrow(HighBitSetError);
    });

    expect(
      captureError(() => decodeSynchsafe(Buffer.from([0x00, 0x81, 0x00, 0x7f]))),
    ).toMatchObject({
      code: Id3RepairErrorCode.HIGH_BIT_SET,
      message: "High bit(s) set in synchsafe size 0x00 0x81 0x00 0x7F",
    });
  });

  it("rejects values that need more than 28 bits", () => {
    expect(() => encodeSynchsafe(2 ** 28)).toThrow(ValueTooLargeError);
    expect(() => encodeSynchsafe(-1)).toThrow(ValueTooLargeError);
    expect(() => encodeSynchsafe(1.5)).toThrow(ValueTooLargeError);
  });

  it("only decodes exactly 4 bytes", () => {
    expect(() => decodeSynchsafe(Buffer.from([0x00, 0x01, 0x02]))).toThrow(
      RangeError,
    );
  });
});
