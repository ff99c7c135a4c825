import { HighBitSetError, ValueTooLargeError } from "./errors.js";
import {
  SYNCHSAFE_BITS_PER_BYTE,
  SYNCHSAFE_HIGH_BIT,
  SYNCHSAFE_MASK,
  SYNCHSAFE_MAX,
  UINT32_SIZE,
} from "./constants.js";

/**
 * Decode a 4-byte synchsafe integer.
 *
 * Each byte carries 7 bits, the highest bit is always 0:
 *   bytes[0] → bits 27–21
 *   bytes[1] → bits 20–14
 *   bytes[2] → bits 13–7
 *   bytes[3] → bits 6–0
 */
export function decodeSynchsafe(bytes: Uint8Array): number {
  if (bytes.length !== UINT32_SIZE) {
    throw new RangeError(
      `Synchsafe integers are ${UINT32_SIZE} bytes (got ${bytes.length})`,
    );
  }

  let value = 0;
  for (const byte of bytes) {
    if (byte & SYNCHSAFE_HIGH_BIT) {
      throw new HighBitSetError(Buffer.from(bytes));
    }
    value = (value << SYNCHSAFE_BITS_PER_BYTE) | (byte & SYNCHSAFE_MASK);
  }
  return value;
}

export function encodeSynchsafe(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value >= SYNCHSAFE_MAX) {
    throw new ValueTooLargeError(value);
  }

  const bytes = Buffer.alloc(UINT32_SIZE);
  let remaining = value;
  for (let i = UINT32_SIZE - 1; i >= 0; i--) {
    bytes[i] = remaining & SYNCHSAFE_MASK;
    remaining >>>= SYNCHSAFE_BITS_PER_BYTE;
  }
  return bytes;
}
