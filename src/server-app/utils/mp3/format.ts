/**
 * Hex formatting for diagnostics and error messages
 */

export function formatHex(value: number): string {
  return `0x${value.toString(16)}`;
}

export function formatByte(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;
}

// e.g. [0x58, 0x59, 0x5a] -> "0x58 0x59 0x5A"
export function formatBytes(bytes: Uint8Array): string {
  return Array.from(bytes, formatByte).join(" ");
}
