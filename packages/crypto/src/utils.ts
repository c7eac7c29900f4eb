/**
 * Utility helpers for hex encoding/decoding and byte normalization.
 * Ciphertexts travel as hex strings so they survive JSON keys and values.
 */
import { Buffer } from "node:buffer";

/**
 * Validates that a string is valid hexadecimal and optionally checks byte length.
 * @throws Error if the string is not valid hex or does not match expected byte length.
 */
export function validateHex(value: string, label: string, expectedBytes?: number): Buffer {
  // Hex strings must have even length and contain only hex characters
  if (!/^[0-9a-f]*$/i.test(value) || value.length % 2 !== 0) {
    throw new Error(`${label}: invalid hex encoding`);
  }

  const buf = Buffer.from(value, "hex");

  if (expectedBytes !== undefined && buf.length !== expectedBytes) {
    throw new Error(
      `${label}: expected ${expectedBytes} bytes, got ${buf.length} bytes`
    );
  }

  return buf;
}

/** Strings are taken as UTF-8; byte arrays are copied. */
export function toBuffer(value: string | Uint8Array): Buffer {
  return typeof value === "string" ? Buffer.from(value, "utf-8") : Buffer.from(value);
}

/**
 * Pads `buf` with ASCII spaces up to `size` bytes, or truncates it to `size`.
 */
export function fitWithSpaces(buf: Buffer, size: number): Buffer {
  if (buf.length >= size) {
    return Buffer.from(buf.subarray(0, size));
  }
  return Buffer.concat([buf, Buffer.alloc(size - buf.length, " ")]);
}
