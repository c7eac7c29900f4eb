/**
 * Key Material Normalization
 * ============================
 *
 * AES-CBC needs a 16- or 32-byte key and a 16-byte IV, but mailbox owners
 * share arbitrary passphrases. Both are fitted to size with ASCII spaces:
 *
 *   key shorter than 16 bytes      → padded to 16 (AES-128)
 *   key of 16 up to 31 bytes       → padded to 32 (AES-256)
 *   key of 32 bytes or more        → truncated to 32 (AES-256)
 *   iv                             → padded or truncated to 16
 *
 * When no IV is given, the raw key input doubles as the IV and the two are
 * normalized independently, so a 20-byte passphrase yields a 32-byte key
 * and a 16-byte IV.
 */

import { Buffer } from "node:buffer";
import type { KeyInput, KeyMaterial } from "./types.js";
import { fitWithSpaces, toBuffer } from "./utils.js";

// ----- Constants -----

/** Used when a session is created without a key. Anyone can read these messages. */
export const DEFAULT_KEY = "aes_cbc_key";

export const AES_128_KEY_BYTES = 16;
export const AES_256_KEY_BYTES = 32;
export const IV_BYTES = 16;

// ----- Normalization -----

export function normalizeKey(key: KeyInput): Buffer {
  const raw = toBuffer(key);
  if (raw.length < AES_128_KEY_BYTES) {
    return fitWithSpaces(raw, AES_128_KEY_BYTES);
  }
  return fitWithSpaces(raw, AES_256_KEY_BYTES);
}

export function normalizeIv(iv: KeyInput): Buffer {
  return fitWithSpaces(toBuffer(iv), IV_BYTES);
}

/**
 * Build frozen key material from a passphrase and an optional IV.
 *
 * @param key - raw key; defaults to {@link DEFAULT_KEY}
 * @param iv  - raw IV; defaults to the raw key
 */
export function createKeyMaterial(key: KeyInput = DEFAULT_KEY, iv?: KeyInput): KeyMaterial {
  return Object.freeze({
    key: normalizeKey(key),
    iv: normalizeIv(iv ?? key),
  });
}
