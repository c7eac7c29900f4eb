/**
 * AES-CBC Text Cipher
 * =====================
 *
 * Encrypts short texts (mailbox names, timestamps, messages) with AES in CBC
 * mode and PKCS#7 padding, hex-encoding the ciphertext for JSON transport.
 *
 * The IV is part of the shared key material rather than generated per call,
 * so encryption is deterministic: the same mailbox name always maps to the
 * same bulletin-board thing, which is how sender and receiver find each
 * other. The flip side is that equal plaintexts produce equal ciphertexts.
 *
 * Key size picks the variant:
 *   - 16-byte key → aes-128-cbc
 *   - 32-byte key → aes-256-cbc
 */

import { createCipheriv, createDecipheriv } from "node:crypto";
import { Buffer } from "node:buffer";
import type { CbcAlgorithm, KeyMaterial, MessageBody } from "./types.js";
import { AES_128_KEY_BYTES, AES_256_KEY_BYTES, IV_BYTES } from "./keys.js";
import { toBuffer, validateHex } from "./utils.js";

const BLOCK_BYTES = 16;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * @throws if the key is neither 16 nor 32 bytes
 */
export function algorithmFor(key: Buffer): CbcAlgorithm {
  switch (key.length) {
    case AES_128_KEY_BYTES:
      return "aes-128-cbc";
    case AES_256_KEY_BYTES:
      return "aes-256-cbc";
    default:
      throw new Error(
        `key: expected ${AES_128_KEY_BYTES} or ${AES_256_KEY_BYTES} bytes, got ${key.length} bytes`
      );
  }
}

function checkIv(iv: Buffer): void {
  if (iv.length !== IV_BYTES) {
    throw new Error(`iv: expected ${IV_BYTES} bytes, got ${iv.length} bytes`);
  }
}

// ----- Bytes -----

export function cbcEncrypt(material: KeyMaterial, plaintext: Buffer): string {
  checkIv(material.iv);
  const cipher = createCipheriv(algorithmFor(material.key), material.key, material.iv);
  return Buffer.concat([cipher.update(plaintext), cipher.final()]).toString("hex");
}

/**
 * Decrypt a hex ciphertext.
 * Validates the encoding and block alignment before touching the cipher.
 *
 * @throws on invalid hex, misaligned ciphertext, or bad padding (usually a wrong key)
 */
export function cbcDecrypt(material: KeyMaterial, ctHex: string): Buffer {
  checkIv(material.iv);
  const ct = validateHex(ctHex, "ciphertext");

  if (ct.length === 0 || ct.length % BLOCK_BYTES !== 0) {
    throw new Error(
      `ciphertext: expected a non-empty multiple of ${BLOCK_BYTES} bytes, got ${ct.length} bytes`
    );
  }

  const decipher = createDecipheriv(algorithmFor(material.key), material.key, material.iv);

  try {
    return Buffer.concat([decipher.update(ct), decipher.final()]);
  } catch (err) {
    throw new Error(
      `Decryption failed: bad padding (wrong key or corrupted data). ${err instanceof Error ? err.message : ""}`
    );
  }
}

// ----- Text -----

export function encryptText(material: KeyMaterial, body: MessageBody): string {
  return cbcEncrypt(material, toBuffer(body));
}

/**
 * @throws when decryption fails or the plaintext is not valid UTF-8
 */
export function decryptText(material: KeyMaterial, ctHex: string): string {
  const plaintext = cbcDecrypt(material, ctHex);
  try {
    return utf8.decode(plaintext);
  } catch {
    throw new Error("Decryption produced invalid UTF-8: wrong key or corrupted data");
  }
}
