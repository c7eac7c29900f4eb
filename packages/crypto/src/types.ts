import type { Buffer } from "node:buffer";

/** Raw key, IV or message input: text (UTF-8) or bytes */
export type KeyInput = string | Uint8Array;

/** A message body accepted for encryption */
export type MessageBody = string | Uint8Array;

/**
 * Normalized symmetric key material for AES-CBC.
 */
export type KeyMaterial = Readonly<{
  /** 16 bytes (AES-128) or 32 bytes (AES-256) */
  key: Buffer;

  /** Always 16 bytes */
  iv: Buffer;
}>;

export type CbcAlgorithm = "aes-128-cbc" | "aes-256-cbc";
