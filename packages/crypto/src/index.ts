/**
 * @dweet-messenger/crypto — AES-CBC text cipher with passphrase normalization
 *
 * Re-exports all public types and functions for consumers.
 */
export { algorithmFor, cbcEncrypt, cbcDecrypt, encryptText, decryptText } from "./cipher.js";
export {
  DEFAULT_KEY,
  AES_128_KEY_BYTES,
  AES_256_KEY_BYTES,
  IV_BYTES,
  normalizeKey,
  normalizeIv,
  createKeyMaterial,
} from "./keys.js";
export type { KeyInput, KeyMaterial, MessageBody, CbcAlgorithm } from "./types.js";
export { validateHex, toBuffer } from "./utils.js";
