/**
 * Encrypted Bulletin Service
 * ============================
 *
 * The session talks to the bulletin board through {@link BulletinService}:
 * one call to publish a payload under a mailbox, one to fetch the latest
 * payload back, both keyed by the session's AES-CBC material.
 *
 * {@link CryptoDweetService} is the dweet-backed implementation. Everything
 * it puts on the wire is encrypted and hex-encoded:
 *   - the mailbox name becomes the dweet `thing`
 *   - every payload key (the sender's timestamp) and value (the message)
 *
 * Because the IV is fixed, the encrypted mailbox name is stable and the
 * receiver can look it up without any other shared state.
 */

import { decryptText, encryptText, type KeyMaterial, type MessageBody } from "@dweet-messenger/crypto";
import type { DweetClient, DweetPublishResponse } from "./dweet-client.js";

/** A fetched dweet with its content decrypted */
export interface FetchedDweet {
  thing: string;
  created: string;
  content: Record<string, string>;
}

export interface BulletinService {
  publish(
    mailbox: string,
    keys: KeyMaterial,
    payload: Record<string, MessageBody>
  ): Promise<DweetPublishResponse>;

  /** @returns at least one dweet; callers only use the first */
  fetchLatest(mailbox: string, keys: KeyMaterial): Promise<FetchedDweet[]>;
}

export class CryptoDweetService implements BulletinService {
  constructor(private readonly client: DweetClient) {}

  /**
   * Encrypt and publish. The service response is returned untouched, so its
   * `thing` and `content` are still ciphertext.
   */
  async publish(
    mailbox: string,
    keys: KeyMaterial,
    payload: Record<string, MessageBody>
  ): Promise<DweetPublishResponse> {
    const content: Record<string, string> = {};
    for (const [name, value] of Object.entries(payload)) {
      content[encryptText(keys, name)] = encryptText(keys, value);
    }
    return this.client.dweetFor(encryptText(keys, mailbox), content);
  }

  async fetchLatest(mailbox: string, keys: KeyMaterial): Promise<FetchedDweet[]> {
    const dweets = await this.client.getLatestDweetFor(encryptText(keys, mailbox));
    return dweets.map((dweet) => ({
      thing: dweet.thing,
      created: dweet.created,
      content: decryptContent(keys, dweet.content),
    }));
  }
}

function decryptContent(keys: KeyMaterial, content: Record<string, unknown>): Record<string, string> {
  const decrypted: Record<string, string> = {};
  for (const [name, value] of Object.entries(content)) {
    if (typeof value !== "string") {
      throw new Error(`content value for ${name} is not an encrypted string`);
    }
    decrypted[decryptText(keys, name)] = decryptText(keys, value);
  }
  return decrypted;
}
