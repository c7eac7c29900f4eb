/**
 * Messenger Session
 * ===================
 *
 * A mailbox plus AES-CBC key material, and the last message sent and
 * received through it.
 *
 * Sending:
 *   - The payload is a single entry `{ <UTC send time>: <message> }`.
 *   - The bulletin service encrypts both halves and publishes them under the
 *     (encrypted) mailbox name, replacing whatever was there.
 *
 * Receiving:
 *   - The latest dweet is fetched and decrypted.
 *   - Its embedded send time is compared with the server's `created` time.
 *     A replayed or duplicated dweet carries an old send time under a fresh
 *     `created` time, so a gap above the freshness tolerance is rejected.
 *     The tolerance defaults to 10 seconds and also absorbs clock skew
 *     between sender and server; it is a tunable, not a proven bound.
 *
 * State:
 *   - The sent/received records are plain in-memory fields, replaced only
 *     when an operation succeeds.
 *   - Sessions are not safe for concurrent use: each call mutates those
 *     fields without locking, so callers must await one call before the next.
 */

import {
  createKeyMaterial,
  type KeyInput,
  type KeyMaterial,
  type MessageBody,
} from "@dweet-messenger/crypto";
import { type BulletinService, CryptoDweetService, type FetchedDweet } from "./bulletin.js";
import { DweetClient, type DweetPublishResponse } from "./dweet-client.js";
import { MessagingError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { formatUtcTime, gapSeconds, microsToDate, normalizeCreatedTime, parseUtcTime } from "./time.js";

// ----- Constants -----

export const FRESHNESS_TOLERANCE_SECONDS = 10;

const utf8 = new TextDecoder("utf-8", { fatal: true });

// ----- Types -----

export interface SessionOptions {
  /** Bulletin board to use; defaults to the dweet service at `baseUrl` */
  service?: BulletinService;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Clock used to stamp outgoing messages */
  now?: () => Date;
  freshnessToleranceSeconds?: number;
}

interface MessageRecord {
  sentAtUtc: Date;
  /** Microsecond-precision send time, used for ordering */
  sentAtMicros: number;
  message: string;
}

// ----- Helpers -----

function decodeMessage(message: MessageBody): string {
  if (typeof message === "string") {
    return message;
  }
  try {
    return utf8.decode(message);
  } catch (err) {
    throw new MessagingError("INVALID_MESSAGE", "Message bytes are not valid UTF-8", { cause: err });
  }
}

/**
 * Pull the send time, server time and message out of the first fetched dweet.
 * @throws on an empty result, a content mapping without exactly one entry, or unparsable times
 */
function readLatest(dweets: FetchedDweet[]): { sentAt: number; createdAt: number; message: string } {
  const latest = dweets[0];
  if (latest === undefined) {
    throw new Error("bulletin service returned no dweets");
  }

  const entries = Object.entries(latest.content);
  if (entries.length !== 1) {
    throw new Error(`expected exactly one entry in dweet content, got ${entries.length}`);
  }
  const [sentTimeString, message] = entries[0];

  return {
    sentAt: parseUtcTime(sentTimeString),
    createdAt: parseUtcTime(normalizeCreatedTime(latest.created)),
    message,
  };
}

// ----- Session -----

export class MessengerSession {
  readonly mailbox: string;
  readonly keys: KeyMaterial;

  private readonly service: BulletinService;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly freshnessToleranceSeconds: number;

  private lastSent: MessageRecord | null = null;
  private lastReceived: MessageRecord | null = null;

  /**
   * @param mailbox - shared channel name
   * @param key     - passphrase; defaults to an insecure well-known key
   * @param iv      - IV passphrase; defaults to `key`
   */
  constructor(mailbox: string, key?: KeyInput, iv?: KeyInput, options: SessionOptions = {}) {
    this.mailbox = mailbox;
    this.keys = createKeyMaterial(key, iv);
    this.service =
      options.service ??
      new CryptoDweetService(new DweetClient({ baseUrl: options.baseUrl, timeoutMs: options.timeoutMs }));
    this.logger = options.logger ?? createLogger();
    this.now = options.now ?? (() => new Date());
    this.freshnessToleranceSeconds = options.freshnessToleranceSeconds ?? FRESHNESS_TOLERANCE_SECONDS;
  }

  // ----- Accessors -----

  get latestSendMessageTime(): Date | null {
    return this.lastSent ? new Date(this.lastSent.sentAtUtc.getTime()) : null;
  }

  get latestSendMessage(): string | null {
    return this.lastSent?.message ?? null;
  }

  get latestGetMessageTime(): Date | null {
    return this.lastReceived ? new Date(this.lastReceived.sentAtUtc.getTime()) : null;
  }

  get latestGetMessage(): string | null {
    return this.lastReceived?.message ?? null;
  }

  // ----- Operations -----

  /**
   * Encrypt and publish a message, stamped with the current UTC time.
   *
   * @returns the bulletin service's response, passed through unchanged
   * @throws MessagingError if the message is not text or publishing fails
   */
  async sendMessage(message: MessageBody): Promise<DweetPublishResponse> {
    const sentAt = this.now();
    const timeString = formatUtcTime(sentAt);
    const text = decodeMessage(message);

    let response: DweetPublishResponse;
    try {
      response = await this.service.publish(this.mailbox, this.keys, { [timeString]: message });
    } catch (err) {
      throw MessagingError.wrap("PUBLISH_FAILED", err, { mailbox: this.mailbox });
    }

    this.lastSent = { sentAtUtc: sentAt, sentAtMicros: sentAt.getTime() * 1000, message: text };
    this.logger.debug(
      { event: "message_sent", mailbox: this.mailbox, sentAt: timeString, transaction: response.transaction },
      "Message published"
    );
    return response;
  }

  /**
   * Fetch, decrypt and freshness-check the latest message in the mailbox.
   *
   * @throws MessagingError on transport, decryption or format failures, or
   *   when the send and server times are too far apart
   */
  async getLatestMessage(): Promise<string> {
    const record = await this.receiveLatest();
    return record.message;
  }

  /**
   * Like {@link getLatestMessage}, but resolves to `null` when the latest
   * message is not newer than the last one received. Failures still reject.
   */
  async getNewMessage(): Promise<string | null> {
    const previous = this.lastReceived?.sentAtMicros;
    const record = await this.receiveLatest();

    if (previous === undefined || record.sentAtMicros > previous) {
      return record.message;
    }
    return null;
  }

  private async receiveLatest(): Promise<MessageRecord> {
    let dweets: FetchedDweet[];
    try {
      dweets = await this.service.fetchLatest(this.mailbox, this.keys);
    } catch (err) {
      throw MessagingError.wrap("FETCH_FAILED", err, { mailbox: this.mailbox });
    }

    let latest: { sentAt: number; createdAt: number; message: string };
    try {
      latest = readLatest(dweets);
    } catch (err) {
      throw MessagingError.wrap("MALFORMED_RECORD", err, { mailbox: this.mailbox });
    }

    const gap = gapSeconds(latest.createdAt, latest.sentAt);
    if (gap > this.freshnessToleranceSeconds) {
      const context = {
        mailbox: this.mailbox,
        gapSeconds: gap,
        sentAt: microsToDate(latest.sentAt).toISOString(),
        createdAt: microsToDate(latest.createdAt).toISOString(),
      };
      // Never log the message itself
      this.logger.warn({ event: "replay_suspected", ...context }, "Rejected stale message");
      throw new MessagingError(
        "REPLAY_SUSPECTED",
        "Too much gap between sent time and created time; likely duplication/replay attack",
        { context }
      );
    }

    const record: MessageRecord = {
      sentAtUtc: microsToDate(latest.sentAt),
      sentAtMicros: latest.sentAt,
      message: latest.message,
    };
    this.lastReceived = record;
    this.logger.debug(
      { event: "message_received", mailbox: this.mailbox, sentAt: record.sentAtUtc.toISOString() },
      "Message fetched"
    );
    return record;
  }
}
