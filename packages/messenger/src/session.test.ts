/**
 * Messenger Session Tests
 * =========================
 *
 * Tests cover:
 *   1. Key material normalization at construction
 *   2. Send → latest → new message flow
 *   3. Freshness check between embedded send time and server created time
 *   4. Malformed fetched records
 *   5. Failures leave the session's records untouched
 *
 * Runs against an in-memory bulletin board with controlled clocks.
 * Uses Node's built-in test runner (node:test).
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import type { KeyMaterial, MessageBody } from "@dweet-messenger/crypto";
import {
  MessengerSession,
  MessagingError,
  createLogger,
  type BulletinService,
  type DweetPublishResponse,
  type FetchedDweet,
  type MessagingErrorReason,
} from "./index.js";

// ----- Test helpers -----

/** Keeps the latest payload per mailbox in plain text, stamped with `serverTime` */
class FakeBulletin implements BulletinService {
  serverTime = new Date("2024-05-01T12:00:01.250Z");
  latest: FetchedDweet[] = [];
  published: Array<{ mailbox: string; keys: KeyMaterial; payload: Record<string, MessageBody> }> = [];
  publishError: Error | null = null;
  fetchError: Error | null = null;
  lastResponse: DweetPublishResponse | null = null;

  async publish(
    mailbox: string,
    keys: KeyMaterial,
    payload: Record<string, MessageBody>
  ): Promise<DweetPublishResponse> {
    if (this.publishError) {
      throw this.publishError;
    }
    this.published.push({ mailbox, keys, payload });

    const content: Record<string, string> = {};
    for (const [name, value] of Object.entries(payload)) {
      content[name] = typeof value === "string" ? value : Buffer.from(value).toString("utf-8");
    }
    const created = this.serverTime.toISOString();
    this.latest = [{ thing: mailbox, created, content }];
    this.lastResponse = { thing: mailbox, created, content, transaction: `tx-${this.published.length}` };
    return this.lastResponse;
  }

  async fetchLatest(): Promise<FetchedDweet[]> {
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.latest;
  }

  /** Put a dweet on the board as if someone else had written it */
  stage(sentTime: string, message: string, created: string): void {
    this.latest = [{ thing: "m1", created, content: { [sentTime]: message } }];
  }
}

function setup(options: { freshnessToleranceSeconds?: number } = {}) {
  const service = new FakeBulletin();
  const clock = { now: new Date("2024-05-01T12:00:00.000Z") };
  const session = new MessengerSession("m1", "k1", undefined, {
    service,
    now: () => clock.now,
    logger: createLogger("silent"),
    ...options,
  });
  return { service, clock, session };
}

async function rejectsWith(promise: Promise<unknown>, reason: MessagingErrorReason): Promise<MessagingError> {
  try {
    await promise;
  } catch (err) {
    assert.ok(err instanceof MessagingError);
    assert.equal(err.reason, reason);
    return err;
  }
  assert.fail(`expected a MessagingError with reason ${reason}`);
}

// ----- Tests -----

describe("MessengerSession construction", () => {
  it("normalizes the key and defaults the IV to the key", () => {
    const session = new MessengerSession("m1", "k1");
    assert.equal(session.mailbox, "m1");
    assert.equal(session.keys.key.toString("utf-8"), "k1" + " ".repeat(14));
    assert.equal(session.keys.iv.toString("utf-8"), "k1" + " ".repeat(14));
  });

  it("normalizes key and IV independently", () => {
    const session = new MessengerSession("m1", "k".repeat(20), "v".repeat(20));
    assert.equal(session.keys.key.length, 32);
    assert.equal(session.keys.iv.toString("utf-8"), "v".repeat(16));
  });

  it("starts with empty records", () => {
    const { session } = setup();
    assert.equal(session.latestSendMessageTime, null);
    assert.equal(session.latestSendMessage, null);
    assert.equal(session.latestGetMessageTime, null);
    assert.equal(session.latestGetMessage, null);
  });
});

describe("MessengerSession.sendMessage", () => {
  it("publishes a single timestamped entry and returns the response verbatim", async () => {
    const { service, session } = setup();

    const response = await session.sendMessage("hello");

    assert.equal(response, service.lastResponse);
    assert.deepEqual(response, {
      thing: "m1",
      created: "2024-05-01T12:00:01.250Z",
      content: { "2024-05-01T12:00:00.000000Z": "hello" },
      transaction: "tx-1",
    });
    assert.equal(service.published.length, 1);
    assert.equal(service.published[0].mailbox, "m1");
    assert.equal(service.published[0].keys, session.keys);
    assert.deepEqual(service.published[0].payload, { "2024-05-01T12:00:00.000000Z": "hello" });
  });

  it("records the send time and message", async () => {
    const { session } = setup();
    await session.sendMessage("hello");

    assert.equal(session.latestSendMessage, "hello");
    assert.equal(session.latestSendMessageTime?.toISOString(), "2024-05-01T12:00:00.000Z");
  });

  it("decodes byte messages as UTF-8", async () => {
    const { session } = setup();
    await session.sendMessage(new TextEncoder().encode("héllo"));
    assert.equal(session.latestSendMessage, "héllo");
  });

  it("rejects bytes that are not UTF-8 without publishing", async () => {
    const { service, session } = setup();
    await rejectsWith(session.sendMessage(new Uint8Array([0xff, 0xfe])), "INVALID_MESSAGE");
    assert.equal(service.published.length, 0);
    assert.equal(session.latestSendMessage, null);
  });

  it("wraps publish failures and keeps the previous record", async () => {
    const { service, clock, session } = setup();
    await session.sendMessage("first");

    const cause = new Error("connect ECONNREFUSED");
    service.publishError = cause;
    clock.now = new Date("2024-05-01T12:05:00.000Z");

    const err = await rejectsWith(session.sendMessage("second"), "PUBLISH_FAILED");
    assert.equal(err.message, "connect ECONNREFUSED");
    assert.equal(err.cause, cause);
    assert.equal(session.latestSendMessage, "first");
    assert.equal(session.latestSendMessageTime?.toISOString(), "2024-05-01T12:00:00.000Z");
  });
});

describe("MessengerSession.getLatestMessage", () => {
  it("returns what was just sent", async () => {
    const { session } = setup();
    await session.sendMessage("hello");

    assert.equal(await session.getLatestMessage(), "hello");
    assert.equal(session.latestGetMessage, "hello");
    assert.equal(session.latestGetMessageTime?.toISOString(), "2024-05-01T12:00:00.000Z");
  });

  it("accepts a gap of exactly the tolerance", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:00.000000Z", "edge", "2024-05-01T12:00:10.000Z");
    assert.equal(await session.getLatestMessage(), "edge");
  });

  it("accepts a send time ahead of the server time", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:05.000000Z", "skewed", "2024-05-01T12:00:00.000Z");
    assert.equal(await session.getLatestMessage(), "skewed");
  });

  it("rejects a replayed message and keeps the previous record", async () => {
    const { service, session } = setup();
    await session.sendMessage("hello");
    await session.getLatestMessage();

    service.stage("2024-05-01T11:59:00.000000Z", "replayed", "2024-05-01T12:00:00.000Z");
    const err = await rejectsWith(session.getLatestMessage(), "REPLAY_SUSPECTED");

    assert.equal(err.message, "Too much gap between sent time and created time; likely duplication/replay attack");
    assert.equal(err.context?.gapSeconds, 60);
    assert.equal(session.latestGetMessage, "hello");
    assert.equal(session.latestGetMessageTime?.toISOString(), "2024-05-01T12:00:00.000Z");
  });

  it("rejects a gap just over the tolerance", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:00.000000Z", "late", "2024-05-01T12:00:10.001Z");
    await rejectsWith(session.getLatestMessage(), "REPLAY_SUSPECTED");
    assert.equal(session.latestGetMessage, null);
  });

  it("honours a custom freshness tolerance", async () => {
    const { service, session } = setup({ freshnessToleranceSeconds: 2 });
    service.stage("2024-05-01T12:00:00.000000Z", "slow", "2024-05-01T12:00:03.000Z");
    await rejectsWith(session.getLatestMessage(), "REPLAY_SUSPECTED");
  });

  it("wraps fetch failures", async () => {
    const { service, session } = setup();
    const cause = new Error("no dweets found for thing abc");
    service.fetchError = cause;

    const err = await rejectsWith(session.getLatestMessage(), "FETCH_FAILED");
    assert.equal(err.cause, cause);
    assert.equal(session.latestGetMessage, null);
  });

  it("rejects an empty result", async () => {
    const { session } = setup();
    const err = await rejectsWith(session.getLatestMessage(), "MALFORMED_RECORD");
    assert.equal(err.message, "bulletin service returned no dweets");
  });

  it("rejects content without exactly one entry", async () => {
    const { service, session } = setup();
    service.latest = [
      {
        thing: "m1",
        created: "2024-05-01T12:00:00.000Z",
        content: { "2024-05-01T12:00:00.000000Z": "a", "2024-05-01T12:00:00.500000Z": "b" },
      },
    ];
    const err = await rejectsWith(session.getLatestMessage(), "MALFORMED_RECORD");
    assert.equal(err.message, "expected exactly one entry in dweet content, got 2");
  });

  it("rejects an unparsable send time", async () => {
    const { service, session } = setup();
    service.stage("yesterday", "hello", "2024-05-01T12:00:00.000Z");
    const err = await rejectsWith(session.getLatestMessage(), "MALFORMED_RECORD");
    assert.match(err.message, /does not match format/);
  });

  it("rejects a created time without milliseconds", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:00.000000Z", "hello", "2024-05-01T12:00:00Z");
    await rejectsWith(session.getLatestMessage(), "MALFORMED_RECORD");
  });
});

describe("MessengerSession.getNewMessage", () => {
  it("returns the first message, then null until a newer one arrives", async () => {
    const { service, clock, session } = setup();
    await session.sendMessage("hello");

    assert.equal(await session.getNewMessage(), "hello");
    assert.equal(await session.getNewMessage(), null);

    clock.now = new Date("2024-05-01T12:00:05.000Z");
    service.serverTime = new Date("2024-05-01T12:00:05.100Z");
    await session.sendMessage("second");

    assert.equal(await session.getNewMessage(), "second");
    assert.equal(await session.getNewMessage(), null);
  });

  it("returns null after getLatestMessage already saw the message", async () => {
    const { session } = setup();
    await session.sendMessage("hello");
    await session.getLatestMessage();

    assert.equal(await session.getNewMessage(), null);
  });

  it("orders by microseconds", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:00.000000Z", "first", "2024-05-01T12:00:00.000Z");
    assert.equal(await session.getNewMessage(), "first");

    service.stage("2024-05-01T12:00:00.000001Z", "second", "2024-05-01T12:00:00.000Z");
    assert.equal(await session.getNewMessage(), "second");
  });

  it("returns null for an older message but still records it", async () => {
    const { service, session } = setup();
    service.stage("2024-05-01T12:00:00.000000Z", "current", "2024-05-01T12:00:00.000Z");
    await session.getNewMessage();

    service.stage("2024-05-01T11:59:59.000000Z", "older", "2024-05-01T12:00:00.000Z");
    assert.equal(await session.getNewMessage(), null);
    assert.equal(session.latestGetMessage, "older");
    assert.equal(session.latestGetMessageTime?.toISOString(), "2024-05-01T11:59:59.000Z");
  });

  it("propagates failures and leaves the records unchanged", async () => {
    const { service, session } = setup();
    await session.sendMessage("hello");
    await session.getNewMessage();

    service.stage("2024-05-01T11:00:00.000000Z", "replayed", "2024-05-01T12:00:00.000Z");
    await rejectsWith(session.getNewMessage(), "REPLAY_SUSPECTED");

    assert.equal(session.latestSendMessage, "hello");
    assert.equal(session.latestGetMessage, "hello");
    assert.equal(session.latestGetMessageTime?.toISOString(), "2024-05-01T12:00:00.000Z");
  });
});
