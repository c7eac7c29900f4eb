/**
 * @dweet-messenger/messenger — encrypted messaging over a dweet bulletin board
 *
 * Re-exports all public types and functions for consumers.
 */
export { MessengerSession, FRESHNESS_TOLERANCE_SECONDS, type SessionOptions } from "./session.js";
export { MessagingError, type MessagingErrorReason } from "./errors.js";
export { CryptoDweetService, type BulletinService, type FetchedDweet } from "./bulletin.js";
export {
  DweetClient,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type DweetClientOptions,
  type DweetRecord,
  type DweetPublishResponse,
} from "./dweet-client.js";
export { loadMessengerConfig, createSessionFromEnv, type MessengerConfig, type LogLevel } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { formatUtcTime, parseUtcTime, normalizeCreatedTime } from "./time.js";
