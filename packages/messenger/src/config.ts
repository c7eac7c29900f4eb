/**
 * Environment configuration.
 *
 * Environment variables:
 *   DWEET_BASE_URL=<http(s) url>          (default https://dweet.io)
 *   DWEET_TIMEOUT_MS=<positive integer>   (default 10000)
 *   DWEET_FRESHNESS_TOLERANCE_S=<number>  (default 10)
 *   DWEET_MESSENGER_LOG_LEVEL=<pino level> (default silent)
 *
 * Session variables, read by createSessionFromEnv:
 *   DWEET_MAILBOX=<mailbox>               (required)
 *   DWEET_KEY=<passphrase>                (optional)
 *   DWEET_IV=<passphrase>                 (optional, defaults to the key)
 */

import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./dweet-client.js";
import { createLogger } from "./logger.js";
import { FRESHNESS_TOLERANCE_SECONDS, MessengerSession, type SessionOptions } from "./session.js";

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface MessengerConfig {
  baseUrl: string;
  timeoutMs: number;
  freshnessToleranceSeconds: number;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`DWEET_BASE_URL: invalid URL '${value}'`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`DWEET_BASE_URL: expected an http or https URL, got '${value}'`);
  }
  return value;
}

function parsePositive(value: string, label: string, integer: boolean): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0 || (integer && !Number.isInteger(parsed))) {
    throw new Error(`${label}: expected a positive ${integer ? "integer" : "number"}, got '${value}'`);
  }
  return parsed;
}

/**
 * Read messenger settings from `env`, falling back to defaults.
 * @throws naming the offending variable when a value is invalid
 */
export function loadMessengerConfig(env: Env = process.env): MessengerConfig {
  const logLevel = env.DWEET_MESSENGER_LOG_LEVEL ?? "silent";
  if (!isLogLevel(logLevel)) {
    throw new Error(`DWEET_MESSENGER_LOG_LEVEL: unknown level '${logLevel}'`);
  }

  return {
    baseUrl: env.DWEET_BASE_URL ? parseBaseUrl(env.DWEET_BASE_URL) : DEFAULT_BASE_URL,
    timeoutMs: env.DWEET_TIMEOUT_MS
      ? parsePositive(env.DWEET_TIMEOUT_MS, "DWEET_TIMEOUT_MS", true)
      : DEFAULT_TIMEOUT_MS,
    freshnessToleranceSeconds: env.DWEET_FRESHNESS_TOLERANCE_S
      ? parsePositive(env.DWEET_FRESHNESS_TOLERANCE_S, "DWEET_FRESHNESS_TOLERANCE_S", false)
      : FRESHNESS_TOLERANCE_SECONDS,
    logLevel,
  };
}

/**
 * Build a session from `DWEET_MAILBOX`, `DWEET_KEY` and `DWEET_IV` plus the
 * settings read by {@link loadMessengerConfig}.
 *
 * @param overrides - options that take precedence over the environment (e.g. a test service)
 */
export function createSessionFromEnv(env: Env = process.env, overrides: SessionOptions = {}): MessengerSession {
  const mailbox = env.DWEET_MAILBOX;
  if (!mailbox) {
    throw new Error("DWEET_MAILBOX environment variable is required");
  }

  const config = loadMessengerConfig(env);
  return new MessengerSession(mailbox, env.DWEET_KEY, env.DWEET_IV, {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    freshnessToleranceSeconds: config.freshnessToleranceSeconds,
    logger: createLogger(config.logLevel),
    ...overrides,
  });
}
