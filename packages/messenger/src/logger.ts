import { pino, type Logger } from "pino";

export type { Logger };

/**
 * Create the messenger's logger. Silent unless a level is given here or in
 * `DWEET_MESSENGER_LOG_LEVEL`.
 */
export function createLogger(level = process.env.DWEET_MESSENGER_LOG_LEVEL ?? "silent"): Logger {
  return pino({ name: "dweet-messenger", level });
}
