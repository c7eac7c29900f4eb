/**
 * Dweet HTTP client.
 *
 * Speaks the subset of the dweet API the messenger needs:
 *
 *   POST {baseUrl}/dweet/for/:thing              — publish a JSON object
 *   GET  {baseUrl}/get/latest/dweet/for/:thing   — read the latest one back
 *
 * Every response is wrapped in an envelope:
 *   { "this": "succeeded" | "failed", "by": ..., "the": ..., "with": ..., "because"?: ... }
 *
 * Single attempt per call; the only timeout is the per-request abort signal.
 */

export const DEFAULT_BASE_URL = "https://dweet.io";
export const DEFAULT_TIMEOUT_MS = 10_000;

/** A dweet as stored by the service */
export interface DweetRecord {
  thing: string;
  /** ISO-8601 server receipt time, millisecond precision */
  created: string;
  content: Record<string, unknown>;
}

/** Response body of a successful publish */
export interface DweetPublishResponse extends DweetRecord {
  transaction: string;
}

export interface DweetClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

// ----- Shape checks -----

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDweetRecord(value: unknown): value is DweetRecord {
  return (
    isRecord(value) &&
    typeof value.thing === "string" &&
    typeof value.created === "string" &&
    isRecord(value.content)
  );
}

function isPublishResponse(value: unknown): value is DweetPublishResponse {
  return isDweetRecord(value) && "transaction" in value && typeof value.transaction === "string";
}

// ----- Client -----

export class DweetClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;

  constructor(options: DweetClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Publish `content` as the latest dweet for `thing`.
   * @returns the service's record of the dweet, including its transaction id
   */
  async dweetFor(thing: string, content: Record<string, string>): Promise<DweetPublishResponse> {
    const result = await this.request(`/dweet/for/${encodeURIComponent(thing)}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(content),
    });

    if (!isPublishResponse(result)) {
      throw new Error("dweet service returned a malformed publish response");
    }
    return result;
  }

  /**
   * Fetch the latest dweet for `thing`.
   * @returns a non-empty array; the service only ever returns one element here
   */
  async getLatestDweetFor(thing: string): Promise<DweetRecord[]> {
    const result = await this.request(`/get/latest/dweet/for/${encodeURIComponent(thing)}`, {
      method: "GET",
      headers: { Accept: "application/json" },
    });

    if (!Array.isArray(result) || result.length === 0) {
      throw new Error(`no dweets found for thing ${thing}`);
    }
    if (!result.every(isDweetRecord)) {
      throw new Error("dweet service returned a malformed dweet");
    }
    return result;
  }

  /** Send one request and unwrap the `with` member of a successful envelope. */
  private async request(path: string, init: RequestInit): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new Error(`dweet service returned a non-JSON response (HTTP ${response.status})`);
    }

    if (!isRecord(body) || body.this !== "succeeded") {
      const because = isRecord(body) && typeof body.because === "string" ? body.because : undefined;
      throw new Error(`dweet service request failed (HTTP ${response.status})${because ? `: ${because}` : ""}`);
    }

    return body.with;
  }
}
