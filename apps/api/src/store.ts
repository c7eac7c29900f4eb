/**
 * In-memory dweet store. Keeps only the latest dweet per thing; every new
 * dweet replaces the previous one, and everything is lost on restart.
 */

export interface StoredDweet {
  thing: string;
  /** ISO-8601 receipt time */
  created: string;
  content: Record<string, unknown>;
}

export class DweetStore {
  private readonly latest = new Map<string, StoredDweet>();

  put(dweet: StoredDweet): void {
    this.latest.set(dweet.thing, dweet);
  }

  get(thing: string): StoredDweet | undefined {
    return this.latest.get(thing);
  }

  get size(): number {
    return this.latest.size;
  }
}
