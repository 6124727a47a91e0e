import type { TokenEvent } from "./types";

/**
 * Append-only log of token notifications. A mark taken before a call lets
 * the call's events be dropped again when it fails.
 */
export class EventJournal {
  private entries: TokenEvent[] = [];

  record(event: TokenEvent): void {
    this.entries.push(event);
  }

  mark(): number {
    return this.entries.length;
  }

  rollback(mark: number): void {
    this.entries.length = mark;
  }

  all(): readonly TokenEvent[] {
    return this.entries;
  }
}
