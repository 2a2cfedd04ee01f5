// transcript.ts - Append-only transcript of one session's turns.

import { TurnSchema, type Turn } from "./types.js";

/**
 * Ordered log of chat turns; what the UI displays.
 *
 * Turns are validated and frozen on append. The only other mutation is
 * `reset`, used on session start and persona switch.
 */
export class TranscriptStore {
  private turns: Turn[] = [];

  /** Throws a ZodError on malformed input. Empty content is valid. */
  append(turn: Turn): void {
    const parsed = TurnSchema.parse(turn);
    this.turns.push(Object.freeze({ ...parsed }));
  }

  /** Snapshot in append order; later appends do not affect it. */
  all(): readonly Turn[] {
    return this.turns.slice();
  }

  /** Clear all turns, then append `seed` if given. */
  reset(seed?: Turn): void {
    const next: Turn[] = [];
    if (seed) {
      next.push(Object.freeze({ ...TurnSchema.parse(seed) }));
    }
    this.turns = next;
  }

  get size(): number {
    return this.turns.length;
  }
}
