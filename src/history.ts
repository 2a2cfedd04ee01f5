// history.ts - Derive the model-facing history from a transcript.

import type { HistoryEntry, Turn } from "./types.js";

/**
 * Map transcript turns to Gemini history entries.
 *
 * `system_notice` turns are dropped; everything else keeps its order.
 * Assistant error turns are `normal` and therefore kept.
 */
export function projectHistory(turns: readonly Turn[]): HistoryEntry[] {
  const history: HistoryEntry[] = [];
  for (const turn of turns) {
    if (turn.kind === "system_notice") continue;
    history.push({
      role: turn.role === "user" ? "user" : "model",
      parts: [{ text: turn.content }],
    });
  }
  return history;
}
