// llm.ts - LLM client (Google Gemini chat, streamed).

import { GoogleGenAI, type Content } from "@google/genai";
import type { HistoryEntry } from "./types.js";

/** One logical chat; created fresh for every turn. */
export interface ChatSession {
  /** Stream the reply to `text` as text fragments in emission order. */
  send(text: string): AsyncIterable<string>;
}

export interface LlmClient {
  /** Start a chat seeded with `history`. Nothing is kept server-side between calls. */
  startChat(history: HistoryEntry[], systemInstruction: string): ChatSession;
}

/**
 * Sanitize outgoing history:
 * - Replace empty text parts with "..." (the API rejects empty text parts)
 */
export function toContents(history: HistoryEntry[]): Content[] {
  return history.map((entry) => ({
    role: entry.role,
    parts: entry.parts.map((part) => ({ text: part.text.trim() ? part.text : "..." })),
  }));
}

/**
 * Gemini-backed LLM client.
 *
 * Usage:
 *   const llm = new GeminiClient(apiKey, "gemini-flash-latest");
 *   for await (const chunk of llm.startChat(history, instruction).send("Hello")) { ... }
 */
export class GeminiClient implements LlmClient {
  private ai: GoogleGenAI;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.ai = new GoogleGenAI({ apiKey });
    this.model = model;
  }

  startChat(history: HistoryEntry[], systemInstruction: string): ChatSession {
    const chat = this.ai.chats.create({
      model: this.model,
      config: { systemInstruction },
      history: toContents(history),
    });

    return {
      async *send(text: string): AsyncIterable<string> {
        const stream = await chat.sendMessageStream({ message: text });
        for await (const chunk of stream) {
          const piece = chunk.text;
          if (piece) yield piece;
        }
      },
    };
  }
}
