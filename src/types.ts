// types.ts - All TypeScript interfaces and message types.

import { z } from "zod";

// ── Personas ───────────────────────────────────────────────────────

/** Closed set of persona ids. Order is the order shown to users. */
export const PERSONA_IDS = ["hana", "mark", "ms-brown"] as const;

export type PersonaId = (typeof PERSONA_IDS)[number];

/** A character/level profile controlling the system instruction given to the LLM. */
export interface Persona {
  id: PersonaId;
  /** Display name (e.g., "Ms. Brown") */
  label: string;
  /** System instruction for the LLM */
  systemInstruction: string;
  /** First line the persona says when a conversation starts */
  greeting: string;
}

// ── Transcript ─────────────────────────────────────────────────────

export const TURN_ROLES = ["user", "assistant"] as const;
export const TURN_KINDS = ["normal", "system_notice"] as const;

export type TurnRole = (typeof TURN_ROLES)[number];

/**
 * `system_notice` marks synthetic turns (greetings, persona switch announcements):
 * shown in the transcript, never sent to the model.
 */
export type TurnKind = (typeof TURN_KINDS)[number];

/** One message in the conversation. Immutable once appended. */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly kind: TurnKind;
}

export const TurnSchema = z.object({
  role: z.enum(TURN_ROLES),
  content: z.string(),
  kind: z.enum(TURN_KINDS),
});

/** Conversation controller states. */
export type ConversationState = "idle" | "awaiting_response";

// ── LLM ────────────────────────────────────────────────────────────

/** A turn in the model-facing history (Gemini content format). */
export interface HistoryEntry {
  role: "user" | "model";
  parts: { text: string }[];
}

// ── Voice ──────────────────────────────────────────────────────────

/** Voices accepted by the OpenAI speech endpoint. */
export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type TtsVoice = (typeof TTS_VOICES)[number];

/** Configuration for the OpenAI-backed voice bridge. */
export interface VoiceConfig {
  apiKey: string;
  /** Speech-to-text model (e.g., "whisper-1") */
  sttModel: string;
  /** Text-to-speech model (e.g., "tts-1") */
  ttsModel: string;
  voice: TtsVoice;
  /** ISO-639-1 language hint for transcription */
  language: string;
  /** Sample rate (Hz) of incoming PCM16 audio */
  sampleRate: number;
}

// ── Zod Schemas for incoming messages ──────────────────────────────

/** Zod schema for JSON messages from the browser. */
export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("select_persona"), personaId: z.enum(PERSONA_IDS) }),
  z.object({ type: z.literal("set_voice"), enabled: z.boolean() }),
  z.object({ type: z.literal("user_text"), text: z.string() }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ── WebSocket Protocol Messages (server → browser) ─────────────────

/** Persona entry advertised to the browser. */
export interface PersonaOption {
  id: PersonaId;
  label: string;
}

/** Sent once the session exists. */
export interface ReadyMessage {
  type: "ready";
  personas: PersonaOption[];
  personaId: PersonaId;
  voiceAvailable: boolean;
  voiceEnabled: boolean;
  /** Sample rate the browser must use for audio frames */
  sampleRate: number;
}

/** Full transcript snapshot (session start and persona switch). */
export interface TranscriptMessage {
  type: "transcript";
  personaId: PersonaId;
  turns: Turn[];
}

/** A turn appended to the transcript. */
export interface TurnMessage {
  type: "turn";
  turn: Turn;
}

/** One streamed fragment of the assistant reply. */
export interface ChunkMessage {
  type: "chunk";
  text: string;
  accumulated: string;
}

/** Controller state change. */
export interface StateMessage {
  type: "state";
  state: ConversationState;
}

/** Announces the binary audio frame that follows. */
export interface SpeechMessage {
  type: "speech";
  mimeType: string;
  text: string;
}

/** Voice I/O toggle result. */
export interface VoiceMessage {
  type: "voice";
  enabled: boolean;
}

/** Informational message for the user (not part of the transcript). */
export interface NoticeMessage {
  type: "notice";
  message: string;
}

/** Error notification. */
export interface ErrorMessage {
  type: "error";
  message: string;
}

export interface PongMessage {
  type: "pong";
}

/** Union of all server → browser JSON messages. */
export type ServerMessage =
  | ReadyMessage
  | TranscriptMessage
  | TurnMessage
  | ChunkMessage
  | StateMessage
  | SpeechMessage
  | VoiceMessage
  | NoticeMessage
  | ErrorMessage
  | PongMessage;
