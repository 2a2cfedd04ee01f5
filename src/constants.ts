// constants.ts - Centralized constants for message types, paths, and audio settings.

/** WebSocket message types sent between server and browser. */
export const MSG = {
  // Server → Browser
  READY: "ready",
  TRANSCRIPT: "transcript",
  TURN: "turn",
  CHUNK: "chunk",
  STATE: "state",
  SPEECH: "speech",
  VOICE: "voice",
  NOTICE: "notice",
  ERROR: "error",
  PONG: "pong",

  // Browser → Server
  PING: "ping",
  SELECT_PERSONA: "select_persona",
  SET_VOICE: "set_voice",
  USER_TEXT: "user_text",
} as const;

/** HTTP and WebSocket paths. */
export const PATHS = {
  WEBSOCKET: "/session",
  HEALTH: "/health",
  PERSONAS: "/personas",
} as const;

/** Audio sample rates in Hz. */
export const SAMPLE_RATES = {
  STT: 16_000,
  /** Bounds accepted from a WAV header */
  WAV_MIN: 8_000,
  WAV_MAX: 96_000,
} as const;

/** Silence trimming applied before transcription. */
export const VAD = {
  /** Shortest run of silence (ms) that gets cut out */
  MIN_SILENCE_MS: 500,
  /** Frames at or below this loudness (dBFS) count as silent */
  SILENCE_THRESH_DBFS: -35,
  /** Analysis window (ms) */
  FRAME_MS: 10,
} as const;

/** MIME type of synthesized speech sent to the browser. */
export const SPEECH_MIME_TYPE = "audio/mpeg";
