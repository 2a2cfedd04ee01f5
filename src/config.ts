// config.ts - Centralized environment variable loading.

import { z } from "zod";
import { SAMPLE_RATES } from "./constants.js";
import { CredentialMissingError, ERR_INTERNAL, formatZodErrors } from "./errors.js";
import { PERSONA_IDS, TTS_VOICES, type PersonaId, type VoiceConfig } from "./types.js";

export const DEFAULT_GEMINI_MODEL = "gemini-flash-latest";

/** Blank strings count as unset. */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema
  );
}

const optionalString = blankAsUnset(z.string().trim().optional());

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_STT_MODEL: optionalString,
  OPENAI_TTS_MODEL: optionalString,
  OPENAI_TTS_VOICE: blankAsUnset(z.enum(TTS_VOICES).default("nova")),
  VOICE_LANGUAGE: optionalString,
  VOICE_ENABLED_BY_DEFAULT: blankAsUnset(z.enum(["true", "false"]).default("false")),
  DEFAULT_PERSONA: blankAsUnset(z.enum(PERSONA_IDS).default("hana")),
  PORT: blankAsUnset(z.coerce.number().int().min(0).max(65_535).default(3000)),
  CLIENT_DIR: optionalString,
});

/** Application configuration loaded from environment variables. */
export interface AppConfig {
  geminiApiKey: string;
  model: string;
  /** Null when OPENAI_API_KEY is absent: voice features are disabled. */
  voice: VoiceConfig | null;
  voiceEnabledByDefault: boolean;
  defaultPersona: PersonaId;
  port: number;
  clientDir?: string;
}

/**
 * Load application configuration from an explicit env object.
 * Falls back to defaults for optional values.
 *
 * Throws CredentialMissingError when GEMINI_API_KEY is missing and a plain
 * Error listing every problem when a value is malformed.
 */
export function loadAppConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(ERR_INTERNAL.invalidConfig(formatZodErrors(parsed.error)));
  }
  const vars = parsed.data;

  if (!vars.GEMINI_API_KEY) {
    throw new CredentialMissingError("GEMINI_API_KEY", "llm");
  }

  const voice: VoiceConfig | null = vars.OPENAI_API_KEY
    ? {
        apiKey: vars.OPENAI_API_KEY,
        sttModel: vars.OPENAI_STT_MODEL ?? "whisper-1",
        ttsModel: vars.OPENAI_TTS_MODEL ?? "tts-1",
        voice: vars.OPENAI_TTS_VOICE,
        language: vars.VOICE_LANGUAGE ?? "en",
        sampleRate: SAMPLE_RATES.STT,
      }
    : null;

  return {
    geminiApiKey: vars.GEMINI_API_KEY,
    model: vars.GEMINI_MODEL ?? DEFAULT_GEMINI_MODEL,
    voice,
    voiceEnabledByDefault: vars.VOICE_ENABLED_BY_DEFAULT === "true",
    defaultPersona: vars.DEFAULT_PERSONA,
    port: vars.PORT,
    clientDir: vars.CLIENT_DIR,
  };
}
