// errors.ts - Centralized error messages and the credential error type.

import type { ZodError } from "zod";

/** Format a ZodError into a flat array of human-readable strings. */
export function formatZodErrors(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Best-effort message for anything thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Messages sent to the browser (user-facing). */
export const ERR = {
  INVALID_MESSAGE: "Unrecognized message",
  BUSY: "Still waiting for the previous reply",
  TURN_FAILED: "Something went wrong. Please try again.",
  VOICE_UNAVAILABLE:
    "Voice input/output is not available because speech credentials are not configured.",
  TRANSCRIPTION_EMPTY:
    "Could not transcribe audio. Please try speaking clearer, or use text input below.",
} as const;

/** Internal messages (server-side logging / turn construction). All entries are functions. */
export const ERR_INTERNAL = {
  credentialMissing: (name: string) => `${name} environment variable is required`,
  invalidConfig: (issues: string[]) => `Invalid configuration: ${issues.join("; ")}`,
  modelRequestFailed: (detail: string) =>
    `An error occurred with Gemini: ${detail}. Please try again.`,
  transcriptionFailed: () => "Speech-to-text request failed",
  synthesisFailed: () => "Text-to-speech request failed",
  invalidWav: (reason: string) => `Unsupported WAV audio: ${reason}`,
} as const;

/** Which capability a missing credential gates. The LLM is fatal, voice is degraded-mode. */
export type Capability = "llm" | "voice";

export class CredentialMissingError extends Error {
  readonly credential: string;
  readonly capability: Capability;

  constructor(credential: string, capability: Capability) {
    super(ERR_INTERNAL.credentialMissing(credential));
    this.name = "CredentialMissingError";
    this.credential = credential;
    this.capability = capability;
  }
}
