// secrets.ts - Secrets backed by a JSON file, layered under the environment.
//
// File format:
// {
//   "GEMINI_API_KEY": "...",
//   "OPENAI_API_KEY": "..."
// }

import { readFileSync } from "fs";
import { z } from "zod";

const SecretsFileSchema = z.record(z.string());

export type Secrets = Readonly<Record<string, string>>;

/**
 * Load a secrets file as a flat map of name → value.
 * Throws on missing file, invalid JSON, or non-string values.
 */
export function loadSecretsFile(filePath: string): Secrets {
  const raw = readFileSync(filePath, "utf-8");
  return SecretsFileSchema.parse(JSON.parse(raw));
}

/** Environment variables win over file secrets. */
export function mergeSecrets(
  secrets: Secrets,
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  const merged: Record<string, string | undefined> = { ...secrets };
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) merged[name] = value;
  }
  return merged;
}
