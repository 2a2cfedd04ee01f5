// logger.ts - Process-wide pino logger and per-component children.

import pino, { type Logger } from "pino";

/**
 * Pick the log level from the environment. An unknown `LOG_LEVEL` falls back
 * to the default, which is `silent` under test and `info` otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && (requested === "silent" || Object.hasOwn(pino.levels.values, requested))) return requested;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

let root: Logger | null = null;

function rootLogger(): Logger {
  root ??= pino({ name: "talk-partner", level: resolveLogLevel() });
  return root;
}

/**
 * Child logger tagged with `component` and any extra bindings,
 * e.g. `createLogger("conversation", { session: "0123abcd" })`.
 */
export function createLogger(component: string, meta: Record<string, string> = {}): Logger {
  return rootLogger().child({ component, ...meta });
}

export type { Logger };
