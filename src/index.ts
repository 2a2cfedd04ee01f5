// index.ts - Entry point. Loads configuration and starts the server.

import { loadAppConfig, type AppConfig } from "./config.js";
import { ConversationController } from "./conversation.js";
import { CredentialMissingError, describeError } from "./errors.js";
import { GeminiClient } from "./llm.js";
import { createLogger } from "./logger.js";
import { loadSecretsFile, mergeSecrets } from "./secrets.js";
import { startServer } from "./server.js";
import { OpenAiVoiceBridge } from "./voice.js";

const log = createLogger("main");

function readConfig(): AppConfig {
  const secretsFile = process.env.SECRETS_FILE?.trim();
  const env = secretsFile ? mergeSecrets(loadSecretsFile(secretsFile), process.env) : process.env;
  return loadAppConfig(env);
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = readConfig();
  } catch (err) {
    if (err instanceof CredentialMissingError) {
      log.fatal({ credential: err.credential }, err.message);
    } else {
      log.fatal({ err }, describeError(err));
    }
    process.exit(1);
  }

  if (!config.voice) {
    log.warn("OPENAI_API_KEY is not set; voice input/output is disabled");
  }

  const controller = new ConversationController({
    llm: new GeminiClient(config.geminiApiKey, config.model),
    voice: config.voice ? new OpenAiVoiceBridge(config.voice) : null,
  });

  await startServer({
    port: config.port,
    controller,
    defaultPersona: config.defaultPersona,
    voiceEnabledByDefault: config.voiceEnabledByDefault,
    clientDir: config.clientDir,
  });
}

main().catch((err: unknown) => {
  log.fatal({ err }, "Server failed to start");
  process.exit(1);
});
