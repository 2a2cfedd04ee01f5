// voice.ts - Voice bridge: speech-to-text and text-to-speech via OpenAI.

import OpenAI, { toFile } from "openai";
import { decodeWav, isWav, pcmToWav, trimSilence, type PcmAudio } from "./audio.js";
import { ERR_INTERNAL } from "./errors.js";
import { createLogger } from "./logger.js";
import type { VoiceConfig } from "./types.js";
import { normalizeVoiceText } from "./voice-cleaner.js";

const log = createLogger("voice");

/**
 * Speech capability used by the conversation controller.
 * Both calls fail soft: errors are logged here and never thrown.
 */
export interface VoiceBridge {
  /** Returns "" when nothing was said or the request failed. */
  transcribe(audio: Buffer): Promise<string>;
  /** Returns encoded speech, or null when there is nothing to play. */
  synthesize(text: string): Promise<Buffer | null>;
}

export class OpenAiVoiceBridge implements VoiceBridge {
  private client: OpenAI;
  private config: VoiceConfig;

  constructor(config: VoiceConfig) {
    this.config = config;
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audio: Buffer): Promise<string> {
    let input: PcmAudio;
    try {
      input = isWav(audio) ? decodeWav(audio) : { pcm: audio, sampleRate: this.config.sampleRate };
    } catch (err) {
      log.warn({ err }, "Rejected audio input");
      return "";
    }

    const trimmed = trimSilence(input.pcm, input.sampleRate);
    if (trimmed.length === 0) {
      log.info({ bytes: audio.length }, "No substantial speech detected after trimming");
      return "";
    }
    log.debug(
      { originalBytes: input.pcm.length, trimmedBytes: trimmed.length },
      "Trimmed silence"
    );

    try {
      const file = await toFile(pcmToWav(trimmed, input.sampleRate), "speech.wav", {
        type: "audio/wav",
      });
      const result = await this.client.audio.transcriptions.create({
        model: this.config.sttModel,
        file,
        language: this.config.language,
      });
      return result.text.trim();
    } catch (err) {
      log.error({ err }, ERR_INTERNAL.transcriptionFailed());
      return "";
    }
  }

  async synthesize(text: string): Promise<Buffer | null> {
    const cleaned = normalizeVoiceText(text);
    if (!cleaned) return null;

    try {
      const response = await this.client.audio.speech.create({
        model: this.config.ttsModel,
        voice: this.config.voice,
        input: cleaned,
        response_format: "mp3",
      });
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      log.error({ err }, ERR_INTERNAL.synthesisFailed());
      return null;
    }
  }
}
