import { describe, it, expect, vi, beforeEach } from "vitest";

// Use vi.hoisted so these are available in the vi.mock factory
const mocks = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return {
    clientOptions,
    transcriptionsCreate: vi.fn(),
    speechCreate: vi.fn(),
    toFile: vi.fn(async (data: Buffer, name: string, options: { type: string }) => ({
      data,
      name,
      options,
    })),
  };
});

vi.mock("openai", () => ({
  default: class {
    audio = {
      transcriptions: { create: mocks.transcriptionsCreate },
      speech: { create: mocks.speechCreate },
    };

    constructor(options: unknown) {
      mocks.clientOptions.push(options);
    }
  },
  toFile: mocks.toFile,
}));

import { decodeWav, isWav, pcmToWav } from "../audio.js";
import { OpenAiVoiceBridge } from "../voice.js";
import { createTestVoiceConfig, silence, tone } from "./_factories.js";

/** The WAV bytes handed to the upload helper on its last call. */
function uploadedWav(): Buffer {
  const call = mocks.toFile.mock.lastCall;
  if (!call) throw new Error("toFile was not called");
  return call[0];
}

beforeEach(() => {
  mocks.clientOptions.length = 0;
  mocks.transcriptionsCreate.mockReset();
  mocks.speechCreate.mockReset();
  mocks.toFile.mockClear();
});

describe("OpenAiVoiceBridge", () => {
  it("creates the client with the configured key", () => {
    new OpenAiVoiceBridge(createTestVoiceConfig());
    expect(mocks.clientOptions).toEqual([{ apiKey: "test-openai-key" }]);
  });
});

describe("transcribe", () => {
  it("returns an empty string for silent audio without calling the API", async () => {
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.transcribe(silence(1000))).toBe("");
    expect(mocks.transcriptionsCreate).not.toHaveBeenCalled();
  });

  it("uploads speech as WAV and returns the trimmed text", async () => {
    mocks.transcriptionsCreate.mockResolvedValue({ text: " I like soccer. \n" });
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.transcribe(tone(1000))).toBe("I like soccer.");

    const wav = uploadedWav();
    expect(isWav(wav)).toBe(true);
    expect(wav.length).toBe(44 + 32_000);
    expect(mocks.toFile).toHaveBeenCalledWith(wav, "speech.wav", { type: "audio/wav" });
    expect(mocks.transcriptionsCreate).toHaveBeenCalledWith({
      model: "whisper-1",
      file: { data: wav, name: "speech.wav", options: { type: "audio/wav" } },
      language: "en",
    });
  });

  it("trims leading and trailing silence before upload", async () => {
    mocks.transcriptionsCreate.mockResolvedValue({ text: "Hello" });
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());
    const speech = tone(300);

    await bridge.transcribe(Buffer.concat([silence(600), speech, silence(600)]));

    expect(decodeWav(uploadedWav()).pcm.equals(speech)).toBe(true);
  });

  it("accepts WAV input at its own sample rate", async () => {
    mocks.transcriptionsCreate.mockResolvedValue({ text: "Hello" });
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    await bridge.transcribe(pcmToWav(tone(500, 10_000, 8000), 8000));

    const decoded = decodeWav(uploadedWav());
    expect(decoded.sampleRate).toBe(8000);
    expect(decoded.pcm.length).toBe(8000);
  });

  it("uses the configured model and language", async () => {
    mocks.transcriptionsCreate.mockResolvedValue({ text: "Bonjour" });
    const bridge = new OpenAiVoiceBridge(
      createTestVoiceConfig({ sttModel: "whisper-test", language: "fr" })
    );

    await bridge.transcribe(tone(200));

    expect(mocks.transcriptionsCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: "whisper-test", language: "fr" })
    );
  });

  it("returns an empty string for unsupported WAV", async () => {
    const wav = pcmToWav(tone(200), 16_000);
    wav.writeUInt16LE(2, 22);
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.transcribe(wav)).toBe("");
    expect(mocks.transcriptionsCreate).not.toHaveBeenCalled();
  });

  it("returns an empty string for a WAV header with a zero sample rate", async () => {
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.transcribe(pcmToWav(Buffer.alloc(3200, 1), 0))).toBe("");
    expect(mocks.toFile).not.toHaveBeenCalled();
    expect(mocks.transcriptionsCreate).not.toHaveBeenCalled();
  });

  it("returns an empty string when the request fails", async () => {
    mocks.transcriptionsCreate.mockRejectedValue(new Error("network down"));
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.transcribe(tone(200))).toBe("");
  });
});

describe("synthesize", () => {
  it("requests MP3 speech for the cleaned text", async () => {
    mocks.speechCreate.mockResolvedValue({
      arrayBuffer: async () => new Uint8Array([1, 2, 3]).buffer,
    });
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig({ voice: "shimmer" }));

    const audio = await bridge.synthesize("**Hello** world");

    expect(audio).toEqual(Buffer.from([1, 2, 3]));
    expect(mocks.speechCreate).toHaveBeenCalledWith({
      model: "tts-1",
      voice: "shimmer",
      input: "Hello world",
      response_format: "mp3",
    });
  });

  it("returns null when nothing speakable is left", async () => {
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.synthesize("```\ncode\n```")).toBeNull();
    expect(mocks.speechCreate).not.toHaveBeenCalled();
  });

  it("returns null when the request fails", async () => {
    mocks.speechCreate.mockRejectedValue(new Error("rate limited"));
    const bridge = new OpenAiVoiceBridge(createTestVoiceConfig());

    expect(await bridge.synthesize("Hello")).toBeNull();
  });
});
