import { describe, it, expect } from "vitest";
import { decodeWav, detectNonSilent, isWav, pcmToWav, trimSilence } from "../audio.js";
import { silence, tone } from "./_factories.js";

describe("pcmToWav", () => {
  it("prepends a 44-byte PCM16 mono header", () => {
    const pcm = tone(10);
    const wav = pcmToWav(pcm, 16_000);

    expect(wav.length).toBe(44 + pcm.length);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt32LE(4)).toBe(36 + pcm.length);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16_000);
    expect(wav.readUInt32LE(28)).toBe(32_000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.readUInt32LE(40)).toBe(pcm.length);
  });
});

describe("isWav", () => {
  it("recognizes a RIFF/WAVE header", () => {
    expect(isWav(pcmToWav(Buffer.alloc(0), 16_000))).toBe(true);
  });

  it("rejects raw PCM and short buffers", () => {
    expect(isWav(tone(10))).toBe(false);
    expect(isWav(Buffer.from("RIFF"))).toBe(false);
  });
});

describe("decodeWav", () => {
  it("returns the samples and sample rate", () => {
    const pcm = tone(20, 5000, 8000);
    const decoded = decodeWav(pcmToWav(pcm, 8000));
    expect(decoded.sampleRate).toBe(8000);
    expect(decoded.pcm.equals(pcm)).toBe(true);
  });

  it("skips unknown chunks, including odd-sized ones", () => {
    const pcm = tone(10);
    const wav = pcmToWav(pcm, 16_000);
    const size = Buffer.alloc(4);
    size.writeUInt32LE(3);
    const list = Buffer.concat([Buffer.from("LIST", "ascii"), size, Buffer.from("abc"), Buffer.alloc(1)]);

    const decoded = decodeWav(Buffer.concat([wav.subarray(0, 36), list, wav.subarray(36)]));

    expect(decoded.sampleRate).toBe(16_000);
    expect(decoded.pcm.equals(pcm)).toBe(true);
  });

  it("rejects stereo audio", () => {
    const wav = pcmToWav(tone(10), 16_000);
    wav.writeUInt16LE(2, 22);
    expect(() => decodeWav(wav)).toThrow("Unsupported WAV audio: format=1 channels=2 bits=16");
  });

  it("rejects a zero sample rate", () => {
    expect(() => decodeWav(pcmToWav(tone(10), 0))).toThrow("Unsupported WAV audio: sample rate 0");
  });

  it("rejects sample rates outside 8-96 kHz", () => {
    expect(() => decodeWav(pcmToWav(tone(10), 1))).toThrow("Unsupported WAV audio: sample rate 1");
    expect(() => decodeWav(pcmToWav(tone(10), 400_000))).toThrow(
      "Unsupported WAV audio: sample rate 400000"
    );
  });

  it("rejects data without a header", () => {
    expect(() => decodeWav(tone(10))).toThrow("Unsupported WAV audio: missing RIFF/WAVE header");
  });

  it("rejects a header with no data chunk", () => {
    const wav = pcmToWav(Buffer.alloc(0), 16_000).subarray(0, 36);
    expect(() => decodeWav(wav)).toThrow("Unsupported WAV audio: no data chunk");
  });
});

describe("detectNonSilent", () => {
  it("returns no ranges for an all-zero buffer", () => {
    expect(detectNonSilent(silence(1000), 16_000)).toEqual([]);
  });

  it("returns no ranges for an empty buffer", () => {
    expect(detectNonSilent(Buffer.alloc(0), 16_000)).toEqual([]);
  });

  it("returns no ranges for a non-positive sample rate", () => {
    expect(detectNonSilent(tone(100), 0)).toEqual([]);
    expect(detectNonSilent(tone(100), -16_000)).toEqual([]);
  });

  it("returns no ranges for a non-positive frame size", () => {
    expect(detectNonSilent(tone(100), 16_000, { frameMs: 0 })).toEqual([]);
  });

  it("treats audio below -35 dBFS as silence", () => {
    // RMS 500 ≈ -36.3 dBFS
    expect(detectNonSilent(tone(1000, 500), 16_000)).toEqual([]);
  });

  it("returns the whole buffer when nothing is silent", () => {
    expect(detectNonSilent(tone(1000), 16_000)).toEqual([[0, 1000]]);
  });

  it("cuts silences of at least 500 ms", () => {
    const pcm = Buffer.concat([silence(600), tone(300), silence(600), tone(200), silence(100)]);
    expect(detectNonSilent(pcm, 16_000)).toEqual([
      [600, 900],
      [1500, 1800],
    ]);
  });

  it("keeps pauses shorter than the minimum", () => {
    const pcm = Buffer.concat([tone(200), silence(400), tone(200)]);
    expect(detectNonSilent(pcm, 16_000)).toEqual([[0, 800]]);
  });

  it("honors a custom minimum silence", () => {
    const pcm = Buffer.concat([tone(200), silence(400), tone(200)]);
    expect(detectNonSilent(pcm, 16_000, { minSilenceMs: 300 })).toEqual([
      [0, 200],
      [600, 800],
    ]);
  });
});

describe("trimSilence", () => {
  it("concatenates the non-silent parts", () => {
    const speech = tone(300);
    const pcm = Buffer.concat([silence(600), speech, silence(600)]);
    const trimmed = trimSilence(pcm, 16_000);
    expect(trimmed.equals(speech)).toBe(true);
  });

  it("keeps short trailing silence attached to speech", () => {
    const pcm = Buffer.concat([silence(600), tone(300), silence(600), tone(200), silence(100)]);
    // 300 ms + 300 ms at 32 bytes/ms
    expect(trimSilence(pcm, 16_000).length).toBe(19_200);
  });

  it("returns an empty buffer for a zero sample rate", () => {
    expect(trimSilence(tone(100), 0).length).toBe(0);
  });

  it("returns an empty buffer when nothing was spoken", () => {
    expect(trimSilence(silence(2000), 16_000).length).toBe(0);
  });
});
