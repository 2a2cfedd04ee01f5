// audio.ts - PCM16 helpers: WAV framing and silence trimming.

import { SAMPLE_RATES, VAD } from "./constants.js";
import { ERR_INTERNAL } from "./errors.js";

const BYTES_PER_SAMPLE = 2;
const MAX_AMPLITUDE = 32_768;

/** Raw mono PCM16 audio with its sample rate. */
export interface PcmAudio {
  pcm: Buffer;
  sampleRate: number;
}

/** A non-silent stretch of audio, in milliseconds from the start. */
export type TimeRange = [startMs: number, endMs: number];

export interface SilenceOptions {
  minSilenceMs?: number;
  silenceThreshDbfs?: number;
  frameMs?: number;
}

/**
 * Wrap mono/multichannel PCM16 data in a 44-byte WAV header.
 */
export function pcmToWav(pcm: Buffer, sampleRate: number, numChannels = 1): Buffer {
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // audio format (1 = PCM)
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * numChannels * BYTES_PER_SAMPLE, 28); // byte rate
  header.writeUInt16LE(numChannels * BYTES_PER_SAMPLE, 32); // block align
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

export function isWav(data: Buffer): boolean {
  return (
    data.length >= 12 &&
    data.toString("ascii", 0, 4) === "RIFF" &&
    data.toString("ascii", 8, 12) === "WAVE"
  );
}

/**
 * Extract mono PCM16 samples from a WAV container.
 * Throws on anything other than 16-bit mono PCM.
 */
export function decodeWav(data: Buffer): PcmAudio {
  if (!isWav(data)) throw new Error(ERR_INTERNAL.invalidWav("missing RIFF/WAVE header"));

  let sampleRate: number | null = null;
  let offset = 12;
  while (offset + 8 <= data.length) {
    const id = data.toString("ascii", offset, offset + 4);
    const size = data.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      const format = data.readUInt16LE(body);
      const channels = data.readUInt16LE(body + 2);
      const bits = data.readUInt16LE(body + 14);
      if (format !== 1 || channels !== 1 || bits !== 16) {
        throw new Error(
          ERR_INTERNAL.invalidWav(`format=${format} channels=${channels} bits=${bits}`)
        );
      }
      sampleRate = data.readUInt32LE(body + 4);
      if (sampleRate < SAMPLE_RATES.WAV_MIN || sampleRate > SAMPLE_RATES.WAV_MAX) {
        throw new Error(ERR_INTERNAL.invalidWav(`sample rate ${sampleRate}`));
      }
    } else if (id === "data") {
      if (sampleRate === null) throw new Error(ERR_INTERNAL.invalidWav("data before fmt chunk"));
      return { pcm: data.subarray(body, Math.min(body + size, data.length)), sampleRate };
    }

    // Chunks are word-aligned
    offset = body + size + (size % 2);
  }

  throw new Error(ERR_INTERNAL.invalidWav("no data chunk"));
}

function frameRms(pcm: Buffer, start: number, end: number): number {
  const count = (end - start) / BYTES_PER_SAMPLE;
  if (count <= 0) return 0;
  let sum = 0;
  for (let i = start; i < end; i += BYTES_PER_SAMPLE) {
    const s = pcm.readInt16LE(i);
    sum += s * s;
  }
  return Math.sqrt(sum / count);
}

/**
 * Find the non-silent ranges of a mono PCM16 buffer.
 *
 * The audio is split into fixed frames; a frame is silent when its RMS is at or
 * below the threshold. Runs of silent frames at least `minSilenceMs` long are
 * cut; everything between them is returned. Audio with no loud frame at all
 * yields no ranges, and so does a non-positive sample rate or frame size.
 */
export function detectNonSilent(
  pcm: Buffer,
  sampleRate: number,
  options: SilenceOptions = {}
): TimeRange[] {
  const minSilenceMs = options.minSilenceMs ?? VAD.MIN_SILENCE_MS;
  const threshDbfs = options.silenceThreshDbfs ?? VAD.SILENCE_THRESH_DBFS;
  const frameMs = options.frameMs ?? VAD.FRAME_MS;
  if (!(sampleRate > 0) || !(frameMs > 0)) return [];

  const bytesPerMs = (sampleRate * BYTES_PER_SAMPLE) / 1000;
  const totalSamples = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  const durationMs = Math.floor((totalSamples * 1000) / sampleRate);
  if (durationMs === 0) return [];

  const threshRms = Math.pow(10, threshDbfs / 20) * MAX_AMPLITUDE;

  const silent: boolean[] = [];
  for (let ms = 0; ms < durationMs; ms += frameMs) {
    const start = Math.floor(ms * bytesPerMs);
    const end = Math.min(Math.floor(Math.min(ms + frameMs, durationMs) * bytesPerMs), pcm.length);
    silent.push(frameRms(pcm, start - (start % 2), end - (end % 2)) <= threshRms);
  }
  if (silent.every(Boolean)) return [];

  // Silent runs long enough to cut, as [startMs, endMs)
  const cuts: TimeRange[] = [];
  let runStart: number | null = null;
  for (let i = 0; i <= silent.length; i++) {
    if (i < silent.length && silent[i]) {
      runStart ??= i;
      continue;
    }
    if (runStart !== null) {
      const startMs = runStart * frameMs;
      const endMs = Math.min(i * frameMs, durationMs);
      if (endMs - startMs >= minSilenceMs) cuts.push([startMs, endMs]);
      runStart = null;
    }
  }

  const ranges: TimeRange[] = [];
  let cursor = 0;
  for (const [start, end] of cuts) {
    if (start > cursor) ranges.push([cursor, start]);
    cursor = end;
  }
  if (cursor < durationMs) ranges.push([cursor, durationMs]);
  return ranges;
}

/** Concatenate the non-silent parts of `pcm`. Empty when nothing was spoken. */
export function trimSilence(pcm: Buffer, sampleRate: number, options?: SilenceOptions): Buffer {
  const bytesPerMs = (sampleRate * BYTES_PER_SAMPLE) / 1000;
  const pieces = detectNonSilent(pcm, sampleRate, options).map(([start, end]) => {
    const from = Math.floor(start * bytesPerMs);
    const to = Math.floor(end * bytesPerMs);
    return pcm.subarray(from - (from % 2), to - (to % 2));
  });
  return Buffer.concat(pieces);
}
