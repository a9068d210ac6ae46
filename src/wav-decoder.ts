// Presentation Analyzer - WAV Decoder
// RIFF/WAVE, 16-bit PCM only. Channels are averaged to mono and samples are
// normalized to [-1, 1].

import { InputValidationError } from "./errors.js";

const PCM_FORMAT = 1;
const EXTENSIBLE_FORMAT = 0xfffe;

export interface DecodedWav {
  samples: Float32Array;
  sampleRate: number;
  channels: number;
  durationSec: number;
}

interface FormatChunk {
  format: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export function decodeWav(buf: Buffer): DecodedWav {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new InputValidationError("Unreadable audio: expected a RIFF/WAVE file");
  }

  let fmt: FormatChunk | null = null;
  let data: Buffer | null = null;

  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;
    const end = Math.min(body + size, buf.length);

    if (id === "fmt " && size >= 16) {
      if (end - body < 16) {
        throw new InputValidationError("Unreadable audio: truncated fmt chunk");
      }
      fmt = {
        format: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      data = buf.subarray(body, end);
    }

    // Chunks are word-aligned
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new InputValidationError("Unreadable audio: missing fmt chunk");
  if (!data) throw new InputValidationError("Unreadable audio: missing data chunk");
  if ((fmt.format !== PCM_FORMAT && fmt.format !== EXTENSIBLE_FORMAT) || fmt.bitsPerSample !== 16) {
    throw new InputValidationError(
      `Unsupported audio encoding: format ${fmt.format}, ${fmt.bitsPerSample}-bit (expected 16-bit PCM)`,
    );
  }
  if (fmt.channels < 1 || fmt.sampleRate <= 0) {
    throw new InputValidationError("Unreadable audio: invalid channel count or sample rate");
  }

  const frameBytes = 2 * fmt.channels;
  const frames = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frames);
  for (let i = 0; i < frames; i++) {
    let sum = 0;
    for (let c = 0; c < fmt.channels; c++) {
      sum += data.readInt16LE(i * frameBytes + c * 2);
    }
    samples[i] = sum / fmt.channels / 32768;
  }

  return {
    samples,
    sampleRate: fmt.sampleRate,
    channels: fmt.channels,
    durationSec: frames / fmt.sampleRate,
  };
}

/** Encodes mono samples in [-1, 1] as a 16-bit PCM WAV file. */
export function encodeWav(samples: ArrayLike<number>, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buf = Buffer.alloc(44 + dataBytes);
  buf.write("RIFF", 0, "ascii");
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write("WAVE", 8, "ascii");
  buf.write("fmt ", 12, "ascii");
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(PCM_FORMAT, 20);
  buf.writeUInt16LE(1, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28);
  buf.writeUInt16LE(2, 32);
  buf.writeUInt16LE(16, 34);
  buf.write("data", 36, "ascii");
  buf.writeUInt32LE(dataBytes, 40);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    buf.writeInt16LE(Math.round(clamped * 32767), 44 + i * 2);
  }
  return buf;
}
