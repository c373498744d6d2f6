// ─── WAV Reader ─────────────────────────────────────────────────────────────
//
// Walks the RIFF chunks and converts PCM / IEEE float samples to Float32
// in [-1, 1]. Integer formats are divided by their full-scale magnitude.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { ContainerParseError, UnsupportedFormatError, wrapIoError } from "../errors.js";
import type { WavData } from "./types.js";

const FORMAT_PCM = 0x0001;
const FORMAT_IEEE_FLOAT = 0x0003;
const FORMAT_EXTENSIBLE = 0xfffe;

interface FmtChunk {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

/**
 * Decode WAV file bytes.
 *
 * @throws ContainerParseError on a malformed RIFF structure.
 * @throws UnsupportedFormatError on sample formats other than int16/24/32 and float32.
 */
export function decodeWav(bytes: Uint8Array, source?: string): WavData {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const fail = (reason: string): never => {
    const where = source ? ` (${source})` : "";
    throw new ContainerParseError("wav", `WAV parsing error${where}: ${reason}`, source);
  };

  if (view.byteLength < 12 || fourCC(view, 0) !== "RIFF" || fourCC(view, 8) !== "WAVE") {
    fail("missing RIFF/WAVE header");
  }

  let fmt: FmtChunk | null = null;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;

  while (offset + 8 <= view.byteLength) {
    const id = fourCC(view, offset);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (id === "fmt ") {
      if (size < 16 || body + size > view.byteLength) fail("truncated fmt chunk");
      fmt = readFmt(view, body, size);
    } else if (id === "data") {
      dataOffset = body;
      // Some writers leave the size unset or too large; clamp to what is there
      dataSize = Math.min(size, view.byteLength - body);
    }
    if (fmt && dataOffset >= 0) break;
    offset = body + size + (size % 2);
  }

  if (!fmt) return fail("missing fmt chunk");
  if (dataOffset < 0) return fail("missing data chunk");
  if (fmt.channels === 0) return fail("fmt chunk declares zero channels");
  if (fmt.sampleRate === 0) return fail("fmt chunk declares a zero sample rate");

  const read = sampleReader(fmt);
  const bytesPerSample = fmt.bitsPerSample / 8;
  const frameBytes = bytesPerSample * fmt.channels;
  const frames = Math.floor(dataSize / frameBytes);
  const samples = new Float32Array(frames * fmt.channels);

  for (let i = 0; i < samples.length; i++) {
    samples[i] = read(view, dataOffset + i * bytesPerSample);
  }

  return { samples, sampleRate: fmt.sampleRate, channels: fmt.channels };
}

/** Read and decode a WAV file. Filesystem failures surface as IoError. */
export async function readWavFile(path: string): Promise<WavData> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw wrapIoError(err, path, "WAV file");
  }
  return decodeWav(bytes, path);
}

/** Duration in seconds. */
export function wavDuration(wav: WavData): number {
  return frameCount(wav) / wav.sampleRate;
}

/** Samples per channel. */
export function frameCount(wav: WavData): number {
  return Math.floor(wav.samples.length / wav.channels);
}

// ─── Internal ────────────────────────────────────────────────────────────────

function fourCC(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset), view.getUint8(offset + 1),
    view.getUint8(offset + 2), view.getUint8(offset + 3),
  );
}

function readFmt(view: DataView, body: number, size: number): FmtChunk {
  let formatTag = view.getUint16(body, true);
  const channels = view.getUint16(body + 2, true);
  const sampleRate = view.getUint32(body + 4, true);
  const bitsPerSample = view.getUint16(body + 14, true);

  // WAVE_FORMAT_EXTENSIBLE: the real tag is the first two bytes of the subformat GUID
  if (formatTag === FORMAT_EXTENSIBLE && size >= 40) {
    formatTag = view.getUint16(body + 24, true);
  }

  return { formatTag, channels, sampleRate, bitsPerSample };
}

type SampleReader = (view: DataView, offset: number) => number;

function sampleReader(fmt: FmtChunk): SampleReader {
  if (fmt.formatTag === FORMAT_IEEE_FLOAT && fmt.bitsPerSample === 32) {
    return (view, offset) => view.getFloat32(offset, true);
  }
  if (fmt.formatTag === FORMAT_PCM) {
    switch (fmt.bitsPerSample) {
      case 16:
        return (view, offset) => view.getInt16(offset, true) / 32768;
      case 24:
        return (view, offset) => readInt24(view, offset) / 8388608;
      case 32:
        return (view, offset) => view.getInt32(offset, true) / 2147483648;
    }
  }

  const kind = fmt.formatTag === FORMAT_IEEE_FLOAT ? "Float" : fmt.formatTag === FORMAT_PCM ? "Int" : `format tag 0x${fmt.formatTag.toString(16)}`;
  throw new UnsupportedFormatError("wav", `${kind} ${fmt.bitsPerSample}-bit`);
}

function readInt24(view: DataView, offset: number): number {
  const value = view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getUint8(offset + 2) << 16);
  return value & 0x800000 ? value - 0x1000000 : value;
}
