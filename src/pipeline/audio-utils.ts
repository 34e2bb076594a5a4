/**
 * Audio format helpers: PCM16 <-> WAV, durations, fallback tone.
 * All PCM here is 16-bit little-endian; mono unless a WAV header says otherwise.
 */

export const WAV_HEADER_BYTES = 44;
export const PCM16_SAMPLE_WIDTH = 2;

export interface WavInfo {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  /** Byte offset of the first sample. */
  dataOffset: number;
  /** Length of the data chunk in bytes. */
  dataBytes: number;
  durationMs: number;
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const fileSize = WAV_HEADER_BYTES + dataSize;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

export function isWav(buf: Buffer): boolean {
  return buf.length >= 12 && buf.toString("ascii", 0, 4) === "RIFF" && buf.toString("ascii", 8, 12) === "WAVE";
}

/**
 * Walk the RIFF chunks for "fmt " and "data". Returns null when the buffer is not a PCM WAV header.
 * Only the header needs to be present; `dataBytes` comes from the data chunk size field.
 */
export function parseWavHeader(buf: Buffer): WavInfo | null {
  if (!isWav(buf)) return null;
  let offset = 12;
  let sampleRate = 0;
  let channels = 0;
  let bitsPerSample = 0;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt ") {
      if (body + 16 > buf.length) return null;
      channels = buf.readUInt16LE(body + 2);
      sampleRate = buf.readUInt32LE(body + 4);
      bitsPerSample = buf.readUInt16LE(body + 14);
    } else if (id === "data") {
      if (!sampleRate || !channels || !bitsPerSample) return null;
      const bytesPerSecond = sampleRate * channels * (bitsPerSample / 8);
      return {
        sampleRate,
        channels,
        bitsPerSample,
        dataOffset: body,
        dataBytes: size,
        durationMs: Math.round((size / bytesPerSecond) * 1000),
      };
    }
    // Chunks are word-aligned.
    offset = body + size + (size % 2);
  }
  return null;
}

/** Duration of mono PCM16 audio in seconds: samples / rate. */
export function pcmDurationSec(byteCount: number, sampleRateHz: number, channels = 1): number {
  const sampleCount = byteCount / (PCM16_SAMPLE_WIDTH * channels);
  return sampleCount / sampleRateHz;
}

export function pcmDurationMs(byteCount: number, sampleRateHz: number): number {
  return pcmDurationSec(byteCount, sampleRateHz) * 1000;
}

/** True when `byteCount` covers whole 16-bit samples. */
export function isPcm16Aligned(byteCount: number): boolean {
  return byteCount % PCM16_SAMPLE_WIDTH === 0;
}

/**
 * 440 Hz sine as a WAV file, played when synthesis yields nothing.
 * Length follows the reply: 50 ms per character, clamped to 1..5 s.
 */
export function generateFallbackTone(text: string, sampleRateHz = 16000): Buffer {
  const durationSec = Math.min(Math.max(text.length * 0.05, 1), 5);
  const numSamples = Math.floor(durationSec * sampleRateHz);
  const amplitude = 8000;
  const frequency = 440;
  const pcm = Buffer.alloc(numSamples * PCM16_SAMPLE_WIDTH);
  for (let i = 0; i < numSamples; i++) {
    const value = Math.trunc(amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRateHz));
    pcm.writeInt16LE(value, i * PCM16_SAMPLE_WIDTH);
  }
  return pcmToWav(pcm, sampleRateHz);
}
