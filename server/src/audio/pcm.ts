import { DecodeError } from '../errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a base64 string of little-endian 16-bit PCM samples
 * @throws DecodeError on malformed base64 or a byte count that is not a whole number of samples
 */
export function decodeBase64Pcm16(audio: unknown): Int16Array {
  if (typeof audio !== 'string' || audio.length === 0) {
    throw new DecodeError('Audio payload must be a non-empty base64 string');
  }
  if (audio.length % 4 !== 0 || !BASE64_PATTERN.test(audio)) {
    throw new DecodeError('Audio payload is not valid base64');
  }

  return pcm16FromBuffer(Buffer.from(audio, 'base64'));
}

/**
 * Read little-endian 16-bit samples from raw bytes
 */
export function pcm16FromBuffer(bytes: Buffer): Int16Array {
  if (bytes.length === 0) {
    throw new DecodeError('Audio payload is empty');
  }
  if (bytes.length % 2 !== 0) {
    throw new DecodeError(`Audio payload has ${bytes.length} bytes, expected 16-bit samples`);
  }

  const samples = new Int16Array(bytes.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return samples;
}

/**
 * Convert PCM16 to float32 in [-1, 1], applying gain and clipping
 */
export function pcm16ToFloat32(samples: Int16Array, gain: number = 1): Float32Array {
  const out = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const value = (samples[i] / 32768) * gain;
    out[i] = value > 1 ? 1 : value < -1 ? -1 : value;
  }
  return out;
}

/**
 * Encode float32 samples as base64 little-endian PCM16 (client side of the protocol)
 */
export function float32ToBase64Pcm16(samples: Float32Array): string {
  const bytes = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const clipped = Math.max(-1, Math.min(1, samples[i]));
    bytes.writeInt16LE(Math.round(clipped < 0 ? clipped * 32768 : clipped * 32767), i * 2);
  }
  return bytes.toString('base64');
}

/**
 * Root mean square level of a window
 */
export function rms(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}
