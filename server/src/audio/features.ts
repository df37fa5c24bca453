/**
 * Feature Extractor
 * One analysis window -> log-mel spectrogram normalized to [0, 1]
 *
 * Framing is centered (reflect padding of nFft/2 on both sides), so a window of
 * N samples with hop H yields 1 + floor(N / H) frames; H is chosen so that this
 * equals the configured number of time frames.
 */

import Meyda from 'meyda';
import type { FeatureConfig, FeatureTensor } from '../types/index.js';
import { InvalidWindowLength } from '../errors.js';

const AMIN = 1e-10;
const TOP_DB = 80;
const NORM_EPSILON = 1e-8;

// Slaney mel scale: linear below 1 kHz, logarithmic above
const F_SP = 200 / 3;
const MIN_LOG_HZ = 1000;
const MIN_LOG_MEL = MIN_LOG_HZ / F_SP;
const LOG_STEP = Math.log(6.4) / 27;

export function hzToMel(hz: number): number {
  return hz < MIN_LOG_HZ ? hz / F_SP : MIN_LOG_MEL + Math.log(hz / MIN_LOG_HZ) / LOG_STEP;
}

export function melToHz(mel: number): number {
  return mel < MIN_LOG_MEL ? mel * F_SP : MIN_LOG_HZ * Math.exp(LOG_STEP * (mel - MIN_LOG_MEL));
}

/**
 * Triangular, area-normalized mel filters over `bins` FFT bins
 */
export function createMelFilterBank(
  melBands: number,
  nFft: number,
  sampleRate: number,
  fMax: number,
  bins: number = nFft / 2
): Float32Array[] {
  const melMin = hzToMel(0);
  const melMax = hzToMel(fMax);
  const edges: number[] = [];
  for (let i = 0; i < melBands + 2; i++) {
    edges.push(melToHz(melMin + ((melMax - melMin) * i) / (melBands + 1)));
  }

  const filters: Float32Array[] = [];
  for (let m = 0; m < melBands; m++) {
    const lower = edges[m];
    const center = edges[m + 1];
    const upper = edges[m + 2];
    const norm = 2 / (upper - lower);
    const filter = new Float32Array(bins);

    for (let k = 0; k < bins; k++) {
      const freq = (k * sampleRate) / nFft;
      const rising = (freq - lower) / (center - lower);
      const falling = (upper - freq) / (upper - center);
      const weight = Math.max(0, Math.min(rising, falling));
      filter[k] = weight * norm;
    }
    filters.push(filter);
  }
  return filters;
}

function reflectIndex(index: number, length: number): number {
  if (length === 1) return 0;
  const period = 2 * (length - 1);
  let i = Math.abs(index) % period;
  if (i >= length) i = period - i;
  return i;
}

export class FeatureExtractor {
  readonly hopLength: number;
  private readonly filters: Float32Array[];

  constructor(readonly config: FeatureConfig) {
    if (config.timeFrames < 2) {
      throw new RangeError('timeFrames must be at least 2');
    }
    this.hopLength = Math.floor(config.windowSamples / (config.timeFrames - 1));
    if (this.hopLength < 1) {
      throw new RangeError(`Window of ${config.windowSamples} samples is too short for ${config.timeFrames} frames`);
    }
    this.filters = createMelFilterBank(config.melBands, config.nFft, config.sampleRate, config.fMax);
  }

  /**
   * @throws InvalidWindowLength when the window is not exactly windowSamples long
   */
  extract(window: Float32Array): FeatureTensor {
    const { windowSamples, nFft, melBands, timeFrames } = this.config;
    if (window.length !== windowSamples) {
      throw new InvalidWindowLength(windowSamples, window.length);
    }

    const mel = new Float64Array(melBands * timeFrames);
    const half = nFft / 2;
    const frame = new Float32Array(nFft);

    for (let t = 0; t < timeFrames; t++) {
      const start = t * this.hopLength - half;
      for (let i = 0; i < nFft; i++) {
        frame[i] = window[reflectIndex(start + i, windowSamples)];
      }

      const spectrum = this.powerSpectrum(frame);
      for (let m = 0; m < melBands; m++) {
        const filter = this.filters[m];
        let energy = 0;
        for (let k = 0; k < filter.length; k++) {
          if (filter[k] !== 0) energy += filter[k] * spectrum[k];
        }
        mel[m * timeFrames + t] = energy;
      }
    }

    return { data: this.toNormalizedDb(mel), melBands, timeFrames };
  }

  private powerSpectrum(frame: Float32Array): ArrayLike<number> {
    Meyda.bufferSize = this.config.nFft;
    Meyda.sampleRate = this.config.sampleRate;
    Meyda.windowingFunction = 'hanning';

    const features = Meyda.extract(['powerSpectrum'], frame.slice());
    const spectrum: ArrayLike<number> | undefined = features?.powerSpectrum;
    if (!spectrum) {
      throw new Error('Meyda returned no power spectrum');
    }
    return spectrum;
  }

  // power -> dB relative to the loudest cell (80 dB floor) -> min-max [0, 1]
  private toNormalizedDb(power: Float64Array): Float32Array {
    let maxPower = 0;
    for (let i = 0; i < power.length; i++) {
      if (power[i] > maxPower) maxPower = power[i];
    }
    const refDb = 10 * Math.log10(Math.max(AMIN, maxPower));

    const db = new Float64Array(power.length);
    let maxDb = -Infinity;
    for (let i = 0; i < power.length; i++) {
      db[i] = 10 * Math.log10(Math.max(AMIN, power[i])) - refDb;
      if (db[i] > maxDb) maxDb = db[i];
    }

    const floor = maxDb - TOP_DB;
    let minDb = Infinity;
    for (let i = 0; i < db.length; i++) {
      if (db[i] < floor) db[i] = floor;
      if (db[i] < minDb) minDb = db[i];
    }

    const out = new Float32Array(db.length);
    const range = maxDb - minDb + NORM_EPSILON;
    for (let i = 0; i < db.length; i++) {
      out[i] = (db[i] - minDb) / range;
    }
    return out;
  }
}
