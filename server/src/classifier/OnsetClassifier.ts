/**
 * Onset Classifier
 * Artifact-free drumming detector working on the same mel tensor as the model.
 *
 * Drumming is a burst of sharp, evenly spaced broadband hits. We build an
 * onset envelope from frame-to-frame mel increases, pick peaks, and score the
 * hit rate and the regularity of the gaps between hits:
 * - territorial drumming: 10-38 hits/s, regularity <= 0.40
 * - foraging taps: 3-9 hits/s, regularity <= 0.50
 */

import type { FeatureTensor } from '../types/index.js';
import { InferenceError } from '../errors.js';
import { clampProbability, type Classifier } from './Classifier.js';

export interface PeakPickOptions {
  preMax: number;
  postMax: number;
  preAvg: number;
  postAvg: number;
  delta: number;
  wait: number;
}

export const DEFAULT_PEAK_PICK: PeakPickOptions = {
  preMax: 1,
  postMax: 1,
  preAvg: 3,
  postAvg: 3,
  delta: 0.1,
  wait: 1,
};

const DRUMMING = { minRate: 10, maxRate: 38, maxIrregularity: 0.4 };
const FORAGING = { minRate: 3, maxRate: 9, maxIrregularity: 0.5 };

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Median over mel bands of the positive frame-to-frame change, scaled to [0, 1]
 */
export function onsetEnvelope(tensor: FeatureTensor): Float32Array {
  const { data, melBands, timeFrames } = tensor;
  const envelope = new Float32Array(timeFrames);
  const diffs: number[] = new Array(melBands);

  for (let t = 1; t < timeFrames; t++) {
    for (let m = 0; m < melBands; m++) {
      diffs[m] = Math.max(0, data[m * timeFrames + t] - data[m * timeFrames + t - 1]);
    }
    envelope[t] = median(diffs);
  }

  let max = 0;
  for (let t = 0; t < timeFrames; t++) max = Math.max(max, envelope[t]);
  if (max > 0) {
    for (let t = 0; t < timeFrames; t++) envelope[t] /= max;
  }
  return envelope;
}

/**
 * A frame is a peak when it is the local maximum, exceeds the local mean by
 * delta, and comes more than `wait` frames after the previous peak.
 */
export function pickPeaks(envelope: ArrayLike<number>, options: PeakPickOptions = DEFAULT_PEAK_PICK): number[] {
  const peaks: number[] = [];
  const n = envelope.length;
  let last = -Infinity;

  for (let i = 0; i < n; i++) {
    const maxFrom = Math.max(0, i - options.preMax);
    const maxTo = Math.min(n, i + options.postMax + 1);
    let localMax = -Infinity;
    for (let j = maxFrom; j < maxTo; j++) localMax = Math.max(localMax, envelope[j]);
    if (envelope[i] !== localMax) continue;

    const avgFrom = Math.max(0, i - options.preAvg);
    const avgTo = Math.min(n, i + options.postAvg + 1);
    let sum = 0;
    for (let j = avgFrom; j < avgTo; j++) sum += envelope[j];
    if (envelope[i] < sum / (avgTo - avgFrom) + options.delta) continue;

    if (i - last > options.wait) {
      peaks.push(i);
      last = i;
    }
  }
  return peaks;
}

/**
 * Coefficient of variation of the gaps between peaks (0 = perfectly even)
 */
export function irregularity(peaks: number[]): number {
  if (peaks.length < 2) return 1;
  const gaps: number[] = [];
  for (let i = 1; i < peaks.length; i++) gaps.push(peaks[i] - peaks[i - 1]);
  const mean = gaps.reduce((a, b) => a + b, 0) / gaps.length;
  const variance = gaps.reduce((a, b) => a + (b - mean) ** 2, 0) / gaps.length;
  return Math.sqrt(variance) / mean;
}

export class OnsetClassifier implements Classifier {
  readonly name = 'onset';
  private loaded = false;

  /**
   * @param framesPerSecond tensor frame rate (sampleRate / hopLength)
   */
  constructor(
    private framesPerSecond: number,
    private peakOptions: PeakPickOptions = DEFAULT_PEAK_PICK
  ) {}

  async load(): Promise<void> {
    this.loaded = true;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  async predict(tensor: FeatureTensor): Promise<number> {
    if (tensor.timeFrames < 2 || tensor.data.length !== tensor.melBands * tensor.timeFrames) {
      throw new InferenceError(
        `Tensor shape ${tensor.melBands}x${tensor.timeFrames} does not match its ${tensor.data.length} values`
      );
    }
    return this.score(tensor);
  }

  score(tensor: FeatureTensor): number {
    const peaks = pickPeaks(onsetEnvelope(tensor), this.peakOptions);
    if (peaks.length < 2) return 0;

    const duration = tensor.timeFrames / this.framesPerSecond;
    const rate = peaks.length / duration;
    const reg = irregularity(peaks);

    if (rate >= DRUMMING.minRate && rate <= DRUMMING.maxRate && reg <= DRUMMING.maxIrregularity) {
      return clampProbability(Math.min(0.95, 0.6 + (1 - reg) * 0.4));
    }
    if (rate >= FORAGING.minRate && rate <= FORAGING.maxRate && reg <= FORAGING.maxIrregularity) {
      return clampProbability(Math.min(0.75, 0.5 + rate / 20));
    }
    return 0;
  }

  async dispose(): Promise<void> {
    this.loaded = false;
  }
}
