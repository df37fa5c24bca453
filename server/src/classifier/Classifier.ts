/**
 * Classifier Interface
 * A loaded detector turns one feature tensor into the probability that the
 * window holds woodpecker drumming. Implementations are read-only once loaded.
 */

import type { FeatureTensor } from '../types/index.js';

export interface Classifier {
  /**
   * Backend name for logging and status
   */
  readonly name: string;

  /**
   * Load the artifact; rejects with StartupError when it is missing or unusable
   */
  load(): Promise<void>;

  /**
   * Check if load() completed
   */
  isLoaded(): boolean;

  /**
   * Probability in [0, 1]; rejects with InferenceError on malformed input
   */
  predict(tensor: FeatureTensor): Promise<number>;

  /**
   * Release runtime resources
   */
  dispose(): Promise<void>;
}

export function clampProbability(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return value < 0 ? 0 : value > 1 ? 1 : value;
}
