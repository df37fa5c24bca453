import type { EngineConfig } from '../types/index.js';
import type { Classifier } from './Classifier.js';
import { OnnxClassifier } from './OnnxClassifier.js';
import { OnsetClassifier } from './OnsetClassifier.js';

export type { Classifier } from './Classifier.js';

/**
 * Classifier factory
 */
export function createClassifier(config: EngineConfig, hopLength: number): Classifier {
  const { melBands, timeFrames, sampleRate } = config.features;
  if (config.classifier === 'onset') {
    return new OnsetClassifier(sampleRate / hopLength);
  }
  return new OnnxClassifier(config.modelPath, { melBands, timeFrames });
}
