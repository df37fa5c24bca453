/**
 * ONNX Classifier
 * Runs the trained drumming detector on the onnxruntime-web WASM backend.
 * Input [1, melBands, timeFrames, 1] float32, output: one sigmoid probability.
 */

import * as ort from 'onnxruntime-web';
import { readFile } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { InferenceError, StartupError, errorMessage } from '../errors.js';
import type { FeatureTensor } from '../types/index.js';
import { clampProbability, type Classifier } from './Classifier.js';

export interface TensorShape {
  melBands: number;
  timeFrames: number;
}

export class OnnxClassifier implements Classifier {
  readonly name = 'onnx';
  private session: ort.InferenceSession | null = null;
  private inputName = '';
  private outputName = '';

  constructor(
    private modelPath: string,
    private shape: TensorShape
  ) {}

  async load(): Promise<void> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.modelPath);
    } catch (err) {
      throw new StartupError(`Classifier model not readable at ${this.modelPath}: ${errorMessage(err)}`, { cause: err });
    }

    // Single-threaded WASM
    ort.env.wasm.numThreads = 1;

    try {
      this.session = await ort.InferenceSession.create(new Uint8Array(bytes));
    } catch (err) {
      throw new StartupError(`Classifier model at ${this.modelPath} is corrupt: ${errorMessage(err)}`, { cause: err });
    }

    const { inputNames, outputNames } = this.session;
    if (inputNames.length === 0 || outputNames.length === 0) {
      throw new StartupError(`Classifier model at ${this.modelPath} has no inputs or outputs`);
    }
    this.inputName = inputNames[0];
    this.outputName = outputNames[0];

    logger.info('Classifier', `ONNX model loaded: ${this.modelPath}`, {
      input: this.inputName,
      output: this.outputName,
      bytes: bytes.length,
    });
  }

  isLoaded(): boolean {
    return this.session !== null;
  }

  async predict(tensor: FeatureTensor): Promise<number> {
    if (!this.session) {
      throw new InferenceError('Classifier not loaded');
    }

    const { melBands, timeFrames } = this.shape;
    if (
      tensor.melBands !== melBands ||
      tensor.timeFrames !== timeFrames ||
      tensor.data.length !== melBands * timeFrames
    ) {
      throw new InferenceError(
        `Tensor shape ${tensor.melBands}x${tensor.timeFrames} (${tensor.data.length} values) does not match model input ${melBands}x${timeFrames}`
      );
    }

    const input = new ort.Tensor('float32', tensor.data, [1, melBands, timeFrames, 1]);

    let results: ort.InferenceSession.OnnxValueMapType;
    try {
      results = await this.session.run({ [this.inputName]: input });
    } catch (err) {
      throw new InferenceError(`Inference failed: ${errorMessage(err)}`, { cause: err });
    }

    const output = results[this.outputName];
    if (!output || output.type !== 'float32' || !(output.data instanceof Float32Array) || output.data.length === 0) {
      throw new InferenceError(`Model output "${this.outputName}" is not a float32 tensor`);
    }
    return clampProbability(output.data[0]);
  }

  async dispose(): Promise<void> {
    if (this.session) {
      await this.session.release();
      this.session = null;
    }
  }
}
