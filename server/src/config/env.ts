/**
 * Drumwatch Configuration
 * Load from environment variables with defaults
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve, isAbsolute } from 'path';
import type { ClassifierKind, EngineConfig, ReactionMode } from '../types/index.js';
import { isReactionMode } from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Project root (server/src/config -> root)
export const PROJECT_ROOT = resolve(__dirname, '../../..');

// Load .env from project root
config({ path: resolve(PROJECT_ROOT, '.env') });

function num(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function fromRoot(path: string): string {
  return isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
}

export const ENV = {
  // Server
  SERVER_PORT: parseInt(process.env.SERVER_PORT || '8000', 10),
  WS_PATH: process.env.WS_PATH || '/ws',
  WS_IDLE_TIMEOUT_SECONDS: num('WS_IDLE_TIMEOUT_SECONDS', 30),

  // Audio windowing
  SAMPLE_RATE: num('SAMPLE_RATE', 22050),
  WINDOW_SECONDS: num('WINDOW_SECONDS', 1.0),
  WINDOW_HOP_SECONDS: num('WINDOW_HOP_SECONDS', 1.0),
  INPUT_GAIN: num('INPUT_GAIN', 1),
  SILENCE_RMS: num('SILENCE_RMS', 0.001),

  // Features
  N_MELS: num('N_MELS', 64),
  N_FFT: num('N_FFT', 2048),
  TIME_FRAMES: num('TIME_FRAMES', 44),
  F_MAX: num('F_MAX', 8000),

  // Detection
  CLASSIFIER: process.env.CLASSIFIER || 'onnx',
  MODEL_PATH: fromRoot(process.env.MODEL_PATH || 'models/drumming.onnx'),
  CONFIDENCE_THRESHOLD: num('CONFIDENCE_THRESHOLD', 0.75),
  COOLDOWN_SECONDS: num('COOLDOWN_SECONDS', 3),
  DEFAULT_MODE: process.env.DEFAULT_MODE || 'predators',

  // Reaction sounds
  SOUNDS_DIR: fromRoot(process.env.SOUNDS_DIR || 'static/sounds'),

  // Logging (empty LOG_DIR disables the log file)
  LOG_DIR: process.env.LOG_DIR === undefined ? fromRoot('logs') : process.env.LOG_DIR,

  // Debug
  DEBUG: process.env.DEBUG === 'true',
};

/**
 * Returns a list of problems; an empty list means the configuration is usable.
 */
export function validateConfig(env: typeof ENV = ENV): string[] {
  const problems: string[] = [];

  if (env.CONFIDENCE_THRESHOLD < 0 || env.CONFIDENCE_THRESHOLD > 1) {
    problems.push(`CONFIDENCE_THRESHOLD must be within 0..1 (got ${env.CONFIDENCE_THRESHOLD})`);
  }
  if (env.WS_IDLE_TIMEOUT_SECONDS < 0) {
    problems.push(`WS_IDLE_TIMEOUT_SECONDS must not be negative (got ${env.WS_IDLE_TIMEOUT_SECONDS})`);
  }
  if (env.COOLDOWN_SECONDS < 0) {
    problems.push(`COOLDOWN_SECONDS must not be negative (got ${env.COOLDOWN_SECONDS})`);
  }
  if (env.SAMPLE_RATE <= 0 || env.WINDOW_SECONDS <= 0) {
    problems.push('SAMPLE_RATE and WINDOW_SECONDS must be positive');
  }
  if (env.WINDOW_HOP_SECONDS <= 0 || env.WINDOW_HOP_SECONDS > env.WINDOW_SECONDS) {
    problems.push('WINDOW_HOP_SECONDS must be within (0, WINDOW_SECONDS]');
  }
  if (env.TIME_FRAMES < 2 || env.N_MELS < 1) {
    problems.push('TIME_FRAMES must be at least 2 and N_MELS at least 1');
  }
  if (!Number.isInteger(Math.log2(env.N_FFT))) {
    problems.push(`N_FFT must be a power of two (got ${env.N_FFT})`);
  }
  if (env.F_MAX > env.SAMPLE_RATE / 2) {
    problems.push(`F_MAX must not exceed the Nyquist frequency (${env.SAMPLE_RATE / 2} Hz)`);
  }
  if (env.CLASSIFIER !== 'onnx' && env.CLASSIFIER !== 'onset') {
    problems.push(`CLASSIFIER must be "onnx" or "onset" (got "${env.CLASSIFIER}")`);
  }
  if (!isReactionMode(env.DEFAULT_MODE)) {
    problems.push(`DEFAULT_MODE must be predators, woodpeckers, mixed or silent (got "${env.DEFAULT_MODE}")`);
  }

  for (const problem of problems) {
    console.warn(`[Config] WARNING: ${problem}`);
  }
  return problems;
}

/**
 * Build the typed engine configuration from ENV.
 */
export function loadEngineConfig(): EngineConfig {
  const sampleRate = Math.round(ENV.SAMPLE_RATE);
  const windowSamples = Math.round(sampleRate * ENV.WINDOW_SECONDS);
  const classifier: ClassifierKind = ENV.CLASSIFIER === 'onset' ? 'onset' : 'onnx';
  const defaultMode: ReactionMode = isReactionMode(ENV.DEFAULT_MODE) ? ENV.DEFAULT_MODE : 'predators';

  return {
    audio: {
      sampleRate,
      windowSamples,
      hopSamples: Math.max(1, Math.min(windowSamples, Math.round(sampleRate * ENV.WINDOW_HOP_SECONDS))),
      inputGain: ENV.INPUT_GAIN,
      silenceRms: ENV.SILENCE_RMS,
    },
    features: {
      sampleRate,
      windowSamples,
      nFft: ENV.N_FFT,
      melBands: ENV.N_MELS,
      timeFrames: ENV.TIME_FRAMES,
      fMax: ENV.F_MAX,
    },
    detection: {
      threshold: ENV.CONFIDENCE_THRESHOLD,
      cooldownSeconds: ENV.COOLDOWN_SECONDS,
    },
    classifier,
    modelPath: ENV.MODEL_PATH,
    soundsDir: ENV.SOUNDS_DIR,
    defaultMode,
  };
}
