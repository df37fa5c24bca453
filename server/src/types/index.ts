/**
 * Shared Types for Drumwatch
 */

// ============== Reaction Modes ==============

export type ReactionMode =
  | 'predators'    // Scare off with raptor calls (default)
  | 'woodpeckers'  // Answer with rival drumming/calls
  | 'mixed'        // Any category
  | 'silent';      // Detect only

export const REACTION_MODES: readonly ReactionMode[] = ['predators', 'woodpeckers', 'mixed', 'silent'];

export function isReactionMode(value: unknown): value is ReactionMode {
  return REACTION_MODES.some((mode) => mode === value);
}

/**
 * Category-name prefix that places a category in a mode's pool
 */
export const MODE_GROUP_PREFIX: Readonly<Record<'predators' | 'woodpeckers', string>> = {
  predators: 'predator',
  woodpeckers: 'woodpecker',
};

// ============== Configuration ==============

export type ClassifierKind = 'onnx' | 'onset';

export interface AudioConfig {
  sampleRate: number;
  windowSamples: number;
  hopSamples: number;     // == windowSamples for non-overlapping windows
  inputGain: number;
  silenceRms: number;     // 0 disables the silence gate
}

export interface FeatureConfig {
  sampleRate: number;
  windowSamples: number;
  nFft: number;
  melBands: number;
  timeFrames: number;
  fMax: number;
}

export interface DetectionConfig {
  threshold: number;        // 0..1, inclusive
  cooldownSeconds: number;
}

export interface EngineConfig {
  audio: AudioConfig;
  features: FeatureConfig;
  detection: DetectionConfig;
  classifier: ClassifierKind;
  modelPath: string;
  soundsDir: string;
  defaultMode: ReactionMode;
}

// ============== Features ==============

/**
 * Row-major [melBands][timeFrames][1] tensor with values in [0, 1]
 */
export interface FeatureTensor {
  data: Float32Array;
  melBands: number;
  timeFrames: number;
}

// ============== Detection ==============

export type DetectionState = 'IDLE' | 'COOLDOWN';

export interface DetectionEvent {
  sessionId: string;
  sequence: number;     // window index within the session
  timestamp: number;    // ms
  confidence: number;   // 0..1
  matched: boolean;     // confidence >= threshold
  triggered: boolean;   // matched and not suppressed by cooldown
}

// ============== Reactions ==============

export interface PlayInstruction {
  category: string;
  asset: string;
  url: string;
}

export type ReactionOutcome =
  | { played: true; instruction: PlayInstruction }
  | { played: false; reason: 'not_triggered' | 'silent' | 'no_category' | 'empty_category' };

// ============== Stats ==============

export interface SessionStats {
  chunkCount: number;
  detections: number;     // windows at or above threshold
  triggers: number;       // windows that fired a reaction
  soundsPlayed: number;
  lastCategory: string | null;
}

export interface GlobalStats extends SessionStats {
  activeSessions: number;
  totalSessions: number;
}

// ============== WebSocket Messages ==============

// Client -> Server
export type ClientMessage =
  | { type: 'audio'; audio: string }
  | { type: 'mode'; mode: ReactionMode }
  | { type: 'test' }
  | { type: 'ping' };

export type WarningCode =
  | 'decode_error'
  | 'inference_error'
  | 'invalid_message'
  | 'invalid_mode'
  | 'no_sound'
  | 'empty_category';

// Server -> Client
export type ServerMessage =
  | {
      type: 'ready';
      sessionId: string;
      mode: ReactionMode;
      sampleRate: number;
      windowSamples: number;
    }
  | {
      type: 'result';
      confidence: number;
      detected: boolean;
      chunk_count: number;
      detections: number;
      sounds_played: number;
      last_category: string | null;
    }
  | { type: 'play'; category: string; asset: string; url: string }
  | { type: 'mode'; mode: ReactionMode }
  | { type: 'warning'; code: WarningCode; message: string }
  | { type: 'timeout'; idleSeconds: number }
  | { type: 'pong' };

// ============== Status ==============

export interface StatusSnapshot {
  status: 'ready' | 'not_ready';
  ready: boolean;
  classifierLoaded: boolean;
  classifier: string;
  sampleRate: number;
  threshold: number;
  cooldownSeconds: number;
  categories: string[];
  totalAssets: number;
  stats: GlobalStats;
  errors: string[];
}
