/**
 * Session
 * One connected client's isolated pipeline: decode -> window -> features ->
 * classifier -> detection state machine -> reaction + stats.
 *
 * Messages run one at a time through a per-session serial queue, so windows
 * are classified and answered strictly in arrival order even though inference
 * is asynchronous.
 */

import { logger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serialQueue.js';
import { systemClock, type Clock } from '../utils/cooldown.js';
import { decodeBase64Pcm16, pcm16ToFloat32, rms } from '../audio/pcm.js';
import { WindowAssembler } from '../audio/WindowAssembler.js';
import type { FeatureExtractor } from '../audio/features.js';
import { DetectionStateMachine } from '../state/DetectionStateMachine.js';
import type { ReactionDispatcher } from '../reaction/ReactionDispatcher.js';
import type { SessionStatsCounter } from '../stats/StatsAggregator.js';
import { DecodeError, InvalidWindowLength, errorMessage } from '../errors.js';
import {
  isReactionMode,
  type DetectionEvent,
  type EngineConfig,
  type FeatureTensor,
  type ReactionMode,
  type ReactionOutcome,
  type ServerMessage,
  type SessionStats,
  type WarningCode,
} from '../types/index.js';

export interface SessionDeps {
  config: EngineConfig;
  extractor: FeatureExtractor;
  infer: (tensor: FeatureTensor) => Promise<number>;
  dispatcher: ReactionDispatcher;
  stats: SessionStatsCounter;
  send: (message: ServerMessage) => void;
  clock?: Clock;
}

export class Session {
  private mode: ReactionMode;
  private assembler: WindowAssembler;
  private detector: DetectionStateMachine;
  private queue = new SerialQueue();
  private clock: Clock;
  private closed = false;

  constructor(readonly id: string, private deps: SessionDeps) {
    const { audio, detection, defaultMode } = deps.config;
    this.mode = defaultMode;
    this.clock = deps.clock ?? systemClock;
    this.assembler = new WindowAssembler(audio.windowSamples, audio.hopSamples);
    this.detector = new DetectionStateMachine(id, detection, this.clock);
  }

  // ============== Getters ==============

  getMode(): ReactionMode {
    return this.mode;
  }

  getStats(): Readonly<SessionStats> {
    return this.deps.stats.snapshot();
  }

  getDetector(): DetectionStateMachine {
    return this.detector;
  }

  bufferedSamples(): number {
    return this.assembler.buffered();
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ============== Inbound ==============

  /**
   * Queue a raw text frame from the socket
   */
  handleRaw(data: string): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(data);
    } catch {
      this.warn('invalid_message', 'Message is not valid JSON');
      return Promise.resolve();
    }
    return this.handleMessage(message);
  }

  /**
   * Queue a parsed client message; resolves once it has been fully processed
   */
  handleMessage(message: unknown): Promise<void> {
    if (this.closed) return Promise.resolve();
    return this.queue.run(() => this.dispatch(message)).catch((err: unknown) => {
      logger.error('Session', 'Message handling failed', err, this.id);
    });
  }

  private async dispatch(message: unknown): Promise<void> {
    if (this.closed) return;

    if (typeof message !== 'object' || message === null || !('type' in message)) {
      this.warn('invalid_message', 'Message must be an object with a "type"');
      return;
    }

    switch (message.type) {
      case 'audio':
        await this.handleAudio('audio' in message ? message.audio : undefined);
        break;

      case 'mode':
        this.setMode('mode' in message ? message.mode : undefined);
        break;

      case 'test':
        this.handleTest();
        break;

      case 'ping':
        this.deps.send({ type: 'pong' });
        break;

      default:
        logger.warn('Session', `Unknown message type: ${String(message.type)}`, undefined, this.id);
        this.warn('invalid_message', `Unknown message type: ${String(message.type)}`);
    }
  }

  // ============== Handlers ==============

  private async handleAudio(audio: unknown): Promise<void> {
    let samples: Float32Array;
    try {
      samples = pcm16ToFloat32(decodeBase64Pcm16(audio), this.deps.config.audio.inputGain);
    } catch (err) {
      if (err instanceof DecodeError) {
        logger.warn('Session', `Dropped audio chunk: ${err.message}`, undefined, this.id);
        this.warn('decode_error', err.message);
        return;
      }
      throw err;
    }

    this.deps.stats.recordChunk();
    const windows = this.assembler.push(samples);
    for (const window of windows) {
      if (this.closed) return;
      await this.classifyWindow(window);
    }
  }

  private setMode(mode: unknown): void {
    if (!isReactionMode(mode)) {
      this.warn('invalid_mode', `Unknown reaction mode: ${String(mode)}`);
      return;
    }
    this.mode = mode;
    logger.info('Session', `Reaction mode: ${mode}`, undefined, this.id);
    this.deps.send({ type: 'mode', mode });
  }

  private handleTest(): void {
    const outcome = this.deps.dispatcher.testSound(this.id);
    if (outcome.played) {
      this.deps.stats.recordPlay(outcome.instruction.category);
    } else if (outcome.reason === 'no_category') {
      this.warn('no_sound', 'The sound catalog has no assets');
      return;
    }
    this.deliver(outcome);
  }

  // ============== Pipeline ==============

  private async classifyWindow(window: Float32Array): Promise<void> {
    const now = this.clock();
    const confidence = await this.confidenceFor(window);

    // The client may have left while the window was queued for inference
    if (this.closed) return;

    const event = this.detector.process(confidence, now);
    this.deps.stats.recordDetection(event);

    const outcome = this.deps.dispatcher.onDetection(event, this.mode);
    if (outcome.played) {
      this.deps.stats.recordPlay(outcome.instruction.category);
      logger.info('Session', `Detection #${event.sequence} at ${(confidence * 100).toFixed(1)}%`, undefined, this.id);
    }

    this.sendResult(event);
    this.deliver(outcome);
  }

  private async confidenceFor(window: Float32Array): Promise<number> {
    const { silenceRms } = this.deps.config.audio;
    if (silenceRms > 0 && rms(window) < silenceRms) {
      return 0;
    }

    try {
      const tensor = this.deps.extractor.extract(window);
      return await this.deps.infer(tensor);
    } catch (err) {
      if (err instanceof InvalidWindowLength) {
        logger.warn('Session', `Dropped window: ${err.message}`, undefined, this.id);
        this.warn('decode_error', err.message);
      } else {
        logger.warn('Session', `Inference failed, confidence 0: ${errorMessage(err)}`, undefined, this.id);
        this.warn('inference_error', errorMessage(err));
      }
      return 0;
    }
  }

  private sendResult(event: DetectionEvent): void {
    const stats = this.deps.stats.snapshot();
    this.deps.send({
      type: 'result',
      confidence: event.confidence,
      detected: event.triggered,
      chunk_count: stats.chunkCount,
      detections: stats.detections,
      sounds_played: stats.soundsPlayed,
      last_category: stats.lastCategory,
    });
  }

  private deliver(outcome: ReactionOutcome): void {
    if (outcome.played) {
      const { category, asset, url } = outcome.instruction;
      this.deps.send({ type: 'play', category, asset, url });
      return;
    }

    switch (outcome.reason) {
      case 'no_category':
        this.warn('no_sound', `No sound available for mode "${this.mode}"`);
        break;
      case 'empty_category':
        this.warn('empty_category', 'Selected sound category has no assets');
        break;
      default:
        break;
    }
  }

  private warn(code: WarningCode, message: string): void {
    if (this.closed) return;
    this.deps.send({ type: 'warning', code, message });
  }

  // ============== Lifecycle ==============

  /**
   * Drop the partial window and ignore anything still queued
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.assembler.clear();
    this.detector.removeAllListeners();
    void this.queue.close();
    logger.debug('Session', 'Session closed', this.deps.stats.snapshot(), this.id);
  }
}
