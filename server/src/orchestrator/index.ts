/**
 * Drumwatch Orchestrator
 * Process-wide coordinator: loads the sound catalog and the classifier at
 * startup, owns readiness, creates sessions, and serializes inference.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { loadEngineConfig } from '../config/env.js';
import { SerialQueue } from '../utils/serialQueue.js';
import { defaultRng, type Rng } from '../utils/random.js';
import type { Clock } from '../utils/cooldown.js';
import { FeatureExtractor } from '../audio/features.js';
import { WindowAssembler } from '../audio/WindowAssembler.js';
import { pcm16ToFloat32, rms } from '../audio/pcm.js';
import { createClassifier, type Classifier } from '../classifier/index.js';
import { SoundCatalog } from '../sounds/SoundCatalog.js';
import { ReactionDispatcher } from '../reaction/ReactionDispatcher.js';
import { StatsAggregator } from '../stats/StatsAggregator.js';
import { Session } from '../session/Session.js';
import { StartupError, errorMessage } from '../errors.js';
import type { EngineConfig, FeatureTensor, ServerMessage, StatusSnapshot } from '../types/index.js';

export interface OrchestratorDeps {
  classifier?: Classifier;
  catalog?: SoundCatalog;
  rng?: Rng;
  clock?: Clock;
}

export interface AnalysisResult {
  windows: number;
  confidences: number[];
  maxConfidence: number;
  detected: boolean;
}

export interface OrchestratorEvents {
  ready: () => void;
  sessionOpened: (sessionId: string) => void;
  sessionClosed: (sessionId: string) => void;
}

export interface Orchestrator {
  on<K extends keyof OrchestratorEvents>(event: K, listener: OrchestratorEvents[K]): this;
}

export class Orchestrator extends EventEmitter {
  readonly extractor: FeatureExtractor;
  private classifier: Classifier;
  private catalog: SoundCatalog | null = null;
  private dispatcher: ReactionDispatcher | null = null;
  private inferenceQueue = new SerialQueue();
  private stats = new StatsAggregator();
  private sessions: Map<string, Session> = new Map();
  private startupErrors: string[] = [];
  private ready = false;
  private sessionIdCounter = 0;

  constructor(readonly config: EngineConfig, private deps: OrchestratorDeps = {}) {
    super();
    this.extractor = new FeatureExtractor(config.features);
    this.classifier = deps.classifier ?? createClassifier(config, this.extractor.hopLength);
  }

  /**
   * Load catalog and classifier. Failures, and any configuration problems
   * passed in, are recorded and leave the engine not ready; they do not throw.
   */
  async initialize(configProblems: string[] = []): Promise<boolean> {
    logger.info('Orchestrator', 'Initializing Drumwatch engine', {
      classifier: this.classifier.name,
      sampleRate: this.config.audio.sampleRate,
      windowSamples: this.config.audio.windowSamples,
      threshold: this.config.detection.threshold,
      cooldownSeconds: this.config.detection.cooldownSeconds,
    });
    this.startupErrors = [];
    for (const problem of configProblems) {
      this.recordStartupError(new StartupError(`Invalid configuration: ${problem}`));
    }

    try {
      const catalog = this.deps.catalog ?? (await SoundCatalog.scan(this.config.soundsDir));
      if (catalog.totalAssets() === 0) {
        throw new StartupError(`No reaction sounds found under ${catalog.root}`);
      }
      this.catalog = catalog;
      this.dispatcher = new ReactionDispatcher(catalog, this.deps.rng ?? defaultRng);
    } catch (err) {
      this.recordStartupError(err);
    }

    try {
      await this.classifier.load();
    } catch (err) {
      this.recordStartupError(err);
    }

    this.ready = this.startupErrors.length === 0 && this.classifier.isLoaded();
    if (this.ready) {
      logger.info('Orchestrator', `Engine ready (${this.classifier.name} classifier)`);
      this.emit('ready');
    } else {
      logger.error('Orchestrator', 'Engine NOT ready - sessions will be refused', this.startupErrors);
    }
    return this.ready;
  }

  private recordStartupError(err: unknown): void {
    const message = errorMessage(err);
    this.startupErrors.push(message);
    logger.error('Orchestrator', `Startup failure: ${message}`);
  }

  isReady(): boolean {
    return this.ready;
  }

  getCatalog(): SoundCatalog | null {
    return this.catalog;
  }

  // ============== Inference ==============

  /**
   * Classifier access goes through one FIFO queue
   */
  infer(tensor: FeatureTensor): Promise<number> {
    return this.inferenceQueue.run(() => this.classifier.predict(tensor));
  }

  pendingInferences(): number {
    return this.inferenceQueue.size();
  }

  // ============== Sessions ==============

  /**
   * @throws StartupError when the engine is not ready
   */
  openSession(send: (message: ServerMessage) => void): Session {
    if (!this.ready || !this.dispatcher) {
      throw new StartupError('Engine is not ready');
    }

    const sessionId = `session_${++this.sessionIdCounter}`;
    const session = new Session(sessionId, {
      config: this.config,
      extractor: this.extractor,
      infer: (tensor) => this.infer(tensor),
      dispatcher: this.dispatcher,
      stats: this.stats.register(sessionId),
      send,
      clock: this.deps.clock,
    });
    this.sessions.set(sessionId, session);

    logger.info('Orchestrator', `Session opened: ${sessionId}`, { active: this.sessions.size });
    this.emit('sessionOpened', sessionId);
    return session;
  }

  closeSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    session.close();
    this.sessions.delete(sessionId);
    this.stats.retire(sessionId);

    logger.info('Orchestrator', `Session closed: ${sessionId}`, session.getStats());
    this.emit('sessionClosed', sessionId);
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  // ============== Offline Analysis ==============

  /**
   * Classify a whole PCM16 recording window by window, without cooldown or reactions
   */
  async analyze(samples: Int16Array): Promise<AnalysisResult> {
    const { audio, detection } = this.config;
    const assembler = new WindowAssembler(audio.windowSamples, audio.hopSamples);
    const windows = assembler.push(pcm16ToFloat32(samples, audio.inputGain));

    const confidences: number[] = [];
    for (const window of windows) {
      if (audio.silenceRms > 0 && rms(window) < audio.silenceRms) {
        confidences.push(0);
        continue;
      }
      try {
        confidences.push(await this.infer(this.extractor.extract(window)));
      } catch (err) {
        logger.warn('Orchestrator', `Window ${confidences.length} failed, scoring 0: ${errorMessage(err)}`);
        confidences.push(0);
      }
    }

    const maxConfidence = confidences.reduce((a, b) => Math.max(a, b), 0);
    return {
      windows: windows.length,
      confidences,
      maxConfidence,
      detected: windows.length > 0 && maxConfidence >= detection.threshold,
    };
  }

  // ============== Status ==============

  getStatus(): StatusSnapshot {
    const catalog = this.catalog;
    return {
      status: this.ready ? 'ready' : 'not_ready',
      ready: this.ready,
      classifierLoaded: this.classifier.isLoaded(),
      classifier: this.classifier.name,
      sampleRate: this.config.audio.sampleRate,
      threshold: this.config.detection.threshold,
      cooldownSeconds: this.config.detection.cooldownSeconds,
      categories: catalog ? catalog.categories() : [],
      totalAssets: catalog ? catalog.totalAssets() : 0,
      stats: { ...this.stats.snapshot() },
      errors: [...this.startupErrors],
    };
  }

  /**
   * Close every session and release the classifier
   */
  async shutdown(): Promise<void> {
    logger.info('Orchestrator', 'Shutting down');
    for (const sessionId of [...this.sessions.keys()]) {
      this.closeSession(sessionId);
    }
    this.ready = false;
    await this.inferenceQueue.close();
    await this.classifier.dispose();
  }
}

// Singleton instance
export const orchestrator = new Orchestrator(loadEngineConfig());
