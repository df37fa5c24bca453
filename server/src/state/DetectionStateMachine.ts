/**
 * Detection State Machine
 * Turns a session's confidence stream into detection events: IDLE <-> COOLDOWN
 *
 * Cooldown expiry is checked lazily on each window against the stored trigger
 * time, so behavior depends only on the injected clock.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { Cooldown, systemClock, type Clock } from '../utils/cooldown.js';
import { clampProbability } from '../classifier/Classifier.js';
import type { DetectionConfig, DetectionEvent, DetectionState } from '../types/index.js';

export interface DetectionStateMachineEvents {
  stateChange: (newState: DetectionState, oldState: DetectionState) => void;
  detection: (event: DetectionEvent) => void;
}

export interface DetectionStateMachine {
  on<K extends keyof DetectionStateMachineEvents>(event: K, listener: DetectionStateMachineEvents[K]): this;
}

export class DetectionStateMachine extends EventEmitter {
  private state: DetectionState = 'IDLE';
  private cooldown: Cooldown;
  private sequence = 0;

  constructor(
    private sessionId: string,
    private config: DetectionConfig,
    private clock: Clock = systemClock
  ) {
    super();
    this.cooldown = new Cooldown(config.cooldownSeconds * 1000, clock);
  }

  // ============== Getters ==============

  getState(): DetectionState {
    return this.state;
  }

  getLastTriggerTime(): number | null {
    return this.cooldown.lastActionAt();
  }

  getCooldownRemainingMs(now: number = this.clock()): number {
    return this.state === 'COOLDOWN' ? this.cooldown.remaining(now) : 0;
  }

  // ============== Transitions ==============

  private transition(newState: DetectionState): void {
    const oldState = this.state;
    if (oldState === newState) return;

    logger.debug('Detection', `Transition: ${oldState} -> ${newState}`, undefined, this.sessionId);
    this.state = newState;
    this.emit('stateChange', newState, oldState);
  }

  /**
   * Apply one classified window. Threshold is inclusive, and so is the
   * cooldown boundary: a match exactly cooldownSeconds after the last trigger fires.
   */
  process(rawConfidence: number, now: number = this.clock()): DetectionEvent {
    if (this.state === 'COOLDOWN' && this.cooldown.canAct(now)) {
      this.transition('IDLE');
    }

    const confidence = clampProbability(rawConfidence);
    const matched = confidence >= this.config.threshold;
    let triggered = false;

    if (matched && this.state === 'IDLE') {
      this.cooldown.act(now);
      triggered = true;
      this.transition('COOLDOWN');
    } else if (matched) {
      logger.debug('Detection', `Suppressed by cooldown (${this.cooldown.remaining(now)}ms left)`, { confidence }, this.sessionId);
    }

    const event: DetectionEvent = {
      sessionId: this.sessionId,
      sequence: this.sequence++,
      timestamp: now,
      confidence,
      matched,
      triggered,
    };
    this.emit('detection', event);
    return event;
  }

  reset(): void {
    this.cooldown.reset();
    this.sequence = 0;
    this.transition('IDLE');
  }
}
