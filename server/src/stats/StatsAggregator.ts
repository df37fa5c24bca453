/**
 * Stats
 * Per-session counters plus a process-wide view summed over live and closed
 * sessions.
 */

import type { DetectionEvent, GlobalStats, SessionStats } from '../types/index.js';

function emptyStats(): SessionStats {
  return { chunkCount: 0, detections: 0, triggers: 0, soundsPlayed: 0, lastCategory: null };
}

export class SessionStatsCounter {
  private stats: SessionStats = emptyStats();

  constructor(private onPlay?: (category: string) => void) {}

  recordChunk(): void {
    this.stats.chunkCount++;
  }

  recordDetection(event: DetectionEvent): void {
    if (event.matched) this.stats.detections++;
    if (event.triggered) this.stats.triggers++;
  }

  recordPlay(category: string): void {
    this.stats.soundsPlayed++;
    this.stats.lastCategory = category;
    this.onPlay?.(category);
  }

  snapshot(): Readonly<SessionStats> {
    return Object.freeze({ ...this.stats });
  }
}

export class StatsAggregator {
  private active: Map<string, SessionStatsCounter> = new Map();
  private retired: SessionStats = emptyStats();
  private totalSessions = 0;
  private lastCategory: string | null = null;

  register(sessionId: string): SessionStatsCounter {
    const counter = new SessionStatsCounter((category) => {
      this.lastCategory = category;
    });
    this.active.set(sessionId, counter);
    this.totalSessions++;
    return counter;
  }

  /**
   * Fold a closed session's counters into the totals
   */
  retire(sessionId: string): void {
    const counter = this.active.get(sessionId);
    if (!counter) return;

    const s = counter.snapshot();
    this.retired.chunkCount += s.chunkCount;
    this.retired.detections += s.detections;
    this.retired.triggers += s.triggers;
    this.retired.soundsPlayed += s.soundsPlayed;
    this.active.delete(sessionId);
  }

  snapshot(): Readonly<GlobalStats> {
    const total = { ...this.retired };
    for (const counter of this.active.values()) {
      const s = counter.snapshot();
      total.chunkCount += s.chunkCount;
      total.detections += s.detections;
      total.triggers += s.triggers;
      total.soundsPlayed += s.soundsPlayed;
    }

    return Object.freeze({
      ...total,
      lastCategory: this.lastCategory,
      activeSessions: this.active.size,
      totalSessions: this.totalSessions,
    });
  }
}
