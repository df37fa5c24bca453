/**
 * Reaction Dispatcher
 * Chooses the sound to play for a triggered detection (or a test request)
 */

import { logger } from '../utils/logger.js';
import { defaultRng, type Rng } from '../utils/random.js';
import { EmptyCategory } from '../errors.js';
import type { SoundCatalog } from '../sounds/SoundCatalog.js';
import type { DetectionEvent, PlayInstruction, ReactionMode, ReactionOutcome } from '../types/index.js';

export const SOUND_URL_PREFIX = '/api/sound';

export function soundUrl(category: string, asset: string): string {
  return `${SOUND_URL_PREFIX}/${encodeURIComponent(category)}/${encodeURIComponent(asset)}`;
}

export class ReactionDispatcher {
  constructor(
    private catalog: SoundCatalog,
    private rng: Rng = defaultRng
  ) {}

  /**
   * React to a detection event under the session's mode
   */
  onDetection(event: DetectionEvent, mode: ReactionMode): ReactionOutcome {
    if (!event.triggered) {
      return { played: false, reason: 'not_triggered' };
    }
    if (mode === 'silent') {
      logger.debug('Reaction', 'Silent mode - no sound', undefined, event.sessionId);
      return { played: false, reason: 'silent' };
    }

    const category = this.catalog.resolve(mode, this.rng);
    if (category === null) {
      logger.warn('Reaction', `No sound category available for mode "${mode}"`, undefined, event.sessionId);
      return { played: false, reason: 'no_category' };
    }
    return this.play(category, event.sessionId);
  }

  /**
   * Explicit test sound: ignores detection state and cooldown, draws from
   * every non-empty category
   */
  testSound(sessionId?: string): ReactionOutcome {
    const category = this.catalog.resolve('mixed', this.rng);
    if (category === null) {
      logger.warn('Reaction', 'Test sound requested but the catalog has no assets', undefined, sessionId);
      return { played: false, reason: 'no_category' };
    }
    return this.play(category, sessionId);
  }

  private play(category: string, sessionId?: string): ReactionOutcome {
    try {
      const asset = this.catalog.pick(category, this.rng);
      const instruction: PlayInstruction = { category, asset, url: soundUrl(category, asset) };
      logger.info('Reaction', `Play ${category}/${asset}`, undefined, sessionId);
      return { played: true, instruction };
    } catch (err) {
      if (err instanceof EmptyCategory) {
        logger.error('Reaction', err.message, undefined, sessionId);
        return { played: false, reason: 'empty_category' };
      }
      throw err;
    }
  }
}
