/**
 * Cooldown Utility
 * Lazy cooldown over an injectable clock: no timers, the elapsed time is
 * compared whenever someone asks.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export class Cooldown {
  private lastAction: number | null = null;

  constructor(
    private cooldownMs: number,
    private clock: Clock = systemClock
  ) {}

  /**
   * Inclusive: exactly cooldownMs after the last action counts as elapsed.
   */
  canAct(now: number = this.clock()): boolean {
    return this.lastAction === null || now - this.lastAction >= this.cooldownMs;
  }

  act(now: number = this.clock()): boolean {
    if (!this.canAct(now)) return false;
    this.lastAction = now;
    return true;
  }

  remaining(now: number = this.clock()): number {
    if (this.lastAction === null) return 0;
    return Math.max(0, this.cooldownMs - (now - this.lastAction));
  }

  lastActionAt(): number | null {
    return this.lastAction;
  }

  reset(): void {
    this.lastAction = null;
  }
}
