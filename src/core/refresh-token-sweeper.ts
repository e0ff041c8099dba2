/**
 * Refresh Token Sweeper
 *
 * Housekeeping only: purges consumed, revoked and expired refresh records
 * once they are older than the retention window. Correctness never depends
 * on it; an unswept expired record is still rejected on use.
 */

import type { RefreshTokenStore } from '../storage/types.js';
import { type Clock, systemClock, addSeconds } from './clock.js';

export interface RefreshTokenSweeperOptions {
  intervalMs: number;
  retentionSeconds: number;
  clock?: Clock;
}

export class RefreshTokenSweeper {
  private timer: NodeJS.Timeout | null = null;
  private readonly clock: Clock;

  constructor(
    private readonly store: RefreshTokenStore,
    private readonly options: RefreshTokenSweeperOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async sweep(): Promise<number> {
    const cutoff = addSeconds(this.clock.now(), -this.options.retentionSeconds);
    const purged = await this.store.purge(cutoff);

    if (purged > 0) {
      console.log(`[RefreshTokenSweeper] Purged ${purged} refresh token record(s)`);
    }

    return purged;
  }

  /**
   * Run sweep() on an interval. The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        console.error('[RefreshTokenSweeper] Sweep failed:', error);
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
