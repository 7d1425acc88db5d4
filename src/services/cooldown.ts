import { logger } from '../utils/logger';

/**
 * Per-contract alert suppression. State is process-local and lost on restart.
 */
export class CooldownGate {
  private lastAlertAt = new Map<string, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now
  ) {}

  isOnCooldown(contract: string): boolean {
    const last = this.lastAlertAt.get(contract);
    if (last === undefined) return false;
    return this.now() - last < this.cooldownMs;
  }

  recordAlert(contract: string): void {
    this.lastAlertAt.set(contract, this.now());
  }

  /** Milliseconds until `contract` may alert again; 0 when it may already. */
  remainingMs(contract: string): number {
    const last = this.lastAlertAt.get(contract);
    if (last === undefined) return 0;
    return Math.max(0, this.cooldownMs - (this.now() - last));
  }

  sweepExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [contract, last] of this.lastAlertAt) {
      if (now - last >= this.cooldownMs) {
        this.lastAlertAt.delete(contract);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug(`Swept ${removed} expired cooldowns`, { remaining: this.lastAlertAt.size });
    }
    return removed;
  }

  size(): number {
    return this.lastAlertAt.size;
  }
}
