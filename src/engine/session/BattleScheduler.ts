// ─────────────────────────────────────────────
//  Battle Scheduler
//  Drives a session manager from the event loop:
//  tickAll every tick period, sweepOrphans every sweep period.
// ─────────────────────────────────────────────

import type { EngineConfig } from '@/config';
import { DEFAULT_ENGINE_CONFIG } from '@/config';
import { Logger } from '@/engine/utils/Logger';
import type { BattleSessionManager } from './BattleSessionManager';

type Driven = Pick<BattleSessionManager, 'tickAll' | 'sweepOrphans'>;
type Timer = ReturnType<typeof setInterval>;

export class BattleScheduler {
  private tickTimer: Timer | null = null;
  private sweepTimer: Timer | null = null;

  constructor(
    private readonly manager: Driven,
    private readonly config: Pick<EngineConfig, 'tickPeriodMs' | 'sweepPeriodMs'> = DEFAULT_ENGINE_CONFIG,
  ) {}

  get running(): boolean {
    return this.tickTimer !== null;
  }

  start(): void {
    if (this.running) return;
    this.tickTimer = setInterval(() => this.guard('tick', () => this.manager.tickAll()), this.config.tickPeriodMs);
    this.sweepTimer = setInterval(
      () => this.guard('sweep', () => this.manager.sweepOrphans()),
      this.config.sweepPeriodMs,
    );
    Logger.log(`Battle scheduler started (${this.config.tickPeriodMs} ms ticks)`, 'system');
  }

  stop(): void {
    if (!this.running) return;
    if (this.tickTimer) clearInterval(this.tickTimer);
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.tickTimer = null;
    this.sweepTimer = null;
    Logger.log('Battle scheduler stopped', 'system');
  }

  /** A failing pass is logged; the loop keeps running */
  private guard(pass: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      Logger.log(`Scheduler ${pass} failed: ${err instanceof Error ? err.message : String(err)}`, 'critical');
    }
  }
}
