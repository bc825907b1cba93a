// ─────────────────────────────────────────────
//  Battle Registry
//  Insertion-ordered table of live battle stores,
//  owned by one session manager.
// ─────────────────────────────────────────────

import type { BattleStore } from '@/engine/state/BattleStore';

export class BattleRegistry {
  private stores = new Map<string, BattleStore>();

  add(store: BattleStore): void {
    this.stores.set(store.id, store);
  }

  get(battleId: string): BattleStore | undefined {
    return this.stores.get(battleId);
  }

  delete(battleId: string): boolean {
    return this.stores.delete(battleId);
  }

  /** Snapshot of the stores in registry order; safe to mutate the registry while iterating it */
  list(): BattleStore[] {
    return [...this.stores.values()];
  }

  /** Stores whose battle has not ended */
  active(): BattleStore[] {
    return this.list().filter(s => s.getState().battle.phase !== 'ended');
  }

  activeFor(attackerId: string): BattleStore | undefined {
    return this.active().find(s => s.getState().battle.attackerId === attackerId);
  }
}
