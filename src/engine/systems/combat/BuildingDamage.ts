// ─────────────────────────────────────────────
//  Building damage application
//  All HP loss on defender buildings goes through here
//  so the Farm and TownHall rules hold for every source.
// ─────────────────────────────────────────────

import type { Battle } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import { ContextQuery } from '@/engine/state/BattleContext';

const FARM = 'Farm';
const TOWN_HALL = 'TownHall';

/** Farm reaching 0 HP stays on the field at 1 HP */
function downgrade(b: BuildingTarget): void {
  b.currentHp = 1;
  b.wasDowngraded = true;
}

export const BuildingDamage = {
  /**
   * Apply damage to a building and resolve destruction.
   * Ignores buildings that are already cleared.
   */
  apply(b: BuildingTarget, amount: number, battle: Pick<Battle, 'townHallDestroyed'>): void {
    if (ContextQuery.isCleared(b) || amount <= 0) return;

    b.currentHp = Math.max(0, b.currentHp - amount);
    if (b.currentHp > 0) return;

    if (b.type === FARM) {
      downgrade(b);
      return;
    }

    b.isDestroyed = true;
    if (b.type === TOWN_HALL) battle.townHallDestroyed = true;
  },

  /**
   * Earthquake damage: walls can be destroyed outright, everything
   * else is floored at 1 HP (Farms still downgrade).
   */
  applyQuake(b: BuildingTarget, amount: number, battle: Pick<Battle, 'townHallDestroyed'>): void {
    if (ContextQuery.isCleared(b) || amount <= 0) return;

    if (b.category === 'wall') {
      BuildingDamage.apply(b, amount, battle);
      return;
    }

    const next = b.currentHp - amount;
    if (b.type === FARM && next <= 0) {
      downgrade(b);
      return;
    }
    b.currentHp = Math.max(1, next);
  },
};
