// ─────────────────────────────────────────────
//  Battle Context: everything one battle owns
//  The battle record plus the per-battle tables the
//  simulation needs (buildings, active effects, research).
// ─────────────────────────────────────────────

import type { Battle } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import type { ActiveSpellEffect } from '@/engine/data/types/Spell';
import type { TroopInstance } from '@/engine/data/types/Troop';

export interface BattleContext {
  readonly battle: Battle;

  /** Defender layout, in snapshot order */
  readonly buildings: BuildingTarget[];

  /** Duration spells still on the field */
  readonly activeEffects: ActiveSpellEffect[];

  /** Defender's completed research ids, frozen at battle start */
  readonly research: string[];

  /** Σ maxHp of every building; denominator for destruction */
  readonly totalHp: number;

  readonly attackerTownHallLevel: number;
  readonly defenderTownHallLevel: number;
}

/** Utility helpers for querying a BattleContext */
export const ContextQuery = {
  /** Destroyed, or a Farm already knocked down to 1 HP */
  isCleared(b: BuildingTarget): boolean {
    return b.isDestroyed || b.wasDowngraded === true;
  },

  standingBuildings(buildings: readonly BuildingTarget[]): BuildingTarget[] {
    return buildings.filter(b => !ContextQuery.isCleared(b));
  },

  liveTroops(troops: readonly TroopInstance[]): TroopInstance[] {
    return troops.filter(t => t.state !== 'dead');
  },

  /** HP removed from the layout so far: full maxHp for destroyed, the missing part otherwise */
  destroyedHp(buildings: readonly BuildingTarget[]): number {
    let total = 0;
    for (const b of buildings) {
      total += b.isDestroyed ? b.maxHp : b.maxHp - b.currentHp;
    }
    return total;
  },

  /** floor(destroyedHp / totalHp × 100) */
  destructionPercent(buildings: readonly BuildingTarget[], totalHp: number): number {
    if (totalHp <= 0) return 0;
    return Math.floor((ContextQuery.destroyedHp(buildings) / totalHp) * 100);
  },
};
