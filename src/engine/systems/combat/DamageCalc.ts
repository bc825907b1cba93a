// ─────────────────────────────────────────────
//  Damage Calculation System
//  Pure functions.
// ─────────────────────────────────────────────

import type { TroopLevelData } from '@/engine/data/types/Troop';
import type { BuildingTarget, DefenseProfile } from '@/engine/data/types/Building';
import type { TroopBuff } from '@/engine/systems/spell/SpellEffectEngine';

export const DamageCalc = {
  /**
   * Damage of one troop hit against a building.
   * dps × interval, scaled by rage and by the wall multiplier when hitting a wall.
   */
  troopHit(
    stats: Pick<TroopLevelData, 'dps' | 'wallDamageMultiplier'>,
    target: Pick<BuildingTarget, 'category'>,
    interval: number,
    buff?: TroopBuff,
  ): number {
    let dmg = stats.dps * interval;
    if (buff) dmg *= buff.damageBoost;
    if (target.category === 'wall' && stats.wallDamageMultiplier !== undefined) {
      dmg *= stats.wallDamageMultiplier;
    }
    return dmg;
  },

  /** Damage of one defense shot after research bonuses */
  defenseShot(profile: Pick<DefenseProfile, 'damage'>, damageMultiplier: number): number {
    return profile.damage * damageMultiplier;
  },

  /** Share of a hit dealt to each secondary target in a splash */
  splash(dmg: number, splashFactor: number): number {
    return dmg * splashFactor;
  },
};
