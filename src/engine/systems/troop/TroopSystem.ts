// ─────────────────────────────────────────────
//  Troop System
//  Per-tick behavior of one attacking troop:
//  pick a target, then hit it or walk toward it.
// ─────────────────────────────────────────────

import type { Battle } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import type { TroopInstance, TroopLevelData } from '@/engine/data/types/Troop';
import type { BuffSet } from '@/engine/systems/spell/SpellEffectEngine';
import { TargetSelector } from '@/engine/systems/targeting/TargetSelector';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { BuildingDamage } from '@/engine/systems/combat/BuildingDamage';
import { ContextQuery } from '@/engine/state/BattleContext';
import { MathUtils } from '@/engine/utils/MathUtils';

export interface TroopTickEnv {
  now: number;
  /** Simulated seconds per tick */
  dt: number;
  /** Seconds between two hits of the same troop */
  attackInterval: number;
  splashFactor: number;
}

export const TroopSystem = {
  /** Whether the troop's hit cooldown has elapsed */
  canAttack(troop: Pick<TroopInstance, 'lastAttackAt'>, now: number, interval: number): boolean {
    return troop.lastAttackAt === undefined || now - troop.lastAttackAt >= interval;
  },

  /** Resolve one hit: splash on neighbours of the target first, then the target itself */
  strike(
    troop: TroopInstance,
    stats: TroopLevelData,
    target: BuildingTarget,
    buildings: BuildingTarget[],
    battle: Pick<Battle, 'townHallDestroyed'>,
    buffs: BuffSet,
    env: TroopTickEnv,
  ): number {
    const dmg = DamageCalc.troopHit(stats, target, env.attackInterval, buffs.rage.get(troop.id));
    troop.lastAttackAt = env.now;

    const radius = stats.splashRadius ?? 0;
    if (radius > 0) {
      const splashDmg = DamageCalc.splash(dmg, env.splashFactor);
      for (const other of buildings) {
        if (other.id === target.id || ContextQuery.isCleared(other)) continue;
        if (MathUtils.within(other.position, target.position, radius)) {
          BuildingDamage.apply(other, splashDmg, battle);
        }
      }
    }

    BuildingDamage.apply(target, dmg, battle);
    return dmg;
  },

  /** Advance one living troop by one tick */
  step(
    troop: TroopInstance,
    stats: TroopLevelData,
    buildings: BuildingTarget[],
    battle: Pick<Battle, 'townHallDestroyed'>,
    buffs: BuffSet,
    env: TroopTickEnv,
  ): void {
    if (troop.state === 'dead') return;

    const target = TargetSelector.select(
      troop.position,
      stats.preferredTarget,
      buildings,
      buffs.jumping.has(troop.id),
    );
    if (!target) {
      // Nothing left standing; idle in place
      troop.state = 'moving';
      troop.targetId = undefined;
      return;
    }
    troop.targetId = target.id;

    if (MathUtils.dist(troop.position, target.position) <= stats.attackRange) {
      troop.state = 'attacking';
      if (TroopSystem.canAttack(troop, env.now, env.attackInterval)) {
        TroopSystem.strike(troop, stats, target, buildings, battle, buffs, env);
      }
      return;
    }

    troop.state = 'moving';
    const speedBoost = buffs.rage.get(troop.id)?.speedBoost ?? 1;
    troop.position = MathUtils.stepToward(troop.position, target.position, stats.moveSpeed * speedBoost * env.dt);
  },
};
