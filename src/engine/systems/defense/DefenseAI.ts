// ─────────────────────────────────────────────
//  Defense AI
//  Defender buildings fire at the nearest compatible troop
//  in range. Gated by research, skipped while frozen.
// ─────────────────────────────────────────────

import type { BuildingTarget, DefenseProfile } from '@/engine/data/types/Building';
import { defenseProfile } from '@/engine/data/types/Building';
import type { TargetType, TroopInstance } from '@/engine/data/types/Troop';
import type { BalanceTables } from '@/engine/loader/BalanceLoader';
import type { BuffSet } from '@/engine/systems/spell/SpellEffectEngine';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { TargetSelector } from '@/engine/systems/targeting/TargetSelector';
import { ContextQuery } from '@/engine/state/BattleContext';
import { MathUtils } from '@/engine/utils/MathUtils';
import { ResearchModifiers } from './ResearchModifiers';

export interface DefenseTickEnv {
  now: number;
  splashFactor: number;
}

export interface DefenseShot {
  buildingId: string;
  troopId: string;
  damage: number;
}

export const DefenseAI = {
  canHit(targetType: TargetType, troop: Pick<TroopInstance, 'isFlying'>): boolean {
    if (targetType === 'both') return true;
    return targetType === 'air' ? troop.isFlying : !troop.isFlying;
  },

  /** Nearest living troop this profile can hit, within `range` of the building */
  pickTarget(
    building: BuildingTarget,
    profile: Pick<DefenseProfile, 'targetType'>,
    range: number,
    troops: readonly TroopInstance[],
  ): TroopInstance | undefined {
    const inReach = troops.filter(t =>
      t.state !== 'dead' &&
      DefenseAI.canHit(profile.targetType, t) &&
      MathUtils.within(t.position, building.position, range),
    );
    return TargetSelector.nearest(building.position, inReach);
  },

  /** Apply damage to a troop; HP clamps at 0 and the troop dies there */
  damageTroop(troop: TroopInstance, amount: number): void {
    if (troop.state === 'dead') return;
    troop.currentHp = Math.max(0, troop.currentHp - amount);
    if (troop.currentHp === 0) {
      troop.state = 'dead';
      troop.targetId = undefined;
    }
  },

  /** Run every defense once; returns the shots fired this tick */
  step(
    buildings: BuildingTarget[],
    troops: TroopInstance[],
    research: readonly string[],
    tables: BalanceTables,
    buffs: BuffSet,
    env: DefenseTickEnv,
  ): DefenseShot[] {
    const shots: DefenseShot[] = [];
    const dmgMult = ResearchModifiers.damageMultiplier(research, tables.research);
    const rangeMult = ResearchModifiers.rangeMultiplier(research, tables.research);

    for (const b of buildings) {
      if (ContextQuery.isCleared(b) || buffs.frozen.has(b.id)) continue;
      if (!ResearchModifiers.isDefenseActive(b.type, research, tables.research)) continue;

      const levelData = tables.buildingLevel(b.type, b.level);
      const profile = levelData ? defenseProfile(levelData) : null;
      if (!profile) continue;

      const interval = 1 / profile.attackSpeed;
      if (b.lastAttackAt !== undefined && env.now - b.lastAttackAt < interval) continue;

      const target = DefenseAI.pickTarget(b, profile, profile.range * rangeMult, troops);
      if (!target) continue;

      const dmg = DamageCalc.defenseShot(profile, dmgMult);
      b.lastAttackAt = env.now;

      if (profile.splashRadius > 0) {
        const splashDmg = DamageCalc.splash(dmg, env.splashFactor);
        for (const other of troops) {
          if (other.id === target.id || other.state === 'dead') continue;
          if (!DefenseAI.canHit(profile.targetType, other)) continue;
          if (MathUtils.within(other.position, target.position, profile.splashRadius)) {
            DefenseAI.damageTroop(other, splashDmg);
          }
        }
      }

      DefenseAI.damageTroop(target, dmg);
      shots.push({ buildingId: b.id, troopId: target.id, damage: dmg });
    }

    return shots;
  },
};
