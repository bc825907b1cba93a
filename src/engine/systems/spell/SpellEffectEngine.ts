// ─────────────────────────────────────────────
//  Spell Effect Engine
//  Instant spells resolve on cast. Duration spells live in
//  the active list and are folded into a per-tick BuffSet,
//  recomputed from scratch each tick (no stat mutation).
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import type { Battle } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import type { TroopInstance } from '@/engine/data/types/Troop';
import type {
  ActiveSpellEffect,
  DurationSpellLevel,
  InstantSpellLevel,
} from '@/engine/data/types/Spell';
import { BuildingDamage } from '@/engine/systems/combat/BuildingDamage';
import { ContextQuery } from '@/engine/state/BattleContext';
import { MathUtils } from '@/engine/utils/MathUtils';

export interface TroopBuff {
  damageBoost: number;
  speedBoost: number;
}

/** Everything duration spells change for one tick */
export interface BuffSet {
  /** Troop id → strongest rage covering it */
  rage: ReadonlyMap<string, TroopBuff>;
  /** Building ids that skip firing this tick */
  frozen: ReadonlySet<string>;
  /** Troop ids that ignore walls when targeting */
  jumping: ReadonlySet<string>;
}

export const EMPTY_BUFFS: BuffSet = {
  rage: new Map(),
  frozen: new Set(),
  jumping: new Set(),
};

function isAlive(t: TroopInstance): boolean {
  return t.state !== 'dead';
}

export const SpellEffectEngine = {
  /** Resolve Lightning / Earthquake against every standing building in radius */
  castInstant(
    data: InstantSpellLevel,
    at: Pos,
    buildings: BuildingTarget[],
    battle: Pick<Battle, 'townHallDestroyed'>,
  ): number {
    let hit = 0;
    for (const b of buildings) {
      if (ContextQuery.isCleared(b) || !MathUtils.within(b.position, at, data.radius)) continue;
      hit++;
      switch (data.kind) {
        case 'lightning':
          // numberOfStrikes bolts, landed as one lump
          BuildingDamage.apply(b, data.totalDamage, battle);
          break;
        case 'earthquake': {
          const mult = b.category === 'wall' ? data.wallDamageMultiplier : 1;
          BuildingDamage.applyQuake(b, b.maxHp * data.damagePercent * mult, battle);
          break;
        }
      }
    }
    return hit;
  },

  createEffect(id: string, type: string, at: Pos, data: DurationSpellLevel, now: number): ActiveSpellEffect {
    return {
      id,
      type,
      position: { x: at.x, y: at.y },
      radius: data.radius,
      startTime: now,
      duration: data.duration,
      data,
    };
  },

  isExpired(effect: ActiveSpellEffect, now: number): boolean {
    return now >= effect.startTime + effect.duration;
  },

  /** Drop every effect whose window has closed */
  expire(effects: readonly ActiveSpellEffect[], now: number): ActiveSpellEffect[] {
    return effects.filter(e => !SpellEffectEngine.isExpired(e, now));
  },

  /**
   * Pure buff pass for one tick.
   * Overlapping rages keep the one with the highest damageBoost.
   */
  computeBuffSet(
    effects: readonly ActiveSpellEffect[],
    troops: readonly TroopInstance[],
    buildings: readonly BuildingTarget[],
  ): BuffSet {
    const rage = new Map<string, TroopBuff>();
    const frozen = new Set<string>();
    const jumping = new Set<string>();

    for (const effect of effects) {
      const { data } = effect;
      switch (data.kind) {
        case 'rage':
          for (const t of troops) {
            if (!isAlive(t) || !MathUtils.within(t.position, effect.position, effect.radius)) continue;
            const current = rage.get(t.id);
            if (!current || data.damageBoost > current.damageBoost) {
              rage.set(t.id, { damageBoost: data.damageBoost, speedBoost: data.speedBoost });
            }
          }
          break;
        case 'freeze':
          for (const b of buildings) {
            if (!ContextQuery.isCleared(b) && MathUtils.within(b.position, effect.position, effect.radius)) {
              frozen.add(b.id);
            }
          }
          break;
        case 'jump':
          for (const t of troops) {
            if (isAlive(t) && MathUtils.within(t.position, effect.position, effect.radius)) jumping.add(t.id);
          }
          break;
        case 'heal':
          break;
      }
    }

    return { rage, frozen, jumping };
  },

  /** Heal living troops inside every heal effect, capped at maxHp */
  applyHealing(effects: readonly ActiveSpellEffect[], troops: TroopInstance[], dt: number): void {
    for (const effect of effects) {
      const { data } = effect;
      if (data.kind !== 'heal') continue;
      const amount = data.healPerSecond * dt;
      for (const t of troops) {
        if (!isAlive(t) || !MathUtils.within(t.position, effect.position, effect.radius)) continue;
        t.currentHp = Math.min(t.maxHp, t.currentHp + amount);
      }
    }
  },
};
