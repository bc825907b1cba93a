// ─────────────────────────────────────────────
//  Tick Orchestrator
//  One simulation step for one battle:
//  spells → troops → defenses → aggregates → termination.
//  Pure over BattleContext; the caller stores the result.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { EndReason } from '@/engine/data/types/Battle';
import type { BalanceTables } from '@/engine/loader/BalanceLoader';
import type { EngineConfig } from '@/config';
import type { BattleContext } from '@/engine/state/BattleContext';
import { ContextQuery } from '@/engine/state/BattleContext';
import { PhaseMachine } from '@/engine/systems/phase/PhaseMachine';
import { SpellEffectEngine } from '@/engine/systems/spell/SpellEffectEngine';
import { TroopSystem } from '@/engine/systems/troop/TroopSystem';
import { DefenseAI } from '@/engine/systems/defense/DefenseAI';
import { OutcomeCalculator } from '@/engine/systems/outcome/OutcomeCalculator';
import { Logger } from '@/engine/utils/Logger';

export interface TickDeps {
  tables: BalanceTables;
  config: Pick<EngineConfig, 'tickDuration' | 'attackInterval' | 'splashFactor'>;
}

export interface TickResult {
  next: BattleContext;
  /** Set when this tick should end the battle */
  termination: EndReason | null;
}

export const TickOrchestrator = {
  run(ctx: BattleContext, now: number, deps: TickDeps): TickResult {
    const timeout = PhaseMachine.checkTimeout(ctx.battle, now);
    if (timeout) return { next: ctx, termination: timeout };
    if (ctx.battle.phase !== 'battle') return { next: ctx, termination: null };

    const { tables, config } = deps;

    const next = produce(ctx, draft => {
      const { battle } = draft;

      // ── Spells ──
      draft.activeEffects = SpellEffectEngine.expire(draft.activeEffects, now);
      const buffs = SpellEffectEngine.computeBuffSet(draft.activeEffects, battle.troops, draft.buildings);
      SpellEffectEngine.applyHealing(draft.activeEffects, battle.troops, config.tickDuration);

      // ── Troops ──
      const troopEnv = {
        now,
        dt: config.tickDuration,
        attackInterval: config.attackInterval,
        splashFactor: config.splashFactor,
      };
      for (const troop of ContextQuery.liveTroops(battle.troops)) {
        const stats = tables.troopLevel(troop.type, troop.level);
        if (!stats) {
          Logger.warn(`No level data for ${troop.type} L${troop.level}; skipping ${troop.id}`);
          continue;
        }
        TroopSystem.step(troop, stats, draft.buildings, battle, buffs, troopEnv);
      }

      // ── Defenses ──
      DefenseAI.step(draft.buildings, battle.troops, draft.research, tables, buffs, {
        now,
        splashFactor: config.splashFactor,
      });

      // ── Aggregates ──
      battle.destruction = Math.max(
        battle.destruction,
        ContextQuery.destructionPercent(draft.buildings, draft.totalHp),
      );
      battle.starsEarned = OutcomeCalculator.starsFor(
        battle.destruction,
        battle.townHallDestroyed,
        tables.config.combat.victoryThresholds,
      );
    });

    return { next, termination: PhaseMachine.checkCompletion(next.battle, next.buildings) };
  },
};
