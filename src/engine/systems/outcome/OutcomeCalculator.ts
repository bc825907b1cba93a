// ─────────────────────────────────────────────
//  Outcome Calculator
//  Turns a finished battle into a BattleResult, and applies
//  the result to both player snapshots (immer recipes).
//  Everything here is pure; the session manager decides when.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { BalanceConfig, VictoryThreshold } from '@/engine/data/types/Balance';
import type { BattleResult, EndReason } from '@/engine/data/types/Battle';
import type { PlayerSnapshot, ResourceBundle } from '@/engine/data/types/Player';
import type { BattleContext } from '@/engine/state/BattleContext';
import { ContextQuery } from '@/engine/state/BattleContext';

const SECONDS_PER_HOUR = 3600;

export interface TrophyDelta {
  attacker: number;
  defender: number;
}

/** Avoids -0 when a floored amount is zero */
function negate(n: number): number {
  return n === 0 ? 0 : -n;
}

function scaleLoot(bundle: ResourceBundle, factor: number): ResourceBundle {
  return {
    gold: Math.floor(bundle.gold * factor),
    wood: Math.floor(bundle.wood * factor),
    food: Math.floor(bundle.food * factor),
  };
}

/** Keep the newest `limit` entries */
function bound<T>(list: T[], limit: number): void {
  if (list.length > limit) list.splice(0, list.length - limit);
}

export const OutcomeCalculator = {
  /** Highest threshold whose destruction requirement is met */
  thresholdFor(destruction: number, thresholds: readonly VictoryThreshold[]): VictoryThreshold | undefined {
    let pick: VictoryThreshold | undefined;
    for (const t of thresholds) {
      if (destruction >= t.destruction && (!pick || t.destruction >= pick.destruction)) pick = t;
    }
    return pick;
  },

  /** Stars from destruction; destroying the TownHall is worth at least one */
  starsFor(destruction: number, townHallDestroyed: boolean, thresholds: readonly VictoryThreshold[]): number {
    const stars = OutcomeCalculator.thresholdFor(destruction, thresholds)?.stars ?? 0;
    return townHallDestroyed ? Math.max(1, stars) : stars;
  },

  /** floor at each step: threshold share, TownHall bonus, revenge bonus */
  lootFor(
    available: ResourceBundle,
    lootPercent: number,
    townHallDestroyed: boolean,
    isRevenge: boolean,
    cfg: BalanceConfig['loot'],
  ): ResourceBundle {
    let loot = scaleLoot(available, lootPercent);
    if (townHallDestroyed) loot = scaleLoot(loot, 1 + cfg.townHallBonus);
    if (isRevenge) loot = scaleLoot(loot, 1 + cfg.revengeBonus);
    return loot;
  },

  /** base^(defenderTH − attackerTH): above 1 when punching up */
  trophyMultiplier(attackerTH: number, defenderTH: number, base: number): number {
    return Math.pow(base, defenderTH - attackerTH);
  },

  trophyDeltas(victory: boolean, stars: number, multiplier: number, cfg: BalanceConfig['trophies']): TrophyDelta {
    if (victory) {
      return {
        attacker: Math.floor(((cfg.baseWin * stars) / 3) * multiplier),
        defender: negate(Math.floor(cfg.baseLoss * multiplier)),
      };
    }
    return {
      attacker: negate(Math.floor(cfg.baseLoss / multiplier)),
      defender: Math.floor(cfg.baseWin / multiplier),
    };
  },

  shieldHours(stars: number, cfg: BalanceConfig['combat']['shieldHours']): number {
    if (stars >= 3) return cfg.threeStar;
    if (stars === 2) return cfg.twoStar;
    if (stars === 1) return cfg.oneStar;
    return 0;
  },

  /** Final destruction: current building state, never below the last recorded value */
  finalDestruction(ctx: BattleContext): number {
    return Math.max(ctx.battle.destruction, ContextQuery.destructionPercent(ctx.buildings, ctx.totalHp));
  },

  calculate(ctx: BattleContext, endReason: EndReason, now: number, balance: BalanceConfig): BattleResult {
    const { battle } = ctx;
    const thresholds = balance.combat.victoryThresholds;

    const destruction = OutcomeCalculator.finalDestruction(ctx);
    const stars = OutcomeCalculator.starsFor(destruction, battle.townHallDestroyed, thresholds);
    const victory = stars > 0;

    const lootPercent = OutcomeCalculator.thresholdFor(destruction, thresholds)?.lootPercent ?? 0;
    const loot = OutcomeCalculator.lootFor(
      battle.lootAvailable, lootPercent, battle.townHallDestroyed, battle.isRevenge, balance.loot,
    );

    const mult = OutcomeCalculator.trophyMultiplier(
      ctx.attackerTownHallLevel, ctx.defenderTownHallLevel, balance.trophies.thDifferenceMultiplier,
    );
    const trophies = OutcomeCalculator.trophyDeltas(victory, stars, mult, balance.trophies);

    // Dead or wounded troops count as lost
    const troopsLost: Record<string, number> = {};
    for (const t of battle.troops) {
      if (t.state === 'dead' || t.currentHp < t.maxHp) {
        troopsLost[t.type] = (troopsLost[t.type] ?? 0) + 1;
      }
    }

    const spellsUsed: Record<string, number> = {};
    for (const s of battle.spells) spellsUsed[s.type] = (spellsUsed[s.type] ?? 0) + 1;

    return {
      battleId: battle.id,
      attackerId: battle.attackerId,
      defenderId: battle.defenderId,
      endReason,
      victory,
      destruction,
      stars,
      isConquest: destruction >= 100,
      townHallDestroyed: battle.townHallDestroyed,
      loot,
      trophiesGained: trophies.attacker,
      defenderTrophyChange: trophies.defender,
      xpGained: victory ? balance.xp.battleWin : balance.xp.battleLoss,
      shieldHours: OutcomeCalculator.shieldHours(stars, balance.combat.shieldHours),
      duration: now - battle.startedAt,
      troopsLost,
      spellsUsed,
      buildingsDestroyed: ctx.buildings.filter(b => b.isDestroyed).length,
      isRevenge: battle.isRevenge,
      revengeLootBonus: battle.isRevenge ? balance.loot.revengeBonus : 0,
    };
  },

  /** Loot, trophies, xp and stats for the attacker; consumes a revenge entry */
  applyToAttacker(player: Draft<PlayerSnapshot>, result: BattleResult): void {
    player.resources.gold += result.loot.gold;
    player.resources.wood += result.loot.wood;
    player.resources.food += result.loot.food;

    player.trophies.current = Math.max(0, player.trophies.current + result.trophiesGained);
    player.trophies.best = Math.max(player.trophies.best, player.trophies.current);

    player.stats.xp += result.xpGained;
    if (result.victory) player.stats.attacksWon += 1;
    player.stats.buildingsDestroyed += result.buildingsDestroyed;
    for (const n of Object.values(result.troopsLost)) player.stats.troopsLost += n;

    if (result.isRevenge) {
      const entry = player.revengeList.find(e => e.attackerId === result.defenderId && !e.used);
      if (entry) entry.used = true;
    }
  },

  /** Resource loss, trophies, shield, defense log and revenge entry for the defender */
  applyToDefender(
    player: Draft<PlayerSnapshot>,
    result: BattleResult,
    attacker: Pick<PlayerSnapshot, 'id' | 'name'>,
    now: number,
    combat: BalanceConfig['combat'],
    logLimit: number,
  ): void {
    player.resources.gold = Math.max(0, player.resources.gold - result.loot.gold);
    player.resources.wood = Math.max(0, player.resources.wood - result.loot.wood);
    player.resources.food = Math.max(0, player.resources.food - result.loot.food);

    player.trophies.current = Math.max(0, player.trophies.current + result.defenderTrophyChange);
    player.trophies.best = Math.max(player.trophies.best, player.trophies.current);
    if (!result.victory) player.stats.defensesWon += 1;

    if (result.shieldHours > 0) {
      player.shield = { expiresAt: now + result.shieldHours * SECONDS_PER_HOUR, source: 'attack' };
    }

    player.defenseLog.push({
      battleId: result.battleId,
      attackerId: attacker.id,
      attackerName: attacker.name,
      stars: result.stars,
      destruction: result.destruction,
      loot: { ...result.loot },
      trophyChange: result.defenderTrophyChange,
      timestamp: now,
      canRevenge: true,
    });
    bound(player.defenseLog, logLimit);

    player.revengeList.push({
      attackerId: attacker.id,
      attackerName: attacker.name,
      attackTime: now,
      expiresAt: now + combat.revengeWindowHours * SECONDS_PER_HOUR,
      used: false,
    });
    bound(player.revengeList, logLimit);
  },
};
