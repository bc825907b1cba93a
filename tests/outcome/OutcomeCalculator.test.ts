import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import { OutcomeCalculator } from '@/engine/systems/outcome/OutcomeCalculator';
import { loadBalanceTables } from '@/engine/loader/BalanceLoader';
import type { BattleResult } from '@/engine/data/types/Battle';
import type { DefenseLogEntry } from '@/engine/data/types/Player';
import { makeContext, makePlayer, makeTarget, makeTroop } from '../helpers';

const balance = loadBalanceTables().config;
const thresholds = balance.combat.victoryThresholds;

function makeResult(overrides: Partial<BattleResult> = {}): BattleResult {
  return {
    battleId: 'battle_1',
    attackerId: 'att',
    defenderId: 'def',
    endReason: 'manual',
    victory: true,
    destruction: 60,
    stars: 2,
    isConquest: false,
    townHallDestroyed: false,
    loot: { gold: 100, wood: 50, food: 20 },
    trophiesGained: 20,
    defenderTrophyChange: -20,
    xpGained: 50,
    shieldHours: 12,
    duration: 90,
    troopsLost: { Barbarian: 2, Archer: 1 },
    spellsUsed: {},
    buildingsDestroyed: 4,
    isRevenge: false,
    revengeLootBonus: 0,
    ...overrides,
  };
}

describe('OutcomeCalculator', () => {
  // ── Stars ────────────────────────────────────────────────────────
  it.each([
    [0, 0], [39, 0], [40, 1], [59, 1], [60, 2], [80, 2], [99, 2], [100, 3],
  ])('gives %i%% destruction %i stars', (destruction, stars) => {
    expect(OutcomeCalculator.starsFor(destruction, false, thresholds)).toBe(stars);
  });

  it('guarantees one star for a destroyed TownHall', () => {
    expect(OutcomeCalculator.starsFor(10, true, thresholds)).toBe(1);
    expect(OutcomeCalculator.starsFor(60, true, thresholds)).toBe(2);
  });

  // ── Loot ─────────────────────────────────────────────────────────
  describe('lootFor', () => {
    const available = { gold: 1000, wood: 500, food: 101 };

    it('takes the threshold share, floored', () => {
      expect(OutcomeCalculator.lootFor(available, 0.4, false, false, balance.loot))
        .toEqual({ gold: 400, wood: 200, food: 40 });
    });

    it('floors after each bonus', () => {
      expect(OutcomeCalculator.lootFor(available, 0.4, true, false, balance.loot))
        .toEqual({ gold: 440, wood: 220, food: 44 });
      expect(OutcomeCalculator.lootFor(available, 0.4, true, true, balance.loot))
        .toEqual({ gold: 528, wood: 264, food: 52 });
    });
  });

  // ── Trophies ─────────────────────────────────────────────────────
  describe('trophies', () => {
    const cfg = { baseWin: 30, baseLoss: 20, thDifferenceMultiplier: 2 };

    it('raises the multiplier when attacking up and lowers it when attacking down', () => {
      expect(OutcomeCalculator.trophyMultiplier(5, 6, 2)).toBe(2);
      expect(OutcomeCalculator.trophyMultiplier(6, 5, 2)).toBe(0.5);
      expect(OutcomeCalculator.trophyMultiplier(5, 5, 2)).toBe(1);
    });

    it('scales a win by stars', () => {
      expect(OutcomeCalculator.trophyDeltas(true, 3, 1, cfg)).toEqual({ attacker: 30, defender: -20 });
      expect(OutcomeCalculator.trophyDeltas(true, 1, 1, cfg)).toEqual({ attacker: 10, defender: -20 });
      expect(OutcomeCalculator.trophyDeltas(true, 3, 2, cfg)).toEqual({ attacker: 60, defender: -40 });
    });

    it('divides a loss by the multiplier', () => {
      expect(OutcomeCalculator.trophyDeltas(false, 0, 1, cfg)).toEqual({ attacker: -20, defender: 30 });
      expect(OutcomeCalculator.trophyDeltas(false, 0, 2, cfg)).toEqual({ attacker: -10, defender: 15 });
    });

    it('reports a zero change as 0', () => {
      const free = { baseWin: 30, baseLoss: 0, thDifferenceMultiplier: 1 };
      expect(OutcomeCalculator.trophyDeltas(true, 3, 1, free).defender).toBe(0);
    });
  });

  it.each([[0, 0], [1, 8], [2, 12], [3, 16]])('grants a %i-star defense %i shield hours', (stars, hours) => {
    expect(OutcomeCalculator.shieldHours(stars, balance.combat.shieldHours)).toBe(hours);
  });

  // ── calculate ────────────────────────────────────────────────────
  describe('calculate', () => {
    it('treats full destruction as a conquest with maximum stars', () => {
      const ctx = makeContext(
        [
          makeTarget('a', { isDestroyed: true, currentHp: 0 }),
          makeTarget('b', { isDestroyed: true, currentHp: 0 }),
        ],
        { startedAt: 100, lootAvailable: { gold: 200, wood: 100, food: 40 } },
      );
      const result = OutcomeCalculator.calculate(ctx, 'all_destroyed', 160, balance);

      expect(result.destruction).toBe(100);
      expect(result.isConquest).toBe(true);
      expect(result.stars).toBe(3);
      expect(result.townHallDestroyed).toBe(false);
      expect(result.loot).toEqual({ gold: 200, wood: 100, food: 40 });
      expect(result.trophiesGained).toBe(30);
      expect(result.defenderTrophyChange).toBe(-20);
      expect(result.xpGained).toBe(50);
      expect(result.shieldHours).toBe(16);
      expect(result.duration).toBe(60);
      expect(result.buildingsDestroyed).toBe(2);
    });

    it('counts dead and wounded troops as lost, and spells by type', () => {
      const ctx = makeContext([makeTarget('a')], {
        troops: [
          makeTroop('t1', { state: 'dead', currentHp: 0 }),
          makeTroop('t2', { currentHp: 30 }),
          makeTroop('t3'),
          makeTroop('t4', { type: 'Archer', state: 'dead', currentHp: 0, maxHp: 20 }),
        ],
        spells: [
          { id: 's1', type: 'Rage', level: 1, position: { x: 0, y: 0 }, radius: 5, deployedAt: 0, expiresAt: 18 },
          { id: 's2', type: 'Rage', level: 1, position: { x: 0, y: 0 }, radius: 5, deployedAt: 1, expiresAt: 19 },
        ],
      });
      const result = OutcomeCalculator.calculate(ctx, 'timeout', 180, balance);

      expect(result.troopsLost).toEqual({ Barbarian: 2, Archer: 1 });
      expect(result.spellsUsed).toEqual({ Rage: 2 });
      expect(result.victory).toBe(false);
      expect(result.trophiesGained).toBe(-20);
      expect(result.defenderTrophyChange).toBe(30);
      expect(result.xpGained).toBe(10);
    });

    it('reports the revenge bonus only for revenge battles', () => {
      const ctx = makeContext([makeTarget('a')], { isRevenge: true });
      expect(OutcomeCalculator.calculate(ctx, 'manual', 0, balance).revengeLootBonus).toBe(0.2);
    });
  });

  // ── Side effects ─────────────────────────────────────────────────
  describe('applyToAttacker', () => {
    it('adds loot, trophies, xp and stats', () => {
      const before = makePlayer('att');
      const after = produce(before, d => OutcomeCalculator.applyToAttacker(d, makeResult()));

      expect(after.resources).toEqual({ gold: 1100, wood: 550, food: 220 });
      expect(after.trophies).toEqual({ current: 120, best: 120 });
      expect(after.stats).toEqual({ xp: 50, attacksWon: 1, defensesWon: 0, buildingsDestroyed: 4, troopsLost: 3 });
    });

    it('floors trophies at 0 and keeps the best record', () => {
      const before = makePlayer('att', { trophies: { current: 5, best: 300 } });
      const after = produce(before, d =>
        OutcomeCalculator.applyToAttacker(d, makeResult({ victory: false, trophiesGained: -20 })),
      );
      expect(after.trophies).toEqual({ current: 0, best: 300 });
    });

    it('uses up the revenge entry against the defender', () => {
      const before = makePlayer('att', {
        revengeList: [{ attackerId: 'def', attackerName: 'Player def', attackTime: 0, expiresAt: 9999, used: false }],
      });
      const after = produce(before, d => OutcomeCalculator.applyToAttacker(d, makeResult({ isRevenge: true })));
      expect(after.revengeList[0]?.used).toBe(true);
    });
  });

  describe('applyToDefender', () => {
    const attacker = { id: 'att', name: 'Raider' };

    it('removes loot, moves trophies, shields and logs the attack', () => {
      const before = makePlayer('def');
      const after = produce(before, d =>
        OutcomeCalculator.applyToDefender(d, makeResult(), attacker, 500, balance.combat, 50),
      );

      expect(after.resources).toEqual({ gold: 900, wood: 450, food: 180 });
      expect(after.trophies).toEqual({ current: 80, best: 100 });
      expect(after.shield).toEqual({ expiresAt: 500 + 12 * 3600, source: 'attack' });
      expect(after.stats.defensesWon).toBe(0);
      expect(after.defenseLog).toEqual([{
        battleId: 'battle_1',
        attackerId: 'att',
        attackerName: 'Raider',
        stars: 2,
        destruction: 60,
        loot: { gold: 100, wood: 50, food: 20 },
        trophyChange: -20,
        timestamp: 500,
        canRevenge: true,
      }]);
      expect(after.revengeList).toEqual([
        { attackerId: 'att', attackerName: 'Raider', attackTime: 500, expiresAt: 500 + 24 * 3600, used: false },
      ]);
    });

    it('counts a defeat as a won defense and grants no shield', () => {
      const before = makePlayer('def');
      const result = makeResult({ victory: false, stars: 0, shieldHours: 0, defenderTrophyChange: 30, loot: { gold: 0, wood: 0, food: 0 } });
      const after = produce(before, d => OutcomeCalculator.applyToDefender(d, result, attacker, 500, balance.combat, 50));

      expect(after.stats.defensesWon).toBe(1);
      expect(after.shield).toBeNull();
      expect(after.trophies).toEqual({ current: 130, best: 130 });
    });

    it('floors resources at 0', () => {
      const before = makePlayer('def', { resources: { gold: 50, wood: 500, food: 200 } });
      const after = produce(before, d =>
        OutcomeCalculator.applyToDefender(d, makeResult(), attacker, 500, balance.combat, 50),
      );
      expect(after.resources.gold).toBe(0);
    });

    it('keeps only the newest entries in the defense log', () => {
      const old: DefenseLogEntry[] = Array.from({ length: 50 }, (_, i) => ({
        battleId: `old_${i}`,
        attackerId: 'x',
        attackerName: 'x',
        stars: 0,
        destruction: 0,
        loot: { gold: 0, wood: 0, food: 0 },
        trophyChange: 0,
        timestamp: i,
        canRevenge: false,
      }));
      const before = makePlayer('def', { defenseLog: old });
      const after = produce(before, d =>
        OutcomeCalculator.applyToDefender(d, makeResult(), attacker, 500, balance.combat, 50),
      );

      expect(after.defenseLog).toHaveLength(50);
      expect(after.defenseLog[0]?.battleId).toBe('old_1');
      expect(after.defenseLog[49]?.battleId).toBe('battle_1');
    });
  });
});
