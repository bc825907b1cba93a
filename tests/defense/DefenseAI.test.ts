import { describe, it, expect } from 'vitest';
import { DefenseAI } from '@/engine/systems/defense/DefenseAI';
import { ResearchModifiers } from '@/engine/systems/defense/ResearchModifiers';
import { EMPTY_BUFFS } from '@/engine/systems/spell/SpellEffectEngine';
import { loadBalanceTables } from '@/engine/loader/BalanceLoader';
import type { BuildingTarget } from '@/engine/data/types/Building';
import { makeTarget, makeTroop } from '../helpers';

const tables = loadBalanceTables();
const env = { now: 0, splashFactor: 0.5 };

function defense(type: string, overrides: Partial<BuildingTarget> = {}): BuildingTarget {
  return makeTarget(type.toLowerCase(), { type, category: 'defense', position: { x: 0, y: 0 }, ...overrides });
}

describe('DefenseAI', () => {
  // ── Research gating ──────────────────────────────────────────────
  it('fires once the requirement is researched', () => {
    const troop = makeTroop('t1', { position: { x: 5, y: 0 } });
    const shots = DefenseAI.step([defense('Cannon')], [troop], ['defense_basic'], tables, EMPTY_BUFFS, env);

    expect(shots).toEqual([{ buildingId: 'cannon', troopId: 't1', damage: 9 }]);
    expect(troop.currentHp).toBe(36);
  });

  it('stays silent without the requirement', () => {
    const troop = makeTroop('t1', { position: { x: 5, y: 0 } });
    const shots = DefenseAI.step([defense('Cannon')], [troop], [], tables, EMPTY_BUFFS, env);
    expect(shots).toEqual([]);
    expect(troop.currentHp).toBe(45);
  });

  it('never fires for a type with no mapped requirement', () => {
    expect(ResearchModifiers.isDefenseActive('Catapult', ['defense_basic'], tables.research)).toBe(false);
  });

  // ── Research bonuses ─────────────────────────────────────────────
  it('adds completed damage bonuses', () => {
    const troop = makeTroop('t1', { position: { x: 5, y: 0 } });
    DefenseAI.step([defense('Cannon')], [troop], ['defense_basic', 'defense_damage_1'], tables, EMPTY_BUFFS, env);
    expect(troop.currentHp).toBeCloseTo(45 - 9.9);
  });

  it('extends range with completed range bonuses', () => {
    const troop = makeTroop('t1', { position: { x: 9.5, y: 0 } });
    const base = DefenseAI.step([defense('Cannon')], [troop], ['defense_basic'], tables, EMPTY_BUFFS, env);
    expect(base).toHaveLength(0);

    const boosted = DefenseAI.step(
      [defense('Cannon')], [troop], ['defense_basic', 'defense_range_1'], tables, EMPTY_BUFFS, env,
    );
    expect(boosted).toHaveLength(1);
  });

  // ── Cadence ──────────────────────────────────────────────────────
  it('waits 1 / attackSpeed between shots', () => {
    const cannon = defense('Cannon', { lastAttackAt: 0 });
    const troop = makeTroop('t1', { position: { x: 5, y: 0 } });

    expect(DefenseAI.step([cannon], [troop], ['defense_basic'], tables, EMPTY_BUFFS, { ...env, now: 1 })).toHaveLength(0);
    expect(DefenseAI.step([cannon], [troop], ['defense_basic'], tables, EMPTY_BUFFS, { ...env, now: 1.25 })).toHaveLength(1);
    expect(cannon.lastAttackAt).toBe(1.25);
  });

  // ── Targeting ────────────────────────────────────────────────────
  it('matches ground and air layers', () => {
    expect(DefenseAI.canHit('ground', { isFlying: true })).toBe(false);
    expect(DefenseAI.canHit('ground', { isFlying: false })).toBe(true);
    expect(DefenseAI.canHit('air', { isFlying: false })).toBe(false);
    expect(DefenseAI.canHit('air', { isFlying: true })).toBe(true);
    expect(DefenseAI.canHit('both', { isFlying: true })).toBe(true);
  });

  it('lets ground defenses ignore flyers while air defenses hit them', () => {
    const dragon = makeTroop('d1', { type: 'Dragon', isFlying: true, position: { x: 4, y: 0 }, currentHp: 100, maxHp: 100 });
    const research = ['defense_basic', 'defense_anti_air'];

    DefenseAI.step([defense('Cannon')], [dragon], research, tables, EMPTY_BUFFS, env);
    expect(dragon.currentHp).toBe(100);

    DefenseAI.step([defense('AirDefense')], [dragon], research, tables, EMPTY_BUFFS, env);
    expect(dragon.currentHp).toBe(20);
  });

  it('picks the nearest compatible troop', () => {
    const far = makeTroop('far', { position: { x: 6, y: 0 } });
    const near = makeTroop('near', { position: { x: 2, y: 0 } });
    const shots = DefenseAI.step([defense('Cannon')], [far, near], ['defense_basic'], tables, EMPTY_BUFFS, env);
    expect(shots[0]?.troopId).toBe('near');
  });

  it('skips frozen and destroyed buildings', () => {
    const troop = makeTroop('t1', { position: { x: 5, y: 0 } });
    const frozen = { ...EMPTY_BUFFS, frozen: new Set(['cannon']) };
    expect(DefenseAI.step([defense('Cannon')], [troop], ['defense_basic'], tables, frozen, env)).toHaveLength(0);

    const rubble = defense('Cannon', { isDestroyed: true, currentHp: 0 });
    expect(DefenseAI.step([rubble], [troop], ['defense_basic'], tables, EMPTY_BUFFS, env)).toHaveLength(0);
  });

  // ── Splash ───────────────────────────────────────────────────────
  it('splashes half damage onto compatible troops near the target', () => {
    const a = makeTroop('a', { position: { x: 10, y: 0 } });
    const b = makeTroop('b', { position: { x: 11, y: 0 } });
    const flyer = makeTroop('f', { position: { x: 10, y: 1 }, isFlying: true });

    DefenseAI.step([defense('Mortar')], [a, b, flyer], ['defense_splash'], tables, EMPTY_BUFFS, env);

    expect(a.currentHp).toBe(25);
    expect(b.currentHp).toBe(35);
    expect(flyer.currentHp).toBe(45);
  });

  it('kills troops at 0 HP', () => {
    const troop = makeTroop('t1', { position: { x: 5, y: 0 }, currentHp: 4 });
    DefenseAI.step([defense('Cannon')], [troop], ['defense_basic'], tables, EMPTY_BUFFS, env);
    expect(troop.state).toBe('dead');
    expect(troop.currentHp).toBe(0);
  });
});
