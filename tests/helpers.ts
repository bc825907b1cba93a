// ─────────────────────────────────────────────
//  Test Helpers
//  Headless battle scenarios: in-memory players, a manual
//  clock and a bus that records every notification.
// ─────────────────────────────────────────────

import type { PlacedBuilding, PlayerSnapshot } from '@/engine/data/types/Player';
import type { Battle } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import type { TroopInstance } from '@/engine/data/types/Troop';
import type { BattleContext } from '@/engine/state/BattleContext';
import type { BalanceSources, BalanceTables } from '@/engine/loader/BalanceLoader';
import { loadBalanceTables } from '@/engine/loader/BalanceLoader';
import { InMemoryPlayerStore } from '@/engine/ports/PlayerStore';
import { SnapshotInventory } from '@/engine/ports/InventoryService';
import { BattleSessionManager } from '@/engine/session/BattleSessionManager';
import { BattleEventBus } from '@/engine/utils/EventBus';
import type { BattleEventMap } from '@/engine/utils/EventBus';
import { ManualClock } from '@/engine/utils/Clock';
import { Logger } from '@/engine/utils/Logger';
import type { EngineConfig } from '@/config';

Logger.setEnabled(false);

/** Clock reading every harness starts at */
export const T0 = 1000;

// ── Snapshot factories ───────────────────────

export function placed(id: string, type: string, x: number, y: number, level = 1): PlacedBuilding {
  return { id, type, level, position: { x, y } };
}

export function makePlayer(id: string, overrides: Partial<PlayerSnapshot> = {}): PlayerSnapshot {
  return {
    id,
    name: `Player ${id}`,
    townHallLevel: 1,
    resources: { gold: 1000, wood: 500, food: 200 },
    trophies: { current: 100, best: 100 },
    stats: { xp: 0, attacksWon: 0, defensesWon: 0, buildingsDestroyed: 0, troopsLost: 0 },
    research: [],
    buildings: [],
    troops: {},
    spells: {},
    troopLevels: {},
    spellLevels: {},
    shield: null,
    revengeList: [],
    defenseLog: [],
    ...overrides,
  };
}

// ── Battle entity factories ──────────────────

export function makeTarget(id: string, overrides: Partial<BuildingTarget> = {}): BuildingTarget {
  return {
    id,
    type: 'Hut',
    level: 1,
    position: { x: 0, y: 0 },
    currentHp: 400,
    maxHp: 400,
    isDestroyed: false,
    category: 'other',
    ...overrides,
  };
}

export function makeTroop(id: string, overrides: Partial<TroopInstance> = {}): TroopInstance {
  return {
    id,
    type: 'Barbarian',
    level: 1,
    position: { x: 0, y: 0 },
    state: 'moving',
    currentHp: 45,
    maxHp: 45,
    isFlying: false,
    deployedAt: 0,
    ...overrides,
  };
}

export function makeBattle(overrides: Partial<Battle> = {}): Battle {
  return {
    id: 'battle_1',
    attackerId: 'att',
    defenderId: 'def',
    phase: 'battle',
    startedAt: 0,
    endsAt: 180,
    scoutEndsAt: 0,
    troops: [],
    spells: [],
    remainingTroops: {},
    remainingSpells: {},
    destruction: 0,
    starsEarned: 0,
    townHallDestroyed: false,
    lootAvailable: { gold: 0, wood: 0, food: 0 },
    lootClaimed: { gold: 0, wood: 0, food: 0 },
    isRevenge: false,
    ...overrides,
  };
}

export function makeContext(
  buildings: BuildingTarget[],
  battle: Partial<Battle> = {},
  overrides: Partial<Omit<BattleContext, 'battle' | 'buildings'>> = {},
): BattleContext {
  return {
    battle: makeBattle(battle),
    buildings,
    activeEffects: [],
    research: [],
    totalHp: buildings.reduce((sum, b) => sum + b.maxHp, 0),
    attackerTownHallLevel: 1,
    defenderTownHallLevel: 1,
    ...overrides,
  };
}

// ── Session harness ──────────────────────────

type Recorded = { [K in keyof BattleEventMap]: BattleEventMap[K][] };

export interface Harness {
  manager: BattleSessionManager;
  players: InMemoryPlayerStore;
  clock: ManualClock;
  bus: BattleEventBus;
  tables: BalanceTables;
  events: Recorded;
}

export interface HarnessOptions {
  attacker?: Partial<PlayerSnapshot>;
  defender?: Partial<PlayerSnapshot>;
  sources?: Partial<BalanceSources>;
  config?: Partial<EngineConfig>;
}

export function makeHarness(opts: HarnessOptions = {}): Harness {
  const tables = loadBalanceTables(opts.sources);
  const players = new InMemoryPlayerStore([
    makePlayer('att', { troops: { Barbarian: 3 }, ...opts.attacker }),
    makePlayer('def', { buildings: [placed('th', 'TownHall', 20, 20)], ...opts.defender }),
  ]);
  const clock = new ManualClock(T0);
  const bus = new BattleEventBus();
  const events: Recorded = {
    battleStarted: [],
    troopDeployed: [],
    spellDeployed: [],
    battleTick: [],
    battleEnded: [],
  };
  bus.on('battleStarted', p => events.battleStarted.push(p));
  bus.on('troopDeployed', p => events.troopDeployed.push(p));
  bus.on('spellDeployed', p => events.spellDeployed.push(p));
  bus.on('battleTick', p => events.battleTick.push(p));
  bus.on('battleEnded', p => events.battleEnded.push(p));

  const manager = new BattleSessionManager({
    players,
    inventory: new SnapshotInventory(players),
    tables,
    events: bus,
    clock,
    config: opts.config,
  });

  return { manager, players, clock, bus, tables, events };
}

/** Start att → def and move the clock past the scout window */
export function startPastScout(h: Harness): string {
  const res = h.manager.startBattle('att', 'def');
  if (!res.success) throw new Error(`startBattle failed: ${res.error}`);
  h.clock.set(T0 + h.tables.config.combat.scoutDuration);
  return res.battleId;
}
