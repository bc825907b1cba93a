// ─────────────────────────────────────────────
//  Battle Session Manager
//  Public contract of the battle core. Owns the registry,
//  validates every call before touching state, and reports
//  through the injected event sink.
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import type {
  Battle,
  BattleResult,
  DeploySpellResult,
  DeployTroopResult,
  EndReason,
  StartBattleOptions,
  StartBattleResult,
} from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import { toTargetCategory } from '@/engine/data/types/Building';
import type { PlayerSnapshot } from '@/engine/data/types/Player';
import { EMPTY_RESOURCES } from '@/engine/data/types/Player';
import type { DeployedSpell } from '@/engine/data/types/Spell';
import { isInstantSpell } from '@/engine/data/types/Spell';
import type { TroopInstance } from '@/engine/data/types/Troop';
import type { BalanceTables } from '@/engine/loader/BalanceLoader';
import type { PlayerStore } from '@/engine/ports/PlayerStore';
import type { InventoryService } from '@/engine/ports/InventoryService';
import type { LootCalculator } from '@/engine/ports/LootCalculator';
import { PercentLootCalculator } from '@/engine/ports/LootCalculator';
import { BattleStore } from '@/engine/state/BattleStore';
import type { BattleContext } from '@/engine/state/BattleContext';
import { PhaseMachine } from '@/engine/systems/phase/PhaseMachine';
import { DeployRules } from '@/engine/systems/deploy/DeployRules';
import { SpellEffectEngine } from '@/engine/systems/spell/SpellEffectEngine';
import { ResearchModifiers } from '@/engine/systems/defense/ResearchModifiers';
import { TickOrchestrator } from '@/engine/systems/tick/TickOrchestrator';
import { OutcomeCalculator } from '@/engine/systems/outcome/OutcomeCalculator';
import type { BattleEventSink } from '@/engine/utils/EventBus';
import { NullEventSink } from '@/engine/utils/EventBus';
import type { Clock } from '@/engine/utils/Clock';
import { SystemClock } from '@/engine/utils/Clock';
import type { IdGenerator } from '@/engine/utils/IdGenerator';
import { createIdGenerator } from '@/engine/utils/IdGenerator';
import { Logger } from '@/engine/utils/Logger';
import type { EngineConfig } from '@/config';
import { resolveEngineConfig } from '@/config';
import { BattleRegistry } from './BattleRegistry';

export interface SessionDeps {
  players: PlayerStore;
  inventory: InventoryService;
  tables: BalanceTables;
  /** Defaults to the balance table's availablePercent of stored resources */
  loot?: LootCalculator;
  events?: BattleEventSink;
  clock?: Clock;
  config?: Partial<EngineConfig>;
  ids?: IdGenerator;
}

export class BattleSessionManager {
  readonly config: EngineConfig;

  private readonly registry = new BattleRegistry();
  private readonly players: PlayerStore;
  private readonly inventory: InventoryService;
  private readonly tables: BalanceTables;
  private readonly loot: LootCalculator;
  private readonly events: BattleEventSink;
  private readonly clock: Clock;
  private readonly nextId: IdGenerator;

  constructor(deps: SessionDeps) {
    this.players = deps.players;
    this.inventory = deps.inventory;
    this.tables = deps.tables;
    this.loot = deps.loot ?? new PercentLootCalculator(deps.tables.config.loot.availablePercent);
    this.events = deps.events ?? NullEventSink;
    this.clock = deps.clock ?? SystemClock;
    this.config = resolveEngineConfig(deps.config);
    this.nextId = deps.ids ?? createIdGenerator();
  }

  // ── Start ─────────────────────────────────────────────────────

  startBattle(attackerId: string, defenderId: string, options: StartBattleOptions = {}): StartBattleResult {
    const now = this.clock.now();
    const isRevenge = options.isRevenge ?? false;

    const attacker = this.players.getPlayer(attackerId);
    if (!attacker) return { success: false, error: 'ATTACKER_NOT_FOUND' };
    const defender = this.players.getPlayer(defenderId);
    if (!defender) return { success: false, error: 'DEFENDER_NOT_FOUND' };
    if (attackerId === defenderId) return { success: false, error: 'CANNOT_ATTACK_SELF' };
    if (this.registry.activeFor(attackerId)) return { success: false, error: 'ALREADY_IN_BATTLE' };

    const troops = this.inventory.availableTroops(attackerId);
    if (Object.keys(troops).length === 0) return { success: false, error: 'NO_TROOPS' };

    if (isRevenge) {
      const entry = attacker.revengeList.find(e => e.attackerId === defenderId && !e.used && now < e.expiresAt);
      if (!entry) return { success: false, error: 'REVENGE_NOT_AVAILABLE' };
    } else if (defender.shield && now < defender.shield.expiresAt) {
      return { success: false, error: 'DEFENDER_HAS_SHIELD' };
    }

    const { combat } = this.tables.config;
    const buildings = this.buildTargets(defender);

    const battle: Battle = {
      id: this.nextId('battle'),
      attackerId,
      defenderId,
      phase: 'scout',
      startedAt: now,
      endsAt: now + combat.battleDuration,
      scoutEndsAt: now + combat.scoutDuration,
      troops: [],
      spells: [],
      remainingTroops: troops,
      remainingSpells: this.inventory.availableSpells(attackerId),
      destruction: 0,
      starsEarned: 0,
      townHallDestroyed: false,
      lootAvailable: this.loot.available(defender),
      lootClaimed: { ...EMPTY_RESOURCES },
      isRevenge,
    };

    const ctx: BattleContext = {
      battle,
      buildings,
      activeEffects: [],
      research: [...defender.research],
      totalHp: buildings.reduce((sum, b) => sum + b.maxHp, 0),
      attackerTownHallLevel: attacker.townHallLevel,
      defenderTownHallLevel: defender.townHallLevel,
    };

    this.registry.add(new BattleStore(ctx));
    Logger.log(`Battle ${battle.id} started: ${attackerId} → ${defenderId}${isRevenge ? ' (revenge)' : ''}`, 'system');
    this.events.emit('battleStarted', { battleId: battle.id, attackerId, defenderId, isRevenge });

    return { success: true, battleId: battle.id };
  }

  /** Defender layout as battle targets; walls get the research HP bonus */
  private buildTargets(defender: PlayerSnapshot): BuildingTarget[] {
    const wallMult = ResearchModifiers.wallHpMultiplier(defender.research, this.tables.research);
    const targets: BuildingTarget[] = [];

    for (const placed of defender.buildings) {
      const def = this.tables.building(placed.type);
      const level = this.tables.buildingLevel(placed.type, placed.level);
      if (!def || !level) {
        Logger.warn(`No building data for ${placed.type} L${placed.level}; ${placed.id} left out of battle`);
        continue;
      }
      const category = toTargetCategory(def.category);
      const maxHp = category === 'wall' ? Math.floor(level.hp * wallMult) : level.hp;
      targets.push({
        id: placed.id,
        type: placed.type,
        level: placed.level,
        position: { x: placed.position.x, y: placed.position.y },
        currentHp: maxHp,
        maxHp,
        isDestroyed: false,
        category,
      });
    }
    return targets;
  }

  // ── Deploy ────────────────────────────────────────────────────

  deployTroop(battleId: string, callerId: string, troopType: string, position: Pos): DeployTroopResult {
    const now = this.clock.now();
    const store = this.registry.get(battleId);
    if (!store) return { success: false, error: 'BATTLE_NOT_FOUND' };

    const { battle } = store.getState();
    const windowError = DeployRules.checkWindow(battle, callerId, now);
    if (windowError) return { success: false, error: windowError };

    if (!this.tables.troop(troopType)) return { success: false, error: 'INVALID_TROOP_TYPE' };
    if (!DeployRules.isValidTroopPosition(position, this.config)) {
      return { success: false, error: 'INVALID_DEPLOY_POSITION' };
    }
    if ((battle.remainingTroops[troopType] ?? 0) <= 0) return { success: false, error: 'NO_TROOPS_AVAILABLE' };

    const level = this.players.getPlayer(callerId)?.troopLevels[troopType] ?? 1;
    const stats = this.tables.troopLevel(troopType, level);
    if (!stats) return { success: false, error: 'NO_LEVEL_DATA' };

    const troop: TroopInstance = {
      id: this.nextId('troop'),
      type: troopType,
      level,
      position: { x: position.x, y: position.y },
      state: 'moving',
      currentHp: stats.hp,
      maxHp: stats.hp,
      isFlying: stats.isFlying,
      deployedAt: now,
    };

    store.apply(draft => {
      DeployRules.takeOne(draft.battle.remainingTroops, troopType);
      draft.battle.troops.push(troop);
      PhaseMachine.advanceOnDeploy(draft.battle);
    });

    // The battle's remaining count is authoritative; a stale inventory is only reported
    if (!this.inventory.consumeTroop(callerId, troopType)) {
      Logger.warn(`Inventory of ${callerId} had no ${troopType} to consume (${battleId})`);
    }

    Logger.log(`${troop.id} ${troopType} L${level} deployed at (${position.x}, ${position.y})`);
    this.events.emit('troopDeployed', { battleId, troop });
    return { success: true, troop };
  }

  deploySpell(battleId: string, callerId: string, spellType: string, position: Pos): DeploySpellResult {
    const now = this.clock.now();
    const store = this.registry.get(battleId);
    if (!store) return { success: false, error: 'BATTLE_NOT_FOUND' };

    const { battle } = store.getState();
    const windowError = DeployRules.checkWindow(battle, callerId, now);
    if (windowError) return { success: false, error: windowError };

    if (!this.tables.spell(spellType)) return { success: false, error: 'INVALID_SPELL_TYPE' };
    if (!DeployRules.isValidSpellPosition(position, this.config)) {
      return { success: false, error: 'INVALID_DEPLOY_POSITION' };
    }
    if ((battle.remainingSpells[spellType] ?? 0) <= 0) return { success: false, error: 'NO_SPELLS_AVAILABLE' };

    const level = this.players.getPlayer(callerId)?.spellLevels[spellType] ?? 1;
    const data = this.tables.spellLevel(spellType, level);
    if (!data) return { success: false, error: 'NO_LEVEL_DATA' };

    const at: Pos = { x: position.x, y: position.y };
    const instant = isInstantSpell(data);
    const spell: DeployedSpell = {
      id: this.nextId('spell'),
      type: spellType,
      level,
      position: at,
      radius: data.radius,
      deployedAt: now,
      expiresAt: isInstantSpell(data) ? now : now + data.duration,
    };

    store.apply(draft => {
      DeployRules.takeOne(draft.battle.remainingSpells, spellType);
      if (isInstantSpell(data)) {
        SpellEffectEngine.castInstant(data, at, draft.buildings, draft.battle);
      } else {
        draft.activeEffects.push(SpellEffectEngine.createEffect(spell.id, spellType, at, data, now));
      }
      draft.battle.spells.push(spell);
      PhaseMachine.advanceOnDeploy(draft.battle);
    });

    if (!this.inventory.consumeSpell(callerId, spellType)) {
      Logger.warn(`Inventory of ${callerId} had no ${spellType} to consume (${battleId})`);
    }

    Logger.log(`${spell.id} ${spellType} L${level} cast at (${at.x}, ${at.y})${instant ? '' : ` for ${spell.expiresAt - now}s`}`, 'spell');
    this.events.emit('spellDeployed', { battleId, spell });
    return { success: true, spell };
  }

  // ── Simulation ────────────────────────────────────────────────

  simulateTick(battleId: string): void {
    const store = this.registry.get(battleId);
    if (!store || store.getState().battle.phase === 'ended') return;

    const { next, termination } = TickOrchestrator.run(store.getState(), this.clock.now(), {
      tables: this.tables,
      config: this.config,
    });
    store.replace(next);

    if (termination) {
      this.endBattle(battleId, termination);
      return;
    }
    if (next.battle.phase === 'battle') {
      this.events.emit('battleTick', { battleId, battle: next.battle });
    }
  }

  /**
   * End a battle and apply its result to both players.
   * Returns null when the battle is unknown or already ended.
   */
  endBattle(battleId: string, reason: EndReason = 'manual'): BattleResult | null {
    const store = this.registry.get(battleId);
    if (!store || store.getState().battle.phase === 'ended') return null;

    const now = this.clock.now();
    const ctx = store.getState();
    const result = OutcomeCalculator.calculate(ctx, reason, now, this.tables.config);

    store.apply(draft => {
      PhaseMachine.transition(draft.battle, 'ended');
      draft.battle.endedAt = now;
      draft.battle.destruction = result.destruction;
      draft.battle.starsEarned = result.stars;
      draft.battle.lootClaimed = { ...result.loot };
    });

    const { attackerId, defenderId } = ctx.battle;
    const attacker = this.players.getPlayer(attackerId);
    this.players.updatePlayer(attackerId, draft => OutcomeCalculator.applyToAttacker(draft, result));
    this.players.updatePlayer(defenderId, draft =>
      OutcomeCalculator.applyToDefender(
        draft,
        result,
        attacker ?? { id: attackerId, name: attackerId },
        now,
        this.tables.config.combat,
        this.config.logLimit,
      ),
    );

    Logger.log(
      `Battle ${battleId} ended (${reason}): ${result.stars}★ ${result.destruction}%, trophies ${result.trophiesGained}`,
      'system',
    );
    this.events.emit('battleEnded', { battleId, result });
    return result;
  }

  // ── Queries ───────────────────────────────────────────────────

  getBattleState(battleId: string): Battle | null {
    return this.registry.get(battleId)?.getState().battle ?? null;
  }

  /** Exact per-building HP for presenters */
  getBuildingTargets(battleId: string): readonly BuildingTarget[] | null {
    return this.registry.get(battleId)?.getState().buildings ?? null;
  }

  getActiveBattles(): Battle[] {
    return this.registry.active().map(s => s.getState().battle);
  }

  /** Battles still in the registry where the player attacks or defends */
  getBattlesForPlayer(playerId: string): Battle[] {
    return this.registry
      .list()
      .map(s => s.getState().battle)
      .filter(b => b.attackerId === playerId || b.defenderId === playerId);
  }

  // ── Housekeeping ──────────────────────────────────────────────

  /** Tick every live battle in registry order, then drop ended ones past retention */
  tickAll(): void {
    for (const store of this.registry.active()) this.simulateTick(store.id);

    const now = this.clock.now();
    for (const store of this.registry.list()) {
      const { endedAt } = store.getState().battle;
      if (endedAt !== undefined && now >= endedAt + this.config.retentionSeconds) {
        this.registry.delete(store.id);
      }
    }
  }

  /** Force-end battles left running past endsAt + grace; returns their ids */
  sweepOrphans(): string[] {
    const now = this.clock.now();
    const swept: string[] = [];
    for (const store of this.registry.active()) {
      const { battle } = store.getState();
      if (now > battle.endsAt + this.config.orphanGraceSeconds) {
        Logger.warn(`Battle ${battle.id} abandoned; forcing end`);
        this.endBattle(battle.id, 'abandoned');
        swept.push(battle.id);
      }
    }
    return swept;
  }
}
