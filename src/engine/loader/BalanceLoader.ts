// ─────────────────────────────────────────────
//  BalanceLoader
//  Parses the static balance tables once at startup.
//  Every table is validated; a malformed table throws here
//  so the simulation itself never sees bad data.
// ─────────────────────────────────────────────

import { z } from 'zod';
import { TroopDefinitionSchema } from '@/engine/data/types/Troop';
import type { TroopDefinition, TroopLevelData } from '@/engine/data/types/Troop';
import { SpellDefinitionSchema } from '@/engine/data/types/Spell';
import type { SpellDefinition, SpellLevelData } from '@/engine/data/types/Spell';
import { BuildingDefinitionSchema } from '@/engine/data/types/Building';
import type { BuildingDefinition, BuildingLevelData } from '@/engine/data/types/Building';
import { BalanceConfigSchema, ResearchConfigSchema } from '@/engine/data/types/Balance';
import type { BalanceConfig, ResearchConfig } from '@/engine/data/types/Balance';

import troopsJson from '@/assets/data/troops.json';
import spellsJson from '@/assets/data/spells.json';
import buildingsJson from '@/assets/data/buildings.json';
import balanceJson from '@/assets/data/balance.json';
import researchJson from '@/assets/data/research.json';

/** Raw, unvalidated table contents (parsed JSON) */
export interface BalanceSources {
  troops: unknown;
  spells: unknown;
  buildings: unknown;
  balance: unknown;
  research: unknown;
}

export const DEFAULT_BALANCE_SOURCES: BalanceSources = {
  troops: troopsJson,
  spells: spellsJson,
  buildings: buildingsJson,
  balance: balanceJson,
  research: researchJson,
};

/** Read-only lookups over the validated tables, keyed by type (+ level) */
export class BalanceTables {
  private readonly troops: Map<string, TroopDefinition>;
  private readonly spells: Map<string, SpellDefinition>;
  private readonly buildings: Map<string, BuildingDefinition>;

  constructor(
    troops: TroopDefinition[],
    spells: SpellDefinition[],
    buildings: BuildingDefinition[],
    readonly config: BalanceConfig,
    readonly research: ResearchConfig,
  ) {
    this.troops = new Map(troops.map(t => [t.type, t]));
    this.spells = new Map(spells.map(s => [s.type, s]));
    this.buildings = new Map(buildings.map(b => [b.type, b]));
  }

  troop(type: string): TroopDefinition | undefined {
    return this.troops.get(type);
  }

  troopLevel(type: string, level: number): TroopLevelData | undefined {
    return this.troops.get(type)?.levels.find(l => l.level === level);
  }

  spell(type: string): SpellDefinition | undefined {
    return this.spells.get(type);
  }

  spellLevel(type: string, level: number): SpellLevelData | undefined {
    const def = this.spells.get(type);
    if (!def) return undefined;
    const levels: SpellLevelData[] = def.levels;
    return levels.find(l => l.level === level);
  }

  building(type: string): BuildingDefinition | undefined {
    return this.buildings.get(type);
  }

  buildingLevel(type: string, level: number): BuildingLevelData | undefined {
    return this.buildings.get(type)?.levels.find(l => l.level === level);
  }
}

/**
 * Validate and index the balance tables.
 * Pass partial sources to swap individual tables (tests, tuning experiments).
 */
export function loadBalanceTables(overrides: Partial<BalanceSources> = {}): BalanceTables {
  const src: BalanceSources = { ...DEFAULT_BALANCE_SOURCES, ...overrides };
  return new BalanceTables(
    z.array(TroopDefinitionSchema).parse(src.troops),
    z.array(SpellDefinitionSchema).parse(src.spells),
    z.array(BuildingDefinitionSchema).parse(src.buildings),
    BalanceConfigSchema.parse(src.balance),
    ResearchConfigSchema.parse(src.research),
  );
}
