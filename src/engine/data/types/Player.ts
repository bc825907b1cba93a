// ─────────────────────────────────────────────
//  Player Snapshot Types
//  What the profile store hands the battle engine.
// ─────────────────────────────────────────────

import type { Pos } from './Map';

export interface ResourceBundle {
  gold: number;
  wood: number;
  food: number;
}

export const EMPTY_RESOURCES: Readonly<ResourceBundle> = Object.freeze({ gold: 0, wood: 0, food: 0 });

export interface PlacedBuilding {
  id: string;
  type: string;
  level: number;
  position: Pos;
}

export interface ShieldData {
  expiresAt: number;
  source: 'attack' | 'purchase' | 'guard';
}

export interface RevengeEntry {
  attackerId: string;
  attackerName: string;
  attackTime: number;
  expiresAt: number;
  used: boolean;
}

export interface DefenseLogEntry {
  battleId: string;
  attackerId: string;
  attackerName: string;
  stars: number;
  destruction: number;
  loot: ResourceBundle;
  trophyChange: number;
  timestamp: number;
  canRevenge: boolean;
}

export interface TrophyData {
  current: number;
  best: number;
}

export interface PlayerStats {
  xp: number;
  attacksWon: number;
  defensesWon: number;
  buildingsDestroyed: number;
  troopsLost: number;
}

export interface PlayerSnapshot {
  id: string;
  name: string;
  townHallLevel: number;
  resources: ResourceBundle;
  trophies: TrophyData;
  stats: PlayerStats;
  /** Completed research ids */
  research: string[];
  buildings: PlacedBuilding[];
  /** Trained troops available for deployment, by type */
  troops: Record<string, number>;
  /** Brewed spells available for deployment, by type */
  spells: Record<string, number>;
  /** Laboratory levels; missing types deploy at level 1 */
  troopLevels: Record<string, number>;
  spellLevels: Record<string, number>;
  shield: ShieldData | null;
  revengeList: RevengeEntry[];
  defenseLog: DefenseLogEntry[];
}
