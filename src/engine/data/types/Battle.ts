// ─────────────────────────────────────────────
//  Battle Types
// ─────────────────────────────────────────────

import type { TroopInstance } from './Troop';
import type { DeployedSpell } from './Spell';
import type { ResourceBundle } from './Player';

export type BattlePhase = 'scout' | 'deploy' | 'battle' | 'ended';

/** Why a battle left the `battle` phase */
export type EndReason =
  | 'timeout'          // wall clock reached endsAt
  | 'all_destroyed'    // every building cleared
  | 'army_depleted'    // every troop dead, nothing left to deploy
  | 'manual'           // EndBattle called by the attacker's client
  | 'abandoned';       // force-ended by the orphan sweep

export interface Battle {
  id: string;
  attackerId: string;
  defenderId: string;
  phase: BattlePhase;

  startedAt: number;
  endsAt: number;
  scoutEndsAt: number;
  endedAt?: number;

  /** Deploy order is preserved; dead troops stay in place */
  troops: TroopInstance[];
  spells: DeployedSpell[];

  remainingTroops: Record<string, number>;
  remainingSpells: Record<string, number>;

  /** 0–100, never decreases */
  destruction: number;
  starsEarned: number;
  townHallDestroyed: boolean;

  lootAvailable: ResourceBundle;
  lootClaimed: ResourceBundle;

  isRevenge: boolean;
}

export interface BattleResult {
  battleId: string;
  attackerId: string;
  defenderId: string;
  endReason: EndReason;

  victory: boolean;
  destruction: number;
  stars: number;
  /** 100% destruction */
  isConquest: boolean;
  townHallDestroyed: boolean;

  loot: ResourceBundle;
  /** Signed trophy change for the attacker */
  trophiesGained: number;
  /** Signed trophy change for the defender */
  defenderTrophyChange: number;
  xpGained: number;
  /** Hours of shield granted to the defender (0 = none) */
  shieldHours: number;

  /** Seconds from start to termination */
  duration: number;
  /** Troops that died or took damage, by type */
  troopsLost: Record<string, number>;
  spellsUsed: Record<string, number>;
  buildingsDestroyed: number;

  isRevenge: boolean;
  /** Bonus fraction applied for a revenge attack (0 when not revenge) */
  revengeLootBonus: number;
}

export type StartBattleError =
  | 'ATTACKER_NOT_FOUND'
  | 'DEFENDER_NOT_FOUND'
  | 'CANNOT_ATTACK_SELF'
  | 'ALREADY_IN_BATTLE'
  | 'NO_TROOPS'
  | 'DEFENDER_HAS_SHIELD'
  | 'REVENGE_NOT_AVAILABLE';

export type DeployError =
  | 'BATTLE_NOT_FOUND'
  | 'NOT_YOUR_BATTLE'
  | 'SCOUT_PHASE'
  | 'BATTLE_ENDED'
  | 'INVALID_TROOP_TYPE'
  | 'INVALID_SPELL_TYPE'
  | 'INVALID_DEPLOY_POSITION'
  | 'NO_TROOPS_AVAILABLE'
  | 'NO_SPELLS_AVAILABLE'
  | 'NO_LEVEL_DATA';

export interface StartBattleOptions {
  isRevenge?: boolean;
}

export type StartBattleResult =
  | { success: true; battleId: string }
  | { success: false; error: StartBattleError };

export type DeployTroopResult =
  | { success: true; troop: TroopInstance }
  | { success: false; error: DeployError };

export type DeploySpellResult =
  | { success: true; spell: DeployedSpell }
  | { success: false; error: DeployError };
