// ─────────────────────────────────────────────
//  Deploy placement rules
//  Troops land only on the outer border of the grid;
//  spells can be cast on any cell.
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import type { Battle, DeployError } from '@/engine/data/types/Battle';
import type { EngineConfig } from '@/config';

type GridRules = Pick<EngineConfig, 'gridSize' | 'deployBorder'>;

function inGrid(pos: Pos, gridSize: number): boolean {
  return (
    Number.isInteger(pos.x) && Number.isInteger(pos.y) &&
    pos.x >= 0 && pos.y >= 0 &&
    pos.x < gridSize && pos.y < gridSize
  );
}

export const DeployRules = {
  isValidTroopPosition(pos: Pos, rules: GridRules): boolean {
    if (!inGrid(pos, rules.gridSize)) return false;
    const far = rules.gridSize - rules.deployBorder;
    return (
      pos.x < rules.deployBorder || pos.x >= far ||
      pos.y < rules.deployBorder || pos.y >= far
    );
  },

  isValidSpellPosition(pos: Pos, rules: GridRules): boolean {
    return inGrid(pos, rules.gridSize);
  },

  /**
   * Ownership and timing checks shared by troop and spell deploys.
   * Returns the first failing code, or null when the battle accepts deploys.
   * Existence is the caller's check.
   */
  checkWindow(battle: Battle, callerId: string, now: number): DeployError | null {
    if (battle.attackerId !== callerId) return 'NOT_YOUR_BATTLE';
    if (battle.phase === 'ended') return 'BATTLE_ENDED';
    if (now < battle.scoutEndsAt) return 'SCOUT_PHASE';
    if (now >= battle.endsAt) return 'BATTLE_ENDED';
    return null;
  },

  /** Decrement a remaining-count table, dropping the entry at zero */
  takeOne(remaining: Record<string, number>, type: string): void {
    const left = (remaining[type] ?? 0) - 1;
    if (left > 0) remaining[type] = left;
    else delete remaining[type];
  },
};
