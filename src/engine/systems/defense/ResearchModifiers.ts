// ─────────────────────────────────────────────
//  Research → defense modifiers
// ─────────────────────────────────────────────

import type { ResearchConfig } from '@/engine/data/types/Balance';

function sumBonuses(table: Record<string, number>, completed: readonly string[]): number {
  let total = 0;
  for (const id of completed) total += table[id] ?? 0;
  return total;
}

export const ResearchModifiers = {
  /** A defense fires only once its type's requirement is researched; unmapped types never fire */
  isDefenseActive(type: string, completed: readonly string[], cfg: ResearchConfig): boolean {
    const required = cfg.defenseRequirements[type];
    return required !== undefined && completed.includes(required);
  },

  damageMultiplier(completed: readonly string[], cfg: ResearchConfig): number {
    return 1 + sumBonuses(cfg.damageBonuses, completed);
  },

  rangeMultiplier(completed: readonly string[], cfg: ResearchConfig): number {
    return 1 + sumBonuses(cfg.rangeBonuses, completed);
  },

  wallHpMultiplier(completed: readonly string[], cfg: ResearchConfig): number {
    return 1 + sumBonuses(cfg.wallHpBonuses, completed);
  },
};
