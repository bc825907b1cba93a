// ─────────────────────────────────────────────
//  Target Selection
//  Nearest building honoring a troop's preference.
//  Iteration order decides ties (first found wins).
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import type { BuildingCategory, BuildingTarget } from '@/engine/data/types/Building';
import type { PreferredTarget } from '@/engine/data/types/Troop';
import { ContextQuery } from '@/engine/state/BattleContext';
import { MathUtils } from '@/engine/utils/MathUtils';

const PREFERENCE_CATEGORY: Record<PreferredTarget, BuildingCategory | null> = {
  any:       null,
  defenses:  'defense',
  resources: 'resource',
  walls:     'wall',
};

function nearest<T extends { position: Pos }>(from: Pos, list: readonly T[]): T | undefined {
  let best: T | undefined;
  let bestDist = Infinity;
  for (const item of list) {
    const d = MathUtils.dist(from, item.position);
    // Strict < keeps the first of equally distant candidates
    if (d < bestDist) {
      best = item;
      bestDist = d;
    }
  }
  return best;
}

export const TargetSelector = {
  /**
   * Buildings a troop may target this tick.
   * Jumping troops skip walls unless walls are all that is left.
   */
  candidates(buildings: readonly BuildingTarget[], ignoreWalls: boolean): BuildingTarget[] {
    const standing = ContextQuery.standingBuildings(buildings);
    if (!ignoreWalls) return standing;
    const noWalls = standing.filter(b => b.category !== 'wall');
    return noWalls.length > 0 ? noWalls : standing;
  },

  select(
    from: Pos,
    preference: PreferredTarget,
    buildings: readonly BuildingTarget[],
    ignoreWalls = false,
  ): BuildingTarget | undefined {
    const pool = TargetSelector.candidates(buildings, ignoreWalls);
    const wanted = PREFERENCE_CATEGORY[preference];
    if (wanted !== null) {
      const preferred = nearest(from, pool.filter(b => b.category === wanted));
      if (preferred) return preferred;
    }
    return nearest(from, pool);
  },

  nearest,
};
