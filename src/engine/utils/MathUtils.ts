import type { Pos } from '@/engine/data/types/Map';

export const MathUtils = {
  /** Euclidean distance */
  dist(a: Pos, b: Pos): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
  },

  /**
   * Move `from` toward `to` by `step`, stopping on `to`.
   * Returns a new point; inputs are untouched.
   */
  stepToward(from: Pos, to: Pos, step: number): Pos {
    const d = MathUtils.dist(from, to);
    if (d === 0 || step >= d) return { x: to.x, y: to.y };
    const t = step / d;
    return {
      x: from.x + (to.x - from.x) * t,
      y: from.y + (to.y - from.y) * t,
    };
  },

  /** Whether `p` lies within `radius` of `center` (inclusive) */
  within(p: Pos, center: Pos, radius: number): boolean {
    return MathUtils.dist(p, center) <= radius;
  },
};
