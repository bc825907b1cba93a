// ─────────────────────────────────────────────
//  Troop Types
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { Pos } from './Map';

export const PreferredTargetSchema = z.enum(['any', 'defenses', 'resources', 'walls']);
export type PreferredTarget = z.infer<typeof PreferredTargetSchema>;

/** Which layers a defense can hit */
export const TargetTypeSchema = z.enum(['ground', 'air', 'both']);
export type TargetType = z.infer<typeof TargetTypeSchema>;

export const TroopLevelSchema = z.object({
  level: z.number().int().positive(),
  dps: z.number().nonnegative(),
  hp: z.number().positive(),
  /** Cells per second */
  moveSpeed: z.number().nonnegative(),
  preferredTarget: PreferredTargetSchema.default('any'),
  attackRange: z.number().nonnegative(),
  splashRadius: z.number().nonnegative().optional(),
  wallDamageMultiplier: z.number().positive().optional(),
  isFlying: z.boolean().default(false),
});

/** Static per-level stats loaded from troops.json; never mutated */
export type TroopLevelData = z.infer<typeof TroopLevelSchema>;

export const TroopDefinitionSchema = z.object({
  type: z.string(),
  displayName: z.string(),
  housingSpace: z.number().int().positive(),
  levels: z.array(TroopLevelSchema).min(1),
});

export type TroopDefinition = z.infer<typeof TroopDefinitionSchema>;

export type TroopState = 'moving' | 'attacking' | 'dead';

/** Runtime instance of a deployed troop */
export interface TroopInstance {
  id: string;
  type: string;
  level: number;
  position: Pos;
  state: TroopState;
  currentHp: number;
  maxHp: number;
  /** Flying troops can only be hit by `air` or `both` defenses */
  isFlying: boolean;
  /** Building currently targeted (lookup only) */
  targetId?: string;
  deployedAt: number;
  lastAttackAt?: number;
}
