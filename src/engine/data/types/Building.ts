// ─────────────────────────────────────────────
//  Building Types
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { Pos } from './Map';
import { TargetTypeSchema } from './Troop';

/** Category as authored in buildings.json */
export const BuildingKindSchema = z.enum(['core', 'resource', 'storage', 'military', 'defense', 'wall']);
export type BuildingKind = z.infer<typeof BuildingKindSchema>;

/** Category as seen by targeting */
export type BuildingCategory = 'defense' | 'resource' | 'wall' | 'other';

export const BuildingLevelSchema = z.object({
  level: z.number().int().positive(),
  hp: z.number().positive(),
  // Defensive stats, present only on buildings that shoot
  damage: z.number().nonnegative().optional(),
  /** Shots per second */
  attackSpeed: z.number().positive().optional(),
  range: z.number().positive().optional(),
  targetType: TargetTypeSchema.optional(),
  splashRadius: z.number().nonnegative().optional(),
});

export type BuildingLevelData = z.infer<typeof BuildingLevelSchema>;

export const BuildingDefinitionSchema = z.object({
  type: z.string(),
  displayName: z.string(),
  category: BuildingKindSchema,
  levels: z.array(BuildingLevelSchema).min(1),
});

export type BuildingDefinition = z.infer<typeof BuildingDefinitionSchema>;

/** Resolved firing profile of a defense building */
export interface DefenseProfile {
  damage: number;
  attackSpeed: number;
  range: number;
  targetType: z.infer<typeof TargetTypeSchema>;
  splashRadius: number;
}

/** A defender building as it exists inside one battle */
export interface BuildingTarget {
  id: string;
  type: string;
  level: number;
  position: Pos;
  currentHp: number;
  maxHp: number;
  isDestroyed: boolean;
  category: BuildingCategory;
  /** Farms drop to 1 HP instead of being destroyed */
  wasDowngraded?: boolean;
  /** Last time this building fired (defenses only) */
  lastAttackAt?: number;
}

export function toTargetCategory(kind: BuildingKind): BuildingCategory {
  switch (kind) {
    case 'defense':  return 'defense';
    case 'resource': return 'resource';
    case 'wall':     return 'wall';
    default:         return 'other';
  }
}

export function defenseProfile(level: BuildingLevelData): DefenseProfile | null {
  const { damage, attackSpeed, range, targetType } = level;
  if (damage === undefined || attackSpeed === undefined || range === undefined || targetType === undefined) {
    return null;
  }
  return { damage, attackSpeed, range, targetType, splashRadius: level.splashRadius ?? 0 };
}
