// ─────────────────────────────────────────────
//  Spell Types
//  Each spell kind carries its own level shape;
//  `kind` is the discriminant everywhere downstream.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { Pos } from './Map';

const base = {
  level: z.number().int().positive(),
  radius: z.number().positive(),
};

const timed = { ...base, duration: z.number().positive() };

const LightningLevelSchema = z
  .object({ ...base, totalDamage: z.number().nonnegative(), numberOfStrikes: z.number().int().positive() })
  .transform(l => ({ kind: 'lightning' as const, ...l }));

const EarthquakeLevelSchema = z
  .object({ ...base, damagePercent: z.number().min(0).max(1), wallDamageMultiplier: z.number().positive() })
  .transform(l => ({ kind: 'earthquake' as const, ...l }));

const HealLevelSchema = z
  .object({ ...timed, healPerSecond: z.number().nonnegative() })
  .transform(l => ({ kind: 'heal' as const, ...l }));

const RageLevelSchema = z
  .object({ ...timed, damageBoost: z.number().positive(), speedBoost: z.number().positive() })
  .transform(l => ({ kind: 'rage' as const, ...l }));

const FreezeLevelSchema = z
  .object(timed)
  .transform(l => ({ kind: 'freeze' as const, ...l }));

const JumpLevelSchema = z
  .object(timed)
  .transform(l => ({ kind: 'jump' as const, ...l }));

const definition = {
  type: z.string(),
  displayName: z.string(),
  housingSpace: z.number().int().positive(),
};

export const SpellDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({ ...definition, kind: z.literal('lightning'),  levels: z.array(LightningLevelSchema).min(1) }),
  z.object({ ...definition, kind: z.literal('earthquake'), levels: z.array(EarthquakeLevelSchema).min(1) }),
  z.object({ ...definition, kind: z.literal('heal'),       levels: z.array(HealLevelSchema).min(1) }),
  z.object({ ...definition, kind: z.literal('rage'),       levels: z.array(RageLevelSchema).min(1) }),
  z.object({ ...definition, kind: z.literal('freeze'),     levels: z.array(FreezeLevelSchema).min(1) }),
  z.object({ ...definition, kind: z.literal('jump'),       levels: z.array(JumpLevelSchema).min(1) }),
]);

export type SpellDefinition = z.infer<typeof SpellDefinitionSchema>;

export type LightningLevel  = z.infer<typeof LightningLevelSchema>;
export type EarthquakeLevel = z.infer<typeof EarthquakeLevelSchema>;
export type HealLevel       = z.infer<typeof HealLevelSchema>;
export type RageLevel       = z.infer<typeof RageLevelSchema>;
export type FreezeLevel     = z.infer<typeof FreezeLevelSchema>;
export type JumpLevel       = z.infer<typeof JumpLevelSchema>;

export type SpellLevelData =
  | LightningLevel
  | EarthquakeLevel
  | HealLevel
  | RageLevel
  | FreezeLevel
  | JumpLevel;

export type InstantSpellLevel  = LightningLevel | EarthquakeLevel;
export type DurationSpellLevel = HealLevel | RageLevel | FreezeLevel | JumpLevel;

export function isInstantSpell(data: SpellLevelData): data is InstantSpellLevel {
  return data.kind === 'lightning' || data.kind === 'earthquake';
}

/** Record of a cast, kept on the battle for results and replays */
export interface DeployedSpell {
  id: string;
  type: string;
  level: number;
  position: Pos;
  radius: number;
  deployedAt: number;
  /** Equal to deployedAt for instant spells */
  expiresAt: number;
}

/** A duration spell still affecting the field */
export interface ActiveSpellEffect {
  id: string;
  type: string;
  position: Pos;
  radius: number;
  startTime: number;
  duration: number;
  data: DurationSpellLevel;
}
