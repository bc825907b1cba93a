// ─────────────────────────────────────────────
//  Balance / Research Types
// ─────────────────────────────────────────────

import { z } from 'zod';

export const VictoryThresholdSchema = z.object({
  destruction: z.number().min(0).max(100),
  stars: z.number().int().min(0).max(3),
  lootPercent: z.number().min(0).max(1),
  name: z.string(),
});

export type VictoryThreshold = z.infer<typeof VictoryThresholdSchema>;

export const BalanceConfigSchema = z.object({
  combat: z.object({
    /** Seconds from battle start to endsAt */
    battleDuration: z.number().positive(),
    /** Seconds from battle start during which deploys are refused */
    scoutDuration: z.number().nonnegative(),
    /** Ascending by destruction */
    victoryThresholds: z.array(VictoryThresholdSchema).min(1),
    /** Shield hours granted to the defender, indexed by stars (1..3) */
    shieldHours: z.object({ oneStar: z.number(), twoStar: z.number(), threeStar: z.number() }),
    revengeWindowHours: z.number().positive(),
  }),
  loot: z.object({
    /** Share of stored resources exposed to an attacker */
    availablePercent: z.number().min(0).max(1),
    townHallBonus: z.number().nonnegative(),
    revengeBonus: z.number().nonnegative(),
  }),
  trophies: z.object({
    baseWin: z.number().nonnegative(),
    baseLoss: z.number().nonnegative(),
    thDifferenceMultiplier: z.number().positive(),
  }),
  xp: z.object({
    battleWin: z.number().nonnegative(),
    battleLoss: z.number().nonnegative(),
  }),
});

export type BalanceConfig = z.infer<typeof BalanceConfigSchema>;

export const ResearchConfigSchema = z.object({
  /** Defense building type → research id that must be completed for it to fire */
  defenseRequirements: z.record(z.string()),
  /** Research id → additive damage bonus for every defense */
  damageBonuses: z.record(z.number()),
  /** Research id → additive range bonus for every defense */
  rangeBonuses: z.record(z.number()),
  /** Research id → additive HP bonus for walls */
  wallHpBonuses: z.record(z.number()),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
