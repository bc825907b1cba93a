import type { PlayerSnapshot, ResourceBundle } from '@/engine/data/types/Player';

export interface LootCalculator {
  /** Resources exposed to an attacker of this defender */
  available(defender: PlayerSnapshot): ResourceBundle;
}

/** Flat share of each stored resource */
export class PercentLootCalculator implements LootCalculator {
  constructor(private readonly percent: number) {}

  available(defender: PlayerSnapshot): ResourceBundle {
    return {
      gold: Math.floor(defender.resources.gold * this.percent),
      wood: Math.floor(defender.resources.wood * this.percent),
      food: Math.floor(defender.resources.food * this.percent),
    };
  }
}
