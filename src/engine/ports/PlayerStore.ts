// ─────────────────────────────────────────────
//  Player store port
//  The profile store the battle engine reads snapshots from
//  and writes result deltas to.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { PlayerSnapshot } from '@/engine/data/types/Player';

export type PlayerRecipe = (draft: Draft<PlayerSnapshot>) => void;

export interface PlayerStore {
  getPlayer(id: string): PlayerSnapshot | undefined;
  /** Apply a recipe; returns the new snapshot, or undefined for an unknown id */
  updatePlayer(id: string, recipe: PlayerRecipe): PlayerSnapshot | undefined;
}

/** Map-backed store; every snapshot it hands out is frozen */
export class InMemoryPlayerStore implements PlayerStore {
  private players = new Map<string, PlayerSnapshot>();

  constructor(initial: readonly PlayerSnapshot[] = []) {
    for (const p of initial) this.put(p);
  }

  put(player: PlayerSnapshot): void {
    this.players.set(player.id, produce(player, () => undefined));
  }

  getPlayer(id: string): PlayerSnapshot | undefined {
    return this.players.get(id);
  }

  updatePlayer(id: string, recipe: PlayerRecipe): PlayerSnapshot | undefined {
    const current = this.players.get(id);
    if (!current) return undefined;
    const next = produce(current, recipe);
    this.players.set(id, next);
    return next;
  }
}
