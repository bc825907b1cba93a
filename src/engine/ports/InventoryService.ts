// ─────────────────────────────────────────────
//  Inventory port: trained troops and brewed spells
// ─────────────────────────────────────────────

import type { PlayerStore } from './PlayerStore';

export interface InventoryService {
  availableTroops(playerId: string): Record<string, number>;
  availableSpells(playerId: string): Record<string, number>;
  /** Remove one unit; false when none is left */
  consumeTroop(playerId: string, type: string): boolean;
  consumeSpell(playerId: string, type: string): boolean;
}

function positive(counts: Readonly<Record<string, number>>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [type, n] of Object.entries(counts)) if (n > 0) out[type] = n;
  return out;
}

/** Inventory kept on the player snapshot itself (`troops` / `spells`) */
export class SnapshotInventory implements InventoryService {
  constructor(private readonly players: PlayerStore) {}

  availableTroops(playerId: string): Record<string, number> {
    return positive(this.players.getPlayer(playerId)?.troops ?? {});
  }

  availableSpells(playerId: string): Record<string, number> {
    return positive(this.players.getPlayer(playerId)?.spells ?? {});
  }

  consumeTroop(playerId: string, type: string): boolean {
    return this.consume(playerId, 'troops', type);
  }

  consumeSpell(playerId: string, type: string): boolean {
    return this.consume(playerId, 'spells', type);
  }

  private consume(playerId: string, table: 'troops' | 'spells', type: string): boolean {
    const have = this.players.getPlayer(playerId)?.[table][type] ?? 0;
    if (have <= 0) return false;
    this.players.updatePlayer(playerId, draft => {
      if (have > 1) draft[table][type] = have - 1;
      else delete draft[table][type];
    });
    return true;
  }
}
