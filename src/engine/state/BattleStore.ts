// ─────────────────────────────────────────────
//  Battle Store: single source of truth for one battle
//  Mirrors the immer produce + subscribe pattern used for
//  every store in the engine. Readers get frozen snapshots.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { BattleContext } from './BattleContext';

type StoreListener = (state: BattleContext) => void;

export class BattleStore {
  private state: BattleContext;
  private listeners: StoreListener[] = [];

  constructor(initial: BattleContext) {
    // Run once through produce so the initial snapshot is frozen too
    this.state = produce(initial, () => undefined);
  }

  get id(): string {
    return this.state.battle.id;
  }

  getState(): BattleContext {
    return this.state;
  }

  /** Apply a recipe to the current state and notify if anything changed */
  apply(recipe: (draft: Draft<BattleContext>) => void): BattleContext {
    const next = produce(this.state, recipe);
    if (next !== this.state) {
      this.state = next;
      this.notify();
    }
    return this.state;
  }

  /** Replace the state with one computed elsewhere (tick results) */
  replace(next: BattleContext): void {
    if (next === this.state) return;
    this.state = next;
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
