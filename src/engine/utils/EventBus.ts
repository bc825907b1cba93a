// ─────────────────────────────────────────────
//  Typed Battle Event Bus
//  Notifications for presentation / networking layers.
//  The session manager talks to a BattleEventSink; the bus
//  is the default sink, instantiated per consumer.
// ─────────────────────────────────────────────

import type { Battle, BattleResult } from '@/engine/data/types/Battle';
import type { TroopInstance } from '@/engine/data/types/Troop';
import type { DeployedSpell } from '@/engine/data/types/Spell';

/** All battle notifications and their payload types */
export interface BattleEventMap {
  battleStarted: { battleId: string; attackerId: string; defenderId: string; isRevenge: boolean };
  troopDeployed: { battleId: string; troop: TroopInstance };
  spellDeployed: { battleId: string; spell: DeployedSpell };
  battleTick:    { battleId: string; battle: Battle };
  battleEnded:   { battleId: string; result: BattleResult };
}

export type BattleEventName = keyof BattleEventMap;

export interface BattleEventSink {
  emit<K extends BattleEventName>(event: K, payload: BattleEventMap[K]): void;
}

type Listener<T> = (payload: T) => void;

type ListenerTable<E extends BattleEventName = BattleEventName> = { [K in E]?: Listener<BattleEventMap[K]>[] };

export class BattleEventBus implements BattleEventSink {
  private listeners: ListenerTable = {};

  on<K extends BattleEventName>(event: K, listener: Listener<BattleEventMap[K]>): () => void {
    const listeners: ListenerTable<K> = this.listeners;
    const arr: Listener<BattleEventMap[K]>[] = listeners[event] ?? [];
    listeners[event] = [...arr, listener];
    return () => this.off(event, listener);
  }

  off<K extends BattleEventName>(event: K, listener: Listener<BattleEventMap[K]>): void {
    const listeners: ListenerTable<K> = this.listeners;
    const arr: Listener<BattleEventMap[K]>[] | undefined = listeners[event];
    if (!arr) return;
    listeners[event] = arr.filter(fn => fn !== listener);
  }

  emit<K extends BattleEventName>(event: K, payload: BattleEventMap[K]): void {
    const arr: Listener<BattleEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}

/** Sink that drops every notification */
export const NullEventSink: BattleEventSink = {
  emit: () => undefined,
};
