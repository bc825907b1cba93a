export { BattleSessionManager } from '@/engine/session/BattleSessionManager';
export type { SessionDeps } from '@/engine/session/BattleSessionManager';
export { BattleScheduler } from '@/engine/session/BattleScheduler';
export { loadBalanceTables, BalanceTables } from '@/engine/loader/BalanceLoader';
export type { BalanceSources } from '@/engine/loader/BalanceLoader';
export { InMemoryPlayerStore } from '@/engine/ports/PlayerStore';
export type { PlayerStore, PlayerRecipe } from '@/engine/ports/PlayerStore';
export { SnapshotInventory } from '@/engine/ports/InventoryService';
export type { InventoryService } from '@/engine/ports/InventoryService';
export { PercentLootCalculator } from '@/engine/ports/LootCalculator';
export type { LootCalculator } from '@/engine/ports/LootCalculator';
export { BattleEventBus, NullEventSink } from '@/engine/utils/EventBus';
export type { BattleEventMap, BattleEventName, BattleEventSink } from '@/engine/utils/EventBus';
export { SystemClock, ManualClock } from '@/engine/utils/Clock';
export type { Clock } from '@/engine/utils/Clock';
export { Logger } from '@/engine/utils/Logger';
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from '@/config';
export type { EngineConfig } from '@/config';
export type * from '@/engine/data/types/Battle';
export type * from '@/engine/data/types/Player';
export type { TroopInstance } from '@/engine/data/types/Troop';
export type { BuildingTarget } from '@/engine/data/types/Building';
export type { DeployedSpell, ActiveSpellEffect } from '@/engine/data/types/Spell';
export type { Pos } from '@/engine/data/types/Map';
