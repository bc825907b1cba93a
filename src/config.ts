// ─────────────────────────────────────────────
//  Engine configuration
//  Simulation timing and grid constants. Balance numbers
//  (troop stats, thresholds, rewards) live in assets/data/*.json.
// ─────────────────────────────────────────────

export interface EngineConfig {
  /** Real-time period of the global tick loop, in ms */
  tickPeriodMs: number;
  /** Simulated seconds advanced per tick */
  tickDuration: number;
  /** Side length of the square deploy grid, in cells */
  gridSize: number;
  /** Width of the deployable outer border, in cells */
  deployBorder: number;
  /** Seconds between two troop hits */
  attackInterval: number;
  /** Fraction of a hit dealt to everything inside the splash radius */
  splashFactor: number;
  /** Seconds an ended battle stays readable before it is discarded */
  retentionSeconds: number;
  /** Seconds past endsAt after which an unfinished battle is force-ended */
  orphanGraceSeconds: number;
  /** Real-time period of the orphan sweep, in ms */
  sweepPeriodMs: number;
  /** Maximum entries kept in a defense log or revenge list */
  logLimit: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  tickPeriodMs: 100,
  tickDuration: 0.1,
  gridSize: 40,
  deployBorder: 2,
  attackInterval: 1,
  splashFactor: 0.5,
  retentionSeconds: 60,
  orphanGraceSeconds: 300,
  sweepPeriodMs: 60_000,
  logLimit: 50,
});

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}
