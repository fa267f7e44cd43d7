// ============================================================================
// WORLD CONFIG - Injected at construction, immutable for the world's life
// ============================================================================

export interface RecipeCost {
  readonly ore: number;
  readonly fuel: number;
}

export interface RespawnConfig {
  /** Run the respawn schedule every N ticks */
  readonly intervalTicks: number;
  /** Stop spawning once this many resources are live */
  readonly maxResources: number;
  readonly minQuantity: number;
  readonly maxQuantity: number;
}

export interface WorldConfig {
  readonly width: number;
  readonly height: number;
  readonly tickIntervalMs: number;
  readonly harvestAmount: number;
  readonly recipe: RecipeCost;
  readonly respawn: RespawnConfig;
  /** Resources scattered when the world is created */
  readonly initialResources: number;
  /** Published ticks a disconnected agent lingers before eviction */
  readonly evictAfterTicks: number;
  readonly seed: number;
  /** Check grid/store agreement after every resolved action */
  readonly verifyInvariants: boolean;
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  width: 20,
  height: 20,
  tickIntervalMs: 100,
  harvestAmount: 10,
  recipe: { ore: 1, fuel: 1 },
  respawn: {
    intervalTicks: 10,
    maxResources: 50,
    minQuantity: 20,
    maxQuantity: 100,
  },
  initialResources: 20,
  evictAfterTicks: 50,
  seed: 1,
  verifyInvariants: true,
};

export interface WorldConfigOverrides
  extends Partial<Omit<WorldConfig, 'recipe' | 'respawn'>> {
  readonly recipe?: Partial<RecipeCost>;
  readonly respawn?: Partial<RespawnConfig>;
}

/** Merge overrides onto the defaults and freeze the result */
export function resolveWorldConfig(overrides: WorldConfigOverrides = {}): WorldConfig {
  return Object.freeze({
    ...DEFAULT_WORLD_CONFIG,
    ...overrides,
    recipe: Object.freeze({ ...DEFAULT_WORLD_CONFIG.recipe, ...overrides.recipe }),
    respawn: Object.freeze({ ...DEFAULT_WORLD_CONFIG.respawn, ...overrides.respawn }),
  });
}
