import 'dotenv/config';
import { z } from 'zod';
import type { WorldConfig } from '../../world/index.ts';
import { resolveWorldConfig } from '../../world/index.ts';

// ============================================================================
// SERVER CONFIG - Environment (.env) validated once at start-up
// ============================================================================

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function intVar(fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));
}

const EnvSchema = z
  .object({
    PLAY_PORT: intVar(8765, 1, 65535),
    WATCH_PORT: intVar(8766, 1, 65535),
    WORLD_WIDTH: intVar(20, 1, 4096),
    WORLD_HEIGHT: intVar(20, 1, 4096),
    TICK_INTERVAL_MS: intVar(100, 1),
    HARVEST_AMOUNT: intVar(10, 1),
    CRAFT_ORE_COST: intVar(1, 0),
    CRAFT_FUEL_COST: intVar(1, 0),
    RESPAWN_INTERVAL_TICKS: intVar(10, 0),
    MAX_RESOURCES: intVar(50, 0),
    RESOURCE_MIN_QUANTITY: intVar(20, 1),
    RESOURCE_MAX_QUANTITY: intVar(100, 1),
    INITIAL_RESOURCES: intVar(20, 0),
    EVICT_AFTER_TICKS: intVar(50, 0),
    MAX_BUFFERED_BYTES: intVar(1024 * 1024, 1),
    WORLD_SEED: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  })
  .refine((env) => env.RESOURCE_MIN_QUANTITY <= env.RESOURCE_MAX_QUANTITY, {
    message: 'must not exceed RESOURCE_MAX_QUANTITY',
    path: ['RESOURCE_MIN_QUANTITY'],
  })
  .refine((env) => env.PLAY_PORT !== env.WATCH_PORT, {
    message: 'must differ from PLAY_PORT',
    path: ['WATCH_PORT'],
  })
  .refine((env) => (env.SUPABASE_URL === undefined) === (env.SUPABASE_SERVICE_KEY === undefined), {
    message: 'SUPABASE_URL and SUPABASE_SERVICE_KEY must be set together',
    path: ['SUPABASE_SERVICE_KEY'],
  });

export interface SupabaseSettings {
  readonly url: string;
  readonly serviceKey: string;
}

export interface ServerConfig {
  readonly playPort: number;
  readonly watchPort: number;
  /** Outbound socket buffer above which a client counts as unreachable */
  readonly maxBufferedBytes: number;
  readonly supabase: SupabaseSettings | undefined;
  readonly world: WorldConfig;
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Parse and validate the environment; throws ConfigError listing every bad variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const supabase =
    vars.SUPABASE_URL !== undefined && vars.SUPABASE_SERVICE_KEY !== undefined
      ? { url: vars.SUPABASE_URL, serviceKey: vars.SUPABASE_SERVICE_KEY }
      : undefined;

  return Object.freeze({
    playPort: vars.PLAY_PORT,
    watchPort: vars.WATCH_PORT,
    maxBufferedBytes: vars.MAX_BUFFERED_BYTES,
    supabase,
    world: resolveWorldConfig({
      width: vars.WORLD_WIDTH,
      height: vars.WORLD_HEIGHT,
      tickIntervalMs: vars.TICK_INTERVAL_MS,
      harvestAmount: vars.HARVEST_AMOUNT,
      recipe: { ore: vars.CRAFT_ORE_COST, fuel: vars.CRAFT_FUEL_COST },
      respawn: {
        intervalTicks: vars.RESPAWN_INTERVAL_TICKS,
        maxResources: vars.MAX_RESOURCES,
        minQuantity: vars.RESOURCE_MIN_QUANTITY,
        maxQuantity: vars.RESOURCE_MAX_QUANTITY,
      },
      initialResources: vars.INITIAL_RESOURCES,
      evictAfterTicks: vars.EVICT_AFTER_TICKS,
      seed: vars.WORLD_SEED ?? Date.now() % 2147483647,
    }),
  });
}
