import {
  ActionQueue,
  SessionRegistry,
  TickEngine,
  createWorld,
  type AgentEntity,
  type World,
  type WorldConfig,
  type WorldSnapshot,
} from '../../world/index.ts';

export interface GameHooks {
  onSnapshot?: (snapshot: WorldSnapshot) => void;
  onEvicted?: (agent: AgentEntity, tick: number) => void;
  onFatal?: (error: Error) => void;
}

/** Everything one running world needs, wired together */
export interface Game {
  readonly world: World;
  readonly queue: ActionQueue;
  readonly sessions: SessionRegistry;
  readonly engine: TickEngine;
}

export function createGame(config: WorldConfig, hooks: GameHooks = {}): Game {
  const world = createWorld(config);
  const queue = new ActionQueue(() => world.tick);
  const sessions = new SessionRegistry({ evictAfterTicks: config.evictAfterTicks });
  const engine = new TickEngine({
    world,
    queue,
    sessions,
    onSnapshot: hooks.onSnapshot,
    onEvicted: hooks.onEvicted,
    onFatal: hooks.onFatal,
  });

  console.log(
    `[Game] World ${config.width}x${config.height} ready with ${world.getResources().length} resources (seed ${config.seed})`
  );
  return { world, queue, sessions, engine };
}
