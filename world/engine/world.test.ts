import { describe, expect, test } from 'vitest';
import { World, createWorld } from './world';
import { InvariantViolationError } from './errors';
import { resolveWorldConfig, type WorldConfigOverrides } from '../config';
import { createAgent } from '../entities/agent';
import { createResource } from '../entities/resource';
import type { PendingAction } from '../actions/types';

function emptyWorld(overrides: WorldConfigOverrides = {}): World {
  return new World(
    resolveWorldConfig({ initialResources: 0, respawn: { intervalTicks: 0 }, ...overrides })
  );
}

function intent(agentId: string, action: string, params: Record<string, unknown> = {}): PendingAction {
  return { agentId, action, params, submittedTick: 0 };
}

function position(world: World, agentId: string): { x: number; y: number } | undefined {
  const agent = world.getAgent(agentId);
  return agent ? { x: agent.x, y: agent.y } : undefined;
}

describe('World', () => {
  describe('spawnAgent', () => {
    test('places new agents at the map centre', () => {
      const world = emptyWorld();
      const spawned = world.spawnAgent('RemoteAgent_1', { entityId: 'a1' });

      expect(spawned.ok).toBe(true);
      expect(position(world, 'a1')).toEqual({ x: 10, y: 10 });
      expect(world.occupantsAt(10, 10).has('a1')).toBe(true);
    });

    test('refuses a duplicate id', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1' });
      const again = world.spawnAgent('B', { entityId: 'a1' });

      expect(again.ok).toBe(false);
      if (!again.ok) expect(again.error.code).toBe('ENTITY_EXISTS');
    });
  });

  describe('move', () => {
    test('steps the agent by (dx, dy)', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1', x: 5, y: 5 });

      const outcome = world.resolve(intent('a1', 'move', { dx: 1, dy: 0 }));

      expect(outcome.status).toBe('applied');
      expect(outcome.events).toEqual([{ type: 'ENTITY_MOVED', entityId: 'a1', x: 6, y: 5 }]);
      expect(position(world, 'a1')).toEqual({ x: 6, y: 5 });
      expect(world.occupantsAt(5, 5).size).toBe(0);
    });

    test('a move off the edge leaves the agent where it was', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1', x: 19, y: 5 });

      const outcome = world.resolve(intent('a1', 'move', { dx: 1, dy: 0 }));

      expect(outcome.status).toBe('noop');
      expect(outcome.error).toBeUndefined();
      expect(position(world, 'a1')).toEqual({ x: 19, y: 5 });
    });

    test('a zero step is a no-op', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1', x: 3, y: 3 });
      expect(world.resolve(intent('a1', 'move')).status).toBe('noop');
    });

    test('agents may share a cell', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1', x: 4, y: 4 });
      world.spawnAgent('B', { entityId: 'a2', x: 5, y: 4 });

      world.resolve(intent('a2', 'move', { dx: -1, dy: 0 }));

      expect(Array.from(world.occupantsAt(4, 4))).toEqual(['a1', 'a2']);
    });
  });

  describe('harvest', () => {
    test('takes up to the harvest amount and deletes a depleted resource', () => {
      const world = emptyWorld();
      world.addEntity(createResource('ORE', 3, 5, 5, 'r1'));
      world.spawnAgent('A', { entityId: 'a1', x: 5, y: 5 });

      const outcome = world.resolve(intent('a1', 'harvest'));

      expect(outcome.status).toBe('applied');
      expect(outcome.events).toEqual([
        {
          type: 'RESOURCE_HARVESTED',
          agentId: 'a1',
          resourceId: 'r1',
          resourceType: 'ORE',
          amount: 3,
          remaining: 0,
        },
        { type: 'RESOURCE_DEPLETED', resourceId: 'r1' },
      ]);
      expect(world.getAgent('a1')?.inventory).toEqual({ ORE: 3 });
      expect(world.getEntity('r1')).toBeUndefined();
      expect(world.occupantsAt(5, 5).has('r1')).toBe(false);
    });

    test('leaves the remainder in place', () => {
      const world = emptyWorld();
      world.addEntity(createResource('FUEL', 25, 2, 2, 'r1'));
      world.spawnAgent('A', { entityId: 'a1', x: 2, y: 2 });

      world.resolve(intent('a1', 'harvest'));

      expect(world.getAgent('a1')?.inventory).toEqual({ FUEL: 10 });
      const resource = world.getEntity('r1');
      expect(resource?.kind === 'RESOURCE' ? resource.quantity : undefined).toBe(15);
    });

    test('contested resources go to whoever resolves first', () => {
      const world = emptyWorld({ harvestAmount: 2 });
      world.addEntity(createResource('ORE', 3, 1, 1, 'r1'));
      world.spawnAgent('A', { entityId: 'a1', x: 1, y: 1 });
      world.spawnAgent('B', { entityId: 'a2', x: 1, y: 1 });

      const first = world.resolve(intent('a1', 'harvest'));
      const second = world.resolve(intent('a2', 'harvest'));

      expect(first.events[0]).toMatchObject({ amount: 2, remaining: 1 });
      expect(second.events).toEqual([
        {
          type: 'RESOURCE_HARVESTED',
          agentId: 'a2',
          resourceId: 'r1',
          resourceType: 'ORE',
          amount: 1,
          remaining: 0,
        },
        { type: 'RESOURCE_DEPLETED', resourceId: 'r1' },
      ]);
      expect(world.getAgent('a1')?.inventory).toEqual({ ORE: 2 });
      expect(world.getAgent('a2')?.inventory).toEqual({ ORE: 1 });
    });

    test('nothing to harvest is a no-op', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1', x: 0, y: 0 });
      const outcome = world.resolve(intent('a1', 'harvest'));
      expect(outcome.status).toBe('noop');
      expect(world.getAgent('a1')?.inventory).toEqual({});
    });
  });

  describe('craft', () => {
    test('turns one ORE and one FUEL into one COMPONENTS', () => {
      const world = emptyWorld();
      world.addEntity(createAgent('A', 0, 0, 'a1', { ORE: 1, FUEL: 1 }));

      const outcome = world.resolve(intent('a1', 'craft'));

      expect(outcome.status).toBe('applied');
      expect(outcome.events).toEqual([
        { type: 'ITEM_CRAFTED', agentId: 'a1', item: 'COMPONENTS', quantity: 1 },
      ]);
      expect(world.getAgent('a1')?.inventory).toEqual({ COMPONENTS: 1 });
    });

    test('without enough stock nothing changes', () => {
      const world = emptyWorld();
      world.addEntity(createAgent('A', 0, 0, 'a1', { ORE: 1 }));

      const outcome = world.resolve(intent('a1', 'craft'));

      expect(outcome.status).toBe('noop');
      expect(world.getAgent('a1')?.inventory).toEqual({ ORE: 1 });
    });
  });

  describe('craft with a larger recipe', () => {
    test('one ORE short is a no-op', () => {
      const world = emptyWorld({ recipe: { ore: 3, fuel: 2 } });
      world.addEntity(createAgent('A', 0, 0, 'a1', { ORE: 2, FUEL: 2 }));

      expect(world.resolve(intent('a1', 'craft')).status).toBe('noop');
      expect(world.getAgent('a1')?.inventory).toEqual({ ORE: 2, FUEL: 2 });
    });

    test('the exact recipe crafts one unit', () => {
      const world = emptyWorld({ recipe: { ore: 3, fuel: 2 } });
      world.addEntity(createAgent('A', 0, 0, 'a1', { ORE: 3, FUEL: 2 }));

      expect(world.resolve(intent('a1', 'craft')).status).toBe('applied');
      expect(world.getAgent('a1')?.inventory).toEqual({ COMPONENTS: 1 });
    });
  });

  describe('entitiesNear', () => {
    test('collects every cell within the radius, row by row', () => {
      const world = emptyWorld();
      world.addEntity(createResource('ORE', 5, 4, 4, 'r1'));
      world.spawnAgent('A', { entityId: 'a1', x: 6, y: 6 });
      world.spawnAgent('B', { entityId: 'a2', x: 5, y: 5 });
      world.spawnAgent('C', { entityId: 'a3', x: 7, y: 5 });

      expect(world.entitiesNear(5, 5).map((e) => e.entityId)).toEqual(['r1', 'a2', 'a1']);
      expect(world.entitiesNear(5, 5, 2).map((e) => e.entityId)).toEqual(['r1', 'a2', 'a3', 'a1']);
      expect(world.entitiesNear(5, 5, 0).map((e) => e.entityId)).toEqual(['a2']);
    });

    test('is clipped at the edges', () => {
      const world = emptyWorld({ width: 3, height: 3 });
      world.spawnAgent('A', { entityId: 'a1', x: 0, y: 0 });
      world.spawnAgent('B', { entityId: 'a2', x: 2, y: 2 });

      expect(world.entitiesNear(0, 0, 1).map((e) => e.entityId)).toEqual(['a1']);
      expect(world.entitiesNear(0, 0, 5).map((e) => e.entityId)).toEqual(['a1', 'a2']);
    });
  });

  describe('rejections', () => {
    test('unknown actions are recorded, not thrown', () => {
      const world = emptyWorld();
      world.spawnAgent('A', { entityId: 'a1' });

      const outcome = world.resolve(intent('a1', 'fly'));

      expect(outcome.status).toBe('rejected');
      expect(outcome.error?.code).toBe('UNKNOWN_ACTION');
      expect(position(world, 'a1')).toEqual({ x: 10, y: 10 });
    });

    test('an unknown agent is NOT_FOUND', () => {
      const world = emptyWorld();
      const outcome = world.resolve(intent('ghost', 'harvest'));
      expect(outcome.error?.code).toBe('NOT_FOUND');
    });
  });

  test('a grid that lost an entity is an invariant violation', () => {
    const world = emptyWorld();
    world.spawnAgent('A', { entityId: 'a1', x: 5, y: 5 });
    world.spawnAgent('B', { entityId: 'a2', x: 7, y: 7 });
    world.getState().grid.remove('a1', 5, 5);

    expect(() => world.resolve(intent('a2', 'harvest'))).toThrow(InvariantViolationError);
  });

  test('removeEntity emits ENTITY_LEFT', () => {
    const world = emptyWorld();
    world.spawnAgent('A', { entityId: 'a1' });
    expect(world.removeEntity('a1')).toEqual({
      ok: true,
      value: [{ type: 'ENTITY_LEFT', entityId: 'a1' }],
    });
    expect(world.occupantsAt(10, 10).size).toBe(0);
  });

  test('ticks only advance by one', () => {
    const world = emptyWorld();
    world.completeTick(1);
    expect(world.tick).toBe(1);
    expect(() => world.completeTick(3)).toThrow(RangeError);
  });

  test('createWorld scatters the starting resources', () => {
    const world = createWorld(resolveWorldConfig({ initialResources: 20, seed: 9 }));
    const resources = world.getResources();

    expect(resources).toHaveLength(20);
    const cells = new Set(resources.map((r) => `${r.x},${r.y}`));
    expect(cells.size).toBe(20);
    for (const resource of resources) {
      expect(resource.quantity).toBeGreaterThanOrEqual(20);
      expect(resource.quantity).toBeLessThanOrEqual(100);
    }
    expect(() => world.verifyInvariants()).not.toThrow();
  });
});
