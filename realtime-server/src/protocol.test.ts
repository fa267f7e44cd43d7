import { describe, expect, test } from 'vitest';
import {
  World,
  createResource,
  resolveWorldConfig,
  viewFor,
  type ActionOutcome,
} from '../../world/index.ts';
import {
  encodeAgentView,
  toActionConfirmedMessage,
  toStatusMessage,
  toWorldSnapshotMessage,
} from './protocol';

function outcome(partial: Pick<ActionOutcome, 'action' | 'status' | 'error'>): ActionOutcome {
  return { agentId: 'a1', events: [], ...partial };
}

describe('protocol', () => {
  test('action results report success only for applied actions', () => {
    expect(toActionConfirmedMessage(3, outcome({ action: 'move', status: 'applied' }))).toEqual({
      type: 'action_confirmed',
      tick: 3,
      action: 'move',
      success: true,
    });
    expect(toActionConfirmedMessage(3, outcome({ action: 'craft', status: 'noop' }))).toEqual({
      type: 'action_confirmed',
      tick: 3,
      action: 'craft',
      success: false,
    });
  });

  test('rejections carry the error code', () => {
    const message = toActionConfirmedMessage(
      4,
      outcome({
        action: 'fly',
        status: 'rejected',
        error: { code: 'UNKNOWN_ACTION', message: 'Unknown action: fly' },
      })
    );
    expect(message).toEqual({
      type: 'action_confirmed',
      tick: 4,
      action: 'fly',
      success: false,
      error: 'UNKNOWN_ACTION',
    });
  });

  test('an agent view encodes as action_confirmed then game_state', () => {
    const world = new World(resolveWorldConfig({ initialResources: 0 }));
    world.spawnAgent('Alice', { entityId: 'a1', x: 5, y: 5 });
    const moved = world.resolve({
      agentId: 'a1',
      action: 'move',
      params: { dx: 1, dy: 0 },
      submittedTick: 0,
    });
    world.completeTick(1);

    const view = viewFor(world.getSnapshot([moved]), 'a1');
    expect(view).toBeDefined();
    if (!view) return;

    expect(encodeAgentView(view)).toEqual([
      { type: 'action_confirmed', tick: 1, action: 'move', success: true },
      {
        type: 'game_state',
        tick: 1,
        agent_state: {
          id: 'a1',
          name: 'Alice',
          x: 6,
          y: 5,
          inventory: { ORE: 0, FUEL: 0, COMPONENTS: 0 },
        },
        world_info: {
          dimensions: [20, 20],
          total_agents: 1,
          total_resources: 0,
          total_entities: 1,
        },
      },
    ]);
  });

  test('an idle agent gets only game_state', () => {
    const world = new World(resolveWorldConfig({ initialResources: 0 }));
    world.spawnAgent('Bob', { entityId: 'a2' });
    const view = viewFor(world.getSnapshot(), 'a2');
    expect(view && encodeAgentView(view).map((frame) => frame.type)).toEqual(['game_state']);
  });

  test('world snapshots list agents and resources', () => {
    const world = new World(resolveWorldConfig({ width: 4, height: 4, initialResources: 0 }));
    world.addEntity(createResource('ORE', 30, 1, 2, 'r1'));
    world.spawnAgent('Alice', { entityId: 'a1', x: 0, y: 0 });

    expect(toWorldSnapshotMessage(world.getSnapshot())).toEqual({
      type: 'world_snapshot',
      tick: 0,
      world_info: { dimensions: [4, 4], total_agents: 1, total_resources: 1, total_entities: 2 },
      agents: [
        { id: 'a1', name: 'Alice', x: 0, y: 0, inventory: { ORE: 0, FUEL: 0, COMPONENTS: 0 } },
      ],
      resources: [{ id: 'r1', resource_type: 'ORE', quantity: 30, x: 1, y: 2 }],
    });
  });

  test('status summarises the server for spectators', () => {
    const world = new World(resolveWorldConfig({ width: 6, height: 3, initialResources: 0 }));
    world.addEntity(createResource('FUEL', 12, 0, 0, 'r1'));
    world.completeTick(1);

    expect(toStatusMessage(world.getSnapshot(), 4)).toEqual({
      type: 'status',
      tick: 1,
      dimensions: [6, 3],
      total_resources: 1,
      connected_agents: 4,
    });
  });
});
