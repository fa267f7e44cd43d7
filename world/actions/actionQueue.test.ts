import { describe, expect, test } from 'vitest';
import { ActionQueue } from './actionQueue';

describe('ActionQueue', () => {
  test('drains in submission order and empties', () => {
    const queue = new ActionQueue();
    queue.submit('a1', 'move', { dx: 1, dy: 0 });
    queue.submit('a2', 'harvest');

    const drained = queue.drainAll();
    expect(drained.map((p) => p.agentId)).toEqual(['a1', 'a2']);
    expect(queue.size).toBe(0);
    expect(queue.drainAll()).toEqual([]);
  });

  test('last write wins and moves the agent to the back', () => {
    const queue = new ActionQueue();
    queue.submit('a1', 'move', { dx: 1, dy: 0 });
    queue.submit('a2', 'harvest');
    queue.submit('a1', 'craft');

    const drained = queue.drainAll();
    expect(drained.map((p) => [p.agentId, p.action])).toEqual([
      ['a2', 'harvest'],
      ['a1', 'craft'],
    ]);
  });

  test('stamps each submission with the clock', () => {
    let tick = 4;
    const queue = new ActionQueue(() => tick);
    queue.submit('a1', 'harvest');
    tick = 5;
    queue.submit('a2', 'craft');

    expect(queue.peek('a1')?.submittedTick).toBe(4);
    expect(queue.peek('a2')?.submittedTick).toBe(5);
  });

  test('discard drops a pending intent', () => {
    const queue = new ActionQueue();
    queue.submit('a1', 'harvest');
    expect(queue.discard('a1')).toBe(true);
    expect(queue.discard('a1')).toBe(false);
    expect(queue.peek('a1')).toBeUndefined();
  });
});
