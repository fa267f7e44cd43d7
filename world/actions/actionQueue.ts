import type { PendingAction } from './types';

// ============================================================================
// ACTION QUEUE - One pending slot per agent, drained once per tick
// ============================================================================

/**
 * Buffer between connection handlers and the tick engine.
 *
 * Handlers and the engine share one event loop and every call below runs to
 * completion, so a drain can never observe a half-written slot. A second
 * submit for the same agent before the drain replaces the first and moves the
 * slot to the back of the FIFO.
 */
export class ActionQueue {
  private slots = new Map<string, PendingAction>();
  private readonly clock: () => number;

  /** @param clock - returns the last completed tick, stamped on each submission */
  constructor(clock: () => number = () => 0) {
    this.clock = clock;
  }

  get size(): number {
    return this.slots.size;
  }

  submit(
    agentId: string,
    action: string,
    params: Readonly<Record<string, unknown>> = {}
  ): PendingAction {
    const pending: PendingAction = {
      agentId,
      action,
      params,
      submittedTick: this.clock(),
    };
    this.slots.delete(agentId);
    this.slots.set(agentId, pending);
    return pending;
  }

  /** Pending intent for an agent, if any */
  peek(agentId: string): PendingAction | undefined {
    return this.slots.get(agentId);
  }

  /** Drop an agent's pending intent (agent evicted) */
  discard(agentId: string): boolean {
    return this.slots.delete(agentId);
  }

  /** Empty the queue, returning entries in submission order */
  drainAll(): PendingAction[] {
    const drained = Array.from(this.slots.values());
    this.slots = new Map();
    return drained;
  }
}
