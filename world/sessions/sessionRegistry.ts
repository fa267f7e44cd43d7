import type { AgentStateView, WorldSnapshot } from '../engine/snapshot';
import { viewFor } from '../engine/snapshot';

// ============================================================================
// SESSION REGISTRY - Bridge from published snapshots to many connections
// ============================================================================

/**
 * Where one agent's per-tick view goes.
 * `send` may throw or return a rejecting promise; either counts as a failed
 * delivery for that agent only.
 */
export interface OutboundChannel {
  send(view: AgentStateView): void | Promise<void>;
  /** Tear down the transport after a failed delivery; the client must reconnect */
  close?(): void;
}

export interface DeliveryReport {
  readonly tick: number;
  readonly delivered: number;
  /** Agents whose channel failed during this broadcast */
  readonly failed: readonly string[];
  /** Registered agents with no view in the snapshot yet (admission pending) */
  readonly skipped: number;
}

export interface SessionRegistryOptions {
  /** Published ticks an agent may stay disconnected before eviction */
  readonly evictAfterTicks: number;
}

interface SessionEntry {
  readonly agentId: string;
  channel: OutboundChannel | undefined;
  /** Last published tick when the channel went away */
  disconnectedAt: number | undefined;
}

function shortId(agentId: string): string {
  return agentId.slice(0, 8);
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly evictAfterTicks: number;
  private lastTick = 0;

  constructor(options: SessionRegistryOptions) {
    this.evictAfterTicks = Math.max(0, options.evictAfterTicks);
  }

  /** Sessions known to the registry, connected or lingering */
  get size(): number {
    return this.sessions.size;
  }

  get connectedCount(): number {
    let count = 0;
    for (const entry of this.sessions.values()) {
      if (entry.channel) count++;
    }
    return count;
  }

  /** Attach (or replace) the agent's outbound channel */
  register(agentId: string, channel: OutboundChannel): void {
    const entry = this.sessions.get(agentId);
    if (entry) {
      entry.channel = channel;
      entry.disconnectedAt = undefined;
      return;
    }
    this.sessions.set(agentId, { agentId, channel, disconnectedAt: undefined });
  }

  /**
   * Detach the agent's channel. The agent itself stays in the world until
   * collectEvictions hands it back.
   */
  unregister(agentId: string): boolean {
    const entry = this.sessions.get(agentId);
    if (!entry || !entry.channel) return false;
    this.detach(entry);
    return true;
  }

  isConnected(agentId: string): boolean {
    return this.sessions.get(agentId)?.channel !== undefined;
  }

  /**
   * Deliver each connected agent its slice of the snapshot.
   * A failing channel is detached, closed and reported; it never stops the others.
   */
  broadcast(snapshot: WorldSnapshot): DeliveryReport {
    this.lastTick = snapshot.tick;

    let delivered = 0;
    let skipped = 0;
    const failed: string[] = [];

    for (const entry of this.sessions.values()) {
      const channel = entry.channel;
      if (!channel) continue;

      const view = viewFor(snapshot, entry.agentId);
      if (!view) {
        skipped++;
        continue;
      }

      try {
        const pending = channel.send(view);
        if (pending instanceof Promise) {
          void pending.catch((error: unknown) => this.fail(entry, channel, error));
        }
        delivered++;
      } catch (error) {
        this.fail(entry, channel, error);
        failed.push(entry.agentId);
      }
    }

    return { tick: snapshot.tick, delivered, failed, skipped };
  }

  /**
   * Agents disconnected for at least `evictAfterTicks` published ticks.
   * The caller removes them from the world and then calls forget().
   */
  collectEvictions(): string[] {
    const due: string[] = [];
    for (const entry of this.sessions.values()) {
      if (entry.channel || entry.disconnectedAt === undefined) continue;
      if (this.lastTick - entry.disconnectedAt >= this.evictAfterTicks) {
        due.push(entry.agentId);
      }
    }
    return due;
  }

  forget(agentId: string): boolean {
    return this.sessions.delete(agentId);
  }

  private detach(entry: SessionEntry): void {
    entry.channel = undefined;
    entry.disconnectedAt = this.lastTick;
  }

  private fail(entry: SessionEntry, channel: OutboundChannel, error: unknown): void {
    // A newer channel may already have replaced the one that failed
    if (entry.channel !== channel) return;
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(
      `[Sessions] Delivery to ${shortId(entry.agentId)} failed (${reason}); closing, marked for eviction`
    );
    this.detach(entry);
    channel.close?.();
  }
}
