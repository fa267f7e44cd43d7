import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AgentEntity, InventoryKey } from '../../world/index.ts';
import { toFullInventory } from '../../world/index.ts';
import type { SupabaseSettings } from './config';

// ============================================================================
// AGENT ARCHIVE - Final state of agents that left the world
// ============================================================================

export interface AgentRecord {
  readonly agentId: string;
  readonly displayName: string;
  readonly x: number;
  readonly y: number;
  readonly inventory: Readonly<Record<InventoryKey, number>>;
  /** Tick at which the agent left the world */
  readonly tick: number;
  readonly archivedAt: string;
}

export interface AgentArchive {
  readonly kind: 'supabase' | 'memory';
  save(record: AgentRecord): Promise<void>;
}

export function toAgentRecord(agent: AgentEntity, tick: number, now: Date = new Date()): AgentRecord {
  return {
    agentId: agent.entityId,
    displayName: agent.displayName,
    x: agent.x,
    y: agent.y,
    inventory: toFullInventory(agent.inventory),
    tick,
    archivedAt: now.toISOString(),
  };
}

/** Rows in the `agent_records` table, keyed by agent_id */
export class SupabaseAgentArchive implements AgentArchive {
  readonly kind = 'supabase';
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async save(record: AgentRecord): Promise<void> {
    const { error } = await this.client.from('agent_records').upsert(
      {
        agent_id: record.agentId,
        display_name: record.displayName,
        x: record.x,
        y: record.y,
        ore: record.inventory.ORE,
        fuel: record.inventory.FUEL,
        components: record.inventory.COMPONENTS,
        tick: record.tick,
        archived_at: record.archivedAt,
      },
      { onConflict: 'agent_id' }
    );
    if (error) {
      throw new Error(`Failed to archive agent ${record.agentId}: ${error.message}`);
    }
  }
}

/** Used when no Supabase credentials are configured, and in tests */
export class MemoryAgentArchive implements AgentArchive {
  readonly kind = 'memory';
  private readonly records = new Map<string, AgentRecord>();

  async save(record: AgentRecord): Promise<void> {
    this.records.set(record.agentId, record);
  }

  get(agentId: string): AgentRecord | undefined {
    return this.records.get(agentId);
  }

  all(): AgentRecord[] {
    return Array.from(this.records.values());
  }
}

export function createAgentArchive(settings: SupabaseSettings | undefined): AgentArchive {
  if (!settings) {
    console.warn('[Archive] No Supabase credentials; evicted agents are kept in memory only');
    return new MemoryAgentArchive();
  }
  return new SupabaseAgentArchive(createClient(settings.url, settings.serviceKey));
}

/**
 * Archive a batch of agents; failures are logged per agent.
 * Resolves with the number archived.
 */
export async function archiveAgents(
  archive: AgentArchive,
  agents: readonly AgentEntity[],
  tick: number
): Promise<number> {
  const results = await Promise.allSettled(
    agents.map((agent) => archive.save(toAgentRecord(agent, tick)))
  );
  let saved = 0;
  results.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      saved++;
    } else {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(`[Archive] ${agents[i].entityId}: ${reason}`);
    }
  });
  return saved;
}
