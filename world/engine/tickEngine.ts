import { v4 as uuidv4 } from 'uuid';
import type { AgentEntity } from '../entities/entity';
import type { ActionQueue } from '../actions/actionQueue';
import type { DeliveryReport, SessionRegistry } from '../sessions/sessionRegistry';
import type { World } from './world';
import type { ActionOutcome, WorldSnapshot } from './snapshot';

// ============================================================================
// TICK ENGINE - Fixed-interval scheduler that owns every world mutation
// ============================================================================

export type TickPhase = 'IDLE' | 'DRAINING' | 'RESOLVING' | 'PUBLISHING' | 'STOPPED';

export interface TickReport {
  readonly tick: number;
  readonly admitted: readonly string[];
  readonly outcomes: readonly ActionOutcome[];
  readonly evicted: readonly string[];
  readonly spawned: number;
  readonly delivery: DeliveryReport;
}

export interface TickEngineOptions {
  readonly world: World;
  readonly queue: ActionQueue;
  readonly sessions: SessionRegistry;
  /** Called with every published snapshot (spectators) */
  readonly onSnapshot?: (snapshot: WorldSnapshot) => void;
  /** Called with the final record of each evicted agent */
  readonly onEvicted?: (agent: AgentEntity, tick: number) => void;
  /** Called once when a tick fails and the engine halts */
  readonly onFatal?: (error: Error) => void;
}

interface PendingAdmission {
  readonly agentId: string;
  readonly displayName: string;
}

function shortId(agentId: string): string {
  return agentId.slice(0, 8);
}

/**
 * Runs IDLE -> DRAINING -> RESOLVING -> PUBLISHING -> IDLE until stopped.
 *
 * IDLE (waiting for the interval timer) is the only point where other code
 * runs. A tick is one synchronous call, so no handler can observe the world
 * half-way through it and no two ticks interleave.
 */
export class TickEngine {
  private readonly world: World;
  private readonly queue: ActionQueue;
  private readonly sessions: SessionRegistry;
  private readonly onSnapshot: ((snapshot: WorldSnapshot) => void) | undefined;
  private readonly onEvicted: ((agent: AgentEntity, tick: number) => void) | undefined;
  private readonly onFatal: ((error: Error) => void) | undefined;

  private admissions: PendingAdmission[] = [];
  private timer: ReturnType<typeof setInterval> | undefined;
  private currentPhase: TickPhase = 'IDLE';

  constructor(options: TickEngineOptions) {
    this.world = options.world;
    this.queue = options.queue;
    this.sessions = options.sessions;
    this.onSnapshot = options.onSnapshot;
    this.onEvicted = options.onEvicted;
    this.onFatal = options.onFatal;
  }

  get phase(): TickPhase {
    return this.currentPhase;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** Last completed tick */
  get tick(): number {
    return this.world.tick;
  }

  /**
   * Reserve an agent id for a new session. The agent is created at the start
   * of the next tick, so the caller can register its channel right away.
   */
  admit(displayName: string, agentId: string = uuidv4()): string {
    this.admissions.push({ agentId, displayName });
    return agentId;
  }

  start(): void {
    if (this.timer || this.currentPhase === 'STOPPED') return;
    this.timer = setInterval(() => this.runScheduledTick(), this.world.config.tickIntervalMs);
    console.log(
      `[Tick] Engine started (${this.world.config.tickIntervalMs}ms interval, tick ${this.world.tick})`
    );
  }

  /** Stop for good; the engine has no other terminal condition */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.currentPhase !== 'STOPPED') {
      this.currentPhase = 'STOPPED';
      console.log(`[Tick] Engine stopped at tick ${this.world.tick}`);
    }
  }

  /**
   * Run one full tick.
   *
   * @throws InvariantViolationError if grid and store disagree; the engine
   * stops and refuses further ticks
   */
  step(): TickReport {
    if (this.currentPhase === 'STOPPED') {
      throw new Error('Tick engine is stopped');
    }
    try {
      return this.runPhases(this.world.tick + 1);
    } catch (error) {
      this.stop();
      throw error;
    }
  }

  private runPhases(tick: number): TickReport {
    // DRAINING
    this.currentPhase = 'DRAINING';
    const admitted = this.applyAdmissions();
    const drained = this.queue.drainAll();

    // RESOLVING
    this.currentPhase = 'RESOLVING';
    const outcomes: ActionOutcome[] = [];
    for (const pending of drained) {
      const outcome = this.world.resolve(pending);
      if (outcome.status === 'rejected' && outcome.error) {
        console.warn(
          `[Tick ${tick}] ${shortId(pending.agentId)} ${pending.action} rejected: ${outcome.error.code} (${outcome.error.message})`
        );
      }
      outcomes.push(outcome);
    }
    const evicted = this.applyEvictions(tick);
    const spawned = this.world.runWorldEvents(tick).length;
    if (spawned > 0) {
      console.log(`[Tick ${tick}] Respawned ${spawned} resources`);
    }

    // PUBLISHING
    this.currentPhase = 'PUBLISHING';
    this.world.completeTick(tick);
    const snapshot = this.world.getSnapshot(outcomes);
    const delivery = this.sessions.broadcast(snapshot);
    this.publishToListener(snapshot);

    this.currentPhase = 'IDLE';
    return { tick, admitted, outcomes, evicted, spawned, delivery };
  }

  private runScheduledTick(): void {
    try {
      this.step();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      console.error(`[Tick] Halting after tick ${this.world.tick}: ${error.name}: ${error.message}`);
      if (!this.onFatal) throw error;
      this.onFatal(error);
    }
  }

  private publishToListener(snapshot: WorldSnapshot): void {
    if (!this.onSnapshot) return;
    try {
      this.onSnapshot(snapshot);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[Tick ${snapshot.tick}] Snapshot listener failed: ${reason}`);
    }
  }

  private applyAdmissions(): string[] {
    const admissions = this.admissions;
    this.admissions = [];

    const admitted: string[] = [];
    for (const { agentId, displayName } of admissions) {
      const spawned = this.world.spawnAgent(displayName, { entityId: agentId });
      if (!spawned.ok) {
        console.warn(`[Tick] Could not admit ${displayName}: ${spawned.error.message}`);
        continue;
      }
      admitted.push(agentId);
      console.log(
        `[Tick] Agent admitted: ${displayName} (${shortId(agentId)}) at (${spawned.value.x}, ${spawned.value.y})`
      );
    }
    return admitted;
  }

  private applyEvictions(tick: number): string[] {
    const evicted: string[] = [];
    for (const agentId of this.sessions.collectEvictions()) {
      const agent = this.world.getAgent(agentId);
      this.queue.discard(agentId);
      this.sessions.forget(agentId);
      if (!agent) continue;

      const removed = this.world.removeEntity(agentId);
      if (!removed.ok) continue;

      evicted.push(agentId);
      console.log(`[Tick ${tick}] Agent evicted: ${agent.displayName} (${shortId(agentId)})`);
      this.onEvicted?.(agent, tick);
    }
    return evicted;
  }
}
