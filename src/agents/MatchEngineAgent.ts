import { TUNING, type EngineTuning } from '../data/tuning';
import type { CommitOutcome, MatchStats, PlayerTickResult, TickResult } from '../domain/matchTypes';
import type { MatchSnapshot, Vector3 } from '../domain/simulationTypes';
import { logger as rootLogger, type Logger } from '../logger';
import {
  applyTransitions,
  cloneSnapshot,
  commitEvents,
  resolveLooseBall
} from './engine/commitEngine';
import {
  getSharedNetworkRegistry,
  NETWORK_IDS,
  NetworkRegistry,
  type NetworkProvider
} from './engine/neuralNetwork';
import { rngFor } from './engine/random';
import { aggregateTickResults, compareIds } from './engine/resultEngine';
import { evaluatePlayer, type EvaluationDependencies } from './engine/stateMachine';
import { buildTickContext } from './engine/tickContext';
import { PhysicsAgent } from './PhysicsAgent';
import { StatsAgent } from './StatsAgent';

type EngineConfig = {
  tuning?: EngineTuning;
  networks?: NetworkProvider;
  logger?: Logger;
  physics?: PhysicsAgent;
};

export type StepResult = {
  snapshot: MatchSnapshot;
  result: TickResult;
  outcomes: CommitOutcome[];
};

export class TickError extends Error {
  readonly tick: number;

  constructor(tick: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Tick ${tick} failed: ${reason}`, options);
    this.name = 'TickError';
    this.tick = tick;
  }
}

export class MatchEngineAgent {
  private readonly tuning: EngineTuning;
  private readonly networks: NetworkProvider;
  private readonly logger: Logger;
  private readonly physics: PhysicsAgent;
  private readonly unavailableNetworks: string[];
  private stats: StatsAgent | null = null;

  constructor(config: EngineConfig = {}) {
    this.tuning = config.tuning ?? TUNING;
    this.networks = config.networks ?? getSharedNetworkRegistry();
    this.logger = config.logger ?? rootLogger.child({ module: 'match-engine' });
    this.physics = config.physics ?? new PhysicsAgent({ tuning: this.tuning });
    this.unavailableNetworks =
      this.networks instanceof NetworkRegistry ? this.networks.preload(Object.values(NETWORK_IDS)) : [];
    if (this.unavailableNetworks.length) {
      this.logger.warn({ networks: this.unavailableNetworks }, 'network-assisted decisions disabled');
    }
  }

  getUnavailableNetworks() {
    return [...this.unavailableNetworks];
  }

  /**
   * Evaluates every player against one frozen view of `snapshot`. Nothing in `snapshot` is
   * modified; transitions and events come back for the caller to commit.
   */
  tick(snapshot: MatchSnapshot, dt: number): TickResult {
    try {
      const context = buildTickContext(snapshot, dt);
      const dependencies: EvaluationDependencies = { networks: this.networks, tuning: this.tuning };
      const results: PlayerTickResult[] = [];
      const ids = context.players.map((player) => player.id).sort(compareIds);
      for (const id of ids) {
        const result = evaluatePlayer(context, id, dependencies);
        if (result) results.push(result);
      }
      return aggregateTickResults(context.tick, results);
    } catch (error) {
      this.logger.error({ tick: snapshot.tick, err: error }, 'tick evaluation failed');
      throw new TickError(snapshot.tick, { cause: error });
    }
  }

  /**
   * Runs a tick and commits it: events against the ball, then state transitions, then physics.
   * Returns the next snapshot; the input is left untouched.
   */
  step(snapshot: MatchSnapshot, dt: number): StepResult {
    const result = this.tick(snapshot, dt);
    try {
      return this.commit(snapshot, result, dt);
    } catch (error) {
      this.logger.error({ tick: snapshot.tick, err: error }, 'tick commit failed');
      throw new TickError(snapshot.tick, { cause: error });
    }
  }

  /** Steps `count` ticks from `snapshot`, returning the final snapshot and every tick result. */
  run(snapshot: MatchSnapshot, dt: number, count: number) {
    let current = snapshot;
    const results: TickResult[] = [];
    for (let i = 0; i < count; i += 1) {
      const stepped = this.step(current, dt);
      results.push(stepped.result);
      current = stepped.snapshot;
    }
    return { snapshot: current, results };
  }

  getStats(): MatchStats | null {
    return this.stats?.getStats() ?? null;
  }

  resetStats() {
    this.stats = null;
  }

  private commit(snapshot: MatchSnapshot, result: TickResult, dt: number): StepResult {
    const next = cloneSnapshot(snapshot);

    const outcomes = commitEvents(next, result.events, rngFor(snapshot.seed, snapshot.tick, 'commit'), this.tuning);
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        this.logger.debug({ tick: snapshot.tick, event: outcome.event, reason: outcome.reason }, 'event rejected');
      }
    }
    applyTransitions(next, result.transitions);

    const corrections = new Map<string, Vector3>(
      result.velocities.map((entry) => [entry.playerId, entry.velocity])
    );
    this.physics.setField(next.field);
    this.physics.step(next, corrections, dt);
    resolveLooseBall(next, this.tuning);

    next.tick = snapshot.tick + 1;
    next.time = snapshot.time + dt;

    const stats = this.getStatsAgent(next);
    stats.recordOutcomes(next, outcomes);
    stats.step(next, dt);

    return { snapshot: next, result, outcomes };
  }

  private getStatsAgent(snapshot: MatchSnapshot) {
    if (!this.stats) {
      const teamIds = [...new Set(snapshot.players.map((player) => player.teamId))].sort(compareIds);
      this.stats = new StatsAgent(teamIds);
    }
    return this.stats;
  }
}
