import type { PlayerTickResult, StateTransition, TickResult } from '../../domain/matchTypes';
import { copyVector } from './engineMath';

/** Code-unit order, independent of locale. */
export const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Merges per-player results in ascending player id order. That order is the canonical event
 * order of a tick, however the results were produced.
 */
export const aggregateTickResults = (tick: number, results: readonly PlayerTickResult[]): TickResult => {
  const ordered = [...results].sort((a, b) => compareIds(a.playerId, b.playerId));

  const transitions: StateTransition[] = [];
  for (const result of ordered) {
    if (result.transition) {
      transitions.push({ playerId: result.playerId, from: result.state, to: result.transition });
    }
  }

  return {
    tick,
    velocities: ordered.map((result) => ({ playerId: result.playerId, velocity: copyVector(result.velocity) })),
    transitions,
    events: ordered.flatMap((result) => result.events),
    players: ordered
  };
};
