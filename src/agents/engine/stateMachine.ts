import { TUNING, type EngineTuning } from '../../data/tuning';
import type { EvaluationPath, PlayerTickResult, StateChangeResult } from '../../domain/matchTypes';
import type { PlayerStateTag } from '../../domain/simulationTypes';
import { isFiniteVector, vector } from './engineMath';
import type { SimPlayer } from './engineTypes';
import type { NetworkProvider } from './neuralNetwork';
import { rngFor } from './random';
import type { StateHandler } from './states/common';
import { DEFENDER_STATES } from './states/defenderStates';
import { FORWARD_STATES } from './states/forwardStates';
import { GOALKEEPER_STATES } from './states/goalkeeperStates';
import { MIDFIELDER_STATES } from './states/midfielderStates';
import { getPlayer, type StateProcessingContext, type TickContext } from './tickContext';

export type EvaluationDependencies = {
  networks: NetworkProvider;
  tuning?: EngineTuning;
};

export const getStateHandler = (tag: PlayerStateTag): StateHandler => {
  switch (tag.role) {
    case 'forward':
      return FORWARD_STATES[tag.state];
    case 'midfielder':
      return MIDFIELDER_STATES[tag.state];
    case 'defender':
      return DEFENDER_STATES[tag.state];
    case 'goalkeeper':
      return GOALKEEPER_STATES[tag.state];
  }
};

export const isSameState = (a: PlayerStateTag, b: PlayerStateTag) => a.role === b.role && a.state === b.state;

/** Random draws depend on seed, tick and player only, never on evaluation order. */
export const buildProcessingContext = (
  tick: TickContext,
  player: SimPlayer,
  dependencies: EvaluationDependencies
): StateProcessingContext => ({
  tick,
  player,
  rng: rngFor(tick.seed, tick.tick, player.id),
  networks: dependencies.networks,
  tuning: dependencies.tuning ?? TUNING
});

const runHandler = (handler: StateHandler, ctx: StateProcessingContext) => {
  let path: EvaluationPath = 'fast';
  let result: StateChangeResult | null = handler.tryFast(ctx);
  if (!result) {
    path = 'slow';
    result = handler.processSlow(ctx);
  }
  if (!result) {
    path = 'idle';
  }
  return { path, result };
};

/**
 * One player's decision for the tick. An id missing from the snapshot yields `null`.
 * The returned transition is a request: the caller applies it once the whole tick is done.
 */
export const evaluatePlayer = (
  tick: TickContext,
  playerId: string,
  dependencies: EvaluationDependencies
): PlayerTickResult | null => {
  const player = getPlayer(tick, playerId);
  if (!player) return null;

  const ctx = buildProcessingContext(tick, player, dependencies);
  const handler = getStateHandler(player.state);
  const { path, result } = runHandler(handler, ctx);

  const velocity = result?.velocity ?? handler.velocity(ctx);
  const transition = result?.transition && !isSameState(result.transition, player.state) ? result.transition : null;

  return {
    playerId: player.id,
    state: { ...player.state },
    path,
    velocity: isFiniteVector(velocity) ? velocity : vector(),
    transition: transition ? { ...transition } : null,
    events: result ? [...result.events] : []
  };
};
