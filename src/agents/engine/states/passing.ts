import type { PlayerEvent } from '../../../domain/matchTypes';
import { clamp, directionTo, distanceTo, dot, normalize, subtract } from '../engineMath';
import type { SimPlayer } from '../engineTypes';
import { evaluateNetwork, NETWORK_IDS } from '../neuralNetwork';
import {
  getOpponentGoal,
  getOpponents,
  getTeammates,
  scoringChance,
  type StateProcessingContext
} from '../tickContext';

export const hasSupport = (ctx: StateProcessingContext) =>
  getTeammates(ctx.tick, ctx.player).some(
    (teammate) => distanceTo(ctx.player.position, teammate.position) < ctx.tuning.support.distance
  );

/** In range of the passer and no opponent within the clearance radius of the receiver. */
export const isOpenForPass = (ctx: StateProcessingContext, teammate: SimPlayer) => {
  if (distanceTo(ctx.player.position, teammate.position) > ctx.tuning.pass.maxDistance) {
    return false;
  }
  return getOpponents(ctx.tick, ctx.player).every(
    (opponent) => distanceTo(opponent.position, teammate.position) > ctx.tuning.pass.minClearance
  );
};

/** The receiver sits along the line the ball is already travelling from the passer. */
export const inPassingLane = (ctx: StateProcessingContext, teammate: SimPlayer) => {
  const playerToBall = normalize(subtract(ctx.tick.ball.position, ctx.player.position));
  const playerToTeammate = normalize(subtract(teammate.position, ctx.player.position));
  return dot(playerToBall, playerToTeammate) > ctx.tuning.pass.laneCosine;
};

/**
 * Open, in-lane teammate with the highest scoring chance. Equal chances keep the earlier
 * teammate in snapshot order.
 */
export const findBestPassOption = (ctx: StateProcessingContext) => {
  let best: { id: string; chance: number } | null = null;
  for (const teammate of getTeammates(ctx.tick, ctx.player)) {
    if (!isOpenForPass(ctx, teammate) || !inPassingLane(ctx, teammate)) continue;
    const chance = scoringChance(ctx.tick, teammate);
    if (!best || chance > best.chance) {
      best = { id: teammate.id, chance };
    }
  }
  return best?.id ?? null;
};

const nearestOpponentDistance = (ctx: StateProcessingContext, teammate: SimPlayer) =>
  getOpponents(ctx.tick, ctx.player).reduce(
    (nearest, opponent) => Math.min(nearest, distanceTo(opponent.position, teammate.position)),
    Number.POSITIVE_INFINITY
  );

export const passFeatures = (ctx: StateProcessingContext, teammate: SimPlayer) => {
  const { pass } = ctx.tuning;
  const distance = distanceTo(ctx.player.position, teammate.position);
  const closeness = clamp(1 - distance / pass.maxDistance, 0, 1);
  const openness = clamp(nearestOpponentDistance(ctx, teammate) / (pass.minClearance * 2), 0, 1);
  const progression = dot(
    directionTo(ctx.player.position, teammate.position),
    directionTo(ctx.player.position, getOpponentGoal(ctx.tick, ctx.player))
  );
  return [
    closeness,
    openness,
    progression,
    scoringChance(ctx.tick, teammate),
    ctx.player.skills.technical.passing / 100
  ];
};

export type PassChoice = {
  target: SimPlayer;
  score: number;
};

/**
 * Ranks open teammates with the pass-scoring network. Without the network the ranking falls
 * back to scoring chance.
 */
export const choosePassTarget = (ctx: StateProcessingContext): PassChoice | null => {
  const network = ctx.networks.tryGet(NETWORK_IDS.passScoring);
  let best: PassChoice | null = null;

  for (const teammate of getTeammates(ctx.tick, ctx.player)) {
    if (!isOpenForPass(ctx, teammate)) continue;
    const score = network
      ? evaluateNetwork(network, passFeatures(ctx, teammate))[0]
      : scoringChance(ctx.tick, teammate);
    if (!best || score > best.score) {
      best = { target: teammate, score };
    }
  }
  return best;
};

export const passForce = (ctx: StateProcessingContext, distance: number) => {
  const { pass } = ctx.tuning;
  return Math.min(pass.maxForce, pass.baseForce + distance * pass.forcePerMetre);
};

export const passEvent = (ctx: StateProcessingContext, target: SimPlayer): PlayerEvent => ({
  type: 'pass_to',
  playerId: ctx.player.id,
  targetId: target.id,
  force: passForce(ctx, distanceTo(ctx.player.position, target.position))
});
