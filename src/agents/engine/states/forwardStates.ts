import type { ForwardState } from '../../../domain/simulationTypes';
import { clamp, directionTo, distanceTo, scale, vector } from '../engineMath';
import { getMaxAcceleration } from '../engineTypes';
import { evaluateNetwork, NETWORK_IDS } from '../neuralNetwork';
import {
  distanceToBall,
  distanceToOpponentGoal,
  getClosestOpponent,
  getOpponentGoal,
  getPlayer,
  getTeammates,
  isClosestTeammateToBall,
  isUnderPressure,
  opponentHasBall,
  teamHasBall,
  type StateProcessingContext
} from '../tickContext';
import {
  arriveAt,
  brake,
  dribbleVelocity,
  findSpaceVelocity,
  noDecision,
  pressingHandler,
  shootingHandler,
  toForward,
  type RoleStateHandlers
} from './common';
import { choosePassTarget, findBestPassOption, hasSupport, passEvent } from './passing';

const underPressure = (ctx: StateProcessingContext) =>
  isUnderPressure(ctx.tick, ctx.player, ctx.tuning.pressure.distance);

const opponentOnBallNearby = (ctx: StateProcessingContext) =>
  opponentHasBall(ctx.tick, ctx.player) && distanceToBall(ctx.tick, ctx.player) < ctx.tuning.pressing.distance;

const looseBall = (ctx: StateProcessingContext) => ctx.tick.ball.ownerId === null;

const inShootingRange = (ctx: StateProcessingContext) =>
  distanceToOpponentGoal(ctx.tick, ctx.player) < ctx.tuning.shooting.distance;

/** A carrier with nobody to pass to shoots when close enough, otherwise keeps the ball. */
const withoutPass = (ctx: StateProcessingContext) =>
  inShootingRange(ctx) ? toForward('shooting') : toForward('dribbling');

export const FORWARD_DECISIONS = ['shoot', 'pass', 'dribble'] as const;

export type ForwardDecision = (typeof FORWARD_DECISIONS)[number];

export const forwardDecisionFeatures = (ctx: StateProcessingContext) => {
  const closest = getClosestOpponent(ctx.tick, ctx.player);
  const pressure = closest ? clamp(1 - closest.distance / (ctx.tuning.pressure.distance * 2), 0, 1) : 0;
  const support = getTeammates(ctx.tick, ctx.player).filter(
    (teammate) => distanceTo(ctx.player.position, teammate.position) < ctx.tuning.support.distance
  ).length;
  return [
    clamp(1 - distanceToOpponentGoal(ctx.tick, ctx.player) / ctx.tick.field.width, 0, 1),
    pressure,
    clamp(support / 3, 0, 1),
    ctx.player.skills.technical.finishing / 100,
    ctx.player.skills.technical.dribbling / 100
  ];
};

/** Network-backed choice between shooting, passing and carrying on. `null` without the network. */
export const decideForwardAction = (ctx: StateProcessingContext) => {
  const network = ctx.networks.tryGet(NETWORK_IDS.forwardDecision);
  if (!network) return null;

  const scores = evaluateNetwork(network, forwardDecisionFeatures(ctx));
  let best = 0;
  scores.forEach((score, index) => {
    if (score > scores[best]) best = index;
  });
  return { decision: FORWARD_DECISIONS[best] ?? 'dribble', score: scores[best] };
};

export const FORWARD_STATES: RoleStateHandlers<ForwardState> = {
  standing: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toForward('heading_up_play');
      if (opponentOnBallNearby(ctx)) return toForward('pressing');
      if (looseBall(ctx) && isClosestTeammateToBall(ctx.tick, ctx.player)) return toForward('running');
      return null;
    },
    processSlow: (ctx) => (teamHasBall(ctx.tick, ctx.player) ? toForward('running') : null),
    velocity: brake
  },

  running: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toForward('heading_up_play');
      if (opponentOnBallNearby(ctx)) return toForward('pressing');
      return null;
    },
    processSlow: (ctx) => {
      if (
        looseBall(ctx) &&
        !isClosestTeammateToBall(ctx.tick, ctx.player) &&
        distanceToBall(ctx.tick, ctx.player) > ctx.tuning.pressing.giveUpDistance
      ) {
        return toForward('standing');
      }
      return null;
    },
    velocity: (ctx) => {
      if (teamHasBall(ctx.tick, ctx.player)) return findSpaceVelocity(ctx);
      return arriveAt(ctx, { ...ctx.tick.ball.position }, 1);
    }
  },

  dribbling: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toForward('running');
      if (inShootingRange(ctx)) return toForward('shooting');
      if (underPressure(ctx)) return toForward('passing');
      return null;
    },
    processSlow: (ctx) => {
      const choice = decideForwardAction(ctx);
      if (!choice) return null;
      if (
        choice.decision === 'shoot' &&
        choice.score >= ctx.tuning.shooting.decisionThreshold &&
        distanceToOpponentGoal(ctx.tick, ctx.player) <= ctx.tuning.shooting.maxDistance
      ) {
        return toForward('shooting');
      }
      if (choice.decision === 'pass') return toForward('passing');
      return null;
    },
    velocity: dribbleVelocity
  },

  passing: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toForward('running');
      if (getTeammates(ctx.tick, ctx.player).length === 0) return withoutPass(ctx);
      return null;
    },
    processSlow: (ctx) => {
      const choice = choosePassTarget(ctx);
      if (!choice) return withoutPass(ctx);
      return toForward('running', [passEvent(ctx, choice.target)]);
    },
    velocity: brake
  },

  shooting: shootingHandler(() => toForward('running')),

  heading_up_play: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toForward('running');
      if (underPressure(ctx)) return toForward('passing');
      if (!hasSupport(ctx)) return toForward('dribbling');

      const teammateId = findBestPassOption(ctx);
      if (teammateId !== null) {
        if (!getPlayer(ctx.tick, teammateId)) return null;
        return toForward('running', [{ type: 'request_pass', playerId: ctx.player.id, targetId: teammateId }]);
      }

      const direction = directionTo(ctx.player.position, getOpponentGoal(ctx.tick, ctx.player));
      return {
        velocity: scale(direction, getMaxAcceleration(ctx.player.skills, ctx.tuning.movement) * 0.5),
        events: []
      };
    },
    processSlow: noDecision,
    velocity: () => vector()
  },

  pressing: pressingHandler(
    () => toForward('heading_up_play'),
    () => toForward('running')
  )
};
