import type { DefenderState } from '../../../domain/simulationTypes';
import { distanceTo, lerp, vector } from '../engineMath';
import {
  distanceToBall,
  getBallOwner,
  getOwnGoal,
  isClosestTeammateToBall,
  isUnderPressure,
  opponentHasBall,
  type StateProcessingContext
} from '../tickContext';
import {
  arriveAt,
  brake,
  clearEvent,
  noDecision,
  pursueBallOwner,
  tackleTargetInReach,
  toDefender,
  type RoleStateHandlers
} from './common';
import { choosePassTarget, passEvent } from './passing';

/** Spot on the line from the defender's own goal to the ball. */
export const coverPoint = (ctx: StateProcessingContext) => {
  const goal = getOwnGoal(ctx.tick, ctx.player);
  const ball = ctx.tick.ball.position;
  const weight = ctx.tuning.covering.ballWeight;
  return vector(lerp(goal.x, ball.x, weight), lerp(goal.y, ball.y, weight), 0);
};

const opponentOwnerDistance = (ctx: StateProcessingContext) => {
  const owner = getBallOwner(ctx.tick);
  if (!owner || owner.teamId === ctx.player.teamId) return null;
  return distanceTo(ctx.player.position, owner.position);
};

export const DEFENDER_STATES: RoleStateHandlers<DefenderState> = {
  covering: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toDefender('passing');
      const ownerDistance = opponentOwnerDistance(ctx);
      if (ownerDistance !== null && ownerDistance < ctx.tuning.marking.distance) return toDefender('marking');
      if (
        ctx.tick.ball.ownerId === null &&
        distanceToBall(ctx.tick, ctx.player) < ctx.tuning.covering.looseBallDistance &&
        isClosestTeammateToBall(ctx.tick, ctx.player)
      ) {
        return toDefender('running');
      }
      return null;
    },
    processSlow: noDecision,
    velocity: (ctx) => arriveAt(ctx, coverPoint(ctx))
  },

  marking: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toDefender('passing');
      if (!opponentHasBall(ctx.tick, ctx.player)) return toDefender('covering');
      const ownerDistance = opponentOwnerDistance(ctx);
      if (ownerDistance !== null && ownerDistance <= ctx.tuning.tackle.distance) return toDefender('tackling');
      return null;
    },
    processSlow: (ctx) => {
      const ownerDistance = opponentOwnerDistance(ctx);
      if (ownerDistance !== null && ownerDistance > ctx.tuning.marking.releaseDistance) {
        return toDefender('covering');
      }
      return null;
    },
    velocity: pursueBallOwner
  },

  tackling: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toDefender('passing');
      const target = tackleTargetInReach(ctx, ctx.tuning.tackle.reach);
      if (!target) return toDefender('marking');
      return toDefender('covering', [{ type: 'tackle', playerId: ctx.player.id, targetId: target.id }]);
    },
    processSlow: noDecision,
    velocity: pursueBallOwner
  },

  running: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toDefender('passing');
      if (ctx.tick.ball.ownerId !== null) return toDefender('covering');
      return null;
    },
    processSlow: (ctx) =>
      distanceToBall(ctx.tick, ctx.player) > ctx.tuning.covering.looseBallDistance * 2 ? toDefender('covering') : null,
    velocity: (ctx) => arriveAt(ctx, { ...ctx.tick.ball.position }, 1)
  },

  passing: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toDefender('covering');
      if (isUnderPressure(ctx.tick, ctx.player, ctx.tuning.pressure.distance)) return toDefender('clearing');
      return null;
    },
    processSlow: (ctx) => {
      const choice = choosePassTarget(ctx);
      if (!choice) return toDefender('clearing');
      return toDefender('covering', [passEvent(ctx, choice.target)]);
    },
    velocity: brake
  },

  clearing: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toDefender('covering');
      return toDefender('covering', [clearEvent(ctx)]);
    },
    processSlow: noDecision,
    velocity: brake
  }
};
