import type { GoalkeeperState } from '../../../domain/simulationTypes';
import { add, directionTo, distanceTo, scale } from '../engineMath';
import { distanceToBall, getOwnGoal, isClosestTeammateToBall, type StateProcessingContext } from '../tickContext';
import { arriveAt, brake, clearEvent, noDecision, toGoalkeeper, type RoleStateHandlers } from './common';
import { choosePassTarget, passEvent } from './passing';

/** Point between the goal and the ball; the keeper steps further out the further away the ball is. */
export const guardPoint = (ctx: StateProcessingContext) => {
  const goal = getOwnGoal(ctx.tick, ctx.player);
  const ball = ctx.tick.ball.position;
  const { maxLineOffset, lineOffsetFactor } = ctx.tuning.goalkeeper;
  const offset = Math.min(distanceTo(goal, ball) * lineOffsetFactor, maxLineOffset);
  return add(goal, scale(directionTo(goal, ball), offset));
};

const ballIsLoose = (ctx: StateProcessingContext) => ctx.tick.ball.ownerId === null;

const ballWithinClaim = (ctx: StateProcessingContext) =>
  distanceToBall(ctx.tick, ctx.player) <= ctx.tuning.goalkeeper.claimDistance;

const ballDistanceFromGoal = (ctx: StateProcessingContext) =>
  distanceTo(getOwnGoal(ctx.tick, ctx.player), ctx.tick.ball.position);

export const GOALKEEPER_STATES: RoleStateHandlers<GoalkeeperState> = {
  positioning: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toGoalkeeper('distributing');
      if (!ballIsLoose(ctx)) return null;
      if (ballWithinClaim(ctx)) return toGoalkeeper('catching');
      if (
        ballDistanceFromGoal(ctx) < ctx.tuning.goalkeeper.comingOutDistance &&
        isClosestTeammateToBall(ctx.tick, ctx.player)
      ) {
        return toGoalkeeper('coming_out');
      }
      return null;
    },
    processSlow: noDecision,
    velocity: (ctx) => arriveAt(ctx, guardPoint(ctx), 2)
  },

  coming_out: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toGoalkeeper('distributing');
      if (!ballIsLoose(ctx)) return toGoalkeeper('positioning');
      if (ballWithinClaim(ctx)) return toGoalkeeper('catching');
      if (ballDistanceFromGoal(ctx) > ctx.tuning.goalkeeper.comingOutDistance * 1.5) {
        return toGoalkeeper('positioning');
      }
      return null;
    },
    processSlow: noDecision,
    velocity: (ctx) => arriveAt(ctx, { ...ctx.tick.ball.position }, 2)
  },

  catching: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toGoalkeeper('distributing');
      if (ballIsLoose(ctx) && ballWithinClaim(ctx)) {
        return { events: [{ type: 'claim_ball', playerId: ctx.player.id }] };
      }
      return toGoalkeeper('positioning');
    },
    processSlow: noDecision,
    velocity: (ctx) => arriveAt(ctx, { ...ctx.tick.ball.position }, 1)
  },

  distributing: {
    tryFast: (ctx) => (ctx.player.hasBall ? null : toGoalkeeper('positioning')),
    processSlow: (ctx) => {
      const choice = choosePassTarget(ctx);
      if (!choice) return toGoalkeeper('positioning', [clearEvent(ctx)]);
      return toGoalkeeper('positioning', [passEvent(ctx, choice.target)]);
    },
    velocity: brake
  }
};
