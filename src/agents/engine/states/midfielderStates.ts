import type { MidfielderState } from '../../../domain/simulationTypes';
import {
  distanceToBall,
  distanceToOpponentGoal,
  getTeammates,
  isClosestTeammateToBall,
  isUnderPressure,
  opponentHasBall,
  scoringChance,
  teamHasBall,
  type StateProcessingContext
} from '../tickContext';
import {
  arriveAt,
  brake,
  dribbleVelocity,
  findSpaceVelocity,
  pressingHandler,
  shootingHandler,
  steer,
  toMidfielder,
  type RoleStateHandlers
} from './common';
import { choosePassTarget, isOpenForPass, passEvent } from './passing';

const WANDER = {
  radius: 0.5,
  jitter: 1,
  distance: 1.5
};

// Midfielders make shorter runs than forwards.
const RUN_DEPTH = 0.5;

const opponentOnBallNearby = (ctx: StateProcessingContext) =>
  opponentHasBall(ctx.tick, ctx.player) && distanceToBall(ctx.tick, ctx.player) < ctx.tuning.pressing.distance;

const inShootingRange = (ctx: StateProcessingContext) =>
  distanceToOpponentGoal(ctx.tick, ctx.player) < ctx.tuning.shooting.distance;

const hasBetterPlacedTeammate = (ctx: StateProcessingContext) => {
  const own = scoringChance(ctx.tick, ctx.player);
  return getTeammates(ctx.tick, ctx.player).some(
    (teammate) => isOpenForPass(ctx, teammate) && scoringChance(ctx.tick, teammate) > own
  );
};

export const MIDFIELDER_STATES: RoleStateHandlers<MidfielderState> = {
  standing: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toMidfielder('distributing');
      if (opponentOnBallNearby(ctx)) return toMidfielder('pressing');
      if (ctx.tick.ball.ownerId === null && isClosestTeammateToBall(ctx.tick, ctx.player)) {
        return toMidfielder('running');
      }
      return null;
    },
    processSlow: (ctx) => (teamHasBall(ctx.tick, ctx.player) ? toMidfielder('running') : null),
    velocity: (ctx) =>
      steer(ctx, {
        kind: 'wander',
        target: { ...ctx.player.position },
        radius: WANDER.radius,
        jitter: WANDER.jitter,
        distance: WANDER.distance,
        rng: ctx.rng
      })
  },

  running: {
    tryFast: (ctx) => {
      if (ctx.player.hasBall) return toMidfielder('distributing');
      if (opponentOnBallNearby(ctx)) return toMidfielder('pressing');
      return null;
    },
    processSlow: (ctx) => {
      if (
        ctx.tick.ball.ownerId === null &&
        !isClosestTeammateToBall(ctx.tick, ctx.player) &&
        distanceToBall(ctx.tick, ctx.player) > ctx.tuning.pressing.giveUpDistance
      ) {
        return toMidfielder('standing');
      }
      return null;
    },
    velocity: (ctx) => {
      if (teamHasBall(ctx.tick, ctx.player)) return findSpaceVelocity(ctx, RUN_DEPTH);
      return arriveAt(ctx, { ...ctx.tick.ball.position }, 1);
    }
  },

  distributing: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toMidfielder('running');
      if (inShootingRange(ctx)) return toMidfielder('shooting');
      return null;
    },
    processSlow: (ctx) => {
      const choice = choosePassTarget(ctx);
      if (!choice) return toMidfielder('dribbling');
      return toMidfielder('running', [passEvent(ctx, choice.target)]);
    },
    velocity: brake
  },

  dribbling: {
    tryFast: (ctx) => {
      if (!ctx.player.hasBall) return toMidfielder('running');
      if (inShootingRange(ctx)) return toMidfielder('shooting');
      if (isUnderPressure(ctx.tick, ctx.player, ctx.tuning.pressure.distance)) return toMidfielder('distributing');
      return null;
    },
    processSlow: (ctx) => (hasBetterPlacedTeammate(ctx) ? toMidfielder('distributing') : null),
    velocity: dribbleVelocity
  },

  shooting: shootingHandler(() => toMidfielder('running')),

  pressing: pressingHandler(
    () => toMidfielder('distributing'),
    () => toMidfielder('running')
  )
};
