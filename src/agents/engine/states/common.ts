import type { PlayerEvent, StateChangeResult } from '../../../domain/matchTypes';
import type {
  DefenderState,
  ForwardState,
  GoalkeeperState,
  MidfielderState,
  PlayerStateTag,
  Vector3
} from '../../../domain/simulationTypes';
import { add, clamp, directionTo, distanceTo, lerp, scale, vector } from '../engineMath';
import { calculateSteering, type SteeringBehavior } from '../steering';
import {
  getAttackDirection,
  getBallOwner,
  getClosestOpponent,
  getOpponentGoal,
  type StateProcessingContext
} from '../tickContext';

/**
 * Contract every behavioural state implements. `tryFast` runs every tick; `processSlow` only
 * when `tryFast` returned nothing. `velocity` is the state's own movement when the result
 * carries none.
 */
export type StateHandler = {
  tryFast: (ctx: StateProcessingContext) => StateChangeResult | null;
  processSlow: (ctx: StateProcessingContext) => StateChangeResult | null;
  velocity: (ctx: StateProcessingContext) => Vector3;
};

export type RoleStateHandlers<S extends string> = Readonly<Record<S, StateHandler>>;

export const noDecision = (): StateChangeResult | null => null;

export const changeState = (transition: PlayerStateTag, events: PlayerEvent[] = []): StateChangeResult => ({
  transition,
  events
});

export const toForward = (state: ForwardState, events?: PlayerEvent[]) =>
  changeState({ role: 'forward', state }, events);

export const toMidfielder = (state: MidfielderState, events?: PlayerEvent[]) =>
  changeState({ role: 'midfielder', state }, events);

export const toDefender = (state: DefenderState, events?: PlayerEvent[]) =>
  changeState({ role: 'defender', state }, events);

export const toGoalkeeper = (state: GoalkeeperState, events?: PlayerEvent[]) =>
  changeState({ role: 'goalkeeper', state }, events);

export const steer = (ctx: StateProcessingContext, behavior: SteeringBehavior) =>
  calculateSteering(behavior, ctx.player).velocity;

export const arriveAt = (ctx: StateProcessingContext, target: Vector3, slowingDistance = ctx.tuning.arrive.slowingDistance) =>
  steer(ctx, { kind: 'arrive', target, slowingDistance });

/** Arrive at the current position: cancels the player's velocity. */
export const brake = (ctx: StateProcessingContext) => arriveAt(ctx, { ...ctx.player.position });

export const pursueBallOwner = (ctx: StateProcessingContext) => {
  const owner = getBallOwner(ctx.tick);
  if (!owner || owner.teamId === ctx.player.teamId) {
    return arriveAt(ctx, { ...ctx.tick.ball.position });
  }
  return steer(ctx, { kind: 'pursuit', target: owner });
};

/** Carry the ball toward goal, sidestepping the nearest opponent when one gets close. */
export const dribbleVelocity = (ctx: StateProcessingContext) => {
  const towardGoal = arriveAt(ctx, getOpponentGoal(ctx.tick, ctx.player));
  const closest = getClosestOpponent(ctx.tick, ctx.player);
  if (!closest || closest.distance >= ctx.tuning.dribble.evadeDistance) {
    return towardGoal;
  }
  const evade = steer(ctx, { kind: 'evade', target: closest.player });
  return add(towardGoal, scale(evade, ctx.tuning.dribble.evadeWeight));
};

/** Point ahead of the ball the player runs into when the team has it. */
export const attackingRunTarget = (ctx: StateProcessingContext, depthFactor = 1): Vector3 => {
  const { ball, field } = ctx.tick;
  const direction = getAttackDirection(ctx.player);
  const x = clamp(ball.position.x + direction * ctx.tuning.run.aheadOfBall * depthFactor, 0, field.width);
  const y = lerp(ctx.player.position.y, field.height / 2, ctx.tuning.run.widthPull);
  return vector(x, y, 0);
};

export const findSpaceVelocity = (ctx: StateProcessingContext, depthFactor = 1) => {
  const run = arriveAt(ctx, attackingRunTarget(ctx, depthFactor));
  const closest = getClosestOpponent(ctx.tick, ctx.player);
  if (!closest || closest.distance >= ctx.tuning.pressure.distance) {
    return run;
  }
  const flee = steer(ctx, { kind: 'flee', target: { ...closest.player.position } });
  return add(run, scale(flee, 0.3));
};

export const shootEvent = (ctx: StateProcessingContext): PlayerEvent => {
  const goal = getOpponentGoal(ctx.tick, ctx.player);
  const accuracy = ctx.player.skills.technical.finishing / 100;
  const spread = (ctx.rng.nextFloat() * 2 - 1) * ctx.tuning.shooting.maxJitter * (1 - accuracy);
  return {
    type: 'shoot',
    playerId: ctx.player.id,
    target: vector(goal.x, goal.y + spread, 0),
    force: ctx.tuning.shooting.force
  };
};

export const clearEvent = (ctx: StateProcessingContext): PlayerEvent => {
  const flat = directionTo(ctx.player.position, getOpponentGoal(ctx.tick, ctx.player));
  return {
    type: 'clear_ball',
    playerId: ctx.player.id,
    direction: vector(flat.x, flat.y, ctx.tuning.clearance.lift),
    force: ctx.tuning.clearance.force
  };
};

export const tackleTargetInReach = (ctx: StateProcessingContext, reach: number) => {
  const owner = getBallOwner(ctx.tick);
  if (!owner || owner.teamId === ctx.player.teamId) return null;
  return distanceTo(ctx.player.position, owner.position) <= reach ? owner : null;
};

/** Shooting is one tick long: release the ball and move on. */
export const shootingHandler = (after: () => StateChangeResult): StateHandler => ({
  tryFast: (ctx) => {
    const next = after();
    if (!ctx.player.hasBall) return next;
    return { ...next, events: [shootEvent(ctx)] };
  },
  processSlow: noDecision,
  velocity: brake
});

/**
 * Chase the ball owner and tackle once close enough. `withBall` fires when the player won the
 * ball, `offBall` when there is nothing left to press.
 */
export const pressingHandler = (
  withBall: () => StateChangeResult,
  offBall: () => StateChangeResult
): StateHandler => ({
  tryFast: (ctx) => {
    if (ctx.player.hasBall) return withBall();
    const owner = getBallOwner(ctx.tick);
    if (!owner || owner.teamId === ctx.player.teamId) return offBall();
    if (distanceTo(ctx.player.position, owner.position) <= ctx.tuning.tackle.distance) {
      const next = offBall();
      return { ...next, events: [{ type: 'tackle', playerId: ctx.player.id, targetId: owner.id }] };
    }
    return null;
  },
  processSlow: (ctx) => {
    const owner = getBallOwner(ctx.tick);
    if (owner && distanceTo(ctx.player.position, owner.position) > ctx.tuning.pressing.giveUpDistance) {
      return offBall();
    }
    return null;
  },
  velocity: pursueBallOwner
});
