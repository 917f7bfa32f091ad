import type { Vector3 } from '../../domain/simulationTypes';
import { add, addScalar, distanceTo, heading, normalize, randomInUnitCircle, scale, subtract } from './engineMath';
import { getMaxSpeed, type MovingTarget, type SteeringActor } from './engineTypes';
import type { Rng } from './random';

export type SteeringBehavior =
  | { kind: 'seek'; target: Vector3 }
  | { kind: 'arrive'; target: Vector3; slowingDistance: number }
  | { kind: 'pursuit'; target: MovingTarget }
  | { kind: 'evade'; target: MovingTarget }
  | { kind: 'wander'; target: Vector3; radius: number; jitter: number; distance: number; rng: Rng }
  | { kind: 'flee'; target: Vector3 };

export type SteeringOutput = {
  velocity: Vector3;
  rotation: number;
};

const correction = (desired: Vector3, actor: SteeringActor): SteeringOutput => ({
  velocity: subtract(desired, actor.velocity),
  rotation: 0
});

/** Where a moving target will be after the time the actor needs to cover the current gap at top speed. */
export const predictPosition = (actor: SteeringActor, target: MovingTarget) => {
  const maxSpeed = getMaxSpeed(actor.skills);
  const prediction = maxSpeed > 0 ? distanceTo(actor.position, target.position) / maxSpeed : 0;
  return add(target.position, scale(target.velocity, prediction));
};

export const desiredArriveSpeed = (distance: number, slowingDistance: number, maxSpeed: number) => {
  if (distance < slowingDistance) {
    return (distance / slowingDistance) * maxSpeed;
  }
  return maxSpeed;
};

/**
 * Returns a correction term (desired minus current velocity). Callers integrate it and clamp
 * to the player's limits; nothing here clamps.
 */
export const calculateSteering = (behavior: SteeringBehavior, actor: SteeringActor): SteeringOutput => {
  switch (behavior.kind) {
    case 'seek': {
      const desired = normalize(subtract(behavior.target, actor.position));
      return correction(desired, actor);
    }
    case 'arrive': {
      const distance = distanceTo(actor.position, behavior.target);
      const speed = desiredArriveSpeed(distance, behavior.slowingDistance, getMaxSpeed(actor.skills));
      const desired = scale(normalize(subtract(behavior.target, actor.position)), speed);
      return correction(desired, actor);
    }
    case 'pursuit': {
      const predicted = predictPosition(actor, behavior.target);
      const desired = scale(normalize(subtract(predicted, actor.position)), getMaxSpeed(actor.skills));
      return correction(desired, actor);
    }
    case 'evade': {
      const predicted = predictPosition(actor, behavior.target);
      const desired = scale(normalize(subtract(actor.position, predicted)), getMaxSpeed(actor.skills));
      return correction(desired, actor);
    }
    case 'wander': {
      const jittered = add(behavior.target, scale(randomInUnitCircle(behavior.rng), behavior.jitter));
      const offset = scale(normalize(subtract(jittered, actor.position)), behavior.distance);
      const desired = addScalar(offset, heading(actor.velocity) * behavior.radius);
      return correction(desired, actor);
    }
    case 'flee': {
      const desired = scale(normalize(subtract(actor.position, behavior.target)), getMaxSpeed(actor.skills));
      return correction(desired, actor);
    }
  }
};
