import { TUNING } from '../../data/tuning';
import type { MatchPlayer, PlayerSkills, Vector3 } from '../../domain/simulationTypes';

export type SimPlayer = Readonly<MatchPlayer>;

/** What steering needs to know about the acting player. */
export type SteeringActor = {
  position: Readonly<Vector3>;
  velocity: Readonly<Vector3>;
  skills: Readonly<PlayerSkills>;
};

export type MovingTarget = {
  position: Readonly<Vector3>;
  velocity: Readonly<Vector3>;
};

export const getMaxSpeed = (skills: Readonly<PlayerSkills>, movement = TUNING.movement) =>
  movement.baseSpeed + (skills.physical.pace / 100) * movement.speedRange;

export const getMaxAcceleration = (skills: Readonly<PlayerSkills>, movement = TUNING.movement) =>
  movement.baseAcceleration + (skills.physical.acceleration / 100) * movement.accelerationRange;
