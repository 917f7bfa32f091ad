import { TUNING, type EngineTuning } from '../data/tuning';
import { DEFAULT_FIELD, type FieldSize, type MatchSnapshot, type Vector3 } from '../domain/simulationTypes';
import { add, clamp, clampLength, length, normalize, scale } from './engine/engineMath';
import { getMaxAcceleration, getMaxSpeed } from './engine/engineTypes';

type PhysicsConfig = {
  field?: FieldSize;
  tuning?: EngineTuning;
  gravity?: number;
  bounce?: number;
};

export class PhysicsAgent {
  private field: FieldSize;
  private tuning: EngineTuning;
  private gravity: number;
  private bounce: number;

  constructor(config: PhysicsConfig = {}) {
    this.field = config.field ?? DEFAULT_FIELD;
    this.tuning = config.tuning ?? TUNING;
    this.gravity = config.gravity ?? 9.81;
    this.bounce = config.bounce ?? 0.75;
  }

  setField(field: FieldSize) {
    this.field = field;
  }

  /**
   * Integrates steering corrections into player velocities and moves everything by `dt`.
   * Corrections are limited to the player's acceleration for the step, velocities to top speed.
   */
  step(state: MatchSnapshot, corrections: ReadonlyMap<string, Vector3>, dt: number) {
    this.updatePlayers(state, corrections, dt);
    this.updateBall(state, dt);
  }

  private updatePlayers(state: MatchSnapshot, corrections: ReadonlyMap<string, Vector3>, dt: number) {
    for (const player of state.players) {
      const correction = corrections.get(player.id);
      const maxSpeed = getMaxSpeed(player.skills, this.tuning.movement);
      const maxAccel = getMaxAcceleration(player.skills, this.tuning.movement);

      let velocity = { ...player.velocity, z: 0 };
      if (correction) {
        const limited = clampLength({ ...correction, z: 0 }, maxAccel * dt);
        velocity = add(velocity, limited);
      }
      velocity = clampLength(velocity, maxSpeed);

      player.velocity = velocity;
      player.position = {
        x: clamp(player.position.x + velocity.x * dt, 0, this.field.width),
        y: clamp(player.position.y + velocity.y * dt, 0, this.field.height),
        z: 0
      };
    }
  }

  private updateBall(state: MatchSnapshot, dt: number) {
    const { ball } = state;
    const owner = ball.ownerId === null ? undefined : state.players.find((player) => player.id === ball.ownerId);

    if (owner) {
      const facing = normalize(owner.velocity);
      ball.position = add(owner.position, scale(facing, this.tuning.ball.carryOffset));
      ball.velocity = { ...owner.velocity };
      return;
    }

    const airborne = ball.position.z > 0 || ball.velocity.z > 0;
    ball.velocity.z = airborne ? ball.velocity.z - this.gravity * dt : 0;
    ball.position = add(ball.position, scale(ball.velocity, dt));

    if (ball.position.z <= 0) {
      ball.position.z = 0;
      ball.velocity.z = ball.velocity.z < -1 ? -ball.velocity.z * this.bounce * 0.5 : 0;
    }

    if (ball.position.x <= 0 || ball.position.x >= this.field.width) {
      ball.velocity.x *= -this.bounce;
      ball.position.x = clamp(ball.position.x, 0, this.field.width);
    }

    if (ball.position.y <= 0 || ball.position.y >= this.field.height) {
      ball.velocity.y *= -this.bounce;
      ball.position.y = clamp(ball.position.y, 0, this.field.height);
    }

    if (ball.position.z === 0) {
      ball.velocity.x *= this.tuning.ball.friction;
      ball.velocity.y *= this.tuning.ball.friction;
    }

    if (length({ x: ball.velocity.x, y: ball.velocity.y, z: 0 }) < this.tuning.ball.stopSpeed) {
      ball.velocity.x = 0;
      ball.velocity.y = 0;
    }
  }
}
