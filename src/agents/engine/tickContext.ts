import type { EngineTuning } from '../../data/tuning';
import type {
  BallState,
  FieldSize,
  GoalPositions,
  MatchPlayer,
  MatchSnapshot,
  Vector3
} from '../../domain/simulationTypes';
import { copyVector, distanceTo, vector } from './engineMath';
import type { SimPlayer } from './engineTypes';
import type { NetworkProvider } from './neuralNetwork';
import type { Rng } from './random';

/**
 * Frozen view of the match at the start of a tick. Every player evaluation in the tick reads
 * this same object; nothing written during the tick shows up here.
 */
export type TickContext = Readonly<{
  tick: number;
  time: number;
  dt: number;
  seed: number;
  field: Readonly<FieldSize>;
  goals: Readonly<GoalPositions>;
  ball: Readonly<BallState>;
  players: ReadonlyArray<SimPlayer>;
  playersById: ReadonlyMap<string, SimPlayer>;
  playersByTeam: ReadonlyMap<string, ReadonlyArray<SimPlayer>>;
}>;

export type StateProcessingContext = {
  tick: TickContext;
  player: SimPlayer;
  rng: Rng;
  networks: NetworkProvider;
  tuning: EngineTuning;
};

const freezeVector = (v: Readonly<Vector3>) => Object.freeze(copyVector(v));

const freezePlayer = (player: MatchPlayer): SimPlayer =>
  Object.freeze({
    ...player,
    position: freezeVector(player.position),
    velocity: freezeVector(player.velocity),
    skills: Object.freeze({
      technical: Object.freeze({ ...player.skills.technical }),
      mental: Object.freeze({ ...player.skills.mental }),
      physical: Object.freeze({ ...player.skills.physical }),
      goalkeeping: Object.freeze({ ...player.skills.goalkeeping })
    }),
    state: Object.freeze({ ...player.state })
  });

export const buildTickContext = (snapshot: MatchSnapshot, dt: number): TickContext => {
  const players = Object.freeze(snapshot.players.map(freezePlayer));
  const playersById = new Map<string, SimPlayer>();
  const playersByTeam = new Map<string, SimPlayer[]>();

  for (const player of players) {
    playersById.set(player.id, player);
    const team = playersByTeam.get(player.teamId);
    if (team) {
      team.push(player);
    } else {
      playersByTeam.set(player.teamId, [player]);
    }
  }
  playersByTeam.forEach((team) => Object.freeze(team));

  return Object.freeze({
    tick: snapshot.tick,
    time: snapshot.time,
    dt,
    seed: snapshot.seed,
    field: Object.freeze({ ...snapshot.field }),
    goals: Object.freeze({
      left: freezeVector(snapshot.goals.left),
      right: freezeVector(snapshot.goals.right)
    }),
    ball: Object.freeze({
      ...snapshot.ball,
      position: freezeVector(snapshot.ball.position),
      velocity: freezeVector(snapshot.ball.velocity)
    }),
    players,
    playersById,
    playersByTeam
  });
};

export const getPlayer = (context: TickContext, id: string | null) =>
  id === null ? null : context.playersById.get(id) ?? null;

/** Same team, excluding the player. */
export const getTeammates = (context: TickContext, player: SimPlayer) =>
  (context.playersByTeam.get(player.teamId) ?? []).filter((teammate) => teammate.id !== player.id);

export const getOpponents = (context: TickContext, player: SimPlayer) =>
  context.players.filter((other) => other.teamId !== player.teamId);

export const getBallOwner = (context: TickContext) => getPlayer(context, context.ball.ownerId);

export const teamHasBall = (context: TickContext, player: SimPlayer) =>
  getBallOwner(context)?.teamId === player.teamId;

export const opponentHasBall = (context: TickContext, player: SimPlayer) => {
  const owner = getBallOwner(context);
  return owner !== null && owner.teamId !== player.teamId;
};

export const getAttackDirection = (player: SimPlayer) => {
  if (player.side === 'left') return 1;
  if (player.side === 'right') return -1;
  return 0;
};

/** Goal the player attacks. A player without a side has no goal and gets the origin. */
export const getOpponentGoal = (context: TickContext, player: SimPlayer): Vector3 => {
  if (player.side === 'left') return copyVector(context.goals.right);
  if (player.side === 'right') return copyVector(context.goals.left);
  return vector();
};

export const getOwnGoal = (context: TickContext, player: SimPlayer): Vector3 => {
  if (player.side === 'left') return copyVector(context.goals.left);
  if (player.side === 'right') return copyVector(context.goals.right);
  return vector();
};

export const distanceToBall = (context: TickContext, player: SimPlayer) =>
  distanceTo(player.position, context.ball.position);

export const distanceToOpponentGoal = (context: TickContext, player: SimPlayer) =>
  distanceTo(player.position, getOpponentGoal(context, player));

export const getClosestOpponent = (context: TickContext, player: SimPlayer) => {
  let closest: { player: SimPlayer; distance: number } | null = null;
  for (const opponent of getOpponents(context, player)) {
    const distance = distanceTo(player.position, opponent.position);
    if (!closest || distance < closest.distance) {
      closest = { player: opponent, distance };
    }
  }
  return closest;
};

export const isUnderPressure = (context: TickContext, player: SimPlayer, pressureDistance: number) =>
  getOpponents(context, player).some(
    (opponent) => distanceTo(player.position, opponent.position) < pressureDistance
  );

/** Ties go to the lower id so every evaluation agrees on a single chaser. */
export const isClosestTeammateToBall = (context: TickContext, player: SimPlayer) => {
  const own = distanceToBall(context, player);
  return getTeammates(context, player).every((teammate) => {
    const other = distanceToBall(context, teammate);
    return other > own || (other === own && teammate.id > player.id);
  });
};

export const scoringChance = (context: TickContext, player: SimPlayer) =>
  1 - distanceToOpponentGoal(context, player) / context.field.width;
