import type { EngineTuning } from '../../data/tuning';
import type { CommitOutcome, PlayerEvent, StateTransition } from '../../domain/matchTypes';
import type { MatchPlayer, MatchSnapshot, Vector3 } from '../../domain/simulationTypes';
import { clamp, distanceTo, length, normalize, scale, subtract } from './engineMath';
import type { Rng } from './random';
import { compareIds } from './resultEngine';

export const cloneSnapshot = (snapshot: MatchSnapshot): MatchSnapshot => ({
  ...snapshot,
  field: { ...snapshot.field },
  goals: { left: { ...snapshot.goals.left }, right: { ...snapshot.goals.right } },
  players: snapshot.players.map((player) => ({
    ...player,
    position: { ...player.position },
    velocity: { ...player.velocity },
    skills: {
      technical: { ...player.skills.technical },
      mental: { ...player.skills.mental },
      physical: { ...player.skills.physical },
      goalkeeping: { ...player.skills.goalkeeping }
    },
    state: { ...player.state }
  })),
  ball: {
    ...snapshot.ball,
    position: { ...snapshot.ball.position },
    velocity: { ...snapshot.ball.velocity }
  }
});

const findPlayer = (snapshot: MatchSnapshot, id: string) =>
  snapshot.players.find((player) => player.id === id) ?? null;

export const setBallOwner = (snapshot: MatchSnapshot, ownerId: string | null) => {
  snapshot.ball.ownerId = ownerId;
  if (ownerId !== null) {
    snapshot.ball.lastTouchId = ownerId;
    snapshot.ball.velocity = { x: 0, y: 0, z: 0 };
  }
  for (const player of snapshot.players) {
    player.hasBall = player.id === ownerId;
  }
};

const releaseBall = (snapshot: MatchSnapshot, playerId: string, direction: Vector3, force: number) => {
  setBallOwner(snapshot, null);
  snapshot.ball.lastTouchId = playerId;
  snapshot.ball.velocity = scale(normalize(direction), force);
};

export const tackleChance = (tackler: MatchPlayer, carrier: MatchPlayer, tuning: EngineTuning) =>
  clamp(
    tuning.tackle.baseChance + (tackler.skills.technical.tackling - carrier.skills.technical.dribbling) / 200,
    tuning.tackle.minChance,
    tuning.tackle.maxChance
  );

const applied = (event: PlayerEvent, reason?: string): CommitOutcome => ({ event, status: 'applied', reason });
const rejected = (event: PlayerEvent, reason: string): CommitOutcome => ({ event, status: 'rejected', reason });

const passBall = (snapshot: MatchSnapshot, event: PlayerEvent, passer: MatchPlayer, receiver: MatchPlayer, force: number) => {
  const direction = subtract(receiver.position, snapshot.ball.position);
  if (length(direction) === 0) {
    setBallOwner(snapshot, receiver.id);
    return applied(event, 'handed over');
  }
  releaseBall(snapshot, passer.id, direction, force);
  return applied(event);
};

const commitEvent = (snapshot: MatchSnapshot, event: PlayerEvent, rng: Rng, tuning: EngineTuning): CommitOutcome => {
  const actor = findPlayer(snapshot, event.playerId);
  if (!actor) return rejected(event, 'unknown player');

  switch (event.type) {
    case 'request_pass': {
      if (snapshot.ball.ownerId !== actor.id) return rejected(event, 'not in possession');
      const receiver = findPlayer(snapshot, event.targetId);
      if (!receiver || receiver.teamId !== actor.teamId) return rejected(event, 'invalid receiver');
      const distance = distanceTo(actor.position, receiver.position);
      const force = Math.min(tuning.pass.maxForce, tuning.pass.baseForce + distance * tuning.pass.forcePerMetre);
      return passBall(snapshot, event, actor, receiver, force);
    }
    case 'pass_to': {
      if (snapshot.ball.ownerId !== actor.id) return rejected(event, 'not in possession');
      const receiver = findPlayer(snapshot, event.targetId);
      if (!receiver || receiver.teamId !== actor.teamId) return rejected(event, 'invalid receiver');
      return passBall(snapshot, event, actor, receiver, event.force);
    }
    case 'shoot': {
      if (snapshot.ball.ownerId !== actor.id) return rejected(event, 'not in possession');
      releaseBall(snapshot, actor.id, subtract(event.target, snapshot.ball.position), event.force);
      return applied(event);
    }
    case 'clear_ball': {
      if (snapshot.ball.ownerId !== actor.id) return rejected(event, 'not in possession');
      releaseBall(snapshot, actor.id, event.direction, event.force);
      return applied(event);
    }
    case 'tackle': {
      if (snapshot.ball.ownerId !== event.targetId) return rejected(event, 'target lost the ball');
      const carrier = findPlayer(snapshot, event.targetId);
      if (!carrier || carrier.teamId === actor.teamId) return rejected(event, 'invalid target');
      if (distanceTo(actor.position, carrier.position) > tuning.tackle.reach) return rejected(event, 'out of reach');
      if (rng.nextFloat() < tackleChance(actor, carrier, tuning)) {
        setBallOwner(snapshot, actor.id);
        return applied(event, 'won');
      }
      return { event, status: 'failed', reason: 'lost' };
    }
    case 'claim_ball': {
      if (snapshot.ball.ownerId !== null) return rejected(event, 'ball is owned');
      if (distanceTo(actor.position, snapshot.ball.position) > tuning.goalkeeper.claimDistance) {
        return rejected(event, 'out of reach');
      }
      setBallOwner(snapshot, actor.id);
      return applied(event);
    }
  }
};

/**
 * The only place the ball changes hands. Events run in the order given, which is the tick's
 * canonical order, so an earlier event can invalidate a later one.
 */
export const commitEvents = (
  snapshot: MatchSnapshot,
  events: readonly PlayerEvent[],
  rng: Rng,
  tuning: EngineTuning
): CommitOutcome[] => events.map((event) => commitEvent(snapshot, event, rng, tuning));

export const applyTransitions = (snapshot: MatchSnapshot, transitions: readonly StateTransition[]) => {
  for (const transition of transitions) {
    const player = findPlayer(snapshot, transition.playerId);
    if (player) {
      player.state = { ...transition.to };
    }
  }
};

/** A slow enough loose ball goes to the nearest player in control range; ties go to the lower id. */
export const resolveLooseBall = (snapshot: MatchSnapshot, tuning: EngineTuning) => {
  const { ball } = snapshot;
  if (ball.ownerId !== null || length(ball.velocity) > tuning.ball.controlSpeed) return null;

  let winner: { player: MatchPlayer; distance: number } | null = null;
  for (const player of snapshot.players) {
    const distance = distanceTo(player.position, ball.position);
    if (distance > tuning.ball.controlDistance) continue;
    if (!winner || distance < winner.distance || (distance === winner.distance && compareIds(player.id, winner.player.id) < 0)) {
      winner = { player, distance };
    }
  }
  if (!winner) return null;
  setBallOwner(snapshot, winner.player.id);
  return winner.player.id;
};
