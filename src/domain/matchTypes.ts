import type { PlayerStateTag, Vector3 } from './simulationTypes';

export type PlayerEvent =
  | { type: 'request_pass'; playerId: string; targetId: string }
  | { type: 'pass_to'; playerId: string; targetId: string; force: number }
  | { type: 'shoot'; playerId: string; target: Vector3; force: number }
  | { type: 'tackle'; playerId: string; targetId: string }
  | { type: 'claim_ball'; playerId: string }
  | { type: 'clear_ball'; playerId: string; direction: Vector3; force: number };

export type StateChangeResult = {
  velocity?: Vector3;
  transition?: PlayerStateTag;
  events: PlayerEvent[];
};

export type EvaluationPath = 'fast' | 'slow' | 'idle';

export type PlayerTickResult = {
  playerId: string;
  state: PlayerStateTag;
  path: EvaluationPath;
  velocity: Vector3;
  transition: PlayerStateTag | null;
  events: PlayerEvent[];
};

export type StateTransition = {
  playerId: string;
  from: PlayerStateTag;
  to: PlayerStateTag;
};

export type TickResult = {
  tick: number;
  velocities: { playerId: string; velocity: Vector3 }[];
  transitions: StateTransition[];
  events: PlayerEvent[];
  players: PlayerTickResult[];
};

export type CommitStatus = 'applied' | 'failed' | 'rejected';

export type CommitOutcome = {
  event: PlayerEvent;
  status: CommitStatus;
  reason?: string;
};

export type TeamMatchStats = {
  possessionSeconds: number;
  passesAttempted: number;
  shots: number;
  tacklesAttempted: number;
  tacklesWon: number;
  clearances: number;
};

export type MatchStats = {
  byTeam: Record<string, TeamMatchStats>;
  clockSeconds: number;
};
