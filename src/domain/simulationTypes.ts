export type Vector3 = {
  x: number;
  y: number;
  z: number;
};

export type PlayerSide = 'left' | 'right';

export type PlayerRole = 'goalkeeper' | 'defender' | 'midfielder' | 'forward';

export type ForwardState =
  | 'standing'
  | 'running'
  | 'dribbling'
  | 'passing'
  | 'shooting'
  | 'heading_up_play'
  | 'pressing';

export type MidfielderState = 'standing' | 'running' | 'distributing' | 'dribbling' | 'shooting' | 'pressing';

export type DefenderState = 'covering' | 'marking' | 'tackling' | 'running' | 'passing' | 'clearing';

export type GoalkeeperState = 'positioning' | 'coming_out' | 'catching' | 'distributing';

export type PlayerStateTag =
  | { role: 'forward'; state: ForwardState }
  | { role: 'midfielder'; state: MidfielderState }
  | { role: 'defender'; state: DefenderState }
  | { role: 'goalkeeper'; state: GoalkeeperState };

export type PlayerSkills = {
  technical: {
    passing: number;
    dribbling: number;
    finishing: number;
    tackling: number;
    firstTouch: number;
  };
  mental: {
    decisions: number;
    vision: number;
    positioning: number;
    anticipation: number;
  };
  physical: {
    pace: number;
    acceleration: number;
    stamina: number;
    strength: number;
  };
  goalkeeping: {
    handling: number;
    reflexes: number;
  };
};

export type MatchPlayer = {
  id: string;
  teamId: string;
  side: PlayerSide | null;
  position: Vector3;
  velocity: Vector3;
  skills: PlayerSkills;
  hasBall: boolean;
  state: PlayerStateTag;
};

export type BallState = {
  position: Vector3;
  velocity: Vector3;
  ownerId: string | null;
  lastTouchId: string | null;
};

export type FieldSize = {
  width: number;
  height: number;
};

export type GoalPositions = {
  left: Vector3;
  right: Vector3;
};

export type MatchSnapshot = {
  tick: number;
  time: number;
  seed: number;
  field: FieldSize;
  goals: GoalPositions;
  players: MatchPlayer[];
  ball: BallState;
};

export const DEFAULT_FIELD: FieldSize = {
  width: 105,
  height: 68
};

export const buildGoalPositions = (field: FieldSize): GoalPositions => ({
  left: { x: 0, y: field.height / 2, z: 0 },
  right: { x: field.width, y: field.height / 2, z: 0 }
});

export const initialStateForRole = (role: PlayerRole): PlayerStateTag => {
  switch (role) {
    case 'forward':
      return { role, state: 'standing' };
    case 'midfielder':
      return { role, state: 'standing' };
    case 'defender':
      return { role, state: 'covering' };
    case 'goalkeeper':
      return { role, state: 'positioning' };
  }
};
