import { describe, expect, test } from 'vitest';
import { TUNING } from '../data/tuning';
import type { BallState, MatchPlayer } from '../domain/simulationTypes';
import { makeRng } from '../agents/engine/random';
import { coverPoint, DEFENDER_STATES } from '../agents/engine/states/defenderStates';
import { GOALKEEPER_STATES, guardPoint } from '../agents/engine/states/goalkeeperStates';
import { MIDFIELDER_STATES } from '../agents/engine/states/midfielderStates';
import { buildTickContext, type StateProcessingContext } from '../agents/engine/tickContext';
import { buildBall, buildPlayer, buildSnapshot, noNetworks, v } from './matchFixtures';

const contextFor = (players: MatchPlayer[], ball: BallState, playerId: string): StateProcessingContext => {
  const tick = buildTickContext(buildSnapshot(players, ball), 0.1);
  const player = tick.playersById.get(playerId);
  if (!player) throw new Error(`${playerId} missing from context`);
  return { tick, player, rng: makeRng(5), networks: noNetworks, tuning: TUNING };
};

describe('defender states', () => {
  test('covering switches to marking when an opponent carries the ball nearby', () => {
    const defender = buildPlayer('d1', 'home', v(30, 34), { state: { role: 'defender', state: 'covering' } });
    const carrier = buildPlayer('o1', 'away', v(40, 34), { hasBall: true });
    const ctx = contextFor([defender, carrier], buildBall(v(40, 34), 'o1'), 'd1');

    expect(DEFENDER_STATES.covering.tryFast(ctx)?.transition).toEqual({ role: 'defender', state: 'marking' });
  });

  test('cover point sits between own goal and the ball', () => {
    const defender = buildPlayer('d1', 'home', v(30, 34), { state: { role: 'defender', state: 'covering' } });
    const ctx = contextFor([defender], buildBall(v(60, 54)), 'd1');

    const point = coverPoint(ctx);

    expect(point.x).toBeCloseTo(60 * 0.35);
    expect(point.y).toBeCloseTo(34 + 20 * 0.35);
  });

  test('tackling emits a tackle on the carrier within reach', () => {
    const defender = buildPlayer('d1', 'home', v(30, 34), { state: { role: 'defender', state: 'tackling' } });
    const carrier = buildPlayer('o1', 'away', v(32, 34), { hasBall: true });
    const ctx = contextFor([defender, carrier], buildBall(v(32, 34), 'o1'), 'd1');

    const result = DEFENDER_STATES.tackling.tryFast(ctx);

    expect(result?.events).toEqual([{ type: 'tackle', playerId: 'd1', targetId: 'o1' }]);
    expect(result?.transition).toEqual({ role: 'defender', state: 'covering' });
  });

  test('tackling falls back to marking when the carrier is out of reach', () => {
    const defender = buildPlayer('d1', 'home', v(30, 34), { state: { role: 'defender', state: 'tackling' } });
    const carrier = buildPlayer('o1', 'away', v(36, 34), { hasBall: true });
    const ctx = contextFor([defender, carrier], buildBall(v(36, 34), 'o1'), 'd1');

    expect(DEFENDER_STATES.tackling.tryFast(ctx)).toEqual({
      transition: { role: 'defender', state: 'marking' },
      events: []
    });
  });

  test('a pressed defender clears toward the opponent goal', () => {
    const defender = buildPlayer('d1', 'home', v(20, 34), { hasBall: true, state: { role: 'defender', state: 'clearing' } });
    const ctx = contextFor([defender], buildBall(v(20, 34), 'd1'), 'd1');

    const result = DEFENDER_STATES.clearing.tryFast(ctx);
    const [event] = result?.events ?? [];

    expect(result?.transition).toEqual({ role: 'defender', state: 'covering' });
    expect(event?.type).toBe('clear_ball');
    if (event?.type === 'clear_ball') {
      expect(event.direction.x).toBeCloseTo(1);
      expect(event.direction.y).toBeCloseTo(0);
      expect(event.direction.z).toBeCloseTo(TUNING.clearance.lift);
    }
  });

  test('passing under pressure turns into a clearance', () => {
    const defender = buildPlayer('d1', 'home', v(20, 34), { hasBall: true, state: { role: 'defender', state: 'passing' } });
    const opponent = buildPlayer('o1', 'away', v(23, 34));
    const ctx = contextFor([defender, opponent], buildBall(v(20, 34), 'd1'), 'd1');

    expect(DEFENDER_STATES.passing.tryFast(ctx)?.transition).toEqual({ role: 'defender', state: 'clearing' });
  });
});

describe('midfielder states', () => {
  test('distributing close to goal becomes a shot', () => {
    const midfielder = buildPlayer('m1', 'home', v(88, 34), {
      hasBall: true,
      state: { role: 'midfielder', state: 'distributing' }
    });
    const ctx = contextFor([midfielder], buildBall(v(88, 34), 'm1'), 'm1');

    expect(MIDFIELDER_STATES.distributing.tryFast(ctx)?.transition).toEqual({ role: 'midfielder', state: 'shooting' });
  });

  test('a pressed dribbler in range shoots rather than distributing', () => {
    const midfielder = buildPlayer('m1', 'home', v(88, 34), {
      hasBall: true,
      state: { role: 'midfielder', state: 'dribbling' }
    });
    const opponent = buildPlayer('o1', 'away', v(90, 34));
    const ctx = contextFor([midfielder, opponent], buildBall(v(88, 34), 'm1'), 'm1');

    expect(MIDFIELDER_STATES.dribbling.tryFast(ctx)?.transition).toEqual({ role: 'midfielder', state: 'shooting' });
  });

  test('dribbling hands on to a better placed open teammate', () => {
    const midfielder = buildPlayer('m1', 'home', v(50, 34), {
      hasBall: true,
      state: { role: 'midfielder', state: 'dribbling' }
    });
    const forward = buildPlayer('f1', 'home', v(65, 34));
    const ctx = contextFor([midfielder, forward], buildBall(v(50, 34), 'm1'), 'm1');

    expect(MIDFIELDER_STATES.dribbling.tryFast(ctx)).toBeNull();
    expect(MIDFIELDER_STATES.dribbling.processSlow(ctx)?.transition).toEqual({
      role: 'midfielder',
      state: 'distributing'
    });
  });

  test('standing wanders reproducibly for the same seed', () => {
    const midfielder = buildPlayer('m1', 'home', v(50, 34), {
      velocity: v(1, 0),
      state: { role: 'midfielder', state: 'standing' }
    });
    const first = contextFor([midfielder], buildBall(v(10, 10), null), 'm1');
    const second = contextFor([midfielder], buildBall(v(10, 10), null), 'm1');

    expect(MIDFIELDER_STATES.standing.velocity(first)).toEqual(MIDFIELDER_STATES.standing.velocity(second));
  });
});

describe('goalkeeper states', () => {
  test('catching claims a loose ball within reach without changing state', () => {
    const keeper = buildPlayer('g1', 'home', v(3, 34), { state: { role: 'goalkeeper', state: 'catching' } });
    const ctx = contextFor([keeper], buildBall(v(4, 34)), 'g1');

    expect(GOALKEEPER_STATES.catching.tryFast(ctx)).toEqual({ events: [{ type: 'claim_ball', playerId: 'g1' }] });
  });

  test('positioning comes out for a loose ball near goal', () => {
    const keeper = buildPlayer('g1', 'home', v(2, 34), { state: { role: 'goalkeeper', state: 'positioning' } });
    const ctx = contextFor([keeper], buildBall(v(12, 34)), 'g1');

    expect(GOALKEEPER_STATES.positioning.tryFast(ctx)?.transition).toEqual({ role: 'goalkeeper', state: 'coming_out' });
  });

  test('guard point steps out toward the ball, capped by the line offset', () => {
    const keeper = buildPlayer('g1', 'home', v(2, 34), { state: { role: 'goalkeeper', state: 'positioning' } });

    const near = guardPoint(contextFor([keeper], buildBall(v(20, 34)), 'g1'));
    const far = guardPoint(contextFor([keeper], buildBall(v(100, 34)), 'g1'));

    expect(near.x).toBeCloseTo(2);
    expect(far.x).toBeCloseTo(TUNING.goalkeeper.maxLineOffset);
  });

  test('distributing with nobody open clears the ball', () => {
    const keeper = buildPlayer('g1', 'home', v(2, 34), {
      hasBall: true,
      state: { role: 'goalkeeper', state: 'distributing' }
    });
    const ctx = contextFor([keeper, buildPlayer('d1', 'home', v(40, 34))], buildBall(v(2, 34), 'g1'), 'g1');

    const result = GOALKEEPER_STATES.distributing.processSlow(ctx);

    expect(result?.transition).toEqual({ role: 'goalkeeper', state: 'positioning' });
    expect(result?.events.map((event) => event.type)).toEqual(['clear_ball']);
  });
});
