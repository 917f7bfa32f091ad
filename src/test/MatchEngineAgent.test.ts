import pino from 'pino';
import { describe, expect, test } from 'vitest';
import { MatchEngineAgent, TickError } from '../agents/MatchEngineAgent';
import { PhysicsAgent } from '../agents/PhysicsAgent';
import { NetworkRegistry, type NetworkProvider } from '../agents/engine/neuralNetwork';
import type { MatchSnapshot } from '../domain/simulationTypes';
import { buildBall, buildPlayer, buildSnapshot, noNetworks, v } from './matchFixtures';

const silent = pino({ level: 'silent' });

const buildMatch = (): MatchSnapshot =>
  buildSnapshot(
    [
      buildPlayer('h-gk', 'home', v(5, 34), { state: { role: 'goalkeeper', state: 'positioning' } }),
      buildPlayer('h-d', 'home', v(25, 30), { state: { role: 'defender', state: 'covering' } }),
      buildPlayer('h-m', 'home', v(40, 41), { state: { role: 'midfielder', state: 'standing' } }),
      buildPlayer('h-f', 'home', v(52, 34), { hasBall: true, state: { role: 'forward', state: 'heading_up_play' } }),
      buildPlayer('a-gk', 'away', v(100, 34), { state: { role: 'goalkeeper', state: 'positioning' } }),
      buildPlayer('a-d', 'away', v(71, 37), { state: { role: 'defender', state: 'covering' } }),
      buildPlayer('a-m', 'away', v(61, 24), { state: { role: 'midfielder', state: 'standing' } }),
      buildPlayer('a-f', 'away', v(44, 29), { state: { role: 'forward', state: 'standing' } })
    ],
    buildBall(v(52, 34), 'h-f'),
    { seed: 4242 }
  );

const buildEngine = () => new MatchEngineAgent({ networks: new NetworkRegistry({ logger: silent }), logger: silent });

describe('MatchEngineAgent', () => {
  test('the same seed and snapshot replay identically', () => {
    const first = buildEngine().run(buildMatch(), 0.1, 50);
    const second = buildEngine().run(buildMatch(), 0.1, 50);

    expect(first.snapshot.tick).toBe(50);
    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });

  test('tick leaves its input untouched', () => {
    const snapshot = buildMatch();
    const before = JSON.stringify(snapshot);

    buildEngine().tick(snapshot, 0.1);

    expect(JSON.stringify(snapshot)).toBe(before);
  });

  test('player order in the snapshot does not change the result', () => {
    const snapshot = buildMatch();
    const reversed = { ...buildMatch(), players: [...buildMatch().players].reverse() };

    expect(buildEngine().tick(reversed, 0.1)).toEqual(buildEngine().tick(snapshot, 0.1));
  });

  test('pressure on the carrier wins over an available pass', () => {
    const snapshot = buildSnapshot(
      [
        buildPlayer('f1', 'home', v(50, 34), { hasBall: true, state: { role: 'forward', state: 'heading_up_play' } }),
        buildPlayer('t1', 'home', v(58, 34)),
        buildPlayer('t2', 'home', v(56, 30)),
        buildPlayer('o1', 'away', v(47, 34))
      ],
      buildBall(v(51, 34), 'f1')
    );
    const engine = new MatchEngineAgent({ networks: noNetworks, logger: silent });

    const result = engine.tick(snapshot, 0.1);

    expect(result.transitions.find((transition) => transition.playerId === 'f1')?.to).toEqual({
      role: 'forward',
      state: 'passing'
    });
    expect(result.events.filter((event) => event.playerId === 'f1')).toEqual([]);
  });

  test('a released pass heads for the teammate picked in the lane', () => {
    const snapshot = buildSnapshot(
      [
        buildPlayer('f1', 'home', v(50, 34), { hasBall: true, state: { role: 'forward', state: 'heading_up_play' } }),
        buildPlayer('a', 'home', v(58, 34)),
        // open and nearer goal, but off the lane
        buildPlayer('c', 'home', v(62, 46))
      ],
      buildBall(v(51, 34), 'f1')
    );
    const engine = new MatchEngineAgent({ networks: noNetworks, logger: silent });

    const { snapshot: next, result, outcomes } = engine.step(snapshot, 0.1);

    expect(result.events.filter((event) => event.playerId === 'f1')).toEqual([
      { type: 'request_pass', playerId: 'f1', targetId: 'a' }
    ]);
    expect(outcomes.filter((outcome) => outcome.event.playerId === 'f1').map((outcome) => outcome.status)).toEqual([
      'applied'
    ]);
    expect(next.ball.ownerId).toBeNull();
    // 12 + 8 m * 0.6, then one step of ground friction
    expect(next.ball.velocity.x).toBeCloseTo(16.8 * 0.96);
    expect(next.ball.velocity.y).toBeCloseTo(0);
  });

  test('transitions land in the next snapshot only', () => {
    const snapshot = buildSnapshot(
      [
        buildPlayer('d1', 'home', v(30, 34), { state: { role: 'defender', state: 'tackling' } }),
        buildPlayer('o1', 'away', v(32, 34), { hasBall: true })
      ],
      buildBall(v(32, 34), 'o1')
    );
    const engine = new MatchEngineAgent({ networks: noNetworks, logger: silent });

    const { snapshot: next, result, outcomes } = engine.step(snapshot, 0.1);

    expect(result.transitions).toContainEqual({
      playerId: 'd1',
      from: { role: 'defender', state: 'tackling' },
      to: { role: 'defender', state: 'covering' }
    });
    expect(snapshot.players[0].state).toEqual({ role: 'defender', state: 'tackling' });
    expect(next.players[0].state).toEqual({ role: 'defender', state: 'covering' });
    expect(next.tick).toBe(1);
    expect(next.time).toBeCloseTo(0.1);
    expect(outcomes.map((outcome) => outcome.event.type)).toEqual(['tackle']);
    expect(engine.getStats()?.clockSeconds).toBeCloseTo(0.1);
  });

  test('stats can be reset', () => {
    const engine = new MatchEngineAgent({ networks: noNetworks, logger: silent });

    engine.step(buildMatch(), 0.1);
    engine.resetStats();

    expect(engine.getStats()).toBeNull();
  });

  test('a failure while evaluating surfaces as a TickError', () => {
    const failing: NetworkProvider = {
      tryGet: () => {
        throw new Error('weights unavailable');
      }
    };
    const snapshot = buildSnapshot(
      [
        buildPlayer('f1', 'home', v(50, 34), { hasBall: true, state: { role: 'forward', state: 'passing' } }),
        buildPlayer('t1', 'home', v(60, 34))
      ],
      buildBall(v(50, 34), 'f1'),
      { tick: 7 }
    );
    const engine = new MatchEngineAgent({ networks: failing, logger: silent });

    expect(() => engine.tick(snapshot, 0.1)).toThrow(TickError);
    expect(() => engine.tick(snapshot, 0.1)).toThrow('Tick 7 failed: weights unavailable');
  });

  test('a failure after evaluation also surfaces as a TickError', () => {
    class FailingPhysics extends PhysicsAgent {
      step(): void {
        throw new Error('integration failed');
      }
    }
    const engine = new MatchEngineAgent({ networks: noNetworks, physics: new FailingPhysics(), logger: silent });

    expect(() => engine.step(buildMatch(), 0.1)).toThrow(TickError);
    expect(() => engine.step(buildMatch(), 0.1)).toThrow('Tick 0 failed: integration failed');
  });

  test('networks that fail to load are reported and play continues', () => {
    const registry = new NetworkRegistry({
      readSource: () => {
        throw new Error('missing');
      },
      logger: silent
    });
    const engine = new MatchEngineAgent({ networks: registry, logger: silent });

    expect(engine.getUnavailableNetworks()).toEqual(['pass_scoring', 'forward_decision']);
    expect(() => engine.run(buildMatch(), 0.1, 5)).not.toThrow();
  });

  test('a network with the wrong shape is reported and play continues', () => {
    const narrow = JSON.stringify({
      id: 'pass_scoring',
      layers: [{ inputs: 4, outputs: 1, weights: [[0.1, 0.2, 0.3, 0.4]], biases: [0], activation: 'sigmoid' }]
    });
    const registry = new NetworkRegistry({
      readSource: (id) => {
        if (id === 'pass_scoring') return narrow;
        throw new Error('missing');
      },
      logger: silent
    });
    const engine = new MatchEngineAgent({ networks: registry, logger: silent });

    expect(engine.getUnavailableNetworks()).toContain('pass_scoring');
    expect(() => engine.run(buildMatch(), 0.1, 5)).not.toThrow();
  });
});
