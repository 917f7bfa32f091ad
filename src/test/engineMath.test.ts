import { describe, expect, test } from 'vitest';
import {
  clampLength,
  directionTo,
  distanceTo,
  heading,
  length,
  normalize,
  randomInUnitCircle
} from '../agents/engine/engineMath';
import { makeRng } from '../agents/engine/random';
import { v } from './matchFixtures';

describe('engineMath', () => {
  test('normalize returns a zero vector for zero-length input', () => {
    const result = normalize(v(0, 0, 0));

    expect(Number.isNaN(result.x)).toBe(false);
    expect(result.x).toBe(0);
    expect(result.y).toBe(0);
    expect(result.z).toBe(0);
  });

  test('normalize scales to unit length', () => {
    const result = normalize(v(3, 4));

    expect(result.x).toBeCloseTo(0.6);
    expect(result.y).toBeCloseTo(0.8);
    expect(length(result)).toBeCloseTo(1);
  });

  test('distanceTo and directionTo', () => {
    expect(distanceTo(v(0, 0), v(3, 4))).toBeCloseTo(5);
    const direction = directionTo(v(1, 1), v(1, 5));
    expect(direction.x).toBeCloseTo(0);
    expect(direction.y).toBeCloseTo(1);
  });

  test('directionTo a coincident point is a zero vector', () => {
    expect(length(directionTo(v(2, 2), v(2, 2)))).toBe(0);
  });

  test('heading follows velocity and is zero when stationary', () => {
    expect(heading(v(0, 0))).toBe(0);
    expect(heading(v(0, 2))).toBeCloseTo(Math.PI / 2);
    expect(heading(v(-1, 0))).toBeCloseTo(Math.PI);
  });

  test('clampLength keeps direction and caps magnitude', () => {
    const clamped = clampLength(v(6, 8), 5);
    expect(clamped.x).toBeCloseTo(3);
    expect(clamped.y).toBeCloseTo(4);
    expect(clampLength(v(1, 0), 5).x).toBe(1);
  });

  test('randomInUnitCircle is bounded and reproducible from the seed', () => {
    const first = makeRng(99);
    const second = makeRng(99);

    for (let i = 0; i < 50; i += 1) {
      const a = randomInUnitCircle(first);
      const b = randomInUnitCircle(second);
      expect(a).toEqual(b);
      expect(length(a)).toBeLessThanOrEqual(1);
      expect(a.z).toBe(0);
    }
  });
});
