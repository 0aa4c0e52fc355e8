import { describe, expect, it } from 'vitest';
import { createIdFactory } from './ids.ts';
import { clamp01, pickRandom, randomRange } from './random.ts';
import { SimulationClock } from './SimulationClock.ts';

describe('random helpers', () => {
  it('clamps to the unit interval and zeroes non-finite input', () => {
    expect(clamp01(1.5)).toBe(1);
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(Number.NaN)).toBe(0);
  });

  it('maps draws onto ranges and lists', () => {
    expect(randomRange(() => 0.25, 1, 5)).toBe(2);
    expect(pickRandom(() => 0.99, ['a', 'b', 'c'])).toBe('c');
    expect(pickRandom(() => 1, ['a', 'b'])).toBe('b');
    expect(() => pickRandom(() => 0, [])).toThrow('Cannot pick from an empty list');
  });
});

describe('createIdFactory', () => {
  it('issues distinct padded ids per factory', () => {
    const next = createIdFactory('battle');
    expect([next(), next()]).toEqual(['battle-0001', 'battle-0002']);
    expect(createIdFactory('threat')()).toBe('threat-0001');
  });
});

describe('SimulationClock', () => {
  it('only moves forward', () => {
    const clock = new SimulationClock();
    clock.advance(2.5);
    clock.advance(-1);
    expect(clock.now()).toBe(2.5);
    clock.reset();
    expect(clock.now()).toBe(0);
  });
});
