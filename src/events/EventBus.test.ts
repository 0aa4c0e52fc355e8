import { describe, it, expect, vi } from 'vitest';
import { EventBus } from './EventBus.ts';

type TestEvents = {
  test: number;
  other: string;
};

describe('EventBus.off', () => {
  it('removes a specific listener', () => {
    const bus = new EventBus<TestEvents>();
    const listener = vi.fn();
    const other = vi.fn();
    bus.on('test', listener);
    bus.on('test', other);

    bus.off('test', listener);
    bus.emit('test', 42);

    expect(listener).not.toHaveBeenCalled();
    expect(other).toHaveBeenCalledWith(42);
  });

  it('returns an unsubscribe handle from on', () => {
    const bus = new EventBus<TestEvents>();
    const listener = vi.fn();
    const unsubscribe = bus.on('other', listener);
    unsubscribe();
    bus.emit('other', 'ignored');
    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount('other')).toBe(0);
  });
});

describe('EventBus.emit', () => {
  it('delivers in registration order', () => {
    const bus = new EventBus<TestEvents>();
    const order: string[] = [];
    bus.on('test', () => order.push('first'));
    bus.on('test', () => order.push('second'));
    bus.on('test', () => order.push('third'));
    bus.emit('test', 1);
    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('reports a throwing listener and keeps delivering', () => {
    const onError = vi.fn();
    const bus = new EventBus<TestEvents>(onError);
    const failure = new Error('listener broke');
    const after = vi.fn();
    bus.on('test', () => {
      throw failure;
    });
    bus.on('test', after);

    bus.emit('test', 7);

    expect(onError).toHaveBeenCalledWith('test', failure);
    expect(after).toHaveBeenCalledWith(7);
  });
});
