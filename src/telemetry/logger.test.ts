import { describe, it, expect, vi } from 'vitest';
import { createLogger, withScope } from './logger.ts';
import { TelemetryBuffer, emitStructuredTelemetry } from './structured.ts';

function makeSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

describe('createLogger', () => {
  it('prefixes lines with the scope', () => {
    const sink = makeSink();
    const logger = createLogger('orchestrator', { sink, minimumLevel: 'debug' });
    logger.warn('queue saturated', { pending: 4 });
    expect(sink.warn).toHaveBeenCalledWith('[orchestrator] queue saturated', { pending: 4 });
  });

  it('drops lines below the minimum level', () => {
    const sink = makeSink();
    const logger = createLogger('threats', { sink, minimumLevel: 'warn' });
    logger.debug('noise');
    logger.info('noise');
    logger.error('broken');
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledWith('[threats] broken');
  });
});

describe('withScope', () => {
  it('prefixes lines of an injected logger', () => {
    const sink = makeSink();
    const logger = withScope(sink, 'subsystems');
    logger.warn('Subsystem pest failed during update: offline', { battleId: null });
    logger.debug('tick');
    expect(sink.warn).toHaveBeenCalledWith('[subsystems] Subsystem pest failed during update: offline', {
      battleId: null
    });
    expect(sink.debug).toHaveBeenCalledWith('[subsystems] tick');
  });
});

describe('structured telemetry', () => {
  it('routes entries through the supplied logger and copies the payload', () => {
    const sink = makeSink();
    const logger = createLogger('telemetry', { sink, minimumLevel: 'debug' });
    const payload = { battleId: 'battle-0001' };
    const entry = emitStructuredTelemetry('battle.started', payload, { logger, timestamp: 12 });
    expect(entry).toEqual({ event: 'battle.started', timestamp: 12, payload });
    expect(entry.payload).not.toBe(payload);
    expect(sink.debug).toHaveBeenCalledWith('[telemetry] battle.started', entry);
  });

  it('keeps only the newest entries in the buffer', () => {
    const buffer = new TelemetryBuffer(2);
    buffer.push({ event: 'a', timestamp: 1, payload: {} });
    buffer.push({ event: 'b', timestamp: 2, payload: {} });
    buffer.push({ event: 'c', timestamp: 3, payload: {} });
    expect(buffer.list().map((entry) => entry.event)).toEqual(['b', 'c']);
  });
});
