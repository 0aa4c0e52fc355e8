import { describe, it, expect } from 'vitest';
import {
  AdmissionDeniedError,
  CreationError,
  EngineError,
  NotFoundError,
  describeError,
  isEngineError
} from './errors.ts';

describe('engine errors', () => {
  it('carries codes and names for each failure kind', () => {
    const denied = new AdmissionDeniedError('capacity', { active: 2 });
    expect(denied).toBeInstanceOf(EngineError);
    expect(denied.name).toBe('AdmissionDeniedError');
    expect(denied.code).toBe('ADMISSION_DENIED');
    expect(denied.reason).toBe('capacity');
    expect(denied.details).toEqual({ active: 2, reason: 'capacity' });
    expect(denied.message).toBe('Battle admission denied (capacity)');

    const missing = new NotFoundError('threat', 't-1');
    expect(missing.code).toBe('NOT_FOUND');
    expect(missing.message).toBe('Unknown threat: t-1');
  });

  it('keeps the underlying failure as the cause of a creation error', () => {
    const hookFailure = new Error('sprayer offline');
    const error = new CreationError('activation failed', { subsystem: 'chemical' }, hookFailure);
    expect(error.cause).toBe(hookFailure);
    expect(isEngineError(error)).toBe(true);
    expect(isEngineError(hookFailure)).toBe(false);
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
