export type EngineErrorCode =
  | 'ADMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CREATION_FAILED'
  | 'INVALID_CONFIGURATION';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = { ...details };
  }
}

export type AdmissionDeniedReason = 'inactive' | 'capacity' | 'policy';

/** Capacity or policy gate refused a battle. Callers may queue and retry. */
export class AdmissionDeniedError extends EngineError {
  readonly reason: AdmissionDeniedReason;

  constructor(reason: AdmissionDeniedReason, details: Record<string, unknown> = {}) {
    super('ADMISSION_DENIED', `Battle admission denied (${reason})`, { ...details, reason });
    this.reason = reason;
  }
}

export class NotFoundError extends EngineError {
  constructor(entity: 'battle' | 'threat', id: string) {
    super('NOT_FOUND', `Unknown ${entity}: ${id}`, { entity, id });
  }
}

/**
 * Battle creation was rolled back. `cause` carries the hook failure when a
 * subsystem threw during activation.
 */
export class CreationError extends EngineError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('CREATION_FAILED', message, details, cause === undefined ? undefined : { cause });
  }
}

export class ConfigurationError extends EngineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    const summary = issues.length > 0 ? issues.join('; ') : 'configuration missing';
    super('INVALID_CONFIGURATION', `Invalid engine configuration: ${summary}`, {
      issues: [...issues]
    });
    this.issues = Object.freeze([...issues]);
  }
}

export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
