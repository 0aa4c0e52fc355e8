import type { Logger } from './logger.ts';

export interface StructuredTelemetryEntry {
  readonly event: string;
  readonly timestamp: number;
  readonly payload: Record<string, unknown>;
}

export interface StructuredTelemetryOptions {
  readonly logger?: Logger;
  readonly timestamp?: number;
}

export function emitStructuredTelemetry(
  event: string,
  payload: Record<string, unknown>,
  options: StructuredTelemetryOptions = {}
): StructuredTelemetryEntry {
  const entry: StructuredTelemetryEntry = {
    event,
    timestamp: options.timestamp ?? Date.now(),
    payload: { ...payload }
  };
  if (options.logger) {
    options.logger.debug(event, entry);
  } else if (process.env.NODE_ENV === 'production') {
    console.info(event, entry);
  } else {
    console.debug(`[telemetry] ${event}`, entry);
  }
  return entry;
}

/** Bounded in-memory buffer of telemetry entries, newest last. */
export class TelemetryBuffer {
  private entries: StructuredTelemetryEntry[] = [];
  private readonly limit: number;

  constructor(limit = 64) {
    this.limit = Number.isFinite(limit) ? Math.max(1, Math.trunc(limit)) : 64;
  }

  push(entry: StructuredTelemetryEntry): void {
    this.entries = [...this.entries, entry].slice(-this.limit);
  }

  list(): StructuredTelemetryEntry[] {
    return this.entries.map((entry) => ({ ...entry, payload: { ...entry.payload } }));
  }

  clear(): void {
    this.entries = [];
  }
}
