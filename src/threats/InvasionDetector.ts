import { SimulationClock } from '../core/SimulationClock.ts';
import type { EngineEventBus } from '../events/index.ts';
import { createLogger, type Logger } from '../telemetry/logger.ts';
import type { Threat, ThreatSource } from './types.ts';

// Accumulated fractional steps land a hair short of a whole interval.
const WINDOW_TOLERANCE = 1e-9;

export interface InvasionDetectorOptions {
  /** Seconds between polls; also the per-threat notification window. */
  readonly interval: number;
  readonly events?: EngineEventBus | null;
  readonly clock?: SimulationClock;
  readonly logger?: Logger;
}

/**
 * Polls the active-threat set on a fixed cadence and raises at most one
 * invasion notification per threat per window.
 */
export class InvasionDetector {
  private readonly source: ThreatSource;
  private readonly interval: number;
  private readonly events: EngineEventBus | null;
  private readonly clock: SimulationClock;
  private readonly logger: Logger;
  private readonly lastNotifiedAt = new Map<string, number>();
  private elapsed = 0;
  private running = false;

  constructor(source: ThreatSource, options: InvasionDetectorOptions) {
    if (!Number.isFinite(options.interval) || options.interval <= 0) {
      throw new Error('Invasion check interval must be positive');
    }
    this.source = source;
    this.interval = options.interval;
    this.events = options.events ?? null;
    this.clock = options.clock ?? new SimulationClock();
    this.logger = options.logger ?? createLogger('invasions');
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  update(dt: number): Threat[] {
    if (!this.running || !Number.isFinite(dt) || dt <= 0) {
      return [];
    }
    this.elapsed += dt;
    if (this.elapsed < this.interval - WINDOW_TOLERANCE) {
      return [];
    }
    this.elapsed = Math.max(0, this.elapsed - this.interval);
    return this.checkForInvasions();
  }

  checkForInvasions(): Threat[] {
    const now = this.clock.now();
    const threats = this.source.getActiveThreats();
    const activeIds = new Set(threats.map((threat) => threat.id));
    for (const id of [...this.lastNotifiedAt.keys()]) {
      if (!activeIds.has(id)) {
        this.lastNotifiedAt.delete(id);
      }
    }

    const notified: Threat[] = [];
    for (const threat of threats) {
      const last = this.lastNotifiedAt.get(threat.id);
      if (last !== undefined && now - last < this.interval - WINDOW_TOLERANCE) {
        continue;
      }
      this.lastNotifiedAt.set(threat.id, now);
      notified.push(threat);
      this.logger.info(`Invasion detected: ${threat.category} at ${threat.originLocation}`);
      this.events?.emit('invasionDetected', {
        threatId: threat.id,
        category: threat.category,
        threat: { ...threat },
        detectedAt: now
      });
    }
    return notified;
  }

  reset(): void {
    this.lastNotifiedAt.clear();
    this.elapsed = 0;
  }
}
