export type StepCallback = (stepSeconds: number) => void;

export interface TickClockOptions {
  /** Wall-clock milliseconds between steps. */
  readonly intervalMs: number;
  /** Simulated seconds per wall-clock second. */
  readonly timeScale?: number;
}

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${label} must be positive`);
  }
}

/**
 * Real-time driver for the runtime. Every `intervalMs` of wall time it hands
 * the step callback `intervalMs / 1000 * timeScale` simulated seconds, so a
 * faster time scale makes each step longer rather than the timer busier.
 */
export class TickClock {
  private readonly intervalMs: number;
  private timeScale: number;
  private handle: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly step: StepCallback, options: TickClockOptions) {
    assertPositive(options.intervalMs, 'Tick interval');
    const timeScale = options.timeScale ?? 1;
    assertPositive(timeScale, 'Time scale');
    this.intervalMs = options.intervalMs;
    this.timeScale = timeScale;
  }

  get stepSeconds(): number {
    return (this.intervalMs / 1000) * this.timeScale;
  }

  start(): void {
    if (this.handle !== null) {
      return;
    }
    this.handle = setInterval(() => this.step(this.stepSeconds), this.intervalMs);
  }

  stop(): void {
    if (this.handle === null) {
      return;
    }
    clearInterval(this.handle);
    this.handle = null;
  }

  isRunning(): boolean {
    return this.handle !== null;
  }

  /** Takes effect from the next step; the timer itself keeps its cadence. */
  setTimeScale(timeScale: number): void {
    assertPositive(timeScale, 'Time scale');
    this.timeScale = timeScale;
  }

  getTimeScale(): number {
    return this.timeScale;
  }
}
