/**
 * Accumulated simulation time in seconds. Shared by reference between the
 * components of one runtime so timestamps agree across threats and battles.
 */
export class SimulationClock {
  private elapsed = 0;

  constructor(startAt = 0) {
    this.elapsed = Number.isFinite(startAt) ? Math.max(0, startAt) : 0;
  }

  now(): number {
    return this.elapsed;
  }

  advance(deltaSeconds: number): number {
    if (Number.isFinite(deltaSeconds) && deltaSeconds > 0) {
      this.elapsed += deltaSeconds;
    }
    return this.elapsed;
  }

  reset(): void {
    this.elapsed = 0;
  }
}

export type TimeSource = () => number;
