import type { Battle } from '../battle/types.ts';

export type SubsystemKind =
  | 'pest'
  | 'biological'
  | 'defense'
  | 'environmental'
  | 'chemical'
  | 'strategy'
  | 'analytics'
  | 'resource'
  | 'ai'
  | 'network'
  | 'notification';

/** Registry order; activation, cleanup and updates always walk this list. */
export const SUBSYSTEM_KINDS: readonly SubsystemKind[] = Object.freeze([
  'pest',
  'biological',
  'defense',
  'environmental',
  'chemical',
  'strategy',
  'analytics',
  'resource',
  'ai',
  'network',
  'notification'
]);

export interface SubsystemMetrics {
  readonly kind: SubsystemKind;
  readonly initialized: boolean;
  readonly activeBattles: number;
  readonly activations: number;
  readonly resets: number;
  readonly counters: Readonly<Record<string, number>>;
}

/**
 * Capability provider contract. Per-battle state created in `activate` must be
 * discarded by `reset` before the provider serves another battle.
 */
export interface Subsystem {
  readonly kind: SubsystemKind;
  initialize(): void;
  activate(battle: Battle): void;
  deactivate(battle: Battle): void;
  reset(battleId: string): void;
  getMetrics(): SubsystemMetrics;
  update?(deltaSeconds: number): void;
}

export type SubsystemHook = 'initialize' | 'activate' | 'deactivate' | 'reset' | 'update' | 'metrics';

export interface SubsystemFault {
  readonly kind: SubsystemKind;
  readonly hook: SubsystemHook;
  readonly battleId: string | null;
  readonly message: string;
  readonly error: unknown;
}
