import type { Battle } from '../battle/types.ts';
import { describeError } from '../core/errors.ts';
import { createLogger, type Logger } from '../telemetry/logger.ts';
import { PassiveSubsystem } from './BaseSubsystem.ts';
import {
  SUBSYSTEM_KINDS,
  type Subsystem,
  type SubsystemFault,
  type SubsystemHook,
  type SubsystemKind,
  type SubsystemMetrics
} from './types.ts';

export interface SubsystemRegistryOptions {
  /** The `ai` provider is skipped during activation unless this is set. */
  readonly enableAIOpponents?: boolean;
  readonly logger?: Logger;
}

export interface ActivationReport {
  readonly activated: readonly SubsystemKind[];
  readonly failure: SubsystemFault | null;
}

interface BattleActivation {
  readonly kinds: SubsystemKind[];
  /** Provider that threw during activation; it may hold partial state. */
  failed: SubsystemKind | null;
}

export function createDefaultSubsystems(): Subsystem[] {
  return SUBSYSTEM_KINDS.map((kind) => new PassiveSubsystem(kind));
}

function toFault(
  kind: SubsystemKind,
  hook: SubsystemHook,
  battleId: string | null,
  error: unknown
): SubsystemFault {
  return { kind, hook, battleId, message: describeError(error), error };
}

/**
 * Fixed set of capability providers, always walked in registry order.
 * Providers are injected once at construction and never swapped.
 */
export class SubsystemRegistry {
  private readonly providers = new Map<SubsystemKind, Subsystem>();
  private readonly activeByBattle = new Map<string, BattleActivation>();
  private readonly enableAIOpponents: boolean;
  private readonly logger: Logger;

  constructor(providers: Iterable<Subsystem>, options: SubsystemRegistryOptions = {}) {
    for (const provider of providers) {
      if (this.providers.has(provider.kind)) {
        throw new Error(`Duplicate subsystem provider: ${provider.kind}`);
      }
      this.providers.set(provider.kind, provider);
    }
    this.enableAIOpponents = options.enableAIOpponents ?? false;
    this.logger = options.logger ?? createLogger('subsystems');
  }

  get(kind: SubsystemKind): Subsystem | null {
    return this.providers.get(kind) ?? null;
  }

  list(): Subsystem[] {
    const ordered: Subsystem[] = [];
    for (const kind of SUBSYSTEM_KINDS) {
      const provider = this.providers.get(kind);
      if (provider) {
        ordered.push(provider);
      }
    }
    return ordered;
  }

  isEnabled(kind: SubsystemKind): boolean {
    return this.providers.has(kind) && (kind !== 'ai' || this.enableAIOpponents);
  }

  initializeAll(): SubsystemFault[] {
    const faults: SubsystemFault[] = [];
    for (const provider of this.list()) {
      try {
        provider.initialize();
      } catch (error) {
        faults.push(this.report(toFault(provider.kind, 'initialize', null, error)));
      }
    }
    return faults;
  }

  /**
   * Activate every enabled provider for the battle. Stops at the first throw;
   * the caller rolls back through {@link cleanupForBattle}, which also resets
   * the provider that threw.
   */
  activateForBattle(battle: Battle): ActivationReport {
    const activated: SubsystemKind[] = [];
    const record: BattleActivation = { kinds: activated, failed: null };
    this.activeByBattle.set(battle.id, record);
    for (const provider of this.list()) {
      if (!this.isEnabled(provider.kind)) {
        continue;
      }
      try {
        provider.activate(battle);
      } catch (error) {
        record.failed = provider.kind;
        return {
          activated: [...activated],
          failure: this.report(toFault(provider.kind, 'activate', battle.id, error))
        };
      }
      activated.push(provider.kind);
    }
    return { activated: [...activated], failure: null };
  }

  /**
   * Deactivate then reset every provider activated for the battle. A provider
   * whose activation threw is only reset.
   */
  cleanupForBattle(battle: Battle): SubsystemFault[] {
    const record = this.activeByBattle.get(battle.id);
    this.activeByBattle.delete(battle.id);
    if (!record) {
      return [];
    }
    const faults: SubsystemFault[] = [];
    for (const kind of record.kinds) {
      const provider = this.providers.get(kind);
      if (!provider) {
        continue;
      }
      try {
        provider.deactivate(battle);
      } catch (error) {
        faults.push(this.report(toFault(kind, 'deactivate', battle.id, error)));
      }
      this.resetProvider(provider, battle.id, faults);
    }
    const failed = record.failed ? this.providers.get(record.failed) : undefined;
    if (failed) {
      this.resetProvider(failed, battle.id, faults);
    }
    return faults;
  }

  getActiveKinds(battleId: string): SubsystemKind[] {
    return [...(this.activeByBattle.get(battleId)?.kinds ?? [])];
  }

  updateAll(deltaSeconds: number): SubsystemFault[] {
    const faults: SubsystemFault[] = [];
    for (const provider of this.list()) {
      if (!provider.update) {
        continue;
      }
      try {
        provider.update(deltaSeconds);
      } catch (error) {
        faults.push(this.report(toFault(provider.kind, 'update', null, error)));
      }
    }
    return faults;
  }

  getMetrics(): SubsystemMetrics[] {
    const metrics: SubsystemMetrics[] = [];
    for (const provider of this.list()) {
      try {
        metrics.push(provider.getMetrics());
      } catch (error) {
        this.report(toFault(provider.kind, 'metrics', null, error));
      }
    }
    return metrics;
  }

  private resetProvider(provider: Subsystem, battleId: string, faults: SubsystemFault[]): void {
    try {
      provider.reset(battleId);
    } catch (error) {
      faults.push(this.report(toFault(provider.kind, 'reset', battleId, error)));
    }
  }

  private report(fault: SubsystemFault): SubsystemFault {
    const scope = fault.battleId ? ` for ${fault.battleId}` : '';
    this.logger.warn(`Subsystem ${fault.kind} failed during ${fault.hook}${scope}: ${fault.message}`);
    return fault;
  }
}
