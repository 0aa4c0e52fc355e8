import type { Logger } from '../telemetry/logger.ts';
import { EventBus } from './EventBus.ts';
import type { EngineEvents } from './types.ts';

export { EventBus, type Listener, type ListenerErrorHandler } from './EventBus.ts';
export type * from './types.ts';

export type EngineEventBus = EventBus<EngineEvents>;

export function createEngineEventBus(logger?: Logger): EngineEventBus {
  if (!logger) {
    return new EventBus<EngineEvents>();
  }
  return new EventBus<EngineEvents>((event, error) => {
    logger.warn(`Listener for "${event}" failed`, error);
  });
}
