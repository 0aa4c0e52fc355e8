export type IdFactory = () => string;

/**
 * Monotonic ids scoped to one factory. Two entities created in the same tick
 * always receive distinct ids.
 */
export function createIdFactory(prefix: string): IdFactory {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter.toString(36).padStart(4, '0')}`;
  };
}
