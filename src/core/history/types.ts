/**
 * Sample history type definitions
 */

/**
 * Anything stored in the history carries a simulated timestamp
 */
export interface Timestamped {
  time: number;
}

/**
 * Bounded, time-ordered, append-only sample store
 */
export interface History<T extends Timestamped> {
  /** Append at the tail, evicting the oldest entry when full */
  append(item: T): void;
  /** Frozen copy, oldest to newest */
  toArray(): readonly T[];
  /** Newest entry, or null when empty */
  latest(): T | null;
  /** Drop every entry */
  clear(): void;
  /** Number of stored entries */
  size(): number;
  /** Maximum number of stored entries */
  readonly capacity: number;
}
