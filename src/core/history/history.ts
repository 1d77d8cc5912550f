/**
 * Fixed-capacity ring buffer for tick samples
 *
 * Append is O(1); once full, each append overwrites the oldest slot.
 * Entries must arrive in non-decreasing time order.
 */

import { HistoryValidationError } from '$types/errors';
import { isInteger } from '@utils/number';

import type { History, Timestamped } from './types';

/**
 * Create an empty history
 * @param capacity - Maximum number of entries (positive integer)
 * @throws {HistoryValidationError} If capacity is not a positive integer
 */
export function createHistory<T extends Timestamped>(capacity: number): History<T> {
  if (!isInteger(capacity) || capacity < 1) {
    throw new HistoryValidationError("capacity must be a positive integer, got " + capacity);
  }

  const slots: Array<T | undefined> = new Array<T | undefined>(capacity);
  let head = 0;
  let count = 0;

  function at(index: number): T {
    const item = slots[(head + index) % capacity];
    if (item === undefined) {
      throw new HistoryValidationError("history slot " + index + " is empty");
    }
    return item;
  }

  function latest(): T | null {
    return count === 0 ? null : at(count - 1);
  }

  function append(item: T): void {
    const last = latest();
    if (last !== null && item.time < last.time) {
      throw new HistoryValidationError(
        "sample time " + item.time + " is earlier than the latest sample (" + last.time + ")"
      );
    }

    if (count < capacity) {
      slots[(head + count) % capacity] = item;
      count++;
    } else {
      slots[head] = item;
      head = (head + 1) % capacity;
    }
  }

  function toArray(): readonly T[] {
    const out: T[] = [];
    for (let i = 0; i < count; i++) {
      out.push(at(i));
    }
    return Object.freeze(out);
  }

  function clear(): void {
    slots.fill(undefined);
    head = 0;
    count = 0;
  }

  function size(): number {
    return count;
  }

  return {
    append: append,
    toArray: toArray,
    latest: latest,
    clear: clear,
    size: size,
    capacity: capacity
  };
}
