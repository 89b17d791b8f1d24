/**
 * Monotonic request-id source.
 *
 * Proxies hold a counter explicitly. Those created without one share
 * `defaultIdCounter`, so ids are unique across the process unless a caller
 * hands out its own counter on purpose.
 */
export class IdCounter {
  private value: number;

  constructor(start = 0) {
    this.value = start;
  }

  /** Increment and return the new id */
  next(): number {
    this.value += 1;
    return this.value;
  }

  /** Last id handed out (the start value before any call) */
  get current(): number {
    return this.value;
  }
}

export const defaultIdCounter = new IdCounter();
