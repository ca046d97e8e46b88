/**
 * Monotonic request-id source.
 *
 * Each transport receives one at construction. Pass the same instance to
 * several transports when their ids must not collide (for instance when
 * they share a log stream or a proxy).
 */
export class IdGenerator {
  private counter: number;

  constructor(start: number = 0) {
    this.counter = start;
  }

  next(): number {
    this.counter += 1;
    return this.counter;
  }

  /** Last id handed out, 0 when none yet */
  get current(): number {
    return this.counter;
  }
}
