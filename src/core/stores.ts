/**
 * Reactive Store System
 *
 * Provides a minimal observable store pattern for state that hosts (a UI,
 * an export job, a test) want to follow without polling. Each engine owns
 * its own stores, so several documents can be open side by side.
 */

type Listener<T> = (value: T) => void;

/**
 * Generic reactive store with subscribe/publish pattern
 */
export class Store<T> {
  private value: T;
  private listeners = new Set<Listener<T>>();

  constructor(initial: T) {
    this.value = initial;
  }

  /**
   * Get current value
   */
  get(): T {
    return this.value;
  }

  /**
   * Set new value and notify all subscribers
   */
  set(value: T) {
    this.value = value;
    this.listeners.forEach((fn) => fn(value));
  }

  /**
   * Update value using a function (for immutable updates)
   */
  update(fn: (current: T) => T) {
    this.set(fn(this.value));
  }

  /**
   * Subscribe to value changes
   * @returns Unsubscribe function
   */
  subscribe(fn: Listener<T>): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  /**
   * Subscribe and immediately call with current value
   * @returns Unsubscribe function
   */
  subscribeImmediate(fn: Listener<T>): () => void {
    fn(this.value);
    return this.subscribe(fn);
  }
}
