export type Listener<T> = (state: T, previous: T) => void;

/**
 * Read-only live view over a piece of state. `subscribe` returns the
 * unsubscribe function.
 */
export interface Observable<T> {
  getState(): T;
  subscribe(listener: Listener<T>): () => void;
}
