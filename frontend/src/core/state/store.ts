export type Unsubscribe = () => void;

export type Store<T> = {
  get: () => T;
  set: (next: T) => void;
  patch: (partial: Partial<T>) => void;
  subscribe: (fn: () => void) => Unsubscribe;
};

export type Reducer<S, A> = (state: S, action: A) => S;

/**
 * A store whose only write path is `dispatch`. Every change goes through one
 * transition function, so listeners always observe a state the reducer produced.
 */
export type ReducerStore<S, A> = {
  get: () => S;
  dispatch: (action: A) => void;
  subscribe: (fn: () => void) => Unsubscribe;
};

export function createStore<T extends object>(initial: T): Store<T> {
  let value = initial;
  const subs = new Set<() => void>();

  function emit() {
    for (const fn of subs) fn();
  }

  return {
    get: () => value,
    set: (next: T) => {
      value = next;
      emit();
    },
    patch: (partial: Partial<T>) => {
      value = { ...value, ...partial };
      emit();
    },
    subscribe: (fn: () => void) => {
      subs.add(fn);
      return () => {
        subs.delete(fn);
      };
    }
  };
}

export function createReducerStore<S extends object, A>(
  initial: S,
  reducer: Reducer<S, A>
): ReducerStore<S, A> {
  const inner = createStore<S>(initial);

  return {
    get: inner.get,
    dispatch: (action: A) => {
      const prev = inner.get();
      const next = reducer(prev, action);
      // Reducers return the same reference for ignored actions; skip the emit.
      if (next !== prev) inner.set(next);
    },
    subscribe: inner.subscribe
  };
}
