/**
 * Minimal reactive state primitives: subscriptions and atoms.
 */

export type SubscriptionCallback<T> = (value: T) => void;

export function createSubscription<T>() {
  const callbacks = new Set<SubscriptionCallback<T>>();

  return {
    subscribe: (callback: SubscriptionCallback<T>) => {
      callbacks.add(callback);
      return () => {
        callbacks.delete(callback);
      };
    },
    notify: (value: T) => {
      callbacks.forEach((callback) => callback(value));
    },
    clear: () => {
      callbacks.clear();
    },
  };
}

export type Subscription<T> = ReturnType<typeof createSubscription<T>>;

export function createAtom<T>(initialValue: T) {
  let value = initialValue;
  const subscription = createSubscription<T>();

  return {
    get: () => value,
    set: (next: T) => {
      value = next;
      subscription.notify(value);
    },
    update: (updater: (current: T) => T) => {
      value = updater(value);
      subscription.notify(value);
    },
    subscribe: subscription.subscribe,
  };
}

export type Atom<T> = ReturnType<typeof createAtom<T>>;
