// Shared reactive primitives

export type Unsubscribe = () => void;

/**
 * A push-based value source. Subscribing registers `listener` and returns the
 * function that removes it. Sources may deliver their current value
 * synchronously during the subscribe call.
 */
export type Source<T> = (listener: (value: T) => void) => Unsubscribe;
