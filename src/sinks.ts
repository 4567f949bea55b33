import type { Awaitable, Sink } from './types';
import { liftEffect } from './step';
import { cat, discard, forEach } from './compose';

/** Awaits and throws away every value. */
export function drain<A>(): Sink<A, never> {
  return forEach<void, A, void, A, never, never, never>(cat<A>(), discard);
}

/** Consumes every value with `fn`, one at a time. */
export function consumeWith<A>(fn: (value: A) => Awaitable<void>): Sink<A, never> {
  return forEach<void, A, void, A, never, never, never>(cat<A>(), (value) => liftEffect(() => fn(value)));
}
