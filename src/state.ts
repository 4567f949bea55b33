import type { StateSlot, Step } from './types';
import { defer, liftEffect } from './step';

/**
 * Threads one mutable slot through `body`.
 *
 * The slot is allocated when the traversal reaches the step, so two runs of
 * the same step never share it. Reads and writes should go through
 * {@link readSlot} and {@link writeSlot} so that they happen at their place
 * in the traversal rather than while the step is being built.
 */
export function withState<S, UA, UV, DA, DV, R>(
  initial: S,
  body: (slot: StateSlot<S>) => Step<UA, UV, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return defer(() => {
    let state = initial;
    return body({
      get: () => state,
      set: (value) => {
        state = value;
      },
    });
  });
}

export function readSlot<S>(slot: StateSlot<S>): Step<never, unknown, unknown, never, S> {
  return liftEffect(() => slot.get());
}

export function writeSlot<S>(slot: StateSlot<S>, value: S): Step<never, unknown, unknown, never, void> {
  return liftEffect(() => slot.set(value));
}
