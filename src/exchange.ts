import type { Sink, Source, Step, Transformer } from './types';
import { bind, done, liftEffect, andThen, unit, unreachable } from './step';
import { awaitValue, emit, forEach, request, respond, substituteRequest } from './compose';
import { readSlot, withState, writeSlot } from './state';
import { next } from './traverse';

type Pending<A> = { readonly value: A } | undefined;

/**
 * Turns a sink into a transformer that also forwards every value the sink
 * awaited, exactly once and in order.
 *
 * A value is forwarded when the sink asks for the next one, or when the sink
 * finishes; the slot holds the single value in between.
 */
export function tee<A, R>(sink: Sink<A, R>): Transformer<A, A, R> {
  return withState<Pending<A>, void, A, void, A, R>(undefined, (slot) => {
    const flush = (): Transformer<A, A, void> =>
      bind(readSlot(slot), (pending): Transformer<A, A, void> => (pending ? emit(pending.value) : unit));

    const upstream = (): Transformer<A, A, A> =>
      andThen(
        flush(),
        bind(awaitValue<A>(), (value) => andThen(writeSlot(slot, { value }), done(value)))
      );

    const silenced = forEach<void, A, never, never, R, void, A>(sink, unreachable);
    return bind(substituteRequest(upstream, silenced), (result) => andThen(flush(), done(result)));
  });
}

/**
 * Widens a one-directional transformer into a bidirectional step.
 *
 * The reply received from downstream becomes the address of the next
 * upstream request; `initial` is the address of the first one.
 */
export function generalize<A, B, R, X>(transformer: Transformer<A, B, R>, initial: X): Step<X, A, X, B, R> {
  return withState<X, X, A, X, B, R>(initial, (slot) => {
    const upstream = (): Step<X, A, X, B, A> => bind(readSlot(slot), (address) => request<X, A>(address));

    const downstream = (value: B): Step<void, A, X, B, void> =>
      bind(respond<B, X>(value), (address) => writeSlot(slot, address));

    return substituteRequest(upstream, forEach<void, A, void, B, R, X, B>(transformer, downstream));
  });
}

/**
 * Pairs two sources element by element, pulling the left one first.
 *
 * Ends with the result of whichever source finishes first; once the left
 * source is exhausted the right one is not pulled again.
 */
export function zipWith<A, B, C, R>(
  combine: (left: A, right: B) => C,
  left: Source<A, R>,
  right: Source<B, R>
): Step<never, unknown, unknown, C, R> {
  const loop = (leftSource: Source<A, R>, rightSource: Source<B, R>): Step<never, unknown, unknown, C, R> =>
    bind(liftEffect(() => next(leftSource)), (first): Step<never, unknown, unknown, C, R> => {
      if (first.done) return done(first.value);
      const { value: a, rest: leftRest } = first;
      return bind(liftEffect(() => next(rightSource)), (second): Step<never, unknown, unknown, C, R> => {
        if (second.done) return done(second.value);
        const { value: b, rest: rightRest } = second;
        return bind(emit(combine(a, b)), () => loop(leftRest, rightRest));
      });
    });
  return loop(left, right);
}

export function zip<A, B, R>(left: Source<A, R>, right: Source<B, R>): Step<never, unknown, unknown, [A, B], R> {
  return zipWith((a: A, b: B): [A, B] => [a, b], left, right);
}
