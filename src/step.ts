import type { Awaitable, Bound, Continuations, Done, Step } from './types';
import type { Scope } from './scope';
import { ContractViolationError } from './errors';
import { describeValue, mapAwaitable } from './internal/helpers';

export function done<R>(value: R): Done<R> {
  return { _tag: 'Done', value };
}

export const unit: Done<void> = done(undefined);

export function awaitStep<UA, UV, DA, DV, R>(
  address: UA,
  next: (reply: UV) => Step<UA, UV, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return { _tag: 'Await', address, next };
}

export function emitStep<UA, UV, DA, DV, R>(
  value: DV,
  next: (reply: DA) => Step<UA, UV, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return { _tag: 'Emit', value, next };
}

/** `run` receives the traversal's {@link Scope}, where it may register release actions. */
export function effect<UA, UV, DA, DV, R>(
  run: (scope: Scope) => Awaitable<Step<UA, UV, DA, DV, R>>
): Step<UA, UV, DA, DV, R> {
  return { _tag: 'Effect', run };
}

/** Builds the step when the traversal reaches it, once per traversal. */
export function defer<UA, UV, DA, DV, R>(build: () => Step<UA, UV, DA, DV, R>): Step<UA, UV, DA, DV, R> {
  return effect(build);
}

export function liftEffect<T>(action: () => Awaitable<T>): Step<never, unknown, unknown, never, T> {
  return effect<never, unknown, unknown, never, T>(() => mapAwaitable(action(), (value) => done(value)));
}

type Advance<UA, UV, DA, DV, S> =
  | { readonly _tag: 'Settled'; readonly step: Step<UA, UV, DA, DV, S> }
  | { readonly _tag: 'Pending'; readonly cursor: Bound<UA, UV, DA, DV, S> };

function settled<UA, UV, DA, DV, S>(step: Step<UA, UV, DA, DV, S>): Advance<UA, UV, DA, DV, S> {
  return { _tag: 'Settled', step };
}

function pending<UA, UV, DA, DV, R, S>(
  base: Step<UA, UV, DA, DV, R>,
  queue: Continuations<UA, UV, DA, DV, R, S>
): Bound<UA, UV, DA, DV, S> {
  return (visit) => visit(base, queue);
}

function single<UA, UV, DA, DV, R, S>(
  fn: (result: R) => Step<UA, UV, DA, DV, S>
): Continuations<UA, UV, DA, DV, R, S> {
  return { _tag: 'Single', fn };
}

function concat<UA, UV, DA, DV, R, M, S>(
  left: Continuations<UA, UV, DA, DV, R, M>,
  right: Continuations<UA, UV, DA, DV, M, S>
): Continuations<UA, UV, DA, DV, R, S> {
  return { _tag: 'Concat', open: (visit) => visit(left, right) };
}

// Feeds `value` to the first queued continuation, rotating left-nested
// queues to the right on the way.
function applyQueue<UA, UV, DA, DV, R, S>(
  value: R,
  queue: Continuations<UA, UV, DA, DV, R, S>
): Advance<UA, UV, DA, DV, S> {
  type Queue = Continuations<UA, UV, DA, DV, R, S>;
  type Outcome = Advance<UA, UV, DA, DV, S> | Queue;

  let current: Queue = queue;
  for (;;) {
    if (current._tag === 'Single') return settled(current.fn(value));
    const outcome: Outcome = current.open<Outcome>((left, right) =>
      left._tag === 'Single'
        ? { _tag: 'Pending', cursor: pending(left.fn(value), right) }
        : left.open<Queue>((first, middle) => concat(first, concat(middle, right)))
    );
    if (outcome._tag === 'Settled' || outcome._tag === 'Pending') return outcome;
    current = outcome;
  }
}

function advance<UA, UV, DA, DV, R, S>(
  base: Step<UA, UV, DA, DV, R>,
  queue: Continuations<UA, UV, DA, DV, R, S>
): Advance<UA, UV, DA, DV, S> {
  if (base._tag === 'Done') return applyQueue(base.value, queue);
  if (base.bound) {
    const cursor = base.bound<Bound<UA, UV, DA, DV, S>>((origin, earlier) => pending(origin, concat(earlier, queue)));
    return { _tag: 'Pending', cursor };
  }
  const bound = pending(base, queue);
  switch (base._tag) {
    case 'Await': {
      const { address, next } = base;
      return settled<UA, UV, DA, DV, S>({ _tag: 'Await', address, next: (reply) => resume(next(reply), queue), bound });
    }
    case 'Emit': {
      const { value, next } = base;
      return settled<UA, UV, DA, DV, S>({ _tag: 'Emit', value, next: (reply) => resume(next(reply), queue), bound });
    }
    case 'Effect': {
      const { run } = base;
      return settled<UA, UV, DA, DV, S>({ _tag: 'Effect', run: (scope) => mapAwaitable(run(scope), (resumed) => resume(resumed, queue)), bound });
    }
  }
}

function resume<UA, UV, DA, DV, R, S>(
  base: Step<UA, UV, DA, DV, R>,
  queue: Continuations<UA, UV, DA, DV, R, S>
): Step<UA, UV, DA, DV, S> {
  const visit = <T>(
    step: Step<UA, UV, DA, DV, T>,
    rest: Continuations<UA, UV, DA, DV, T, S>
  ): Advance<UA, UV, DA, DV, S> => advance(step, rest);

  let cursor = pending(base, queue);
  for (;;) {
    const outcome = cursor(visit);
    if (outcome._tag === 'Settled') return outcome.step;
    cursor = outcome.cursor;
  }
}

/**
 * Substitutes every `Done` leaf of `step` with `fn(result)`.
 *
 * Only the node at hand is rewritten; everything behind an await, an emit or
 * an effect is rewritten when the traversal resumes it. Each node records its
 * base step and pending continuations, so binding onto it again appends to
 * that queue and nesting depth never grows.
 */
export function bind<UA, UV, DA, DV, R, S>(
  step: Step<UA, UV, DA, DV, R>,
  fn: (result: R) => Step<UA, UV, DA, DV, S>
): Step<UA, UV, DA, DV, S> {
  return resume(step, single(fn));
}

export function mapResult<UA, UV, DA, DV, R, S>(
  step: Step<UA, UV, DA, DV, R>,
  fn: (result: R) => S
): Step<UA, UV, DA, DV, S> {
  return bind(step, (result) => done(fn(result)));
}

export function andThen<UA, UV, DA, DV, R>(
  first: Step<UA, UV, DA, DV, unknown>,
  second: Step<UA, UV, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return bind(first, () => second);
}

export function forever<UA, UV, DA, DV>(step: Step<UA, UV, DA, DV, unknown>): Step<UA, UV, DA, DV, never> {
  const loop = (): Step<UA, UV, DA, DV, never> => bind(step, () => defer(loop));
  return loop();
}

/** Trap for a value of an uninhabited interface type. */
export function unreachable(value: never, operator = 'closed'): never {
  throw new ContractViolationError(
    `Closed interface used: received ${describeValue(value)}`,
    { operator, value }
  );
}
