import type { Awaitable, Parser, Transformer } from './types';
import { bind, liftEffect, andThen, unit, done } from './step';
import { awaitValue, cat, each, emit, forEach } from './compose';

export function map<A, B>(fn: (value: A) => B): Transformer<A, B, never> {
  return forEach(cat<A>(), (value): Transformer<A, B, void> => emit(fn(value)));
}

export function mapM<A, B>(fn: (value: A) => Awaitable<B>): Transformer<A, B, never> {
  return forEach(cat<A>(), (value): Transformer<A, B, void> =>
    bind(liftEffect(() => fn(value)), (mapped) => emit(mapped))
  );
}

/** Runs each incoming action and forwards its result. */
export function sequence<A>(): Transformer<() => Awaitable<A>, A, never> {
  return mapM<() => Awaitable<A>, A>((action) => action());
}

export function mapFoldable<A, B>(fn: (value: A) => Iterable<B>): Transformer<A, B, never> {
  return forEach(cat<A>(), (value): Transformer<A, B, void> => each(fn(value)));
}

export function filter<A>(predicate: (value: A) => boolean): Transformer<A, A, never> {
  return forEach(cat<A>(), (value): Transformer<A, A, void> => (predicate(value) ? emit(value) : unit));
}

export function filterM<A>(predicate: (value: A) => Awaitable<boolean>): Transformer<A, A, never> {
  return forEach(cat<A>(), (value): Transformer<A, A, void> =>
    bind(liftEffect(() => predicate(value)), (keep): Transformer<A, A, void> => (keep ? emit(value) : unit))
  );
}

export function take<A>(count: number): Transformer<A, A, void> {
  const loop = (remaining: number): Transformer<A, A, void> =>
    remaining <= 0 ? unit : bind(awaitValue<A>(), (value) => bind(emit(value), () => loop(remaining - 1)));
  return loop(count);
}

export function takeWhile<A>(predicate: (value: A) => boolean): Transformer<A, A, void> {
  const loop = (): Transformer<A, A, void> =>
    bind(awaitValue<A>(), (value): Transformer<A, A, void> => (predicate(value) ? bind(emit(value), loop) : unit));
  return loop();
}

/** Like {@link takeWhile}, returning the first value that failed the predicate. */
export function takeWhileWithRest<A>(predicate: (value: A) => boolean): Transformer<A, A, A> {
  const loop = (): Transformer<A, A, A> =>
    bind(awaitValue<A>(), (value): Transformer<A, A, A> => (predicate(value) ? bind(emit(value), loop) : done(value)));
  return loop();
}

export function drop<A>(count: number): Transformer<A, A, never> {
  const loop = (remaining: number): Transformer<A, A, never> =>
    remaining <= 0 ? cat<A>() : bind(awaitValue<A>(), () => loop(remaining - 1));
  return loop(count);
}

export function dropWhile<A>(predicate: (value: A) => boolean): Transformer<A, A, never> {
  const loop = (): Transformer<A, A, never> =>
    bind(awaitValue<A>(), (value): Transformer<A, A, never> => (predicate(value) ? loop() : andThen(emit(value), cat<A>())));
  return loop();
}

export function concat<A>(): Transformer<Iterable<A>, A, never> {
  return forEach(cat<Iterable<A>>(), (values): Transformer<Iterable<A>, A, void> => each(values));
}

export function elemIndices<A>(target: A): Transformer<A, number, never> {
  return findIndices((value: A) => value === target);
}

export function findIndices<A>(predicate: (value: A) => boolean): Transformer<A, number, never> {
  const loop = (position: number): Transformer<A, number, never> =>
    bind(awaitValue<A>(), (value) => {
      const found: Transformer<A, number, void> = predicate(value) ? emit(position) : unit;
      return andThen(found, loop(position + 1));
    });
  return loop(0);
}

/** Strict left scan: emits `finish(begin)` first, then one value per input. */
export function scan<A, X, B>(
  step: (acc: X, value: A) => X,
  begin: X,
  finish: (acc: X) => B
): Transformer<A, B, never> {
  const loop = (acc: X): Transformer<A, B, never> =>
    bind(emit(finish(acc)), () => bind(awaitValue<A>(), (value) => loop(step(acc, value))));
  return loop(begin);
}

export function scanM<A, X, B>(
  step: (acc: X, value: A) => Awaitable<X>,
  begin: () => Awaitable<X>,
  finish: (acc: X) => Awaitable<B>
): Transformer<A, B, never> {
  const loop = (acc: X): Transformer<A, B, never> =>
    bind(liftEffect(() => finish(acc)), (result) =>
      bind(emit(result), () =>
        bind(awaitValue<A>(), (value) => bind(liftEffect(() => step(acc, value)), loop))
      )
    );
  return bind(liftEffect(begin), loop);
}

/** Runs `fn` on every value before forwarding it unchanged. */
export function chain<A>(fn: (value: A) => Awaitable<void>): Transformer<A, A, never> {
  return forEach(cat<A>(), (value): Transformer<A, A, void> =>
    bind(liftEffect(() => fn(value)), () => emit(value))
  );
}

/** Parses each text value, silently dropping the ones `parse` rejects. */
export function read<A>(parse: Parser<A>): Transformer<string, A, never> {
  return forEach(cat<string>(), (text): Transformer<string, A, void> => {
    const parsed = parse(text);
    return parsed === undefined ? unit : emit(parsed);
  });
}

export function show<A>(format: (value: A) => string = String): Transformer<A, string, never> {
  return map(format);
}

// Parsers accept a value only when the whole text is a plain decimal literal.
// `Number` alone would also take padded, hexadecimal and binary text.
const DECIMAL = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;
const INTEGER = /^-?\d+$/;

export const parseNumber: Parser<number> = (text) => (DECIMAL.test(text) ? Number(text) : undefined);

export const parseInteger: Parser<number> = (text) => (INTEGER.test(text) ? Number(text) : undefined);

export const parseJson: Parser<unknown> = (text) => {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
};
