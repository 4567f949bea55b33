import type { ReadableStream } from 'node:stream/web';
import type { Awaitable, Source, Unfolded } from './types';
import { bind, defer, done, liftEffect, unit } from './step';
import { bracket } from './scope';
import { cat, each, emit, feed } from './compose';
import { take } from './operators';

export function fromIterable<A>(iterable: Iterable<A>): Source<A, void> {
  return each(iterable);
}

export function range(start: number, end: number, step = 1): Source<number, void> {
  const loop = (current: number): Source<number, void> =>
    current < end ? bind(emit(current), () => loop(current + step)) : unit;
  return defer(() => loop(start));
}

/** Runs `action` forever, emitting each result. */
export function repeatM<A>(action: () => Awaitable<A>): Source<A, never> {
  return feed(liftEffect(action), cat<A>());
}

export function replicateM<A>(count: number, action: () => Awaitable<A>): Source<A, void> {
  return feed(liftEffect(action), take<A>(count));
}

/** Emits values produced from a seed until `step` reports completion. */
export function unfoldr<S, A, R>(step: (seed: S) => Awaitable<Unfolded<A, S, R>>, seed: S): Source<A, R> {
  const loop = (current: S): Source<A, R> =>
    bind(liftEffect(() => step(current)), (result): Source<A, R> => {
      if (result.done) return done(result.value);
      const { value, seed: following } = result;
      return bind(emit(value), () => loop(following));
    });
  return loop(seed);
}

/** The iterator is closed when the source ends or its traversal stops early. */
export function fromAsyncIterable<A>(iterable: AsyncIterable<A>): Source<A, void> {
  return bracket(
    () => iterable[Symbol.asyncIterator](),
    async (iterator) => {
      await iterator.return?.();
    },
    (iterator) => {
      const loop = (): Source<A, void> =>
        bind(liftEffect(() => iterator.next()), (result): Source<A, void> =>
          result.done ? unit : bind(emit(result.value), loop)
        );
      return loop();
    }
  );
}

// The stream stays unlocked between pulls, so a traversal that stops early
// leaves it free for another reader.
async function readOnce<A>(stream: ReadableStream<A>) {
  const reader = stream.getReader();
  try {
    return await reader.read();
  } finally {
    reader.releaseLock();
  }
}

export function fromReadableStream<A>(stream: ReadableStream<A>): Source<A, void> {
  const loop = (): Source<A, void> =>
    bind(liftEffect(() => readOnce(stream)), (result): Source<A, void> =>
      result.done ? unit : bind(emit(result.value), loop)
    );
  return loop();
}

export function fromPromise<A>(promise: PromiseLike<A>): Source<A, void> {
  return bind(liftEffect(() => promise), (value) => emit(value));
}
