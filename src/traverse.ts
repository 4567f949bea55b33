import type { Awaitable, Closed, NextResult, Source } from './types';
import { ContractViolationError } from './errors';
import { isPromiseLike } from './internal/helpers';
import { createLogger } from './logger';
import { unreachable } from './step';
import { Scope } from './scope';
import { pipe } from './compose';
import { drop, filter, findIndices } from './operators';

const log = createLogger('traverse');

// Gives `work` a fresh scope and releases it however `work` ends.
async function withScope<T>(work: (scope: Scope) => Promise<T>): Promise<T> {
  const scope = new Scope();
  try {
    return await work(scope);
  } finally {
    await scope.release();
  }
}

export function runEffect<R>(closed: Closed<R>): Promise<R> {
  return withScope<R>(async (scope) => {
    let current = closed;
    let effects = 0;
    for (;;) {
      switch (current._tag) {
        case 'Await':
          return unreachable(current.address, 'runEffect');
        case 'Emit':
          return unreachable(current.value, 'runEffect');
        case 'Effect': {
          const resumed = current.run(scope);
          current = isPromiseLike(resumed) ? await resumed : resumed;
          effects++;
          break;
        }
        case 'Done':
          log.trace({ effects }, 'closed step finished');
          return current.value;
      }
    }
  });
}

// Strict left fold shared by the whole fold family. The accumulator is
// replaced at every emit; nothing else about the stream is retained.
function foldSource<B, R, X>(
  source: Source<B, R>,
  step: (acc: X, value: B) => Awaitable<X>,
  begin: X
): Promise<[X, R]> {
  return withScope<[X, R]>(async (scope) => {
    let current = source;
    let acc = begin;
    for (;;) {
      switch (current._tag) {
        case 'Await':
          return unreachable(current.address, 'fold');
        case 'Emit': {
          const stepped = step(acc, current.value);
          acc = isPromiseLike(stepped) ? await stepped : stepped;
          current = current.next();
          break;
        }
        case 'Effect': {
          const resumed = current.run(scope);
          current = isPromiseLike(resumed) ? await resumed : resumed;
          break;
        }
        case 'Done':
          return [acc, current.value];
      }
    }
  });
}

export async function fold<B, X, T>(
  source: Source<B, unknown>,
  step: (acc: X, value: B) => X,
  begin: X,
  finish: (acc: X) => T
): Promise<T> {
  const [acc] = await foldSource(source, step, begin);
  return finish(acc);
}

/** Like {@link fold}, also returning the source's own result. */
export async function foldWithResult<B, R, X, T>(
  source: Source<B, R>,
  step: (acc: X, value: B) => X,
  begin: X,
  finish: (acc: X) => T
): Promise<[T, R]> {
  const [acc, result] = await foldSource(source, step, begin);
  return [finish(acc), result];
}

export async function foldM<B, X, T>(
  source: Source<B, unknown>,
  step: (acc: X, value: B) => Awaitable<X>,
  begin: () => Awaitable<X>,
  finish: (acc: X) => Awaitable<T>
): Promise<T> {
  const [acc] = await foldSource(source, step, await begin());
  return finish(acc);
}

export async function foldMWithResult<B, R, X, T>(
  source: Source<B, R>,
  step: (acc: X, value: B) => Awaitable<X>,
  begin: () => Awaitable<X>,
  finish: (acc: X) => Awaitable<T>
): Promise<[T, R]> {
  const [acc, result] = await foldSource(source, step, await begin());
  return [await finish(acc), result];
}

/**
 * Runs `source` up to its first emit and stops there.
 *
 * Release actions registered on the way land in `scope`. Whoever keeps
 * `rest` going owns that scope and releases it; the default one is never
 * released, so resources acquired before the first emit stay open until the
 * source finishes them.
 */
export async function next<B, R>(source: Source<B, R>, scope: Scope = new Scope()): Promise<NextResult<B, R>> {
  let current = source;
  for (;;) {
    switch (current._tag) {
      case 'Await':
        return unreachable(current.address, 'next');
      case 'Emit':
        return { done: false, value: current.value, rest: current.next() };
      case 'Effect': {
        const resumed = current.run(scope);
        current = isPromiseLike(resumed) ? await resumed : resumed;
        break;
      }
      case 'Done':
        return { done: true, value: current.value };
    }
  }
}

/** Pulls one value at a time; returning from the generator early releases the source. */
export async function* iterate<B, R>(source: Source<B, R>): AsyncGenerator<B, R, undefined> {
  const scope = new Scope();
  try {
    let current = source;
    for (;;) {
      const result = await next(current, scope);
      if (result.done) return result.value;
      yield result.value;
      current = result.rest;
    }
  } finally {
    await scope.release();
  }
}

// Early-stopping folds: each one stops pulling as soon as the answer is known

export function head<B>(source: Source<B, unknown>): Promise<B | undefined> {
  return withScope<B | undefined>(async (scope) => {
    const result = await next(source, scope);
    return result.done ? undefined : result.value;
  });
}

export function isEmpty(source: Source<unknown, unknown>): Promise<boolean> {
  return withScope(async (scope) => (await next(source, scope)).done);
}

export function all<B>(source: Source<B, unknown>, predicate: (value: B) => boolean): Promise<boolean> {
  return isEmpty(pipe(source, filter((value: B) => !predicate(value))));
}

export async function any<B>(source: Source<B, unknown>, predicate: (value: B) => boolean): Promise<boolean> {
  return !(await isEmpty(pipe(source, filter(predicate))));
}

export function and(source: Source<boolean, unknown>): Promise<boolean> {
  return all(source, (value) => value);
}

export function or(source: Source<boolean, unknown>): Promise<boolean> {
  return any(source, (value) => value);
}

export function elem<B>(source: Source<B, unknown>, target: B): Promise<boolean> {
  return any(source, (value) => value === target);
}

export function notElem<B>(source: Source<B, unknown>, target: B): Promise<boolean> {
  return all(source, (value) => value !== target);
}

export function find<B>(source: Source<B, unknown>, predicate: (value: B) => boolean): Promise<B | undefined> {
  return head(pipe(source, filter(predicate)));
}

export function findIndex<B>(source: Source<B, unknown>, predicate: (value: B) => boolean): Promise<number | undefined> {
  return head(pipe(source, findIndices(predicate)));
}

export function index<B>(source: Source<B, unknown>, position: number): Promise<B | undefined> {
  return head(pipe(source, drop<B>(position)));
}

// Whole-stream folds

export function last<B>(source: Source<B, unknown>): Promise<B | undefined> {
  return fold(source, (_latest: B | undefined, value: B) => value, undefined, (latest) => latest);
}

export function length(source: Source<unknown, unknown>): Promise<number> {
  return fold(source, (count: number) => count + 1, 0, (count) => count);
}

export function maximum(source: Source<number, unknown>): Promise<number | undefined> {
  return fold(
    source,
    (acc: number | undefined, value: number) => (acc === undefined ? value : Math.max(acc, value)),
    undefined,
    (acc) => acc
  );
}

export function minimum(source: Source<number, unknown>): Promise<number | undefined> {
  return fold(
    source,
    (acc: number | undefined, value: number) => (acc === undefined ? value : Math.min(acc, value)),
    undefined,
    (acc) => acc
  );
}

export function sum(source: Source<number, unknown>): Promise<number> {
  return fold(source, (acc: number, value: number) => acc + value, 0, (acc) => acc);
}

export function product(source: Source<number, unknown>): Promise<number> {
  return fold(source, (acc: number, value: number) => acc * value, 1, (acc) => acc);
}

// Collecting helpers. Every element is held in memory at once, which gives up
// the bounded-memory guarantee of the folds above; meant for tests and
// small, known-finite streams.

/** Synchronous collection; every effect of `source` must run synchronously. */
export function toList<B>(source: Source<B, unknown>): B[] {
  const scope = new Scope();
  try {
    const values: B[] = [];
    let current = source;
    for (;;) {
      switch (current._tag) {
        case 'Await':
          return unreachable(current.address, 'toList');
        case 'Emit':
          values.push(current.value);
          current = current.next();
          break;
        case 'Effect': {
          const resumed = current.run(scope);
          if (isPromiseLike(resumed)) {
            throw new ContractViolationError('toList met an asynchronous effect; use toListM instead', {
              operator: 'toList',
            });
          }
          current = resumed;
          break;
        }
        case 'Done':
          return values;
      }
    }
  } finally {
    const released = scope.release();
    if (isPromiseLike(released)) {
      released.then(undefined, (error: unknown) => log.warn({ err: error }, 'asynchronous release after toList failed'));
    }
  }
}

export function toListM<B>(source: Source<B, unknown>): Promise<B[]> {
  return fold(
    source,
    (values: B[], value: B) => {
      values.push(value);
      return values;
    },
    [],
    (values) => values
  );
}

export function toListMWithResult<B, R>(source: Source<B, R>): Promise<[B[], R]> {
  return foldWithResult(
    source,
    (values: B[], value: B) => {
      values.push(value);
      return values;
    },
    [],
    (values) => values
  );
}
