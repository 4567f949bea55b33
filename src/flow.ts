import { ReadableStream } from 'node:stream/web';
import type { Sink, Source, Transformer } from './types';
import { pipe } from './compose';
import { tee, zip } from './exchange';
import { chain, concat, drop, filter, map, mapM, scan, take, takeWhile } from './operators';
import { fromAsyncIterable, fromIterable, fromPromise, fromReadableStream, range } from './sources';
import { unit } from './step';
import { Scope } from './scope';
import {
  all,
  any,
  find,
  fold,
  head,
  iterate,
  last,
  length,
  next,
  runEffect,
  toListM,
  toListMWithResult,
} from './traverse';

/**
 * Fluent wrapper around a {@link Source}. Every method returns a new flow;
 * nothing runs until one of the consuming methods is awaited.
 */
export class Flow<T, R = void> implements AsyncIterable<T> {
  constructor(readonly source: Source<T, R>) {}

  pipe<U, S>(stage: Transformer<T, U, S>): Flow<U, R | S> {
    return new Flow<U, R | S>(pipe<never, never, T, void, U, R | S>(this.source, stage));
  }

  map<U>(fn: (value: T) => U): Flow<U, R> {
    return this.pipe(map(fn));
  }

  mapAsync<U>(fn: (value: T) => Promise<U>): Flow<U, R> {
    return this.pipe(mapM(fn));
  }

  filter(predicate: (value: T) => boolean): Flow<T, R> {
    return this.pipe(filter(predicate));
  }

  scan<U>(fn: (acc: U, value: T) => U, initial: U): Flow<U, R> {
    // Unlike the scan operator, the seed itself is not emitted
    return this.pipe(scan(fn, initial, (acc) => acc)).skip(1);
  }

  take(count: number): Flow<T, R | void> {
    return this.pipe(take<T>(count));
  }

  takeWhile(predicate: (value: T) => boolean): Flow<T, R | void> {
    return this.pipe(takeWhile(predicate));
  }

  skip(count: number): Flow<T, R> {
    return this.pipe(drop<T>(count));
  }

  tap(fn: (value: T) => void | Promise<void>): Flow<T, R> {
    return this.pipe(chain(fn));
  }

  flatten<U>(this: Flow<Iterable<U>, R>): Flow<U, R> {
    return this.pipe(concat<U>());
  }

  tee<S>(sink: Sink<T, S>): Flow<T, R | S> {
    return this.pipe(tee(sink));
  }

  zip<U>(other: Flow<U, R>): Flow<[T, U], R> {
    return new Flow<[T, U], R>(zip(this.source, other.source));
  }

  fork(predicate: (value: T) => boolean): [Flow<T, R>, Flow<T, R>] {
    return [this.filter(predicate), this.filter((value) => !predicate(value))];
  }

  run<S>(sink: Sink<T, S>): Promise<R | S> {
    return runEffect(pipe<never, never, T, never, never, R | S>(this.source, sink));
  }

  fold<X, U>(step: (acc: X, value: T) => X, begin: X, finish: (acc: X) => U): Promise<U> {
    return fold(this.source, step, begin, finish);
  }

  toArray(): Promise<T[]> {
    return toListM(this.source);
  }

  toArrayWithResult(): Promise<[T[], R]> {
    return toListMWithResult(this.source);
  }

  first(): Promise<T | undefined> {
    return head(this.source);
  }

  last(): Promise<T | undefined> {
    return last(this.source);
  }

  count(): Promise<number> {
    return length(this.source);
  }

  find(predicate: (value: T) => boolean): Promise<T | undefined> {
    return find(this.source, predicate);
  }

  all(predicate: (value: T) => boolean): Promise<boolean> {
    return all(this.source, predicate);
  }

  some(predicate: (value: T) => boolean): Promise<boolean> {
    return any(this.source, predicate);
  }

  toReadableStream(): ReadableStream<T> {
    let remaining: Source<T, R> = this.source;
    const scope = new Scope();

    return new ReadableStream<T>({
      async pull(controller) {
        const result = await next(remaining, scope);
        if (result.done) {
          await scope.release();
          controller.close();
        } else {
          controller.enqueue(result.value);
          remaining = result.rest;
        }
      },
      async cancel() {
        await scope.release();
      },
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, R, undefined> {
    return iterate(this.source);
  }

  static of<T>(...values: T[]): Flow<T> {
    return new Flow<T>(fromIterable(values));
  }

  static from<T>(source: Iterable<T> | AsyncIterable<T> | PromiseLike<T>): Flow<T> {
    if (Symbol.asyncIterator in source) {
      return new Flow<T>(fromAsyncIterable(source));
    }
    if (Symbol.iterator in source) {
      return new Flow<T>(fromIterable(source));
    }
    return new Flow<T>(fromPromise(source));
  }

  static fromReadableStream<T>(stream: ReadableStream<T>): Flow<T> {
    return new Flow<T>(fromReadableStream(stream));
  }

  static range(start: number, end: number, step = 1): Flow<number> {
    return new Flow<number>(range(start, end, step));
  }

  static empty<T>(): Flow<T> {
    return new Flow<T>(unit);
  }
}
