import { ReadableStream } from 'node:stream/web';
import { describe, it, expect } from 'vitest';
import {
  chain,
  consumeWith,
  drain,
  each,
  fromAsyncIterable,
  fromIterable,
  fromPromise,
  fromReadableStream,
  head,
  pipe,
  range,
  repeatM,
  replicateM,
  runEffect,
  take,
  toList,
  toListM,
  toListMWithResult,
  unfoldr,
} from '../src';

describe('Sources', () => {
  it('each and fromIterable emit the iterable in order', () => {
    expect(toList(each(new Set(['a', 'b'])))).toEqual(['a', 'b']);
    expect(toList(fromIterable('hi'))).toEqual(['h', 'i']);
  });

  it('range honours the step and excludes the end', () => {
    expect(toList(range(0, 10, 3))).toEqual([0, 3, 6, 9]);
    expect(toList(range(5, 5))).toEqual([]);
  });

  it('repeatM runs its action once per pulled value', () => {
    let calls = 0;
    const ticks = repeatM(() => calls++);
    expect(toList(pipe(ticks, take<number>(3)))).toEqual([0, 1, 2]);
    expect(calls).toBe(3);
  });

  it('replicateM runs its action a fixed number of times', async () => {
    expect(await toListM(replicateM(2, async () => 'x'))).toEqual(['x', 'x']);
  });

  it('unfoldr emits until the step reports completion', async () => {
    const squares = unfoldr<number, number, string>(
      (n) => (n > 3 ? { done: true, value: 'stop' } : { done: false, value: n * n, seed: n + 1 }),
      1
    );
    expect(await toListMWithResult(squares)).toEqual([[1, 4, 9], 'stop']);
  });

  it('fromAsyncIterable starts a fresh iteration per traversal', async () => {
    const letters = {
      async *[Symbol.asyncIterator]() {
        yield 'p';
        yield 'q';
      },
    };
    const source = fromAsyncIterable(letters);
    expect(await toListM(source)).toEqual(['p', 'q']);
    expect(await toListM(source)).toEqual(['p', 'q']);
  });

  it('fromReadableStream reads every chunk and releases the reader', async () => {
    const stream = new ReadableStream<number>({
      start(controller) {
        controller.enqueue(1);
        controller.enqueue(2);
        controller.close();
      },
    });
    expect(await toListM(fromReadableStream(stream))).toEqual([1, 2]);
    expect(stream.locked).toBe(false);
  });

  it('fromAsyncIterable closes the iterator when a consumer stops early', async () => {
    let finalized = false;
    async function* counting() {
      try {
        yield 1;
        yield 2;
      } finally {
        finalized = true;
      }
    }

    expect(await head(fromAsyncIterable(counting()))).toBe(1);
    expect(finalized).toBe(true);
  });

  it('fromAsyncIterable closes the iterator when take finishes first', async () => {
    let finalized = false;
    async function* counting() {
      try {
        yield 1;
        yield 2;
        yield 3;
      } finally {
        finalized = true;
      }
    }

    expect(await toListM(pipe(fromAsyncIterable(counting()), take<number>(2)))).toEqual([1, 2]);
    expect(finalized).toBe(true);
  });

  it('fromReadableStream leaves the stream unlocked after an early stop', async () => {
    const stream = new ReadableStream<number>({
      start(controller) {
        controller.enqueue(1);
        controller.enqueue(2);
        controller.enqueue(3);
        controller.close();
      },
    });

    expect(await head(fromReadableStream(stream))).toBe(1);
    expect(stream.locked).toBe(false);
    expect(await toListM(fromReadableStream(stream))).toEqual([2, 3]);
  });

  it('fromPromise emits the resolved value', async () => {
    expect(await toListM(fromPromise(Promise.resolve(42)))).toEqual([42]);
  });
});

describe('Sinks', () => {
  it('drain pulls every value and discards it', async () => {
    const pulled: number[] = [];
    const source = pipe(fromIterable([1, 2, 3]), chain((value: number) => {
      pulled.push(value);
    }));
    await expect(runEffect(pipe(source, drain<number>()))).resolves.toBeUndefined();
    expect(pulled).toEqual([1, 2, 3]);
  });

  it('consumeWith waits for each asynchronous action', async () => {
    const seen: string[] = [];
    const sink = consumeWith(async (value: string) => {
      await Promise.resolve();
      seen.push(value);
    });
    await runEffect(pipe(fromIterable(['x', 'y']), sink));
    expect(seen).toEqual(['x', 'y']);
  });
});
