import { describe, it, expect } from 'vitest';
import {
  all,
  and,
  any,
  bind,
  chain,
  ContractViolationError,
  done,
  elem,
  emit,
  filter,
  find,
  findIndex,
  fold,
  foldM,
  foldMWithResult,
  foldWithResult,
  fromIterable,
  head,
  index,
  isEmpty,
  iterate,
  last,
  length,
  liftEffect,
  maximum,
  minimum,
  next,
  notElem,
  or,
  pipe,
  product,
  request,
  runEffect,
  sum,
  andThen,
  toList,
  toListM,
  toListMWithResult,
  type Closed,
  type Source,
} from '../src';

/** A source over `values` that records every value it hands out. */
function counted<A>(values: A[], pulled: A[]): Source<A, void> {
  return pipe(fromIterable(values), chain((value: A) => {
    pulled.push(value);
  }));
}

function withResult<A, R>(values: A[], result: R): Source<A, R> {
  const loop = (position: number): Source<A, R> =>
    position < values.length ? andThen(emit(values[position]), loop(position + 1)) : done(result);
  return loop(0);
}

describe('Traversal', () => {
  describe('folds', () => {
    it('keeps only even values and sums them', async () => {
      const evens = pipe(fromIterable([1, 2, 3, 4, 5]), filter((x: number) => x % 2 === 0));
      expect(await fold(evens, (acc: number, x: number) => acc + x, 0, (acc) => acc)).toBe(6);
    });

    it('applies step left to right, then finish', async () => {
      const result = await fold(
        fromIterable(['a', 'b', 'c']),
        (acc: string, x: string) => `(${acc}${x})`,
        '',
        (acc) => `<${acc}>`
      );
      expect(result).toBe('<(((a)b)c)>');
    });

    it('returns the source result alongside the folded value', async () => {
      const source = withResult([3, 4], 'tail');
      expect(await foldWithResult(source, (acc: number, x: number) => acc * x, 1, (acc) => acc + 0.5)).toEqual([
        12.5,
        'tail',
      ]);
    });

    it('supports effectful step, begin and finish', async () => {
      const log: string[] = [];
      const [total, result] = await foldMWithResult(
        withResult([1, 2, 3], 'end'),
        async (acc: number, x: number) => {
          log.push(`step ${x}`);
          return acc + x;
        },
        async () => {
          log.push('begin');
          return 10;
        },
        async (acc) => {
          log.push('finish');
          return acc * 2;
        }
      );
      expect(total).toBe(32);
      expect(result).toBe('end');
      expect(log).toEqual(['begin', 'step 1', 'step 2', 'step 3', 'finish']);
    });

    it('foldM drops the source result', async () => {
      const value = await foldM(
        withResult(['x', 'y'], 99),
        (acc: string[], x: string) => [...acc, x],
        () => [],
        (acc) => acc.join('+')
      );
      expect(value).toBe('x+y');
    });

    it('folds over values produced by asynchronous effects', async () => {
      const source: Source<number, void> = bind(liftEffect(() => Promise.resolve(5)), (n) =>
        andThen(emit(n), emit(n * 2))
      );
      expect(await sum(source)).toBe(15);
    });
  });

  describe('next', () => {
    it('runs up to the first emit', async () => {
      const first = await next(withResult([7, 8], 'r'));
      expect(first.done).toBe(false);
      if (first.done) return;
      expect(first.value).toBe(7);

      const second = await next(first.rest);
      expect(second.done ? undefined : second.value).toBe(8);
      if (second.done) return;

      expect(await next(second.rest)).toEqual({ done: true, value: 'r' });
    });

    it('iterate exposes a source as an async iterator', async () => {
      const seen: number[] = [];
      for await (const value of iterate(fromIterable([1, 2, 3]))) {
        seen.push(value);
      }
      expect(seen).toEqual([1, 2, 3]);
    });
  });

  describe('early stopping', () => {
    it('find pulls nothing past the first match', async () => {
      const pulled: number[] = [];
      expect(await find(counted([1, 3, 4, 5, 6], pulled), (x) => x % 2 === 0)).toBe(4);
      expect(pulled).toEqual([1, 3, 4]);
    });

    it('find pulls everything when nothing matches', async () => {
      const pulled: number[] = [];
      expect(await find(counted([1, 3, 5], pulled), (x) => x % 2 === 0)).toBeUndefined();
      expect(pulled).toEqual([1, 3, 5]);
    });

    it('head pulls a single value', async () => {
      const pulled: string[] = [];
      expect(await head(counted(['a', 'b'], pulled))).toBe('a');
      expect(pulled).toEqual(['a']);
    });

    it('any stops at the first success, all at the first failure', async () => {
      const pulledAny: number[] = [];
      expect(await any(counted([1, 2, 3, 4], pulledAny), (x) => x > 1)).toBe(true);
      expect(pulledAny).toEqual([1, 2]);

      const pulledAll: number[] = [];
      expect(await all(counted([2, 4, 5, 6], pulledAll), (x) => x % 2 === 0)).toBe(false);
      expect(pulledAll).toEqual([2, 4, 5]);
    });

    it('index and findIndex count from zero', async () => {
      const pulled: string[] = [];
      expect(await index(counted(['a', 'b', 'c', 'd'], pulled), 2)).toBe('c');
      expect(pulled).toEqual(['a', 'b', 'c']);
      expect(await findIndex(fromIterable(['a', 'b', 'c']), (x) => x === 'b')).toBe(1);
      expect(await findIndex(fromIterable(['a']), (x) => x === 'z')).toBeUndefined();
    });

    it('answers the boolean queries', async () => {
      expect(await isEmpty(fromIterable([]))).toBe(true);
      expect(await isEmpty(fromIterable([0]))).toBe(false);
      expect(await and(fromIterable([true, true]))).toBe(true);
      expect(await and(fromIterable([]))).toBe(true);
      expect(await or(fromIterable([false, true]))).toBe(true);
      expect(await or(fromIterable([]))).toBe(false);
      expect(await elem(fromIterable([1, 2]), 2)).toBe(true);
      expect(await notElem(fromIterable([1, 2]), 3)).toBe(true);
    });
  });

  describe('whole-stream folds', () => {
    it('computes numeric summaries', async () => {
      const source = () => fromIterable([3, -1, 4, 1, 5]);
      expect(await sum(source())).toBe(12);
      expect(await product(source())).toBe(-60);
      expect(await maximum(source())).toBe(5);
      expect(await minimum(source())).toBe(-1);
      expect(await length(source())).toBe(5);
      expect(await last(source())).toBe(5);
    });

    it('returns undefined or the identity for an empty source', async () => {
      const empty = () => fromIterable<number>([]);
      expect(await sum(empty())).toBe(0);
      expect(await product(empty())).toBe(1);
      expect(await maximum(empty())).toBeUndefined();
      expect(await last(empty())).toBeUndefined();
    });
  });

  describe('collecting', () => {
    it('toList collects a synchronous source', () => {
      expect(toList(fromIterable(['x', 'y']))).toEqual(['x', 'y']);
    });

    it('toList rejects an asynchronous effect', () => {
      const source: Source<number, void> = bind(liftEffect(() => Promise.resolve(1)), (n) => emit(n));
      expect(() => toList(source)).toThrow(ContractViolationError);
    });

    it('toListM and toListMWithResult run asynchronous effects', async () => {
      const source = (): Source<number, string> =>
        bind(liftEffect(async () => 1), (n) => andThen(emit(n), done('finished')));
      expect(await toListM(source())).toEqual([1]);
      expect(await toListMWithResult(source())).toEqual([[1], 'finished']);
    });
  });

  describe('runEffect', () => {
    it('returns the result of a closed step', async () => {
      const closed: Closed<string> = bind(liftEffect(() => 'ok'), (value) => done(value.toUpperCase()));
      expect(await runEffect(closed)).toBe('OK');
    });

    it('traps a request reaching the top level', async () => {
      // only an untyped caller can build this
      const leaky = request<string, number>('anyone?') as unknown as Closed<number>;
      await expect(runEffect(leaky)).rejects.toThrow(ContractViolationError);
      await expect(runEffect(leaky)).rejects.toThrow('Closed interface used: received "anyone?"');
    });
  });
});
