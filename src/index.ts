export * from './types';
export * from './step';
export * from './compose';
export * from './traverse';
export * from './operators';
export * from './sources';
export * from './sinks';
export * from './state';
export * from './exchange';
export * from './io';
export { Flow } from './flow';
export { Scope, bracket } from './scope';
export { BipipeError, ContractViolationError } from './errors';
export { configSchema, loadConfig, type Config } from './config';
export { createLogger, logger, type Logger } from './logger';

import type { Source } from './types';
import { Flow } from './flow';
import { unfoldr } from './sources';

export const bipipe = {
  of: Flow.of,
  from: Flow.from,
  fromReadableStream: Flow.fromReadableStream,
  range: Flow.range,
  empty: Flow.empty,

  wrap: <T, R>(source: Source<T, R>): Flow<T, R> => new Flow<T, R>(source),

  unfold: <S, T>(seed: S, step: (seed: S) => [T, S] | undefined): Flow<T> =>
    new Flow<T>(
      unfoldr<S, T, void>((current) => {
        const produced = step(current);
        return produced === undefined
          ? { done: true as const, value: undefined }
          : { done: false as const, value: produced[0], seed: produced[1] };
      }, seed)
    ),

  zip: <A, B, R>(left: Flow<A, R>, right: Flow<B, R>): Flow<[A, B], R> => left.zip(right),
};

export default bipipe;
