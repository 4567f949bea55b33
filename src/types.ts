import type { Scope } from './scope';

/**
 * A suspended, effectful, bidirectional stream computation.
 *
 * | param | role                        |
 * |-------|-----------------------------|
 * | UA    | address sent upstream       |
 * | UV    | value received from upstream|
 * | DA    | address received from downstream |
 * | DV    | value sent downstream       |
 * | R     | final result                |
 *
 * Uninhabited interfaces are `never`; unit replies are `void`.
 */
export type Step<UA, UV, DA, DV, R> =
  | Await<UA, UV, DA, DV, R>
  | Emit<UA, UV, DA, DV, R>
  | Effect<UA, UV, DA, DV, R>
  | Done<R>;

export interface Await<UA, UV, DA, DV, R> {
  readonly _tag: 'Await';
  readonly address: UA;
  readonly next: (reply: UV) => Step<UA, UV, DA, DV, R>;
  readonly bound?: Bound<UA, UV, DA, DV, R>;
}

export interface Emit<UA, UV, DA, DV, R> {
  readonly _tag: 'Emit';
  readonly value: DV;
  readonly next: (reply: DA) => Step<UA, UV, DA, DV, R>;
  readonly bound?: Bound<UA, UV, DA, DV, R>;
}

export interface Effect<UA, UV, DA, DV, R> {
  readonly _tag: 'Effect';
  readonly run: (scope: Scope) => Awaitable<Step<UA, UV, DA, DV, R>>;
  readonly bound?: Bound<UA, UV, DA, DV, R>;
}

export interface Done<R> {
  readonly _tag: 'Done';
  readonly value: R;
}

/**
 * Continuations queued by `bind`, applied left to right. `Concat` hides the
 * result type shared by its two halves.
 */
export type Continuations<UA, UV, DA, DV, R, S> =
  | { readonly _tag: 'Single'; readonly fn: (result: R) => Step<UA, UV, DA, DV, S> }
  | {
      readonly _tag: 'Concat';
      readonly open: <X>(
        visit: <M>(left: Continuations<UA, UV, DA, DV, R, M>, right: Continuations<UA, UV, DA, DV, M, S>) => X
      ) => X;
    };

/**
 * A step paired with the continuations still to run on its result. `bind`
 * records one on each node it builds so that a later `bind` extends the queue
 * instead of wrapping the node again.
 */
export type Bound<UA, UV, DA, DV, S> = <X>(
  visit: <R>(base: Step<UA, UV, DA, DV, R>, queue: Continuations<UA, UV, DA, DV, R, S>) => X
) => X;

export type Awaitable<T> = T | PromiseLike<T>;

/** Emits `B` downstream; never awaits. */
export type Source<B, R> = Step<never, never, void, B, R>;

/** Awaits `A` from upstream; never emits. */
export type Sink<A, R> = Step<void, A, never, never, R>;

/** One-directional stage: awaits `A`, emits `B`. */
export type Transformer<A, B, R> = Step<void, A, void, B, R>;

/** Self-contained computation with no open interface. */
export type Closed<R> = Step<never, never, never, never, R>;

/** Sends requests upstream only. */
export type Client<UA, UV, R> = Step<UA, UV, never, never, R>;

/** Answers requests from downstream only. */
export type Server<DA, DV, R> = Step<never, never, DA, DV, R>;

export type NextResult<B, R> =
  | { readonly done: true; readonly value: R }
  | { readonly done: false; readonly value: B; readonly rest: Source<B, R> };

export type Parser<A> = (text: string) => A | undefined;

export interface StateSlot<S> {
  get(): S;
  set(value: S): void;
}

export type Unfolded<A, S, R> =
  | { readonly done: true; readonly value: R }
  | { readonly done: false; readonly value: A; readonly seed: S };
