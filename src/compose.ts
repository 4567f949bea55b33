import type { Done, Step } from './types';
import { awaitStep, bind, defer, done, effect, emitStep, unit } from './step';
import { mapAwaitable } from './internal/helpers';

export function request<UA, UV>(address: UA): Step<UA, UV, unknown, never, UV> {
  return awaitStep<UA, UV, unknown, never, UV>(address, (reply) => done(reply));
}

export function respond<DV, DA>(value: DV): Step<never, unknown, DA, DV, DA> {
  return emitStep<never, unknown, DA, DV, DA>(value, (reply) => done(reply));
}

/** `respond` for one-directional streams, where the reply carries nothing. */
export function emit<B>(value: B): Step<never, unknown, unknown, B, void> {
  return emitStep<never, unknown, unknown, B, void>(value, () => unit);
}

export function awaitValue<A>(): Step<void, A, unknown, never, A> {
  return request<void, A>(undefined);
}

export function discard(_value: unknown): Done<void> {
  return unit;
}

// Respond algebra: identity `respond`

/**
 * Replaces every emit of `step` with `handler(value)`; the handler's result
 * is sent back to `step` as the downstream reply. Awaits pass through.
 */
export function forEach<UA, UV, DA, DV, R, DA2, DV2>(
  step: Step<UA, UV, DA, DV, R>,
  handler: (value: DV) => Step<UA, UV, DA2, DV2, DA>
): Step<UA, UV, DA2, DV2, R> {
  let current = step;
  for (;;) {
    switch (current._tag) {
      case 'Await': {
        const { address, next } = current;
        return awaitStep<UA, UV, DA2, DV2, R>(address, (reply) => forEach(next(reply), handler));
      }
      case 'Emit': {
        const { next } = current;
        const substituted = handler(current.value);
        if (substituted._tag === 'Done') {
          current = next(substituted.value);
          continue;
        }
        return bind(substituted, (reply) => forEach(next(reply), handler));
      }
      case 'Effect': {
        const { run } = current;
        return effect<UA, UV, DA2, DV2, R>((scope) => mapAwaitable(run(scope), (resumed) => forEach(resumed, handler)));
      }
      case 'Done':
        return current;
    }
  }
}

export function composeRespond<A, UA, UV, DA, DV, R, DA2, DV2>(
  first: (input: A) => Step<UA, UV, DA, DV, R>,
  second: (value: DV) => Step<UA, UV, DA2, DV2, DA>
): (input: A) => Step<UA, UV, DA2, DV2, R> {
  return (input) => forEach(first(input), second);
}

// Request algebra: identity `request`

/**
 * Replaces every await of `step` with `handler(address)`; the handler's
 * result is sent back to `step` as the upstream reply. Emits pass through.
 */
export function substituteRequest<UA, UV, UA2, UV2, DA, DV, R>(
  handler: (address: UA) => Step<UA2, UV2, DA, DV, UV>,
  step: Step<UA, UV, DA, DV, R>
): Step<UA2, UV2, DA, DV, R> {
  let current = step;
  for (;;) {
    switch (current._tag) {
      case 'Await': {
        const { next } = current;
        const substituted = handler(current.address);
        if (substituted._tag === 'Done') {
          current = next(substituted.value);
          continue;
        }
        return bind(substituted, (reply) => substituteRequest(handler, next(reply)));
      }
      case 'Emit': {
        const { value, next } = current;
        return emitStep<UA2, UV2, DA, DV, R>(value, (reply) => substituteRequest(handler, next(reply)));
      }
      case 'Effect': {
        const { run } = current;
        return effect<UA2, UV2, DA, DV, R>((scope) => mapAwaitable(run(scope), (resumed) => substituteRequest(handler, resumed)));
      }
      case 'Done':
        return current;
    }
  }
}

export function composeRequest<A, UA, UV, UA2, UV2, DA, DV, R>(
  first: (address: UA) => Step<UA2, UV2, DA, DV, UV>,
  second: (input: A) => Step<UA, UV, DA, DV, R>
): (input: A) => Step<UA2, UV2, DA, DV, R> {
  return (input) => substituteRequest(first, second(input));
}

// Push and pull algebras

/** Forwards a value downstream, then every address upstream, forever. */
export function push<UA, UV>(value: UV): Step<UA, UV, UA, UV, never> {
  return emitStep<UA, UV, UA, UV, never>(value, (address) =>
    awaitStep<UA, UV, UA, UV, never>(address, (reply) => push<UA, UV>(reply))
  );
}

/** Forwards an address upstream, then every value downstream, forever. */
export function pull<UA, UV>(address: UA): Step<UA, UV, UA, UV, never> {
  return awaitStep<UA, UV, UA, UV, never>(address, (value) =>
    emitStep<UA, UV, UA, UV, never>(value, (reply) => pull<UA, UV>(reply))
  );
}

type Connection<UA, UV, DA, DV, DA2, DV2, R> =
  | {
      readonly driver: 'upstream';
      readonly upstream: Step<UA, UV, DA, DV, R>;
      readonly handler: (value: DV) => Step<DA, DV, DA2, DV2, R>;
    }
  | {
      readonly driver: 'downstream';
      readonly resume: (address: DA) => Step<UA, UV, DA, DV, R>;
      readonly downstream: Step<DA, DV, DA2, DV2, R>;
    };

// Both sides hand control back and forth in one loop, so a long exchange of
// values between two stages never deepens the call stack.
function connect<UA, UV, DA, DV, DA2, DV2, R>(
  initial: Connection<UA, UV, DA, DV, DA2, DV2, R>
): Step<UA, UV, DA2, DV2, R> {
  let connection = initial;
  for (;;) {
    if (connection.driver === 'upstream') {
      const { upstream, handler } = connection;
      switch (upstream._tag) {
        case 'Await': {
          const { address, next } = upstream;
          return awaitStep<UA, UV, DA2, DV2, R>(address, (reply) =>
            connect({ driver: 'upstream', upstream: next(reply), handler })
          );
        }
        case 'Emit':
          connection = { driver: 'downstream', resume: upstream.next, downstream: handler(upstream.value) };
          continue;
        case 'Effect': {
          const { run } = upstream;
          return effect<UA, UV, DA2, DV2, R>((scope) =>
            mapAwaitable(run(scope), (resumed) => connect({ driver: 'upstream', upstream: resumed, handler }))
          );
        }
        case 'Done':
          return upstream;
      }
    } else {
      const { resume, downstream } = connection;
      switch (downstream._tag) {
        case 'Await':
          connection = { driver: 'upstream', upstream: resume(downstream.address), handler: downstream.next };
          continue;
        case 'Emit': {
          const { value, next } = downstream;
          return emitStep<UA, UV, DA2, DV2, R>(value, (reply) =>
            connect({ driver: 'downstream', resume, downstream: next(reply) })
          );
        }
        case 'Effect': {
          const { run } = downstream;
          return effect<UA, UV, DA2, DV2, R>((scope) =>
            mapAwaitable(run(scope), (resumed) => connect({ driver: 'downstream', resume, downstream: resumed }))
          );
        }
        case 'Done':
          return downstream;
      }
    }
  }
}

/** Upstream drives: each value it emits starts `handler`. */
export function pushInto<UA, UV, DA, DV, DA2, DV2, R>(
  upstream: Step<UA, UV, DA, DV, R>,
  handler: (value: DV) => Step<DA, DV, DA2, DV2, R>
): Step<UA, UV, DA2, DV2, R> {
  return connect<UA, UV, DA, DV, DA2, DV2, R>({ driver: 'upstream', upstream, handler });
}

/** Downstream drives: each address it requests resumes `resume`. */
export function pullFrom<UA, UV, DA, DV, DA2, DV2, R>(
  resume: (address: DA) => Step<UA, UV, DA, DV, R>,
  downstream: Step<DA, DV, DA2, DV2, R>
): Step<UA, UV, DA2, DV2, R> {
  return connect<UA, UV, DA, DV, DA2, DV2, R>({ driver: 'downstream', resume, downstream });
}

export function composePush<A, UA, UV, DA, DV, DA2, DV2, R>(
  first: (input: A) => Step<UA, UV, DA, DV, R>,
  second: (value: DV) => Step<DA, DV, DA2, DV2, R>
): (input: A) => Step<UA, UV, DA2, DV2, R> {
  return (input) => pushInto(first(input), second);
}

export function composePull<A, UA, UV, DA, DV, DA2, DV2, R>(
  first: (address: DA) => Step<UA, UV, DA, DV, R>,
  second: (input: A) => Step<DA, DV, DA2, DV2, R>
): (input: A) => Step<UA, UV, DA2, DV2, R> {
  return (input) => pullFrom(first, second(input));
}

/** Swaps the upstream and downstream interfaces. */
export function reflect<UA, UV, DA, DV, R>(step: Step<UA, UV, DA, DV, R>): Step<DV, DA, UV, UA, R> {
  switch (step._tag) {
    case 'Await': {
      const { address, next } = step;
      return emitStep<DV, DA, UV, UA, R>(address, (reply) => reflect(next(reply)));
    }
    case 'Emit': {
      const { value, next } = step;
      return awaitStep<DV, DA, UV, UA, R>(value, (reply) => reflect(next(reply)));
    }
    case 'Effect': {
      const { run } = step;
      return effect<DV, DA, UV, UA, R>((scope) => mapAwaitable(run(scope), (resumed) => reflect(resumed)));
    }
    case 'Done':
      return step;
  }
}

// One-directional sugar

export function cat<A>(): Step<void, A, void, A, never> {
  return pull<void, A>(undefined);
}

/** Connects `upstream` to `downstream`; the first side to finish ends both. */
export function pipe<UA, UV, DV, DA2, DV2, R>(
  upstream: Step<UA, UV, void, DV, R>,
  downstream: Step<void, DV, DA2, DV2, R>
): Step<UA, UV, DA2, DV2, R> {
  return pullFrom<UA, UV, void, DV, DA2, DV2, R>(() => upstream, downstream);
}

/** Answers every await of `consumer` by running `draw`. */
export function feed<UA, UV, DA, DV, B, R>(
  draw: Step<UA, UV, DA, DV, B>,
  consumer: Step<void, B, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return substituteRequest<void, B, UA, UV, DA, DV, R>(() => draw, consumer);
}

export function each<B>(iterable: Iterable<B>): Step<never, unknown, unknown, B, void> {
  return defer(() => {
    const iterator = iterable[Symbol.iterator]();
    const loop = (): Step<never, unknown, unknown, B, void> => {
      const result = iterator.next();
      return result.done ? unit : bind(emit(result.value), loop);
    };
    return loop();
  });
}
