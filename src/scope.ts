import type { Awaitable, Step } from './types';
import { bind, done, effect } from './step';
import { isPromiseLike, mapAwaitable } from './internal/helpers';

type Finalizer = () => Awaitable<void>;

/**
 * Release actions registered during one traversal. Every traversal entry point
 * owns a scope and releases it when it stops, whether the stream ran to its
 * end, failed, or was abandoned by an early-stopping consumer.
 */
export class Scope {
  private readonly finalizers = new Set<Finalizer>();

  /**
   * Registers `finalizer` and returns a dispose function that runs it at most
   * once and unregisters it.
   */
  onRelease(finalizer: Finalizer): () => Awaitable<void> {
    let pending = true;
    const once: Finalizer = () => {
      if (!pending) return;
      pending = false;
      this.finalizers.delete(once);
      return finalizer();
    };
    this.finalizers.add(once);
    return once;
  }

  get size(): number {
    return this.finalizers.size;
  }

  /** Runs every outstanding finalizer, newest first. The first failure is rethrown once all have run. */
  release(): Awaitable<void> {
    const outstanding = [...this.finalizers].reverse();
    const failures: unknown[] = [];
    const waiting: PromiseLike<void>[] = [];

    for (const finalizer of outstanding) {
      try {
        const result = finalizer();
        if (isPromiseLike(result)) waiting.push(result);
      } catch (error) {
        failures.push(error);
      }
    }

    if (waiting.length === 0) {
      if (failures.length > 0) throw failures[0];
      return;
    }
    return Promise.allSettled(waiting).then((settled) => {
      for (const outcome of settled) {
        if (outcome.status === 'rejected') failures.push(outcome.reason);
      }
      if (failures.length > 0) throw failures[0];
    });
  }
}

/**
 * Acquires a resource when the traversal reaches this step, runs `use` on it
 * and releases it when `use` finishes. A traversal that stops early releases
 * it on the way out instead.
 */
export function bracket<T, UA, UV, DA, DV, R>(
  acquire: () => Awaitable<T>,
  release: (resource: T) => Awaitable<void>,
  use: (resource: T) => Step<UA, UV, DA, DV, R>
): Step<UA, UV, DA, DV, R> {
  return effect<UA, UV, DA, DV, R>((scope) =>
    mapAwaitable(acquire(), (resource) => {
      const dispose = scope.onRelease(() => release(resource));
      return bind(use(resource), (result) =>
        effect<UA, UV, DA, DV, R>(() => mapAwaitable(dispose(), () => done(result)))
      );
    })
  );
}
