// Lightweight helpers shared by the step algebra and the traversal engine

export function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  if (!value || typeof value !== 'object') return false;
  return 'then' in value && typeof value.then === 'function';
}

// Stays synchronous unless the value is a thenable.
export function mapAwaitable<A, B>(value: A | PromiseLike<A>, fn: (value: A) => B): B | Promise<B> {
  return isPromiseLike(value) ? Promise.resolve(value).then(fn) : fn(value);
}

export function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value !== null && typeof value === 'object') {
    try {
      return JSON.stringify(value).slice(0, 100);
    } catch {
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}
