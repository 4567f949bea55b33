import { describeValue } from './internal/helpers';

/**
 * Base class for failures raised by the library itself.
 *
 * Failures coming from user effects or from I/O handles are never wrapped:
 * they reach the caller of the traversal unchanged.
 */
export class BipipeError extends Error {
  /** The operation that detected the failure */
  readonly operator?: string;

  /** The value being processed when the failure was detected */
  readonly value?: unknown;

  constructor(
    message: string,
    options?: {
      operator?: string;
      value?: unknown;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'BipipeError';
    this.operator = options?.operator;
    this.value = options?.value;
  }

  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operator) {
      result += `\n  in operator: ${this.operator}`;
    }

    if (this.value !== undefined) {
      result += `\n  processing value: ${describeValue(this.value)}`;
    }

    return result;
  }
}

/**
 * A closed interface was used: a source reached an await, a sink emitted,
 * or a synchronous traversal met an asynchronous effect.
 */
export class ContractViolationError extends BipipeError {
  constructor(message: string, options?: { operator?: string; value?: unknown }) {
    super(message, options);
    this.name = 'ContractViolationError';
  }
}
