/**
 * Error types for currency units.
 *
 * Every error carries a stable code, a severity and optional structured context
 * so callers can log it with `toJSON()` or branch on `code`.
 */

export interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * - `missing-field`: the keyed payload has no value under the expected key
 * - `unknown-code`: the value is not one of the supported currency codes
 * - `malformed-payload`: the payload itself could not be read (bad JSON, wrong shape)
 */
export type DecodeFailureReason = 'missing-field' | 'unknown-code' | 'malformed-payload';

/**
 * Raised when persisted data cannot be turned back into a currency unit or amount.
 * Returned inside a `Result`, never thrown by the codec.
 */
export class DecodeFailure extends DomainError {
  readonly code = 'DECODE_FAILURE';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly reason: DecodeFailureReason,
    public readonly key?: string,
    public readonly received?: string,
    context?: ErrorContext
  ) {
    super(message, context);
  }

  static missingField(key: string): DecodeFailure {
    return new DecodeFailure(`Missing value for key '${key}'`, 'missing-field', key);
  }

  static unknownCode(key: string, received: string): DecodeFailure {
    return new DecodeFailure(`Unknown currency code '${received}' for key '${key}'`, 'unknown-code', key, received);
  }

  static malformedPayload(message: string, context?: ErrorContext): DecodeFailure {
    return new DecodeFailure(message, 'malformed-payload', undefined, undefined, context);
  }

  override toJSON() {
    return {
      ...super.toJSON(),
      key: this.key,
      reason: this.reason,
      received: this.received,
    };
  }
}
