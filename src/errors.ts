/**
 * Errors raised by the acceptance accounting layer.
 *
 * None of these are transient: they signal a programming or taxonomy
 * mismatch and are never retried.
 */

export type AcceptanceMetricsErrorCode =
  | 'REGISTRATION_FAILED'
  | 'UNKNOWN_BLOCK_TYPE'
  | 'UNKNOWN_TX_TYPE'
  | 'INVALID_CONFIG';

export class AcceptanceMetricsError extends Error {
  constructor(
    public readonly code: AcceptanceMetricsErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AcceptanceMetricsError';
  }
}

/**
 * Raised when a block kind has no counter in this layer.
 */
export class UnknownBlockTypeError extends AcceptanceMetricsError {
  constructor(public readonly kind: unknown) {
    super('UNKNOWN_BLOCK_TYPE', `unknown block type: ${describeKind(kind)}`);
    this.name = 'UnknownBlockTypeError';
  }
}

/**
 * Raised when an unsigned transaction kind has no counter in this layer.
 */
export class UnknownTransactionTypeError extends AcceptanceMetricsError {
  constructor(public readonly kind: unknown) {
    super('UNKNOWN_TX_TYPE', `unknown transaction type: ${describeKind(kind)}`);
    this.name = 'UnknownTransactionTypeError';
  }
}

export interface RegistrationFailure {
  metric: string;
  cause: unknown;
}

export class RegistrationError extends AcceptanceMetricsError {
  constructor(public readonly failures: readonly RegistrationFailure[]) {
    super(
      'REGISTRATION_FAILED',
      `failed to register ${failures.length} metric(s): ` +
        failures.map(f => `${f.metric} (${causeMessage(f.cause)})`).join('; ')
    );
    this.name = 'RegistrationError';
  }
}

export class ConfigError extends AcceptanceMetricsError {
  constructor(public readonly issues: readonly string[]) {
    super('INVALID_CONFIG', `invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Runs every attempt and remembers what failed, instead of stopping at the
 * first throw.
 */
export class ErrorCollector {
  private readonly failures: RegistrationFailure[] = [];

  attempt(metric: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.failures.push({ metric, cause: err });
    }
  }

  get failed(): readonly RegistrationFailure[] {
    return this.failures;
  }

  /**
   * @throws RegistrationError (or what `build` returns) if anything failed
   */
  throwIfAny(
    build: (failures: RegistrationFailure[]) => RegistrationError = failures => new RegistrationError(failures)
  ): void {
    if (this.failures.length > 0) {
      throw build([...this.failures]);
    }
  }
}

export function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function describeKind(kind: unknown): string {
  if (typeof kind === 'string') {
    return kind;
  }
  try {
    return JSON.stringify(kind) ?? String(kind);
  } catch {
    // bigint and circular values
    return String(kind);
  }
}
