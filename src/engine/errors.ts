// ============================================================================
// ENGINE ERRORS
// ============================================================================
// Two failure kinds leave the engine as exceptions. "The oracle said no"
// (makes_sense=false) and "nothing matched" (reconciliation conflicts) are
// ordinary results, not errors.

export type EngineErrorKind = "decode" | "oracle_unavailable";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
  abstract readonly retryable: boolean;
}

/**
 * The oracle answered, but nothing structured could be recovered from the
 * answer after every repair strategy.
 */
export class DecodeError extends EngineError {
  readonly kind = "decode";
  readonly retryable = true;

  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Transport failure or timeout while talking to the oracle.
 */
export class OracleUnavailableError extends EngineError {
  readonly kind = "oracle_unavailable";
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleUnavailableError";
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
