// Error taxonomy shared by the pipeline, engine and control layers

export type RemoteErrorCode = 'schema' | 'engine' | 'invariant' | 'balance-unavailable';

export abstract class RemoteError extends Error {
  abstract readonly code: RemoteErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A pipeline description is structurally or semantically invalid, either by
 * the local consistency check or by the engine's validator.
 */
export class SchemaError extends RemoteError {
  readonly code = 'schema';

  constructor(message: string, readonly problems: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Transport or protocol failure while talking to the live engine. */
export class EngineError extends RemoteError {
  readonly code = 'engine';

  constructor(message: string, readonly command?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A programming error, e.g. a menu entry with no catalog counterpart. */
export class InvariantViolation extends RemoteError {
  readonly code = 'invariant';
}

/** The live description has no balance filter pair to adjust. */
export class BalanceUnavailableError extends RemoteError {
  readonly code = 'balance-unavailable';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
