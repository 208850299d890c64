export class DedupeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable, empty or unanalysable input file. Never fatal. */
export class InputError extends DedupeError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${message}: ${path}`, options);
  }
}

/** A fingerprint block points at a record that no longer exists. */
export class IndexCorruption extends DedupeError {
  constructor(readonly recordKey: number) {
    super(`Fingerprint blocks reference missing record #${recordKey}`);
  }
}

export class AmbiguityUnresolved extends DedupeError {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Ambiguous match left unresolved (${reason}): ${path}`);
  }
}

export class StoreTransactionFailure extends DedupeError {
  constructor(
    readonly path: string,
    readonly verdict: string,
    options?: ErrorOptions
  ) {
    super(`Could not commit ${verdict} for ${path}`, options);
  }
}

export class ConfigError extends DedupeError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
