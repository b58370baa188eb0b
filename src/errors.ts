const EXIT_CODE_FAILURE = 1;
const EXIT_CODE_USAGE = 2;

interface ProjextsErrorOptions {
  cause?: unknown;
}

export class ProjextsError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(message: string, code: string, exitCode: number, options: ProjextsErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class NotFoundError extends ProjextsError {
  constructor(message: string, options: ProjextsErrorOptions = {}) {
    super(message, "NOT_FOUND", EXIT_CODE_FAILURE, options);
  }
}

export class AlreadyExistsError extends ProjextsError {
  constructor(message: string, options: ProjextsErrorOptions = {}) {
    super(message, "ALREADY_EXISTS", EXIT_CODE_FAILURE, options);
  }
}

export class StoreIOError extends ProjextsError {
  constructor(message: string, options: ProjextsErrorOptions = {}) {
    super(message, "IO", EXIT_CODE_FAILURE, options);
  }
}

export class SpawnError extends ProjextsError {
  constructor(message: string, options: ProjextsErrorOptions = {}) {
    super(message, "SPAWN", EXIT_CODE_FAILURE, options);
  }
}

export class UsageError extends ProjextsError {
  constructor(message: string, options: ProjextsErrorOptions = {}) {
    super(message, "USAGE", EXIT_CODE_USAGE, options);
  }
}

export function normalizeError(error: unknown): ProjextsError {
  if (error instanceof ProjextsError) return error;
  if (error instanceof Error) {
    return new ProjextsError(error.message, "UNKNOWN", EXIT_CODE_FAILURE, { cause: error });
  }
  return new ProjextsError(String(error), "UNKNOWN", EXIT_CODE_FAILURE);
}
