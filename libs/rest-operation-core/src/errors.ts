/**
 * Default declared error kind for operations. Raised when a response status
 * is outside the operation's expected set.
 */
export class RestError<TBody = unknown> extends Error {
  readonly status: number;

  constructor(
    message: string,
    public readonly response: Response,
    public readonly body?: TBody,
  ) {
    super(message);
    this.name = 'RestError';
    this.status = response.status;
  }
}

/**
 * Raised instead of the declared error kind when that error could not be
 * constructed from the response.
 */
export class ErrorConstructionError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly errorKind: string,
    public readonly responseText: string | undefined,
    cause: unknown,
  ) {
    super(message, { cause });
    this.name = 'ErrorConstructionError';
  }
}

export class SerializationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SerializationError';
  }
}

export class OperationDefinitionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'OperationDefinitionError';
  }
}

export class UnknownOperationError extends Error {
  constructor(public readonly operation: string) {
    super(`Unknown operation: ${operation}`);
    this.name = 'UnknownOperationError';
  }
}
