/** A request the backend understood but cannot carry out, e.g. an unknown customer. */
export class OperationFailedError extends Error {
  readonly kind = 'OperationFailed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'OperationFailedError';
  }
}

export class UnknownOperationError extends Error {
  readonly kind = 'NotFound' as const;

  constructor(public readonly operation: string) {
    super(`Unknown operation: ${operation}`);
    this.name = 'UnknownOperationError';
  }
}

export class InvalidArgumentsError extends Error {
  readonly kind = 'ValidationError' as const;

  constructor(public readonly operation: string, public readonly issues: string[]) {
    super(`Invalid arguments for "${operation}": ${issues.join('; ')}`);
    this.name = 'InvalidArgumentsError';
  }
}
