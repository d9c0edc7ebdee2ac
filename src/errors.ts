export class MalformedPredicateError extends Error {
  override readonly name = 'MalformedPredicateError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends Error {
  override readonly name = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    message?: string,
  ) {
    super(message ?? `Operator ${operator} is not supported`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedPathExpressionError extends Error {
  override readonly name = 'UnsupportedPathExpressionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidQueryOptionError extends Error {
  override readonly name = 'InvalidQueryOptionError';

  constructor(
    readonly option: string,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
