/** Malformed expression. Detected at compile time. */
export class QuerySyntaxError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
  ) {
    super(`${message} in "${expression}"`);
    this.name = 'QuerySyntaxError';
  }
}

/** A well-formed expression that cannot be applied to the data it was given. */
export class QueryRuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryRuntimeError';
  }
}
