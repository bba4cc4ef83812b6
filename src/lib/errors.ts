/**
 * Collaborator output did not match the expected shape, or a read-only
 * query exited non-zero. Recoverable: the triggering load is abandoned.
 */
export class QueryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "QueryError";
  }
}

/**
 * A jj action ran and reported failure. Recoverable: the diagnostic text is
 * shown to the user.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly stderr: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "CommandError";
  }
}

/**
 * The jj binary could not be started at all. Fatal.
 */
export class InvocationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvocationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
