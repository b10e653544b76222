export type ResolveArgument = "links" | "strategies" | "fallback";

/** Thrown before any network access when `resolveFavicons` is called with malformed arguments. */
export class InvalidArgumentError extends Error {
  readonly argument: ResolveArgument;

  constructor(argument: ResolveArgument, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
