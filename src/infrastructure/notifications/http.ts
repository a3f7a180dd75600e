/** Describes a transport failure, including the low-level cause fetch wraps. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error && err.cause.message !== err.message) {
    return `${err.message}: ${err.cause.message}`;
  }
  return err.message;
}
