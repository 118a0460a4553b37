/**
 * Base error type shared by every exprfuse package.
 *
 * Subclasses set a stable `code` so callers can branch without matching on
 * messages.
 */
export class ExprfuseError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ExprfuseError";
  }
}
