/**
 * Raised when a caller hands the search something it cannot work with:
 * a missing start node or provider, a missing neighbor, or a negative
 * edge distance.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Throws {@link InvalidArgumentError} when `value` is null or undefined.
 * A function `what` is only called to build the message.
 */
export function requireNonNull<T>(value: T, what: string | (() => string)): NonNullable<T> {
  if (value === null || value === undefined) {
    const subject = typeof what === "function" ? what() : what;
    throw new InvalidArgumentError(`${subject} must not be ${String(value)}`);
  }
  return value;
}
