/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Normalizes anything thrown into an `Error`, keeping the thrown value as `cause` when it was not one.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }

  return new Error(`non-error thrown: ${String(thrown)}`, { cause: thrown });
}

/**
 * Gracefully handles a given Promise factory.
 * @example
 * const [error, data] = await safeWrapAsync(() => asyncAction());
 */
export async function safeWrapAsync<DataType = unknown>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<DataType = unknown>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}
