/**
 * @module errors
 * @description Tagged error values reported by the queue.
 *
 * @remarks
 * Every error carries a `tag` discriminant for narrowing, plus the
 * `recoverable` / `retryable` hints callers use to decide what to do next.
 * Errors are plain immutable objects returned inside a `Result`; the queue
 * never throws them.
 *
 * Pulling from an empty queue is not an error: `pull()` returns `undefined`.
 *
 * @example
 * ```typescript
 * const created = BoundedStringQueue.create(-1);
 * if (!created.success && isInvalidArgumentError(created.error)) {
 *   logger.error(created.error.message, toLogMeta(created.error));
 * }
 * ```
 */

export type ErrorContext = Record<string, unknown>;

export type QueueError =
  | InvalidArgumentError
  | OutOfMemoryError
  | CapacityExceededError;

/** Errors `BoundedStringQueue.create` can report */
export type CreateError = InvalidArgumentError | OutOfMemoryError;

/** Errors `BoundedStringQueue.push` can report */
export type PushError = CapacityExceededError | OutOfMemoryError;

/**
 * A caller passed a value the operation cannot accept, such as a negative
 * capacity. Fix the call; retrying with the same input fails again.
 */
export interface InvalidArgumentError {
  readonly tag: "invalid-argument";
  readonly message: string;
  readonly recoverable: false;
  readonly retryable: false;
  readonly context?: ErrorContext;
}

/**
 * The allocator refused storage for the slot array or for a pushed string.
 * The queue is left exactly as it was before the attempt.
 */
export interface OutOfMemoryError {
  readonly tag: "out-of-memory";
  readonly message: string;
  readonly recoverable: true;
  readonly retryable: true;
  readonly context?: ErrorContext;
}

/**
 * Push on a full queue (every push on a capacity-0 queue). Expected in steady
 * state; the caller decides whether to pull and push again.
 */
export interface CapacityExceededError {
  readonly tag: "capacity-exceeded";
  readonly message: string;
  readonly recoverable: true;
  readonly retryable: true;
  readonly context?: ErrorContext;
}

export const createInvalidArgumentError = (
  message: string,
  context?: ErrorContext,
): InvalidArgumentError => ({
  tag: "invalid-argument",
  message,
  recoverable: false,
  retryable: false,
  context,
});

export const createOutOfMemoryError = (
  message: string,
  context?: ErrorContext,
): OutOfMemoryError => ({
  tag: "out-of-memory",
  message,
  recoverable: true,
  retryable: true,
  context,
});

export const createCapacityExceededError = (
  capacity: number,
): CapacityExceededError => ({
  tag: "capacity-exceeded",
  message: `Queue is full (capacity ${capacity})`,
  recoverable: true,
  retryable: true,
  context: { capacity },
});

function createTagTypeGuard<T extends QueueError>(tag: T["tag"]) {
  return (error: unknown): error is T => {
    if (typeof error !== "object" || error === null) {
      return false;
    }
    return "tag" in error && error.tag === tag;
  };
}

export const isInvalidArgumentError =
  createTagTypeGuard<InvalidArgumentError>("invalid-argument");

export const isOutOfMemoryError =
  createTagTypeGuard<OutOfMemoryError>("out-of-memory");

export const isCapacityExceededError =
  createTagTypeGuard<CapacityExceededError>("capacity-exceeded");

export const isQueueError = (error: unknown): error is QueueError =>
  isInvalidArgumentError(error) ||
  isOutOfMemoryError(error) ||
  isCapacityExceededError(error);

/**
 * Flattens an error into logger metadata.
 */
export const toLogMeta = (error: QueueError): Record<string, unknown> => ({
  tag: error.tag,
  recoverable: error.recoverable,
  retryable: error.retryable,
  ...(error.context ?? {}),
});
