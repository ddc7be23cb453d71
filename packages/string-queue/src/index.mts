/**
 * Bounded single-producer/single-consumer string queue over a ring buffer
 *
 * @packageDocumentation
 */

export { BoundedStringQueue, destroyQueue } from "./bounded-string-queue.mjs";
export type {
  BoundedStringQueueOptions,
  QueueSnapshot,
  QueueState,
} from "./bounded-string-queue.mjs";

export { OwnedString } from "./owned-string.mjs";

export { Result } from "./result.mjs";

export {
  createCapacityExceededError,
  createInvalidArgumentError,
  createOutOfMemoryError,
  isCapacityExceededError,
  isInvalidArgumentError,
  isOutOfMemoryError,
  isQueueError,
  toLogMeta,
} from "./errors.mjs";
export type {
  CapacityExceededError,
  CreateError,
  ErrorContext,
  InvalidArgumentError,
  OutOfMemoryError,
  PushError,
  QueueError,
} from "./errors.mjs";

export { heapAllocator, MAX_SLOTS, TrackingAllocator } from "./allocator.mjs";
export type {
  Slot,
  StringAllocator,
  TrackingAllocatorOptions,
} from "./allocator.mjs";

export { createMemorySink, createStreamSink, stdoutSink } from "./sink.mjs";
export type { MemorySink, OutputSink } from "./sink.mjs";
