/**
 * Fixed-capacity FIFO of strings over a ring of pre-allocated slots.
 *
 * A single producer pushes and a single consumer pulls; nothing here is safe
 * for concurrent use. Equal read and write indices mean either empty or full,
 * so an explicit `empty` flag tells the two apart and every slot is usable.
 */

import { noopLogger } from "@ringq/logger";
import type { BaseLogger } from "@ringq/logger";

import { heapAllocator } from "./allocator.mjs";
import type { Slot, StringAllocator } from "./allocator.mjs";
import {
  createCapacityExceededError,
  createInvalidArgumentError,
  toLogMeta,
} from "./errors.mjs";
import type { CreateError, PushError } from "./errors.mjs";
import { OwnedString } from "./owned-string.mjs";
import { Result } from "./result.mjs";
import { stdoutSink } from "./sink.mjs";
import type { OutputSink } from "./sink.mjs";

export type QueueState = "empty" | "partial" | "full";

export interface QueueSnapshot {
  readonly capacity: number;
  readonly writeIndex: number;
  readonly readIndex: number;
  readonly isEmpty: boolean;
  readonly occupancy: number;
  readonly state: QueueState;
}

export interface BoundedStringQueueOptions {
  /** Source of slot and string storage; defaults to the JS heap */
  allocator?: StringAllocator;
  logger?: BaseLogger;
}

export class BoundedStringQueue {
  private writeIndex = 0;
  private readIndex = 0;
  private empty = true;
  private destroyed = false;

  private constructor(
    readonly capacity: number,
    private readonly slots: Slot[],
    private readonly allocator: StringAllocator,
    private readonly logger: BaseLogger,
  ) {}

  /**
   * Creates a queue holding up to `capacity` strings. Capacity 0 is legal and
   * yields a queue that rejects every push.
   */
  static create(
    capacity: number,
    options: BoundedStringQueueOptions = {},
  ): Result<BoundedStringQueue, CreateError> {
    const logger = options.logger ?? noopLogger;

    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      return Result.err(
        createInvalidArgumentError(
          `Capacity must be a non-negative integer, got ${String(capacity)}`,
          { capacity },
        ),
      );
    }

    const allocator = options.allocator ?? heapAllocator;
    const slots = allocator.allocateSlots(capacity);
    if (!slots.success) {
      logger.warn(slots.error.message, toLogMeta(slots.error));
      return slots;
    }

    logger.debug("queue created", { capacity });
    return Result.ok(
      new BoundedStringQueue(capacity, slots.data, allocator, logger),
    );
  }

  /** Number of strings currently held, in `[0, capacity]` */
  get occupancy(): number {
    if (this.capacity === 0) return 0;
    const count =
      (this.writeIndex - this.readIndex + this.capacity) % this.capacity;
    return count === 0 && !this.empty ? this.capacity : count;
  }

  get freeSlots(): number {
    return this.capacity - this.occupancy;
  }

  get isEmpty(): boolean {
    return this.occupancy === 0;
  }

  get isFull(): boolean {
    return this.occupancy === this.capacity;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get state(): QueueState {
    const occupancy = this.occupancy;
    if (occupancy === 0) return "empty";
    return occupancy === this.capacity ? "full" : "partial";
  }

  /**
   * Stores a private copy of `value` at the tail.
   *
   * On success the result holds the number of free slots before the push,
   * which is always at least 1. Called without a value it is a capacity
   * probe: it returns the free slot count and changes nothing.
   */
  push(value: string): Result<number, PushError>;
  push(value: null | undefined): number;
  push(value: string | null | undefined): Result<number, PushError> | number;
  push(value: string | null | undefined): Result<number, PushError> | number {
    this.assertUsable("push");
    const space = this.freeSlots;

    if (value === null || value === undefined) {
      return space;
    }

    if (space === 0) {
      this.logger.debug("push rejected, queue full", {
        capacity: this.capacity,
      });
      return Result.err(createCapacityExceededError(this.capacity));
    }

    const copy = this.allocator.duplicate(value);
    if (!copy.success) {
      this.logger.warn(copy.error.message, toLogMeta(copy.error));
      return copy;
    }

    this.slots[this.writeIndex] = copy.data;
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.empty = false;
    return Result.ok(space);
  }

  /**
   * Removes the oldest string and hands it to the caller, who must
   * `release()` it. Returns undefined when there is nothing to pull.
   */
  pull(): OwnedString | undefined {
    this.assertUsable("pull");
    if (this.occupancy === 0) {
      return undefined;
    }

    const value = this.slots[this.readIndex];
    if (value === undefined) {
      throw new Error(`Occupied slot ${this.readIndex} holds no value`);
    }
    this.slots[this.readIndex] = undefined;
    this.readIndex = (this.readIndex + 1) % this.capacity;
    if (this.readIndex === this.writeIndex) {
      this.empty = true;
    }
    return new OwnedString(value, this.allocator);
  }

  /**
   * Pulls until empty, writing each string to `sink` and releasing it right
   * after. Returns how many strings were emitted.
   */
  drainAndEmit(sink: OutputSink = stdoutSink): number {
    let emitted = 0;
    for (let item = this.pull(); item; item = this.pull()) {
      try {
        sink.writeLine(item.value);
      } finally {
        item.release();
      }
      emitted++;
    }
    return emitted;
  }

  /** Held strings, oldest first, without removing them */
  toArray(): string[] {
    this.assertUsable("toArray");
    const result: string[] = [];
    const count = this.occupancy;
    let index = this.readIndex;
    for (let i = 0; i < count; i++) {
      const item = this.slots[index];
      if (item !== undefined) {
        result.push(item);
      }
      index = (index + 1) % this.capacity;
    }
    return result;
  }

  snapshot(): QueueSnapshot {
    return {
      capacity: this.capacity,
      writeIndex: this.writeIndex,
      readIndex: this.readIndex,
      isEmpty: this.empty,
      occupancy: this.occupancy,
      state: this.state,
    };
  }

  /**
   * Releases every string still held, then the slot array. Calling it again
   * does nothing; any other call on a destroyed queue throws.
   */
  destroy(): void {
    if (this.destroyed) return;

    const held = this.occupancy;
    let index = this.readIndex;
    for (let i = 0; i < held; i++) {
      const item = this.slots[index];
      if (item !== undefined) {
        this.allocator.release(item);
        this.slots[index] = undefined;
      }
      index = (index + 1) % this.capacity;
    }
    this.allocator.releaseSlots(this.slots);

    this.writeIndex = 0;
    this.readIndex = 0;
    this.empty = true;
    this.destroyed = true;
    this.logger.debug("queue destroyed", {
      capacity: this.capacity,
      released: held,
    });
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new Error(`Cannot ${operation}: queue has been destroyed`);
    }
  }
}

/**
 * Destroys `queue` if there is one.
 */
export function destroyQueue(
  queue: BoundedStringQueue | null | undefined,
): void {
  queue?.destroy();
}
