/**
 * Storage collaborators for the queue: the slot array and the strings it owns
 * are obtained from, and handed back to, a `StringAllocator`.
 */

import { Result } from "./result.mjs";
import { createOutOfMemoryError } from "./errors.mjs";
import type { OutOfMemoryError } from "./errors.mjs";

/** One cell of the ring: an owned string or nothing */
export type Slot = string | undefined;

export interface StringAllocator {
  allocateSlots(capacity: number): Result<Slot[], OutOfMemoryError>;
  releaseSlots(slots: Slot[]): void;
  /** Takes a private copy of `value` for the queue to own */
  duplicate(value: string): Result<string, OutOfMemoryError>;
  release(value: string): void;
}

/** Largest slot array either allocator hands out */
export const MAX_SLOTS = 2 ** 24;

function allocateArray(
  capacity: number,
  maxSlots: number,
): Result<Slot[], OutOfMemoryError> {
  if (capacity > maxSlots) {
    return Result.err(
      createOutOfMemoryError(`Cannot allocate ${capacity} slots`, {
        capacity,
        maxSlots,
      }),
    );
  }
  return Result.ok(new Array<Slot>(capacity).fill(undefined));
}

/**
 * Default allocator backed by the JS heap.
 *
 * Strings are immutable, so the copy handed to the queue can share the
 * caller's string; releasing is left to the garbage collector.
 */
export const heapAllocator: StringAllocator = {
  allocateSlots: (capacity) => allocateArray(capacity, MAX_SLOTS),
  releaseSlots(slots) {
    slots.length = 0;
  },
  duplicate: (value) => Result.ok(value),
  release() {
    // collected once unreachable
  },
};

export interface TrackingAllocatorOptions {
  /** Refuse `duplicate` once this many strings are live */
  maxLiveStrings?: number;
  /** Refuse slot arrays longer than this; defaults to `MAX_SLOTS` */
  maxSlots?: number;
  /** Refuse every `allocateSlots` call */
  failSlotAllocation?: boolean;
}

/**
 * Instrumented allocator that counts what is currently handed out.
 *
 * Used to verify that `destroy()` and `OwnedString.release()` leave no
 * storage reachable, and to inject allocation failures.
 */
export class TrackingAllocator implements StringAllocator {
  private liveStringCount = 0;
  private liveSlotArrayCount = 0;
  private stringAllocations = 0;
  private stringReleases = 0;
  private refusals = 0;

  constructor(private readonly options: TrackingAllocatorOptions = {}) {}

  allocateSlots(capacity: number): Result<Slot[], OutOfMemoryError> {
    if (this.options.failSlotAllocation) {
      this.refusals++;
      return Result.err(
        createOutOfMemoryError(`Cannot allocate ${capacity} slots`, {
          capacity,
        }),
      );
    }
    const slots = allocateArray(capacity, this.options.maxSlots ?? MAX_SLOTS);
    if (slots.success) {
      this.liveSlotArrayCount++;
    } else {
      this.refusals++;
    }
    return slots;
  }

  releaseSlots(slots: Slot[]): void {
    if (this.liveSlotArrayCount === 0) {
      throw new Error("releaseSlots called with no live slot array");
    }
    slots.length = 0;
    this.liveSlotArrayCount--;
  }

  duplicate(value: string): Result<string, OutOfMemoryError> {
    const limit = this.options.maxLiveStrings;
    if (limit !== undefined && this.liveStringCount >= limit) {
      this.refusals++;
      return Result.err(
        createOutOfMemoryError(
          `Cannot allocate string of length ${value.length}`,
          { length: value.length, liveStrings: this.liveStringCount },
        ),
      );
    }
    this.liveStringCount++;
    this.stringAllocations++;
    return Result.ok(value);
  }

  release(_value: string): void {
    if (this.liveStringCount === 0) {
      throw new Error("release called with no live string");
    }
    this.liveStringCount--;
    this.stringReleases++;
  }

  get liveStrings(): number {
    return this.liveStringCount;
  }

  get liveSlotArrays(): number {
    return this.liveSlotArrayCount;
  }

  get allocations(): number {
    return this.stringAllocations;
  }

  get releases(): number {
    return this.stringReleases;
  }

  get refused(): number {
    return this.refusals;
  }

  /** True when every string and slot array handed out has come back */
  isBalanced(): boolean {
    return this.liveStringCount === 0 && this.liveSlotArrayCount === 0;
  }
}
