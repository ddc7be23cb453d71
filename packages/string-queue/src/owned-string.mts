import type { StringAllocator } from "./allocator.mjs";

/**
 * A string pulled out of the queue. The holder owns it and must call
 * `release()` once done; the text is unreadable afterwards.
 */
export class OwnedString {
  private isReleased = false;

  constructor(
    private readonly content: string,
    private readonly allocator: StringAllocator,
  ) {}

  get value(): string {
    if (this.isReleased) {
      throw new Error("OwnedString read after release");
    }
    return this.content;
  }

  get released(): boolean {
    return this.isReleased;
  }

  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    this.allocator.release(this.content);
  }

  toString(): string {
    return this.value;
  }
}
