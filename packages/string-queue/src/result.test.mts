import { describe, expect, it } from "vitest";

import { Result } from "./result.mjs";

describe("Result", () => {
  it("should tell success from failure", () => {
    expect(Result.isOk(Result.ok(1))).toBe(true);
    expect(Result.isErr(Result.err("nope"))).toBe(true);
  });

  it("should unwrap with a default", () => {
    expect(Result.unwrapOr(0)(Result.ok(3))).toBe(3);
    expect(Result.unwrapOr(0)(Result.err("full"))).toBe(0);
  });
});
