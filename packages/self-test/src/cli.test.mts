import { describe, expect, it, vi } from "vitest";

import { runCli } from "./cli.mjs";
import type { CliIo } from "./cli.mjs";

function createIo(env: Record<string, string> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const logTarget = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
  const io: CliIo = {
    env,
    stdout: {
      write: (chunk: string | Uint8Array) => {
        out.push(String(chunk));
        return true;
      },
    },
    stderr: {
      write: (chunk: string | Uint8Array) => {
        err.push(String(chunk));
        return true;
      },
    },
    logTarget,
  };
  return {
    io,
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

describe("runCli", () => {
  it("should run every scenario and print drained strings", () => {
    const { io, stdout, stderr } = createIo();

    const code = runCli(["--quiet"], io);

    expect(code).toBe(0);
    expect(stdout()).toBe(
      [
        "hello",
        "world",
        "elem1",
        "elem2",
        "elem3",
        "elem4",
        "X",
        "Y",
        "Z",
        "T",
        "elem1",
        "elem2",
        "elem3",
        "elem4",
        "A",
        "X",
        "Y",
        "Z",
        "T",
        "",
      ].join("\n"),
    );
    expect(stderr()).toBe("");
  });

  it("should run only the selected scenario", () => {
    const { io, stdout } = createIo();

    const code = runCli(["-q", "--scenario", "hello-world"], io);

    expect(code).toBe(0);
    expect(stdout()).toBe("hello\nworld\n");
  });

  it("should keep log output off stdout", () => {
    const { io, stdout } = createIo();

    const code = runCli(["--log-level", "info", "-s", "hello-world"], io);

    expect(code).toBe(0);
    expect(stdout()).toBe("hello\nworld\n");
  });

  it("should list scenarios", () => {
    const { io, stdout } = createIo();

    const code = runCli(["--list", "-s", "zero-capacity"], io);

    expect(code).toBe(0);
    expect(stdout()).toBe(
      "zero-capacity\tcapacity 0 accepts nothing and yields nothing\n",
    );
  });

  it("should print help", () => {
    const { io, stdout } = createIo();

    expect(runCli(["--help"], io)).toBe(0);
    expect(stdout()).toContain("Usage: ringq-self-test [options]");
    expect(stdout()).toContain(
      "ringq-self-test: exercises the bounded string queue",
    );
  });

  it("should exit with 2 on bad arguments", () => {
    const { io, stdout, stderr } = createIo();

    const code = runCli(["--scenario", "nope"], io);

    expect(code).toBe(2);
    expect(stderr()).toBe('Unknown scenario "nope"\nTry --help\n');
    expect(stdout()).toBe("");
  });

  it("should exit with 2 on an invalid log level from the environment", () => {
    const { io, stderr } = createIo({ RINGQ_LOG_LEVEL: "loud" });

    expect(runCli([], io)).toBe(2);
    expect(stderr()).toBe('Invalid log level "loud"\nTry --help\n');
  });
});
