#!/usr/bin/env node

import { runCli } from "./cli.mjs";

try {
  process.exitCode = runCli(process.argv.slice(2), {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
  });
} catch (err) {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
