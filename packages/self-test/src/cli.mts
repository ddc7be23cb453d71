import { Console } from "node:console";

import { loggerFactory, noopLogger } from "@ringq/logger";
import type { BaseLogger, LoggerFactoryOptions } from "@ringq/logger";
import { createStreamSink } from "@ringq/string-queue";

import { parseArgs, resolveConfig } from "./config.mjs";
import type { SelfTestConfig } from "./config.mjs";
import { formatFailures, runSelfTest } from "./harness.mjs";

type Writable = Pick<NodeJS.WritableStream, "write">;

export interface CliIo {
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Receives drained strings and failure lines */
  readonly stdout: Writable;
  /** Receives usage errors */
  readonly stderr: Writable;
  /** Console-like target for log output; defaults to a console on stderr */
  readonly logTarget?: LoggerFactoryOptions["logger"];
}

const HELP = `
ringq-self-test: exercises the bounded string queue

Usage: ringq-self-test [options]

Options:
  -s, --scenario <name[,name]>  Run only the named scenarios (repeatable)
  --list                        List scenarios and exit
  --log-level <level>           trace|debug|info|warn|error|fatal (default: warn,
                                or RINGQ_LOG_LEVEL)
  -q, --quiet                   Disable logging
  -h, --help                    Show this help message

Exit codes: 0 all scenarios passed, 1 a scenario failed, 2 bad arguments.
`;

function createLogger(config: SelfTestConfig, io: CliIo): BaseLogger {
  if (config.quiet) return noopLogger;
  const { logger } = loggerFactory({
    level: config.logLevel,
    name: "ringq-self-test",
    logger: io.logTarget ?? new Console({ stdout: process.stderr }),
  });
  return logger;
}

/**
 * Runs the CLI and returns the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  const parsed = parseArgs(argv);
  const resolved = parsed.success
    ? resolveConfig(parsed.data, io.env)
    : parsed;
  if (!resolved.success) {
    io.stderr.write(`${resolved.error.message}\nTry --help\n`);
    return 2;
  }
  const config = resolved.data;

  if (config.help) {
    io.stdout.write(HELP);
    return 0;
  }

  if (config.list) {
    for (const scenario of config.scenarios) {
      io.stdout.write(`${scenario.name}\t${scenario.description}\n`);
    }
    return 0;
  }

  const sink = createStreamSink(io.stdout);
  const report = runSelfTest({
    scenarios: config.scenarios,
    sink,
    logger: createLogger(config, io),
  });

  for (const line of formatFailures(report)) {
    sink.writeLine(line);
  }
  return report.exitCode;
}
