/**
 * Command-line and environment configuration for the self-test CLI.
 *
 * Precedence for the log level: `--log-level`, then `RINGQ_LOG_LEVEL`, then
 * "warn". `--quiet` silences logging entirely.
 */

import { isLoggerLevel } from "@ringq/logger";
import type { LoggerLevels } from "@ringq/logger";
import { Result } from "@ringq/string-queue";

import { builtinScenarios, findScenario } from "./scenarios.mjs";
import type { Scenario } from "./types.mjs";

export const LOG_LEVEL_ENV = "RINGQ_LOG_LEVEL";
export const DEFAULT_LOG_LEVEL: LoggerLevels = "warn";

/**
 * Bad command-line or environment input. Fix the invocation; retrying
 * unchanged fails again.
 */
export interface ConfigurationError {
  readonly tag: "configuration";
  readonly message: string;
  readonly recoverable: false;
  readonly retryable: false;
}

export const createConfigurationError = (
  message: string,
): ConfigurationError => ({
  tag: "configuration",
  message,
  recoverable: false,
  retryable: false,
});

export interface CliArgs {
  readonly scenarios: readonly string[];
  readonly list: boolean;
  readonly help: boolean;
  readonly quiet: boolean;
  readonly logLevel?: string;
}

export interface SelfTestConfig {
  readonly scenarios: readonly Scenario[];
  readonly logLevel: LoggerLevels;
  readonly quiet: boolean;
  readonly list: boolean;
  readonly help: boolean;
}

/**
 * Parses arguments that follow the executable name.
 */
export function parseArgs(
  argv: readonly string[],
): Result<CliArgs, ConfigurationError> {
  const scenarios: string[] = [];
  let list = false;
  let help = false;
  let quiet = false;
  let logLevel: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--scenario":
      case "-s":
        if (next === undefined) {
          return Result.err(
            createConfigurationError(`Option ${arg} requires a value`),
          );
        }
        scenarios.push(...next.split(",").filter((name) => name !== ""));
        i++;
        break;
      case "--log-level":
        if (next === undefined) {
          return Result.err(
            createConfigurationError(`Option ${arg} requires a value`),
          );
        }
        logLevel = next;
        i++;
        break;
      case "--list":
        list = true;
        break;
      case "--quiet":
      case "-q":
        quiet = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        return Result.err(
          createConfigurationError(`Unknown option "${String(arg)}"`),
        );
    }
  }

  return Result.ok({
    scenarios,
    list,
    help,
    quiet,
    ...(logLevel !== undefined ? { logLevel } : {}),
  });
}

/**
 * Combines parsed arguments with the environment into a validated config.
 */
export function resolveConfig(
  args: CliArgs,
  env: Readonly<Record<string, string | undefined>>,
): Result<SelfTestConfig, ConfigurationError> {
  const rawLevel = args.logLevel ?? env[LOG_LEVEL_ENV];
  let logLevel = DEFAULT_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== "") {
    if (!isLoggerLevel(rawLevel)) {
      return Result.err(
        createConfigurationError(`Invalid log level "${rawLevel}"`),
      );
    }
    logLevel = rawLevel;
  }

  const scenarios: Scenario[] = [];
  for (const name of args.scenarios) {
    const scenario = findScenario(name);
    if (!scenario) {
      return Result.err(createConfigurationError(`Unknown scenario "${name}"`));
    }
    scenarios.push(scenario);
  }

  return Result.ok({
    scenarios: scenarios.length > 0 ? scenarios : builtinScenarios,
    logLevel,
    quiet: args.quiet,
    list: args.list,
    help: args.help,
  });
}
