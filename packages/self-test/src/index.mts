/**
 * Self-test harness for the bounded string queue
 *
 * @packageDocumentation
 */

export { runCli } from "./cli.mjs";
export type { CliIo } from "./cli.mjs";

export {
  createConfigurationError,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV,
  parseArgs,
  resolveConfig,
} from "./config.mjs";
export type { CliArgs, ConfigurationError, SelfTestConfig } from "./config.mjs";

export {
  CheckFailedError,
  formatFailures,
  LEAK_CHECK,
  runScenario,
  runSelfTest,
} from "./harness.mjs";

export { builtinScenarios, findScenario } from "./scenarios.mjs";

export type {
  Scenario,
  ScenarioContext,
  ScenarioResult,
  ScenarioStatus,
  SelfTestOptions,
  SelfTestReport,
} from "./types.mjs";
