import { BoundedStringQueue, TrackingAllocator } from "@ringq/string-queue";

import type {
  Scenario,
  ScenarioContext,
  ScenarioResult,
  SelfTestOptions,
  SelfTestReport,
} from "./types.mjs";

export const LEAK_CHECK = "no storage left allocated";

/**
 * Thrown by `check` to stop a scenario at its first failed condition.
 */
export class CheckFailedError extends Error {
  constructor(readonly label: string) {
    super(`Check failed: ${label}`);
    this.name = "CheckFailedError";
  }
}

function createContext(
  options: SelfTestOptions,
  allocator: TrackingAllocator,
  counter: { checks: number },
): ScenarioContext {
  return {
    allocator,
    sink: options.sink,
    logger: options.logger,
    createQueue(capacity) {
      const created = BoundedStringQueue.create(capacity, {
        allocator,
        logger: options.logger,
      });
      counter.checks++;
      if (!created.success) {
        throw new CheckFailedError(
          `create(${capacity}): ${created.error.message}`,
        );
      }
      return created.data;
    },
    check(condition, label) {
      counter.checks++;
      if (!condition) {
        throw new CheckFailedError(label);
      }
    },
  };
}

export function runScenario(
  scenario: Scenario,
  options: SelfTestOptions,
): ScenarioResult {
  const allocator = new TrackingAllocator();
  const counter = { checks: 0 };
  const context = createContext(options, allocator, counter);
  const start = Date.now();

  const finish = (
    status: ScenarioResult["status"],
    extra: Pick<ScenarioResult, "failedCheck" | "error"> = {},
  ): ScenarioResult => ({
    name: scenario.name,
    status,
    checks: counter.checks,
    durationMs: Date.now() - start,
    ...extra,
  });

  try {
    scenario.run(context);
    context.check(allocator.isBalanced(), LEAK_CHECK);
    return finish("passed");
  } catch (err) {
    if (err instanceof CheckFailedError) {
      return finish("failed", { failedCheck: err.label });
    }
    return finish("error", {
      error: err instanceof Error ? err : new Error(String(err)),
    });
  }
}

/**
 * Runs every scenario in order, each on a fresh tracked allocator.
 */
export function runSelfTest(options: SelfTestOptions): SelfTestReport {
  const results: ScenarioResult[] = [];

  for (const scenario of options.scenarios) {
    options.logger.info(`running ${scenario.name}`, {
      description: scenario.description,
    });
    const result = runScenario(scenario, options);
    results.push(result);

    if (result.status === "passed") {
      options.logger.debug(`${scenario.name} passed`, {
        checks: result.checks,
        durationMs: result.durationMs,
      });
    } else {
      options.logger.error(`${scenario.name} ${result.status}`, {
        failedCheck: result.failedCheck,
        error: result.error?.message,
      });
    }
  }

  const passed = results.filter((r) => r.status === "passed").length;
  const failed = results.length - passed;

  return {
    results,
    passed,
    failed,
    exitCode: failed === 0 ? 0 : 1,
  };
}

/**
 * One line per scenario that did not pass.
 */
export function formatFailures(report: SelfTestReport): string[] {
  return report.results
    .filter((r) => r.status !== "passed")
    .map(
      (r) =>
        `TEST FAILED: ${r.name}: ${r.failedCheck ?? r.error?.message ?? r.status}`,
    );
}
