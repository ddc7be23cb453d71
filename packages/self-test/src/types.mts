/**
 * Type definitions for the queue self-test harness.
 */

import type { BaseLogger } from "@ringq/logger";
import type {
  BoundedStringQueue,
  OutputSink,
  TrackingAllocator,
} from "@ringq/string-queue";

/** Handed to each scenario; every queue it creates shares one allocator */
export interface ScenarioContext {
  readonly allocator: TrackingAllocator;
  readonly sink: OutputSink;
  readonly logger: BaseLogger;
  /** Creates a queue on the tracked allocator; a failed creation fails the check */
  createQueue(capacity: number): BoundedStringQueue;
  /** Records a check; a false condition stops the scenario */
  check(condition: boolean, label: string): void;
}

export interface Scenario {
  readonly name: string;
  readonly description: string;
  run(context: ScenarioContext): void;
}

export type ScenarioStatus = "passed" | "failed" | "error";

export interface ScenarioResult {
  readonly name: string;
  readonly status: ScenarioStatus;
  readonly checks: number;
  readonly durationMs: number;
  /** Label of the first check that failed */
  readonly failedCheck?: string;
  readonly error?: Error;
}

export interface SelfTestReport {
  readonly results: readonly ScenarioResult[];
  readonly passed: number;
  readonly failed: number;
  readonly exitCode: 0 | 1;
}

export interface SelfTestOptions {
  readonly scenarios: readonly Scenario[];
  readonly sink: OutputSink;
  readonly logger: BaseLogger;
}
