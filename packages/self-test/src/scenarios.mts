/**
 * Built-in scenarios. Each one destroys the queues it creates and releases
 * every string it pulls, so the harness can verify nothing was left behind.
 */

import { Result } from "@ringq/string-queue";
import type { BoundedStringQueue } from "@ringq/string-queue";

import type { Scenario, ScenarioContext } from "./types.mjs";

function pullText(queue: BoundedStringQueue): string | undefined {
  const item = queue.pull();
  if (!item) return undefined;
  const text = item.value;
  item.release();
  return text;
}

function pushAll(
  context: ScenarioContext,
  queue: BoundedStringQueue,
  values: readonly string[],
): void {
  for (const value of values) {
    context.check(Result.isOk(queue.push(value)), `push "${value}"`);
  }
}

const sameItems = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((item, i) => item === b[i]);

const helloWorld: Scenario = {
  name: "hello-world",
  description: "capacity 4, two pushes, drain prints both in order",
  run(context) {
    const queue = context.createQueue(4);
    const freeBefore = Result.unwrapOr(0);
    context.check(
      freeBefore(queue.push("hello")) === 4,
      "4 slots free before hello",
    );
    context.check(
      freeBefore(queue.push("world")) === 3,
      "3 slots free before world",
    );
    context.check(
      sameItems(queue.toArray(), ["hello", "world"]),
      "hello queued before world",
    );
    context.check(queue.drainAndEmit(context.sink) === 2, "drain emits 2");
    context.check(queue.isEmpty, "empty after drain");
    queue.destroy();
  },
};

const overflowAfterRefill: Scenario = {
  name: "overflow-after-refill",
  description: "capacity 4, fill, drain, refill, fifth push is rejected",
  run(context) {
    const queue = context.createQueue(4);
    pushAll(context, queue, ["elem1", "elem2", "elem3", "elem4"]);
    queue.drainAndEmit(context.sink);

    pushAll(context, queue, ["X", "Y", "Z", "T"]);
    context.check(Result.isErr(queue.push("U")), `push "U" rejected when full`);
    context.check(
      sameItems(queue.toArray(), ["X", "Y", "Z", "T"]),
      "contents intact after rejected push",
    );
    context.check(queue.drainAndEmit(context.sink) === 4, "drain emits 4");
    queue.destroy();
  },
};

const zeroCapacity: Scenario = {
  name: "zero-capacity",
  description: "capacity 0 accepts nothing and yields nothing",
  run(context) {
    const queue = context.createQueue(0);
    context.check(Result.isErr(queue.push("a")), `push "a" rejected`);
    context.check(queue.pull() === undefined, "pull returns nothing");
    context.check(queue.occupancy === 0, "occupancy stays 0");
    context.check(context.allocator.allocations === 0, "nothing allocated");
    queue.destroy();
  },
};

const capacityTwoRefill: Scenario = {
  name: "capacity-two-refill",
  description: "capacity 2, fill, reject, empty, push again",
  run(context) {
    const queue = context.createQueue(2);
    pushAll(context, queue, ["a", "a"]);
    context.check(Result.isErr(queue.push("a")), `third push "a" rejected`);
    context.check(pullText(queue) === "a", `first pull is "a"`);
    context.check(pullText(queue) === "a", `second pull is "a"`);
    context.check(queue.isEmpty, "empty after two pulls");
    pushAll(context, queue, ["b"]);
    context.check(pullText(queue) === "b", `pull is "b"`);
    context.check(queue.isEmpty, "empty again");
    queue.destroy();
  },
};

const capacityOne: Scenario = {
  name: "capacity-one",
  description: "capacity 1, full after one push, draining empty is a no-op",
  run(context) {
    const queue = context.createQueue(1);
    pushAll(context, queue, ["a"]);
    context.check(Result.isErr(queue.push("a")), `second push "a" rejected`);
    context.check(pullText(queue) === "a", `pull is "a"`);
    context.check(queue.isEmpty, "empty after pull");

    const before = queue.snapshot();
    context.check(
      queue.drainAndEmit(context.sink) === 0,
      "drain of empty queue emits nothing",
    );
    const after = queue.snapshot();
    context.check(
      before.readIndex === after.readIndex &&
        before.writeIndex === after.writeIndex &&
        before.isEmpty === after.isEmpty,
      "drain of empty queue changes nothing",
    );
    queue.destroy();
  },
};

const wraparound: Scenario = {
  name: "wraparound",
  description: "fill, drain, single push and drain, refill across the ring end",
  run(context) {
    const queue = context.createQueue(4);
    pushAll(context, queue, ["elem1", "elem2", "elem3", "elem4"]);
    queue.drainAndEmit(context.sink);
    pushAll(context, queue, ["A"]);
    queue.drainAndEmit(context.sink);
    pushAll(context, queue, ["X", "Y", "Z", "T"]);
    context.check(Result.isErr(queue.push("U")), `push "U" rejected when full`);
    queue.drainAndEmit(context.sink);
    queue.destroy();
  },
};

const destroyWithContents: Scenario = {
  name: "destroy-with-contents",
  description: "destroying a full queue releases every string it holds",
  run(context) {
    const queue = context.createQueue(4);
    pushAll(context, queue, ["elem1", "elem2", "elem3", "elem4"]);
    queue.destroy();
    context.check(
      context.allocator.liveStrings === 0,
      "held strings released by destroy",
    );
  },
};

const interleaved: Scenario = {
  name: "interleaved",
  description: "pulls between pushes keep FIFO order",
  run(context) {
    const queue = context.createQueue(4);
    pushAll(context, queue, ["elem1", "elem2"]);
    context.check(pullText(queue) === "elem1", `pull is "elem1"`);
    pushAll(context, queue, ["elem3", "elem4"]);
    context.check(pullText(queue) === "elem2", `pull is "elem2"`);
    context.check(pullText(queue) === "elem3", `pull is "elem3"`);
    context.check(pullText(queue) === "elem4", `pull is "elem4"`);
    queue.destroy();
  },
};

export const builtinScenarios: readonly Scenario[] = [
  helloWorld,
  overflowAfterRefill,
  zeroCapacity,
  capacityTwoRefill,
  capacityOne,
  wraparound,
  destroyWithContents,
  interleaved,
];

export function findScenario(name: string): Scenario | undefined {
  return builtinScenarios.find((scenario) => scenario.name === name);
}
