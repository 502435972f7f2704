import { test } from "node:test";
import assert from "node:assert/strict";
import { createSilentLogger } from "../src/logger.js";
import { ObserverFanout } from "../src/state/fanout.js";

test("every subscriber receives each event until it unsubscribes", () => {
  const fanout = new ObserverFanout<number>(createSilentLogger());
  const first: number[] = [];
  const second: number[] = [];
  fanout.subscribe(value => first.push(value));
  const unsubscribe = fanout.subscribe(value => second.push(value));

  fanout.publish(1);
  unsubscribe();
  fanout.publish(2);

  assert.deepEqual(first, [1, 2]);
  assert.deepEqual(second, [1]);
  assert.equal(fanout.size, 1);
});

test("events published from a listener wait for the current delivery", () => {
  const fanout = new ObserverFanout<string>(createSilentLogger());
  const seen: string[] = [];
  fanout.subscribe(value => {
    seen.push(`a:${value}`);
    if (value === "first") {
      fanout.publish("second");
    }
  });
  fanout.subscribe(value => seen.push(`b:${value}`));

  fanout.publish("first");

  assert.deepEqual(seen, ["a:first", "b:first", "a:second", "b:second"]);
});

test("a throwing listener does not stop delivery to the others", () => {
  const fanout = new ObserverFanout<string>(createSilentLogger());
  const seen: string[] = [];
  fanout.subscribe(() => {
    throw new Error("render failed");
  });
  fanout.subscribe(value => seen.push(value));

  fanout.publish("tick");
  fanout.publish("stop");

  assert.deepEqual(seen, ["tick", "stop"]);
});
