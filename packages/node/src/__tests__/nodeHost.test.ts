import { assert, describe, test } from "@waymark/testkit";
import { createNodeHost } from "../host/nodeHost.js";

describe("node host", () => {
  test("timers fire after their delay and can be cleared", async () => {
    const host = createNodeHost();
    const fired: string[] = [];
    const start = host.now();
    const cancelled = host.setTimer(() => fired.push("cancelled"), 5);
    host.clearTimer(cancelled);
    await new Promise<void>((resolve) => {
      host.setTimer(() => {
        fired.push("kept");
        resolve();
      }, 10);
    });
    assert.deepEqual(fired, ["kept"]);
    assert.ok(host.now() - start >= 5);
  });

  test("clearing an unknown or fired timer is a no-op", async () => {
    const host = createNodeHost();
    let handle = host.setTimer(() => {}, 0);
    await host.sleep(5);
    host.clearTimer(handle);
    handle = { id: 12345 };
    host.clearTimer(handle);
  });

  test("sleep waits at least roughly the delay", async () => {
    const host = createNodeHost();
    const start = host.now();
    await host.sleep(5);
    assert.ok(host.now() - start >= 4);
  });
});
