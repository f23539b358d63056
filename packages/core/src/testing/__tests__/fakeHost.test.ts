import { assert, describe, test } from "@waymark/testkit";
import { FakeHost } from "../fakeHost.js";
import { RecordingSurface } from "../recordingSurface.js";

describe("FakeHost", () => {
  test("fires timers in due-time then creation order", async () => {
    const host = new FakeHost(100);
    const order: string[] = [];
    host.setTimer(() => order.push(`b@${String(host.now())}`), 5);
    host.setTimer(() => order.push(`a@${String(host.now())}`), 2);
    host.setTimer(() => order.push(`c@${String(host.now())}`), 5);
    const cancelled = host.setTimer(() => order.push("x"), 1);
    host.clearTimer(cancelled);
    await host.advance(4);
    assert.deepEqual(order, ["a@102"]);
    assert.equal(host.now(), 104);
    await host.advance(10);
    assert.deepEqual(order, ["a@102", "b@105", "c@105"]);
    assert.equal(host.now(), 114);
    assert.equal(host.pendingTimers, 0);
  });

  test("spent time makes timers fire late without moving the clock back", async () => {
    const host = new FakeHost();
    const seen: number[] = [];
    host.setTimer(() => {
      seen.push(host.now());
      host.spend(10);
    }, 1);
    host.setTimer(() => seen.push(host.now()), 2);
    await host.advance(5);
    assert.deepEqual(seen, [1, 11]);
    assert.equal(host.now(), 11);
  });

  test("sleep resolves when its timer fires", async () => {
    const host = new FakeHost();
    let woke = false;
    const done = host.sleep(3).then(() => {
      woke = true;
    });
    await host.advance(2);
    assert.equal(woke, false);
    await host.advance(1);
    await done;
    assert.equal(woke, true);
  });
});

describe("RecordingSurface", () => {
  test("splits ops into frames at present()", () => {
    let now = 7;
    const surface = new RecordingSurface(100, 50, () => now);
    surface.clear("white");
    surface.drawText(1, 2, "hi", "black", { size: 16, weight: "normal", style: "normal" });
    surface.present();
    now = 9;
    surface.fillRect(0, 0, 1, 1, "red");
    surface.present();
    assert.equal(surface.frames.length, 2);
    assert.equal(surface.frames[0]?.presentedAtMs, 7);
    assert.deepEqual(surface.lastFrame()?.ops, [{ op: "fillRect", x: 0, y: 0, w: 1, h: 1, color: "red" }]);
    assert.deepEqual(surface.lastTexts(), []);
  });
});
