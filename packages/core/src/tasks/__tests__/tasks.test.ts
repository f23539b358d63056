import { assert, describe, test } from "@waymark/testkit";
import { WmError } from "../../errors.js";
import { Lock, isThenable } from "../lock.js";
import { Task } from "../task.js";
import { TaskQueue } from "../taskQueue.js";

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
  } catch (e: unknown) {
    return e instanceof WmError ? e.code : "not a WmError";
  }
  return null;
}

describe("Task", () => {
  test("binds arguments and runs once", () => {
    const calls: number[] = [];
    function add(a: number, b: number): number {
      calls.push(a + b);
      return a + b;
    }
    const task = Task.of(add, 2, 3);
    assert.equal(task.label, "add");
    assert.equal(task.consumed, false);
    assert.equal(task.run(), 5);
    assert.equal(task.consumed, true);
    assert.equal(codeOf(() => task.run()), "WM_INVALID_STATE");
    assert.deepEqual(calls, [5]);
  });

  test("labels: anonymous functions and explicit names", () => {
    assert.equal(Task.of(() => 1).label, "anonymous");
    assert.equal(Task.named("load page", (u: string) => u, "/a").run(), "/a");
  });
});

describe("Lock", () => {
  test("tracks holding and acquisitions", () => {
    const lock = new Lock("test");
    assert.equal(lock.held, false);
    const seen = lock.withLock(() => lock.held);
    assert.equal(seen, true);
    assert.equal(lock.held, false);
    assert.equal(lock.acquireCount, 1);
  });

  test("re-entry throws WM_REENTRANT_CALL and releases the lock", () => {
    const lock = new Lock("test");
    assert.equal(
      codeOf(() => lock.withLock(() => lock.withLock(() => 1))),
      "WM_REENTRANT_CALL",
    );
    assert.equal(lock.held, false);
  });

  test("asynchronous critical sections are rejected", () => {
    const lock = new Lock("test");
    const pending = Promise.resolve(1);
    assert.equal(
      codeOf(() => lock.withLock(() => pending)),
      "WM_INVALID_STATE",
    );
    assert.equal(lock.held, false);
    assert.equal(isThenable(pending), true);
    assert.equal(isThenable({ then: 1 }), false);
    assert.equal(isThenable(null), false);
  });

  test("a throwing callback releases the lock", () => {
    const lock = new Lock("test");
    assert.throws(() =>
      lock.withLock(() => {
        throw new Error("boom");
      }),
    );
    assert.equal(lock.held, false);
  });
});

describe("TaskQueue", () => {
  test("FIFO order under the lock", () => {
    const lock = new Lock("main");
    const q = new TaskQueue(lock);
    const out: string[] = [];
    q.addTask(Task.named("a", () => out.push("a")));
    q.addTask(Task.named("b", () => out.push("b")));
    assert.equal(q.hasTasks(), true);
    assert.equal(q.size, 2);
    q.getNextTask().run();
    q.takeNext()?.run();
    assert.deepEqual(out, ["a", "b"]);
    assert.equal(q.hasTasks(), false);
    assert.equal(q.takeNext(), null);
    assert.equal(lock.acquireCount, 8);
  });

  test("getNextTask on an empty queue throws", () => {
    const q = new TaskQueue(new Lock("main"));
    assert.equal(codeOf(() => q.getNextTask()), "WM_INVALID_STATE");
  });

  test("queue access while the lock is held throws", () => {
    const lock = new Lock("main");
    const q = new TaskQueue(lock);
    assert.equal(
      codeOf(() => lock.withLock(() => q.addTask(Task.of(() => 0)))),
      "WM_REENTRANT_CALL",
    );
  });

  test("clear drops pending tasks", () => {
    const q = new TaskQueue(new Lock("main"));
    q.addTask(Task.of(() => 0));
    q.clear();
    assert.equal(q.size, 0);
  });
});
