import { assert, describe, test } from "@waymark/testkit";
import {
  isMainThreadWorkerData,
  isMainToWorkerMessage,
  isWorkerToMainMessage,
} from "../worker/protocol.js";

describe("worker protocol", () => {
  test("accepts well-formed messages to the worker", () => {
    assert.equal(isMainToWorkerMessage({ type: "command", command: { op: "click", x: 1, y: 2 } }), true);
    assert.equal(isMainToWorkerMessage({ type: "frame", scroll: 40 }), true);
    assert.equal(isMainToWorkerMessage({ type: "stop" }), true);
  });

  test("rejects malformed messages to the worker", () => {
    assert.equal(isMainToWorkerMessage(null), false);
    assert.equal(isMainToWorkerMessage({ type: "command", command: { op: "click", x: 1 } }), false);
    assert.equal(isMainToWorkerMessage({ type: "command", command: { op: "reload" } }), false);
    assert.equal(isMainToWorkerMessage({ type: "frame", scroll: Number.NaN }), false);
    assert.equal(isMainToWorkerMessage({ type: "init" }), false);
  });

  test("checks commit payloads from the worker", () => {
    const data = { frameId: 3, url: "http://test/", documentHeight: 120, scroll: null, displayList: [] };
    assert.equal(isWorkerToMainMessage({ type: "commit", data }), true);
    assert.equal(isWorkerToMainMessage({ type: "commit", data: { ...data, displayList: "x" } }), false);
    assert.equal(isWorkerToMainMessage({ type: "requestFrame" }), true);
    assert.equal(isWorkerToMainMessage({ type: "fatal", detail: 7 }), false);
  });

  test("worker data needs a module URL and a config object", () => {
    assert.equal(isMainThreadWorkerData({ pageModule: "file:///page.js", config: {} }), true);
    assert.equal(isMainThreadWorkerData({ pageModule: "file:///page.js" }), false);
    assert.equal(isMainThreadWorkerData(undefined), false);
  });
});
