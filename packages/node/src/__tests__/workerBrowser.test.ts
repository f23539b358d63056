import { assert, describe, test } from "@waymark/testkit";
import { createWorkerBrowser } from "../createWorkerBrowser.js";
import { collectingStream } from "./collect.js";

const EXT = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
const SPIN_PAGE = new URL(`../worker/testShims/spinPage${EXT}`, import.meta.url);

function waitFor(check: () => boolean, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const started = Date.now();
    const poll = setInterval(() => {
      if (check()) {
        clearInterval(poll);
        resolve();
      } else if (Date.now() - started > timeoutMs) {
        clearInterval(poll);
        reject(new Error("timed out"));
      }
    }, 2);
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("createWorkerBrowser", () => {
  test("scrolling redraws while a script holds the worker's main thread", async () => {
    const { stream } = collectingStream();
    const browser = createWorkerBrowser({
      pageModule: SPIN_PAGE,
      stream,
      config: { perf: false, debug: { echo: false } },
    });
    browser.load("http://test/");
    const done = browser.start();
    try {
      await waitFor(() => browser.compositor.committedData !== null, 10000);
      const committed = browser.compositor.committedData;
      assert.equal(committed?.url, "http://test/");

      // The first paragraph's click listener spins for SPIN_MS.
      browser.dispatchInput({ kind: "click", x: 30, y: 88 });
      await sleep(100);

      const frameIdWhileBlocked = browser.compositor.committedData?.frameId;
      const drawsBefore = browser.compositor.drawCount;
      const scrolledAt = Date.now();
      browser.dispatchInput({ kind: "scroll", delta: 50 });
      await waitFor(() => browser.compositor.scroll === 50 && browser.compositor.drawCount > drawsBefore, 500);
      assert.ok(Date.now() - scrolledAt < 500);
      // Nothing new was committed: the worker is still inside the listener.
      assert.equal(browser.compositor.committedData?.frameId, frameIdWhileBlocked);
    } finally {
      browser.dispatchInput({ kind: "quit" });
    }
    await done;
    assert.equal(browser.compositor.isRunning, false);
  });

  test("a page module without createPageLoader stops the compositor", async () => {
    const { stream } = collectingStream();
    const browser = createWorkerBrowser({
      pageModule: new URL(`./collect${EXT}`, import.meta.url),
      stream,
      config: { perf: false, debug: { echo: false } },
    });
    await browser.start();
    assert.equal(browser.compositor.isRunning, false);
    const errors = browser.log.query({ minSeverity: "error" });
    assert.equal(errors.length, 1);
    assert.ok(errors[0]?.message.startsWith("main-thread worker failed: Error: mainThreadWorker: "));
    assert.ok(errors[0]?.message.endsWith("does not export createPageLoader()"));
  });
});
