import { assert, describe, test } from "@waymark/testkit";
import { element, text } from "../../content/build.js";
import type { ElementNode } from "../../content/types.js";
import { positionNode, propagateHeights, sizeNode } from "../engine/layoutEngine.js";
import type { LayoutNode } from "../types.js";
import { rectOf } from "../types.js";
import { allNodes, assertClose, layoutPage, makeCtx, nodesOfKind, words } from "./layoutHarness.js";

function page(...children: ElementNode[]): ElementNode {
  return element("div", {}, children);
}

function mustChild(node: LayoutNode, i: number): LayoutNode {
  const child = node.children?.[i];
  if (!child) throw new Error(`missing child ${String(i)} of ${node.kind}`);
  return child;
}

describe("layout - block and inline geometry", () => {
  test("single paragraph lays out words on one line", () => {
    const ctx = makeCtx();
    const doc = layoutPage(page(element("p", {}, [text("hello world")])), ctx);
    const root = mustChild(doc, 0);
    assert.equal(doc.w, 800);
    assert.deepEqual(rectOf(root), { x: 10, y: 10, w: 780, h: root.h });
    const texts = nodesOfKind(doc, "text");
    assert.deepEqual(
      texts.map((t) => [t.x, t.w]),
      [
        [10, 40],
        [58, 40],
      ],
    );
    const first = texts[0];
    assert.ok(first);
    assertClose(first.y, 12.56);
    assertClose(root.h, 19.2);
    assertClose(doc.h, 39.2);
  });

  test("words wrap when the next word would pass the line width", () => {
    const ctx = makeCtx({ viewportWidth: 100 });
    const doc = layoutPage(page(element("p", {}, [text("aaaa bbbb cccc")])), ctx);
    const lines = nodesOfKind(doc, "line");
    assert.equal(lines.length, 2);
    const [l1, l2] = lines;
    assert.ok(l1 && l2);
    assert.deepEqual(words(l1), ["aaaa", "bbbb"]);
    assert.deepEqual(words(l2), ["cccc"]);
    assertClose(l2.y, 29.2);
    assert.equal(mustChild(l2, 0).x, 10);
  });

  test("a word wider than the line stays on its own line", () => {
    const ctx = makeCtx({ viewportWidth: 100 });
    const doc = layoutPage(page(element("p", {}, [text("abcdefghijklmnop")])), ctx);
    const lines = nodesOfKind(doc, "line");
    assert.equal(lines.length, 1);
    assert.equal(nodesOfKind(doc, "text")[0]?.w, 128);
  });

  test("br starts a new line", () => {
    const ctx = makeCtx();
    const doc = layoutPage(page(element("p", {}, [text("a"), element("br"), text("b")])), ctx);
    const lines = nodesOfKind(doc, "line");
    assert.deepEqual(
      lines.map((l) => words(l)),
      [["a"], ["b"]],
    );
  });

  test("display: none skips inline and block content", () => {
    const ctx = makeCtx();
    const doc = layoutPage(
      page(
        element("p", {}, [text("shown"), element("span", { style: "display: none" }, [text("hidden")])]),
        element("div", { style: "display: none" }, [text("gone")]),
      ),
      ctx,
    );
    assert.deepEqual(words(doc), ["shown"]);
    assert.equal(nodesOfKind(doc, "block").length, 2);
  });

  test("inputs take the configured width clamped to the line", () => {
    const wide = makeCtx();
    const wideDoc = layoutPage(page(element("p", {}, [element("input")])), wide);
    assert.equal(nodesOfKind(wideDoc, "input")[0]?.w, 200);

    const narrow = makeCtx({ viewportWidth: 100 });
    const doc = layoutPage(page(element("p", {}, [text("go"), element("input")])), narrow);
    const lines = nodesOfKind(doc, "line");
    assert.equal(lines.length, 2);
    const input = nodesOfKind(doc, "input")[0];
    assert.ok(input);
    assert.equal(input.w, 80);
    assert.equal(input.parent, lines[1]);
  });

  test("explicit width and height are honored; width is clamped to the container", () => {
    const ctx = makeCtx();
    const doc = layoutPage(
      page(
        element("div", { style: "width: 100px; height: 50px" }, [text("x")]),
        element("div", { style: "width: 2000px" }, [text("y")]),
      ),
      ctx,
    );
    const root = mustChild(doc, 0);
    const a = mustChild(root, 0);
    const b = mustChild(root, 1);
    assert.equal(a.w, 100);
    assert.equal(a.h, 50);
    assert.equal(b.w, 780);
    assert.equal(b.y, 60);
  });

  test("malformed lengths fall back to defaults", () => {
    const ctx = makeCtx();
    const doc = layoutPage(
      page(
        element("div", { style: "width: abc; margin-left: 5em; font-size: big" }, [text("ab")]),
        element("div", { style: "width: 50%; padding-top: -4px" }, [text("cd")]),
      ),
      ctx,
    );
    const root = mustChild(doc, 0);
    const a = mustChild(root, 0);
    const b = mustChild(root, 1);
    assert.equal(a.w, 780);
    assert.equal(a.x, 10);
    assert.equal(nodesOfKind(a, "text")[0]?.w, 16);
    assert.equal(b.w, 780);
    assertClose(b.y, 10 + 19.2);
  });

  test("margins, borders and padding offset content", () => {
    const ctx = makeCtx();
    const p = element(
      "p",
      { style: "margin-top: 5px; margin-left: 7px; padding-left: 3px; padding-top: 4px; border-left-width: 2px" },
      [text("hi")],
    );
    const doc = layoutPage(page(p), ctx);
    const root = mustChild(doc, 0);
    const block = mustChild(root, 0);
    const inline = mustChild(block, 0);
    assert.equal(block.x, 17);
    assert.equal(block.y, 15);
    assert.equal(block.w, 773);
    assert.equal(inline.x, 22);
    assert.equal(inline.y, 19);
    assert.equal(inline.w, 768);
    assertClose(block.h, 23.2);
    assertClose(root.h, 28.2);
  });

  test("layout is idempotent", () => {
    const ctx = makeCtx({ viewportWidth: 120 });
    const doc = layoutPage(
      page(element("p", {}, [text("some words that wrap around"), element("input")]), element("div")),
      ctx,
    );
    const before = allNodes(doc).map(rectOf);
    sizeNode(doc, ctx);
    positionNode(doc, ctx);
    assert.deepEqual(allNodes(doc).map(rectOf), before);
  });
});

describe("layout - phase separation", () => {
  test("size() reads no positions and calls no position()", () => {
    const ctx = makeCtx();
    const p = element("p", {}, [text("one two")]);
    const doc = layoutPage(page(p, element("p", {}, [text("three")])), ctx);

    const state = { sizing: false };
    const reads: string[] = [];
    for (const node of allNodes(doc)) {
      for (const key of ["x", "y"] as const) {
        let value = node[key];
        Object.defineProperty(node, key, {
          configurable: true,
          enumerable: true,
          get(): number {
            if (state.sizing) reads.push(`${node.kind}.${key}`);
            return value;
          },
          set(v: number) {
            value = v;
          },
        });
      }
    }

    const block = ctx.index.exact(p, doc);
    assert.ok(block);
    ctx.profile.reset();
    state.sizing = true;
    sizeNode(block, ctx);
    sizeNode(doc, ctx);
    state.sizing = false;
    assert.deepEqual(reads, []);
    assert.equal(ctx.profile.positionCalls, 0);
  });

  test("position() finishes each child's subtree before the next child", () => {
    const ctx = makeCtx();
    const doc = layoutPage(page(element("p", {}, [text("one")]), element("p", {}, [text("two")])), ctx);
    const nodes = allNodes(doc);
    const firstWrite: number[] = [];
    nodes.forEach((node, id) => {
      for (const key of ["x", "y"] as const) {
        let value = node[key];
        Object.defineProperty(node, key, {
          configurable: true,
          enumerable: true,
          get: () => value,
          set(v: number) {
            if (!firstWrite.includes(id)) firstWrite.push(id);
            value = v;
          },
        });
      }
    });
    positionNode(doc, ctx);
    assert.deepEqual(
      firstWrite,
      nodes.map((_, id) => id),
    );
  });
});

describe("layout - incremental reflow", () => {
  test("re-sizing one block touches only its subtree", () => {
    const ctx = makeCtx({ viewportWidth: 100 });
    const label = text("one");
    const p1 = element("p", {}, [label]);
    const p2 = element("p", {}, [text("two")]);
    const doc = layoutPage(page(p1, p2), ctx);
    const root = mustChild(doc, 0);
    const block1 = ctx.index.exact(p1, doc);
    const block2 = ctx.index.exact(p2, doc);
    assert.ok(block1 && block2);
    assertClose(block2.y, 29.2);

    label.text = "one two three four";
    ctx.profile.reset();
    sizeNode(block1, ctx);
    propagateHeights(block1.parent, ctx);
    positionNode(doc, ctx);

    assert.deepEqual(ctx.profile.sizeByKind, { block: 1, inline: 1, line: 2, text: 4 });
    assert.equal(ctx.profile.sizeCalls, 8);
    assert.equal(ctx.profile.heightCalls, 2);
    assert.equal(mustChild(root, 1), block2);
    assertClose(block2.y, 10 + 38.4);
    assertClose(doc.h, 3 * 19.2 + 20);
  });
});

describe("layout - zoom", () => {
  test("three zoom steps scale explicit widths by 1.331 and keep children inside", () => {
    const ctx = makeCtx();
    const zoom = 1.1 * 1.1 * 1.1;
    const box = element("div", { style: "width: 100px" }, [text("ab cd ef gh ij")]);
    const doc = layoutPage(page(box), ctx, zoom);
    const block = ctx.index.exact(box, doc);
    assert.ok(block);
    assertClose(block.w, 100 * 1.331);
    assertClose(mustChild(doc, 0).w, 800 - 20 * 1.331);
    assertClose(nodesOfKind(doc, "text")[0]?.w ?? 0, 16 * 1.331);
    for (const line of nodesOfKind(doc, "line")) {
      for (const child of line.children ?? []) {
        assert.ok(child.x + child.w <= line.x + line.w + 1e-9);
      }
    }
    assert.equal(nodesOfKind(doc, "line").length, 2);
  });
});
