import { assert, describe, test } from "@waymark/testkit";
import {
  closestTag,
  element,
  parseInlineStyle,
  replaceChildren,
  text,
  textContent,
  treeToList,
} from "../build.js";
import { parseSelector, querySelectorAll } from "../selectors.js";
import { resolveStyles, styleValue } from "../style.js";

describe("content tree", () => {
  test("parseInlineStyle lowercases names and skips malformed declarations", () => {
    assert.deepEqual(parseInlineStyle("Color: red; margin-left:4px;junk; :x; width:"), {
      color: "red",
      "margin-left": "4px",
    });
  });

  test("element adopts children and inline style wins over declared style", () => {
    const child = text("hi");
    const node = element("DIV", { style: "color: blue" }, [child], { color: "red", width: "10px" });
    assert.equal(node.tag, "div");
    assert.equal(child.parent, node);
    assert.deepEqual(node.style, { color: "red", width: "10px" });
    assert.deepEqual(node.inlineStyle, { color: "blue" });
    resolveStyles(node);
    assert.equal(node.computedStyle.color, "blue");
    assert.equal(node.computedStyle.width, "10px");
  });

  test("replacing inline declarations keeps the cascaded ones", () => {
    const node = element("p", { style: "color: blue" }, [], { "font-size": "32px" });
    node.inlineStyle = parseInlineStyle("color: red");
    resolveStyles(node);
    assert.equal(node.computedStyle["font-size"], "32px");
    assert.equal(node.computedStyle.color, "red");
  });

  test("replaceChildren detaches previous children", () => {
    const old = text("a");
    const node = element("p", {}, [old]);
    const next = text("b");
    replaceChildren(node, [next]);
    assert.equal(old.parent, null);
    assert.equal(next.parent, node);
    assert.equal(textContent(node), "b");
  });

  test("treeToList is pre-order", () => {
    const root = element("div", { id: "r" }, [
      element("p", { id: "a" }, [text("x")]),
      element("p", { id: "b" }),
    ]);
    const ids = treeToList(root).map((n) => (n.kind === "element" ? n.attributes.id : "text"));
    assert.deepEqual(ids, ["r", "a", "text", "b"]);
  });

  test("closestTag walks ancestors inclusively", () => {
    const leaf = text("go");
    const link = element("a", { href: "/x" }, [element("b", {}, [leaf])]);
    element("div", {}, [link]);
    assert.equal(closestTag(leaf, "a"), link);
    assert.equal(closestTag(leaf, "form"), null);
  });
});

describe("style phase", () => {
  test("inherited properties flow down and declared values win", () => {
    const leaf = text("t");
    const inner = element("span", {}, [leaf], { "font-weight": "bold" });
    const root = element("div", {}, [inner], { "font-size": "20px", "background-color": "red" });
    resolveStyles(root);
    assert.equal(root.computedStyle["font-size"], "20px");
    assert.equal(root.computedStyle.color, "black");
    assert.equal(inner.computedStyle["font-size"], "20px");
    assert.equal(inner.computedStyle["font-weight"], "bold");
    assert.equal(inner.computedStyle["background-color"], undefined);
    assert.equal(leaf.computedStyle, inner.computedStyle);
  });

  test("restyling a subtree keeps the parent's inherited values", () => {
    const inner = element("p");
    const root = element("div", {}, [inner], { color: "green" });
    resolveStyles(root);
    inner.style = { "font-style": "italic" };
    resolveStyles(inner);
    assert.equal(inner.computedStyle.color, "green");
    assert.equal(inner.computedStyle["font-style"], "italic");
  });

  test("styleValue falls back for unset properties", () => {
    const node = element("div");
    resolveStyles(node);
    assert.equal(styleValue(node, "width", "auto"), "auto");
  });
});

describe("selectors", () => {
  test("parseSelector accepts tag, id and class only", () => {
    assert.deepEqual(parseSelector("DIV"), { kind: "tag", tag: "div" });
    assert.deepEqual(parseSelector("#main"), { kind: "id", id: "main" });
    assert.deepEqual(parseSelector(".note"), { kind: "class", className: "note" });
    assert.equal(parseSelector("div p"), null);
    assert.equal(parseSelector("#"), null);
    assert.equal(parseSelector(""), null);
  });

  test("querySelectorAll returns matches in document order", () => {
    const a = element("p", { class: "x y" });
    const b = element("p", { class: "y" });
    const root = element("div", {}, [a, element("section", {}, [b])]);
    assert.deepEqual(querySelectorAll(root, ".y"), [a, b]);
    assert.deepEqual(querySelectorAll(root, ".x"), [a]);
    assert.deepEqual(querySelectorAll(root, "p"), [a, b]);
    assert.deepEqual(querySelectorAll(root, "a b"), []);
  });
});
