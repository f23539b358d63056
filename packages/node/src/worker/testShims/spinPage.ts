import { type PageLoader, createStaticPageLoader, element, text } from "@waymark/core";

/** How long a click on the first paragraph keeps the main thread busy. */
export const SPIN_MS = 1500;

function spin(ms: number): number {
  const until = Date.now() + ms;
  let turns = 0;
  while (Date.now() < until) turns++;
  return turns;
}

export function createPageLoader(): PageLoader {
  return createStaticPageLoader({
    "http://test/": () => ({
      root: element("div", {}, [
        element("p", {}, [text("spin")]),
        element("p", { style: "height: 2000px" }, [text("tall")]),
      ]),
      scripts: [
        (ctx) => {
          const [first] = ctx.querySelectorAll("p");
          if (first) ctx.addEventListener(first, "click", () => void spin(SPIN_MS));
        },
      ],
    }),
  });
}
