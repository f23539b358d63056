import type { ElementNode } from "../content/types.js";
import type { ScriptContext } from "./scriptContext.js";

/** Page script: runs once as a script task after the page loads. */
export type PageScript = (ctx: ScriptContext) => void | Promise<void>;

export type PageRequest = Readonly<{
  url: string;
  /** Form-encoded body for POST submissions. */
  body?: string;
}>;

/** A fetched, parsed and cascaded page. */
export type PageDocument = Readonly<{
  url: string;
  root: ElementNode;
  scripts: readonly PageScript[];
}>;

/** Network, HTML parsing and the CSS cascade live behind this interface. */
export interface PageLoader {
  load(request: PageRequest): PageDocument | Promise<PageDocument>;
}

/**
 * In-memory loader keyed by URL. Each load builds a fresh tree, so going
 * back to a page starts from its original content.
 */
export function createStaticPageLoader(
  pages: Readonly<Record<string, (request: PageRequest) => Omit<PageDocument, "url">>>,
): PageLoader {
  return {
    load(request: PageRequest): PageDocument {
      const build = pages[request.url];
      if (!build) throw new Error(`no page for ${request.url}`);
      const page = build(request);
      return { url: request.url, root: page.root, scripts: page.scripts };
    },
  };
}

/** Resolve `href` against `base`; unparseable input is returned as-is. */
export function resolveUrl(base: string | null, href: string): string {
  try {
    return base === null ? new URL(href).toString() : new URL(href, base).toString();
  } catch {
    return href;
  }
}
