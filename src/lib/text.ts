import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

const SKIPPED_TAGS = "script, style, template";

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function collectText($: CheerioAPI, node: AnyNode, out: string[]): void {
  $(node)
    .contents()
    .each((_, child) => {
      if (child.nodeType === 3) {
        const text = $(child).text().trim();
        if (text) out.push(text);
        return;
      }
      if (child.nodeType === 1 && !$(child).is(SKIPPED_TAGS)) {
        collectText($, child, out);
      }
    });
}

/**
 * Text of a single element: every text node trimmed, joined with one space,
 * whitespace runs collapsed.
 */
export function elementText($: CheerioAPI, node: AnyNode): string {
  const parts: string[] = [];
  collectText($, node, parts);
  return collapseWhitespace(parts.join(" "));
}

/** Parses without scripting so that `<noscript>` content is built as elements. */
export function loadMarkup(markup: string): CheerioAPI {
  return cheerio.load(markup, { scriptingEnabled: false });
}

/** Flattens a whole page to one line of text. */
export function flattenText(markup: string): string {
  const $ = loadMarkup(markup);
  const root = $.root().get(0);
  return root ? elementText($, root) : "";
}
