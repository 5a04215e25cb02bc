import * as cheerio from "cheerio";
import { normalizeWhitespace, stripHtml } from "./nlp";
import type { ExtractedHeading, ExtractedText, HeadingLevel } from "./types";

function toHeadingLevel(tag: string): HeadingLevel | null {
  switch (tag.toLowerCase()) {
    case "h1":
      return 1;
    case "h2":
      return 2;
    case "h3":
      return 3;
    default:
      return null;
  }
}

function anchorFor(index: number) {
  return `heading-${index}`;
}

const BLOCK_TAGS = [
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt", "figcaption", "figure", "footer",
  "h1", "h2", "h3", "h4", "h5", "h6", "header", "li", "main", "nav", "ol", "p", "pre", "section",
  "table", "tbody", "td", "tfoot", "th", "thead", "tr", "ul",
].join(", ");

function extractWithCheerio(body: string): ExtractedText {
  const $ = cheerio.load(body, null, false);
  $("script, style").remove();

  // Block boundaries separate words, so `<p>a</p><p>b</p>` reads "a b".
  // Inline tags add nothing: `<em>Py</em>thon` stays one word.
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend(" ").append(" ");
  });
  $("br, hr").replaceWith(" ");

  const headings: ExtractedHeading[] = [];
  $("h1, h2, h3").each((_, el) => {
    const level = toHeadingLevel(el.tagName);
    if (!level) return;
    headings.push({
      level,
      text: normalizeWhitespace($(el).text()),
      anchorId: anchorFor(headings.length),
    });
  });

  return { plainText: normalizeWhitespace($.root().text()), headings };
}

const HEADING_TAG = /<h([1-3])\b[^>]*>([\s\S]*?)(?:<\/h\1\s*>|$)/gi;

/**
 * Regex-only extraction. Any `<...>` span is dropped and replaced by a space.
 */
export function extractWithTagStripping(body: string): ExtractedText {
  const headings: ExtractedHeading[] = [];
  for (const match of body.matchAll(HEADING_TAG)) {
    const level = toHeadingLevel(`h${match[1]}`);
    if (!level) continue;
    headings.push({
      level,
      text: normalizeWhitespace(stripHtml(match[2] ?? "")),
      anchorId: anchorFor(headings.length),
    });
  }
  return { plainText: normalizeWhitespace(stripHtml(body)), headings };
}

/**
 * Plain text and h1-h3 headings of a post body, in document order.
 * Never throws on malformed markup.
 */
export function extractText(body: string): ExtractedText {
  try {
    return extractWithCheerio(body);
  } catch (err) {
    console.warn("Markup parsing failed, falling back to tag stripping", err);
    return extractWithTagStripping(body);
  }
}
