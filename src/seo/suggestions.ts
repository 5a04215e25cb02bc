import { normalizeWhitespace } from "./nlp";
import type { ExtractedText, PostContent, PostLink, PublishedPostFinder, SeoMetrics, SuggestionBundle } from "./types";

const HEADING_TEMPLATES = [
  "What is {kw}",
  "How to {kw}",
  "{kw} vs Alternatives",
  "Benefits of {kw}",
  "Common Mistakes with {kw}",
];

const FAQ_TEMPLATES = ["What is {kw}?", "How does {kw} work?", "Why is {kw} important?", "Is {kw} worth it?"];

export const TARGET_HEADING_COUNT = 3;
export const MAX_FAQ_SUGGESTIONS = 4;
export const MAX_INTERNAL_LINKS = 5;
export const META_DESCRIPTION_MAX = 155;

function fill(template: string, keyword: string) {
  return template.replace("{kw}", keyword);
}

export function suggestHeadings(keyword: string, extracted: ExtractedText) {
  const kw = keyword.trim();
  const missing = TARGET_HEADING_COUNT - extracted.headings.length;
  if (!kw || missing <= 0) return [];

  const existing = extracted.headings.map((h) => h.text.toLowerCase());
  return HEADING_TEMPLATES.map((t) => fill(t, kw))
    .filter((candidate) => !existing.some((text) => text.includes(candidate.toLowerCase())))
    .slice(0, missing);
}

export function suggestFaqs(keyword: string) {
  const kw = keyword.trim();
  if (!kw) return [];
  return FAQ_TEMPLATES.map((t) => fill(t, kw)).slice(0, MAX_FAQ_SUGGESTIONS);
}

/**
 * Leading text up to `maxLength`. Longer text is cut at the last word
 * boundary and "..." is appended, still within `maxLength`. The keyword is
 * never inserted.
 */
export function generateMetaDescription(plainText: string, maxLength = META_DESCRIPTION_MAX) {
  const text = normalizeWhitespace(plainText);
  if (text.length <= maxLength) return text;

  const budget = maxLength - 3;
  const head = text.slice(0, budget + 1);
  const cut = head.lastIndexOf(" ");
  const truncated = (cut > 0 ? head.slice(0, cut) : text.slice(0, budget)).replace(/[\s,;:.!?-]+$/, "");
  return `${truncated}...`;
}

export async function suggestInternalLinks(post: PostContent, finder: PublishedPostFinder): Promise<PostLink[]> {
  const primary = post.primaryKeyword.trim();
  const secondary = post.secondaryKeywords.map((k) => k.trim()).filter(Boolean);

  const candidates = await finder.searchByKeywords(primary, secondary);
  return candidates.filter((c) => !post.slug || c.slug !== post.slug).slice(0, MAX_INTERNAL_LINKS);
}

export async function generateSuggestions(
  post: PostContent,
  extracted: ExtractedText,
  metrics: SeoMetrics,
  finder: PublishedPostFinder
): Promise<SuggestionBundle> {
  const headingSuggestions = metrics.headingCount < TARGET_HEADING_COUNT ? suggestHeadings(post.primaryKeyword, extracted) : [];

  return {
    headingSuggestions,
    faqSuggestions: suggestFaqs(post.primaryKeyword),
    internalLinkSuggestions: await suggestInternalLinks(post, finder),
    generatedMetaDescription: post.metaDescription.trim() ? "" : generateMetaDescription(extracted.plainText),
  };
}
