import { auditSeoFields } from "../seo/audit";
import { ValidationFailure } from "../seo/errors";
import { extractText } from "../seo/extractor";
import {
  extractPrimaryKeyword,
  generateMetaTitle,
  generateSecondaryKeywords,
  generateSlug,
  generateSocialTags,
} from "../seo/generators";
import { calculateMetrics } from "../seo/metrics";
import { scoreContent } from "../seo/scoring";
import { generateMetaDescription, generateSuggestions } from "../seo/suggestions";
import type { GeneratedSeoFields, PostContent, PostScoreReport, PublishedPostFinder } from "../seo/types";

function requireBody(body: string | undefined | null) {
  if (body == null || !body.trim()) {
    throw new ValidationFailure("body", "Post body is required to compute a score");
  }
  return body;
}

/**
 * Scores a draft and builds its suggestions in one pass. Holds no state, so
 * concurrent calls with different posts are independent.
 */
export async function scorePost(post: PostContent, linkFinder: PublishedPostFinder): Promise<PostScoreReport> {
  const body = requireBody(post.body);

  const extracted = extractText(body);
  const metrics = calculateMetrics(extracted, post.primaryKeyword);
  const breakdown = scoreContent(post, metrics);
  const suggestions = await generateSuggestions(post, extracted, metrics, linkFinder);

  return { metrics, breakdown, suggestions, audit: auditSeoFields(post) };
}

export async function suggestForPost(post: PostContent, linkFinder: PublishedPostFinder) {
  const body = requireBody(post.body);
  const extracted = extractText(body);
  const metrics = calculateMetrics(extracted, post.primaryKeyword);
  const suggestions = await generateSuggestions(post, extracted, metrics, linkFinder);
  return { metrics, suggestions };
}

type AutoGenerateInput = {
  title: string;
  body: string;
  existingKeyword?: string;
};

export function autoGenerateSeoFields(input: AutoGenerateInput): GeneratedSeoFields {
  const title = input.title.trim();
  if (!title) throw new ValidationFailure("title", "Title is required");

  const { plainText } = extractText(input.body);
  const primaryKeyword = input.existingKeyword?.trim() || extractPrimaryKeyword(title);
  const metaDescription = generateMetaDescription(plainText);

  return {
    primaryKeyword,
    secondaryKeywords: generateSecondaryKeywords(primaryKeyword, plainText),
    slug: generateSlug(title),
    metaTitle: generateMetaTitle(title, primaryKeyword),
    metaDescription,
    ...generateSocialTags(title, metaDescription),
  };
}
