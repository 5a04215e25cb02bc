import { containsIgnoreCase } from "./nlp";
import type { FactorScore, PostContent, RubricFactorId, ScoreBreakdown, SeoMetrics } from "./types";

export const PUBLISHABLE_SCORE = 70;

export const TITLE_LENGTH = { min: 30, max: 60 };
export const META_DESCRIPTION_LENGTH = { min: 120, max: 155 };
export const SLUG_MAX_LENGTH = 75;

const SLUG_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

type FactorResult = { points: number; reasons: string[] };

type RubricFactor = {
  id: RubricFactorId;
  label: string;
  max: number;
  evaluate: (post: PostContent, metrics: SeoMetrics) => FactorResult;
};

function inRange(value: number, range: { min: number; max: number }) {
  return value >= range.min && value <= range.max;
}

function isSet(value: string) {
  return value.trim().length > 0;
}

// Length window plus keyword: both earn full credit, one earns half.
function lengthAndKeyword(
  field: string,
  text: string,
  range: { min: number; max: number },
  keyword: string,
  max: number
): FactorResult {
  const value = text.trim();
  if (!value) return { points: 0, reasons: [`${field} is missing`] };

  const reasons: string[] = [];
  const lengthOk = inRange(value.length, range);
  const keywordOk = containsIgnoreCase(value, keyword);
  if (!lengthOk) {
    reasons.push(`${field} is ${value.length} characters; aim for ${range.min}-${range.max}`);
  }
  if (!keywordOk) reasons.push(`${field} does not contain the primary keyword`);

  if (lengthOk && keywordOk) return { points: max, reasons };
  if (lengthOk || keywordOk) return { points: max / 2, reasons };
  return { points: 0, reasons };
}

export const RUBRIC: readonly RubricFactor[] = [
  {
    id: "title",
    label: "Title",
    max: 10,
    evaluate: (post) => lengthAndKeyword("Title", post.title, TITLE_LENGTH, post.primaryKeyword, 10),
  },
  {
    id: "metaDescription",
    label: "Meta description",
    max: 10,
    evaluate: (post) =>
      lengthAndKeyword("Meta description", post.metaDescription, META_DESCRIPTION_LENGTH, post.primaryKeyword, 10),
  },
  {
    id: "primaryKeyword",
    label: "Primary keyword presence",
    max: 15,
    evaluate: (post, metrics) => {
      if (!isSet(post.primaryKeyword)) return { points: 0, reasons: ["Set a primary keyword"] };
      if (metrics.keywordOccurrences < 1) {
        return { points: 0, reasons: ["The primary keyword does not appear in the content"] };
      }
      return { points: 15, reasons: [] };
    },
  },
  {
    id: "contentLength",
    label: "Content length",
    max: 15,
    evaluate: (_post, { wordCount }) => {
      if (wordCount >= 1000) return { points: 15, reasons: [] };
      const reasons = [`Content has ${wordCount} words; 1000+ earns full credit`];
      if (wordCount >= 500) return { points: 10, reasons };
      if (wordCount >= 300) return { points: 5, reasons };
      return { points: 0, reasons };
    },
  },
  {
    id: "headings",
    label: "Headings",
    max: 10,
    evaluate: (_post, { headingCount }) => {
      const points = Math.max(0, Math.floor(Math.min(10, (headingCount * 10) / 3)));
      const reasons = headingCount < 3 ? [`Add ${3 - headingCount} more H1-H3 heading(s)`] : [];
      return { points, reasons };
    },
  },
  {
    id: "images",
    label: "Images",
    max: 10,
    evaluate: ({ featuredImage }) => {
      if (!isSet(featuredImage.url)) return { points: 0, reasons: ["Add a featured image"] };
      if (!isSet(featuredImage.altText)) return { points: 5, reasons: ["Add alt text to the featured image"] };
      return { points: 10, reasons: [] };
    },
  },
  {
    id: "keywordDensity",
    label: "Keyword density",
    max: 10,
    evaluate: (_post, { keywordDensityPercent: density }) => {
      if (density >= 1.0 && density <= 2.5) return { points: 10, reasons: [] };
      const reasons = [`Keyword density is ${density}%; aim for 1.0-2.5%`];
      if ((density > 0 && density < 1.0) || (density > 2.5 && density <= 4.0)) return { points: 5, reasons };
      return { points: 0, reasons };
    },
  },
  {
    id: "slug",
    label: "URL slug",
    max: 5,
    evaluate: ({ slug }) => {
      if (slug.length <= SLUG_MAX_LENGTH && SLUG_PATTERN.test(slug)) return { points: 5, reasons: [] };
      return {
        points: 0,
        reasons: [`Use a lowercase slug of letters, digits and hyphens, at most ${SLUG_MAX_LENGTH} characters`],
      };
    },
  },
  {
    id: "excerpt",
    label: "Excerpt",
    max: 5,
    evaluate: ({ excerpt }) => (isSet(excerpt) ? { points: 5, reasons: [] } : { points: 0, reasons: ["Add an excerpt"] }),
  },
  {
    id: "socialTags",
    label: "Social tags",
    max: 10,
    evaluate: (post) => {
      const og = [post.ogTitle, post.ogDescription, post.ogImage].some(isSet);
      const twitter = [post.twitterTitle, post.twitterDescription, post.twitterImage].some(isSet);
      const reasons: string[] = [];
      if (!og) reasons.push("Add Open Graph tags");
      if (!twitter) reasons.push("Add Twitter card tags");
      if (og && twitter) return { points: 10, reasons };
      if (og || twitter) return { points: 5, reasons };
      return { points: 0, reasons };
    },
  },
];

export function scoreContent(post: PostContent, metrics: SeoMetrics): ScoreBreakdown {
  const factors: FactorScore[] = RUBRIC.map((factor) => {
    const result = factor.evaluate(post, metrics);
    return {
      id: factor.id,
      label: factor.label,
      pointsEarned: Math.min(factor.max, Math.max(0, result.points)),
      pointsMax: factor.max,
      reasons: result.reasons,
    };
  });
  const total = factors.reduce((sum, f) => sum + f.pointsEarned, 0);

  return { total, publishable: total >= PUBLISHABLE_SCORE, factors };
}
