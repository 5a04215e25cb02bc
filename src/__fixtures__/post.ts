import type { PostContent, SeoMetrics } from "../seo/types";

export function makePost(overrides: Partial<PostContent> = {}): PostContent {
  return {
    title: "",
    slug: "",
    body: "<p>Draft</p>",
    excerpt: "",
    primaryKeyword: "",
    secondaryKeywords: [],
    metaTitle: "",
    metaDescription: "",
    ogTitle: "",
    ogDescription: "",
    ogImage: "",
    twitterTitle: "",
    twitterDescription: "",
    twitterImage: "",
    canonicalUrl: "",
    schemaType: "",
    featuredImage: { url: "", altText: "" },
    images: [],
    ...overrides,
  };
}

export function makeMetrics(overrides: Partial<SeoMetrics> = {}): SeoMetrics {
  return {
    wordCount: 0,
    readingTimeMinutes: 0,
    keywordOccurrences: 0,
    keywordDensityPercent: 0,
    headingCount: 0,
    ...overrides,
  };
}

export function repeatWords(word: string, count: number) {
  return Array(count).fill(word).join(" ");
}
