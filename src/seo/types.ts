export type PostImage = {
  url: string;
  altText: string;
};

export type PostContent = {
  title: string;
  slug: string;
  body: string;
  excerpt: string;
  primaryKeyword: string;
  secondaryKeywords: string[];
  metaTitle: string;
  metaDescription: string;
  ogTitle: string;
  ogDescription: string;
  ogImage: string;
  twitterTitle: string;
  twitterDescription: string;
  twitterImage: string;
  canonicalUrl: string;
  schemaType: string;
  featuredImage: PostImage;
  images: PostImage[];
};

export type HeadingLevel = 1 | 2 | 3;

export type ExtractedHeading = {
  level: HeadingLevel;
  text: string;
  anchorId: string;
};

export type ExtractedText = {
  plainText: string;
  headings: ExtractedHeading[];
};

export type SeoMetrics = {
  wordCount: number;
  readingTimeMinutes: number;
  keywordOccurrences: number;
  keywordDensityPercent: number;
  headingCount: number;
};

export type RubricFactorId =
  | "title"
  | "metaDescription"
  | "primaryKeyword"
  | "contentLength"
  | "headings"
  | "images"
  | "keywordDensity"
  | "slug"
  | "excerpt"
  | "socialTags";

export type FactorScore = {
  id: RubricFactorId;
  label: string;
  pointsEarned: number;
  pointsMax: number;
  reasons: string[];
};

export type ScoreBreakdown = {
  total: number;
  publishable: boolean;
  factors: FactorScore[];
};

export type PostLink = {
  title: string;
  slug: string;
};

/**
 * Lookup over already published posts, supplied by the persistence layer.
 * The engine keeps the returned order and never re-ranks it.
 */
export interface PublishedPostFinder {
  searchByKeywords(primary: string, secondary: string[]): PostLink[] | Promise<PostLink[]>;
}

export type SuggestionBundle = {
  headingSuggestions: string[];
  faqSuggestions: string[];
  internalLinkSuggestions: PostLink[];
  generatedMetaDescription: string;
};

export type SeoFieldAudit = {
  errors: string[];
  warnings: string[];
};

export type PostScoreReport = {
  metrics: SeoMetrics;
  breakdown: ScoreBreakdown;
  suggestions: SuggestionBundle;
  audit: SeoFieldAudit;
};

export type GeneratedSeoFields = {
  primaryKeyword: string;
  secondaryKeywords: string[];
  slug: string;
  metaTitle: string;
  metaDescription: string;
  ogTitle: string;
  ogDescription: string;
  twitterTitle: string;
  twitterDescription: string;
};
