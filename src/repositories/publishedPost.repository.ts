import fs from "fs/promises";
import { z } from "zod";
import { containsIgnoreCase } from "../seo/nlp";
import type { PostLink, PublishedPostFinder } from "../seo/types";

const publishedPostSchema = z.object({
  title: z.string().min(1),
  slug: z.string().min(1),
  keywords: z.array(z.string()).default([]),
  publishedAt: z.string().datetime().optional(),
});

export type PublishedPost = z.infer<typeof publishedPostSchema>;

const PRIMARY_TITLE_WEIGHT = 3;
const PRIMARY_KEYWORD_WEIGHT = 2;
const SECONDARY_WEIGHT = 1;

function relevance(post: PublishedPost, primary: string, secondary: string[]) {
  const keywords = post.keywords.map((k) => k.trim().toLowerCase());
  const matchesKeyword = (term: string) => keywords.includes(term.trim().toLowerCase());

  let score = 0;
  if (primary) {
    if (containsIgnoreCase(post.title, primary)) score += PRIMARY_TITLE_WEIGHT;
    if (matchesKeyword(primary)) score += PRIMARY_KEYWORD_WEIGHT;
  }
  for (const term of secondary) {
    if (containsIgnoreCase(post.title, term) || matchesKeyword(term)) score += SECONDARY_WEIGHT;
  }
  return score;
}

/**
 * Published posts held in memory. Ranks by keyword overlap, newest first on ties.
 */
export class InMemoryPublishedPostRepository implements PublishedPostFinder {
  private readonly posts: PublishedPost[];

  constructor(posts: PublishedPost[] = []) {
    this.posts = [...posts];
  }

  get size() {
    return this.posts.length;
  }

  searchByKeywords(primary: string, secondary: string[]): PostLink[] {
    const terms = secondary.map((s) => s.trim()).filter(Boolean);
    return this.posts
      .map((post) => ({ post, score: relevance(post, primary.trim(), terms) }))
      .filter((entry) => entry.score > 0)
      .sort(
        (a, b) =>
          b.score - a.score ||
          (b.post.publishedAt ?? "").localeCompare(a.post.publishedAt ?? "") ||
          a.post.title.localeCompare(b.post.title)
      )
      .map(({ post }) => ({ title: post.title, slug: post.slug }));
  }
}

export function parsePublishedPosts(raw: unknown): PublishedPost[] {
  return z.array(publishedPostSchema).parse(raw);
}

export async function loadPublishedPosts(filePath: string) {
  const raw = await fs.readFile(filePath, "utf8");
  return new InMemoryPublishedPostRepository(parsePublishedPosts(JSON.parse(raw)));
}
