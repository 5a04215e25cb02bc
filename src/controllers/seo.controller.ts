import type { Request, Response } from "express";
import { z } from "zod";
import { ValidationFailure } from "../seo/errors";
import type { PostContent, PublishedPostFinder } from "../seo/types";
import { autoGenerateSeoFields, scorePost, suggestForPost } from "../services/seo.service";

const text = z.string().default("");

const imageSchema = z.object({
  url: text,
  altText: text,
});

const postSchema = z.object({
  title: text,
  slug: text,
  body: text,
  excerpt: text,
  primaryKeyword: text,
  secondaryKeywords: z.array(z.string()).default([]),
  metaTitle: text,
  metaDescription: text,
  ogTitle: text,
  ogDescription: text,
  ogImage: text,
  twitterTitle: text,
  twitterDescription: text,
  twitterImage: text,
  canonicalUrl: text,
  schemaType: text,
  featuredImage: imageSchema.default({}),
  images: z.array(imageSchema).default([]),
});

const autoGenerateSchema = z.object({
  title: text,
  body: text,
  existingKeyword: z.string().optional(),
});

function handleError(res: Response, err: unknown, context: string) {
  if (err instanceof ValidationFailure) {
    return res.status(400).json({ message: err.message, field: err.field });
  }
  console.error(`${context} error`, err instanceof Error ? err.message : err);
  return res.status(500).json({ message: `Failed to ${context.toLowerCase()}` });
}

export function createSeoController(postFinder: PublishedPostFinder) {
  async function scoreDraft(req: Request, res: Response) {
    const parsed = postSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    try {
      const post: PostContent = parsed.data;
      const report = await scorePost(post, postFinder);
      return res.json({ seoScore: report.breakdown.total, ...report });
    } catch (err) {
      return handleError(res, err, "Score post");
    }
  }

  async function suggest(req: Request, res: Response) {
    const parsed = postSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    try {
      const result = await suggestForPost(parsed.data, postFinder);
      return res.json(result);
    } catch (err) {
      return handleError(res, err, "Generate suggestions");
    }
  }

  function autoGenerate(req: Request, res: Response) {
    const parsed = autoGenerateSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    try {
      return res.json({ data: autoGenerateSeoFields(parsed.data) });
    } catch (err) {
      return handleError(res, err, "Generate SEO fields");
    }
  }

  return { scoreDraft, suggest, autoGenerate };
}
