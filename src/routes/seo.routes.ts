import { Router } from "express";
import { createSeoController } from "../controllers/seo.controller";
import type { PublishedPostFinder } from "../seo/types";

export function createSeoRouter(postFinder: PublishedPostFinder) {
  const seoRouter = Router();
  const { scoreDraft, suggest, autoGenerate } = createSeoController(postFinder);

  seoRouter.post("/admin/seo/score", scoreDraft);
  seoRouter.post("/admin/seo/suggestions", suggest);
  seoRouter.post("/admin/seo/auto-generate", autoGenerate);

  return seoRouter;
}
