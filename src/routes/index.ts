import { Router } from "express";
import type { PublishedPostFinder } from "../seo/types";
import { createSeoRouter } from "./seo.routes";

export type ApiDependencies = {
  postFinder: PublishedPostFinder;
};

export function createApiRouter(deps: ApiDependencies) {
  const apiRouter = Router();
  apiRouter.use("/", createSeoRouter(deps.postFinder));
  return apiRouter;
}
