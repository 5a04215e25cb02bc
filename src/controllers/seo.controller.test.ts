import type { Request, Response } from "express";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createSeoController } from "./seo.controller";

function mockRes() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function call(handler: (req: Request, res: Response) => unknown, body: unknown) {
  const res = mockRes();
  const req = { body } as unknown as Request;
  return Promise.resolve(handler(req, res as unknown as Response)).then(() => res);
}

describe("seo controller", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("scores a draft and fills absent fields with empty values", async () => {
    const searchByKeywords = vi.fn(() => [{ title: "Python Basics", slug: "python-basics" }]);
    const { scoreDraft } = createSeoController({ searchByKeywords });

    const res = await call(scoreDraft, { body: "<p>Python rocks</p>", primaryKeyword: "Python", excerpt: "Intro" });

    expect(res.status).not.toHaveBeenCalled();
    const payload = res.json.mock.calls[0]?.[0];
    // primary keyword 15 + excerpt 5
    expect(payload.seoScore).toBe(20);
    expect(payload.metrics.wordCount).toBe(2);
    expect(payload.suggestions.internalLinkSuggestions).toEqual([{ title: "Python Basics", slug: "python-basics" }]);
    expect(searchByKeywords).toHaveBeenCalledWith("Python", []);
  });

  it("answers 400 with the field when the body is missing", async () => {
    const { scoreDraft } = createSeoController({ searchByKeywords: () => [] });
    const res = await call(scoreDraft, { title: "No body here" });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ message: "Post body is required to compute a score", field: "body" });
  });

  it("answers 400 for a malformed request", async () => {
    const { scoreDraft } = createSeoController({ searchByKeywords: () => [] });
    const res = await call(scoreDraft, { body: 42 });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json.mock.calls[0]?.[0].fieldErrors.body).toBeDefined();
  });

  it("answers 500 when the link lookup fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { scoreDraft } = createSeoController({
      searchByKeywords: () => {
        throw new Error("database offline");
      },
    });

    const res = await call(scoreDraft, { body: "<p>Python</p>", primaryKeyword: "Python" });

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ message: "Failed to score post" });
    expect(errorSpy).toHaveBeenCalledWith("Score post error", "database offline");
  });

  it("returns suggestions", async () => {
    const { suggest } = createSeoController({ searchByKeywords: () => [] });
    const res = await call(suggest, { body: "<h2>Setup</h2><p>Django setup</p>", primaryKeyword: "Django" });

    expect(res.json.mock.calls[0]?.[0].suggestions.headingSuggestions).toEqual(["What is Django", "How to Django"]);
  });

  it("auto-generates SEO fields", async () => {
    const { autoGenerate } = createSeoController({ searchByKeywords: () => [] });
    const res = await call(autoGenerate, { title: "Learn Django Fast", body: "<p>Django is great.</p>" });

    expect(res.json.mock.calls[0]?.[0].data.slug).toBe("learn-django-fast");
    expect(res.json.mock.calls[0]?.[0].data.primaryKeyword).toBe("Django");
  });

  it("requires a title for auto-generation", async () => {
    const { autoGenerate } = createSeoController({ searchByKeywords: () => [] });
    const res = await call(autoGenerate, { body: "<p>x</p>" });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ message: "Title is required", field: "title" });
  });
});
