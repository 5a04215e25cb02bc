import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5050),
  CORS_ORIGIN: z.string().default(""),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  PUBLISHED_POSTS_FILE: z.string().optional(),
});

export type AppConfig = {
  port: number;
  corsOrigins: string[];
  rateLimitMax: number;
  publishedPostsFile?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    corsOrigins: data.CORS_ORIGIN.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    rateLimitMax: data.RATE_LIMIT_MAX,
    publishedPostsFile: data.PUBLISHED_POSTS_FILE?.trim() || undefined,
  };
}
