import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { type ApiDependencies, createApiRouter } from "./routes";
import { buildAllowedOrigins, isOriginAllowed } from "./config/cors";
import type { AppConfig } from "./config/env";

export function createApp(config: AppConfig, deps: ApiDependencies) {
  const app = express();
  const allowedOrigins = buildAllowedOrigins(config.corsOrigins);

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: config.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(
    helmet({
      crossOriginResourcePolicy: false,
    })
  );

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true); // non-browser or same-origin
        if (isOriginAllowed(origin, allowedOrigins)) return callback(null, true);
        return callback(new Error("Not allowed by CORS"), false);
      },
    })
  );

  app.use(limiter);
  app.use(morgan("dev"));

  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/api", createApiRouter(deps));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    const message = err instanceof Error && err.message ? err.message : "Internal server error";
    res.status(status).json({ message });
  });

  return app;
}
