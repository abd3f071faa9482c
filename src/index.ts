// src/index.ts
import express from "express";
import helmet from "helmet";
import cors from "cors";
import { env } from "./config/env";
import v1Routes, { type V1Deps } from "./routes/v1";
import { requestLogger } from "./middleware/requestLogger";
import { notFound } from "./middleware/notFound";
import { errorHandler } from "./middleware/errorHandler";

export function createApp(deps: V1Deps) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: env.corsOrigin.length ? env.corsOrigin : true }));
  if (env.requestLog) app.use(requestLogger);

  app.get("/api/health", (_req, res) => res.json({ ok: true }));
  app.use("/api/v1", v1Routes(deps));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
