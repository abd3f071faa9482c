// src/middleware/errorHandler.ts
import type { NextFunction, Request, Response } from "express";
import { HttpError } from "../utils/errors";

// Express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }
  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, err);
  res.status(500).json({ error: "Internal Server Error" });
}
