import type { Request, Response, NextFunction } from "express";
import { logger } from "./logger";

/**
 * One line per request once the response is flushed. Only the path is
 * logged: query strings can carry consent flags and other user input.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    logger.info(`${req.method} ${req.path} -> ${res.statusCode} (${Date.now() - start}ms)`);
  });
  next();
}
