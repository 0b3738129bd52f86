/**
 * Authentication Middleware
 * Static API key check for protected routes.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { AuthenticationError } from "../utils/errors.js";

/**
 * Requires `?apikey=` to equal the configured key exactly.
 * Answers 401 itself and never calls the next handler on mismatch.
 */
export function requireApiKey(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const provided = req.query.apikey;

    if (typeof provided !== "string" || provided !== expectedKey) {
      const error = new AuthenticationError();
      console.log(`[auth] Rejected ${req.method} ${req.path}: ${error.message}`);
      res.status(error.statusCode).json({ error: error.message, status: "failed" });
      return;
    }

    next();
  };
}
