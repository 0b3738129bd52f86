/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError, NotFoundError } from "../utils/errors.js";
import { AVAILABLE_ENDPOINTS } from "../services/business/responseBuilder.js";

export interface ErrorBody {
  error: string;
  status: "failed";
  [detail: string]: unknown;
}

/**
 * Catch-all for unmatched routes. Register after the routers.
 */
export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError("Endpoint", { available_endpoints: AVAILABLE_ENDPOINTS }));
}

/**
 * Global error handler middleware.
 * Operational AppErrors keep their status and message; anything else becomes a generic 500.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof AppError && error.isOperational) {
    if (error.statusCode >= 500) {
      logError(error, req, error.statusCode);
    }
    const body: ErrorBody = { ...error.details, error: error.message, status: "failed" };
    res.status(error.statusCode).json(body);
    return;
  }

  logError(error, req, 500);
  const body: ErrorBody = { error: "Internal server error", status: "failed" };
  res.status(500).json(body);
}

function logError(error: Error, req: Request, statusCode: number): void {
  console.error(`[Error] ${statusCode} - ${error.message}`, {
    error: error.name,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });
}
