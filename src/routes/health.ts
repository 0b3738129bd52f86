/**
 * Health Check Routes
 * Public endpoints for monitoring and discovery.
 */

import { Router } from "express";
import {
  HEALTH_ENDPOINT,
  SERVICE_NAME,
  buildServiceDescription,
} from "../services/business/responseBuilder.js";

export function createHealthRouter(serviceInstanceId: string): Router {
  const healthRouter = Router();

  /** Service description. */
  healthRouter.get("/", (_req, res) => {
    res.json(buildServiceDescription());
  });

  /** Simple health check endpoint. */
  healthRouter.get(HEALTH_ENDPOINT, (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      instance: serviceInstanceId,
      timestamp: new Date().toISOString(),
    });
  });

  return healthRouter;
}
