/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { AppConfig } from "../config/env.js";
import type { VideoController } from "../controllers/videoController.js";
import { createHealthRouter } from "./health.js";
import { createVideoRouter } from "./video.js";

export function createRouter(config: AppConfig, videoController: VideoController): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(config.serviceInstanceId));
  router.use(createVideoRouter(videoController, config.apiKey));

  return router;
}
