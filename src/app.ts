import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import type { AppConfig } from "./config/env.js";
import type { VideoExtractor } from "./types/video.js";
import { createRouter } from "./routes/index.js";
import { createVideoController } from "./controllers/videoController.js";
import { VideoService } from "./services/business/videoService.js";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler.js";

export interface AppDependencies {
  config: AppConfig;
  extractor: VideoExtractor;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes around the given extractor.
 */
export function createApp({ config, extractor }: AppDependencies): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());

  const videoService = new VideoService({
    extractor,
    maxDurationSeconds: config.maxDurationSeconds,
  });

  /** Application routes. */
  app.use(createRouter(config, createVideoController(videoService)));

  /** Unmatched routes. */
  app.use(notFoundHandler);

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
