/**
 * Video Routes
 * Protected endpoints that resolve video URLs.
 */

import { Router } from "express";
import type { VideoController } from "../controllers/videoController.js";
import { requireApiKey } from "../middlewares/auth.middleware.js";
import { DOWNLOAD_ENDPOINT, INFO_ENDPOINT } from "../services/business/responseBuilder.js";

export function createVideoRouter(controller: VideoController, apiKey: string): Router {
  const videoRouter = Router();
  const auth = requireApiKey(apiKey);

  /** Metadata plus up to five ranked download links */
  videoRouter.get(DOWNLOAD_ENDPOINT, auth, controller.download);

  /** Full metadata only */
  videoRouter.get(INFO_ENDPOINT, auth, controller.videoInfo);

  return videoRouter;
}
