/**
 * Video Controller
 * Thin HTTP handlers for the download and info endpoints.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { parseQuery } from "../middlewares/validation.js";
import { downloadQuerySchema, videoInfoQuerySchema } from "../middlewares/schemas/videoSchemas.js";
import type { VideoService } from "../services/business/videoService.js";
import { selectFormats } from "../services/business/formatSelector.js";
import { buildDownloadResponse, buildInfoResponse } from "../services/business/responseBuilder.js";
import { normalizeVideoUrl, type NormalizedVideoUrl } from "../utils/videoUrl.js";
import { ValidationError } from "../utils/errors.js";

export interface VideoController {
  download: RequestHandler;
  videoInfo: RequestHandler;
}

function requireVideoUrl(rawUrl: string): NormalizedVideoUrl {
  const normalized = normalizeVideoUrl(rawUrl);
  if (!normalized) {
    throw new ValidationError("Invalid YouTube URL");
  }
  return normalized;
}

export function createVideoController(videoService: VideoService): VideoController {
  return {
    /**
     * GET /api/youtube-downloader - Metadata plus ranked download links
     * Probes first so over-long videos are rejected before the format-aware call.
     */
    async download(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = parseQuery(downloadQuerySchema, req.query);
        const { url, videoId } = requireVideoUrl(query.url);

        console.log(`[video] Download request for ${videoId} (${query.format}, ${query.quality})`);
        await videoService.probe(url);
        const extracted = await videoService.resolve(url, query.format, query.quality);
        const links = selectFormats(extracted, query.format, query.quality);

        res.json(buildDownloadResponse(extracted.metadata, links, query.format, query.quality));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/video-info - Full metadata, no links
     */
    async videoInfo(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = parseQuery(videoInfoQuerySchema, req.query);
        const { url, videoId } = requireVideoUrl(query.url);

        console.log(`[video] Info request for ${videoId}`);
        const metadata = await videoService.probe(url);

        res.json(buildInfoResponse(metadata));
      } catch (error) {
        next(error);
      }
    },
  };
}
