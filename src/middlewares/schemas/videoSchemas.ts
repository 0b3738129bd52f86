/**
 * Video Request Schemas
 * Zod schemas for the query strings of the video endpoints.
 */

import { z } from "zod";

const urlParam = z
  .string({
    required_error: "URL parameter is required",
    invalid_type_error: "URL parameter must be a single value",
  })
  .trim()
  .min(1, "URL parameter is required");

/**
 * Lower-cased and echoed back as given. Anything other than mp3 takes the video
 * path, and an unrecognized quality means no height ceiling.
 */
const formatParam = z
  .string({ invalid_type_error: "Format must be a single value" })
  .trim()
  .toLowerCase()
  .default("mp4");

const qualityParam = z
  .string({ invalid_type_error: "Quality must be a single value" })
  .trim()
  .toLowerCase()
  .default("best");

/**
 * GET /api/youtube-downloader
 */
export const downloadQuerySchema = z.object({
  url: urlParam,
  format: formatParam,
  quality: qualityParam,
});

/**
 * GET /api/video-info
 */
export const videoInfoQuerySchema = z.object({
  url: urlParam,
});
