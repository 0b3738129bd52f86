/**
 * Response Builder
 * Shapes extractor output into the JSON envelopes returned by the API.
 */

import type { VideoMetadata } from "../../types/video.js";
import { OUTPUT_FORMATS, QUALITIES } from "../../types/video.js";
import type { DownloadLink } from "./formatSelector.js";

export const SERVICE_NAME = "YouTube Downloader API";
export const SERVICE_VERSION = "1.0.0";

export const DOWNLOAD_ENDPOINT = "/api/youtube-downloader";
export const INFO_ENDPOINT = "/api/video-info";
export const HEALTH_ENDPOINT = "/health";

export const DESCRIPTION_PREVIEW_LENGTH = 500;
export const MAX_TAGS = 10;

export interface DownloadResponse {
  status: "success";
  video_info: {
    id: string | null;
    title: string | null;
    uploader: string | null;
    duration: number | null;
    view_count: number | null;
    description: string;
    thumbnail: string | null;
    upload_date: string | null;
  };
  download_links: DownloadLink[];
  requested_format: string;
  requested_quality: string;
}

export interface InfoResponse {
  status: "success";
  video_info: {
    id: string | null;
    title: string | null;
    uploader: string | null;
    duration: number | null;
    view_count: number | null;
    like_count: number | null;
    description: string;
    thumbnail: string | null;
    upload_date: string | null;
    categories: string[];
    tags: string[];
    webpage_url: string | null;
  };
}

/**
 * First 500 characters plus "..." for any non-empty description, "" otherwise.
 */
export function previewDescription(description: string | null): string {
  if (!description) {
    return "";
  }
  // Code points, so astral characters are never split.
  return `${Array.from(description).slice(0, DESCRIPTION_PREVIEW_LENGTH).join("")}...`;
}

export function buildDownloadResponse(
  metadata: VideoMetadata,
  links: DownloadLink[],
  format: string,
  quality: string
): DownloadResponse {
  return {
    status: "success",
    video_info: {
      id: metadata.id,
      title: metadata.title,
      uploader: metadata.uploader,
      duration: metadata.duration,
      view_count: metadata.viewCount,
      description: previewDescription(metadata.description),
      thumbnail: metadata.thumbnail,
      upload_date: metadata.uploadDate,
    },
    download_links: links,
    requested_format: format,
    requested_quality: quality,
  };
}

export function buildInfoResponse(metadata: VideoMetadata): InfoResponse {
  return {
    status: "success",
    video_info: {
      id: metadata.id,
      title: metadata.title,
      uploader: metadata.uploader,
      duration: metadata.duration,
      view_count: metadata.viewCount,
      like_count: metadata.likeCount,
      description: metadata.description ?? "",
      thumbnail: metadata.thumbnail,
      upload_date: metadata.uploadDate,
      categories: metadata.categories,
      tags: metadata.tags.slice(0, MAX_TAGS),
      webpage_url: metadata.webpageUrl,
    },
  };
}

/** Body of GET / */
export function buildServiceDescription() {
  return {
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    endpoints: {
      download: DOWNLOAD_ENDPOINT,
      info: INFO_ENDPOINT,
      health: HEALTH_ENDPOINT,
    },
    usage: {
      download: `${DOWNLOAD_ENDPOINT}?url=YOUTUBE_URL&apikey=YOUR_API_KEY&format=mp4&quality=720p`,
      info: `${INFO_ENDPOINT}?url=YOUTUBE_URL&apikey=YOUR_API_KEY`,
    },
    parameters: {
      url: "YouTube video URL (required)",
      apikey: "API authentication key (required)",
      format: `Output format: ${OUTPUT_FORMATS.join(", ")} (optional, default: mp4)`,
      quality: `Video quality: ${QUALITIES.join(", ")} (optional, default: best)`,
    },
  };
}

/** Routes listed in 404 bodies. */
export const AVAILABLE_ENDPOINTS = [DOWNLOAD_ENDPOINT, INFO_ENDPOINT, HEALTH_ENDPOINT];
