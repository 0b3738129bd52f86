/**
 * Video Service
 * Wraps the extractor: enforces the duration ceiling on probe, builds the
 * format-selector hint for resolve, and reports extractor failures as
 * ExtractionError. No retries.
 */

import type { ExtractedVideo, VideoExtractor, VideoMetadata } from "../../types/video.js";
import { isQualityTier } from "../../types/video.js";
import { AppError, ExtractionError, VideoTooLongError } from "../../utils/errors.js";

export interface VideoServiceOptions {
  extractor: VideoExtractor;
  maxDurationSeconds: number;
}

/**
 * Height ceiling for a quality tier: "720p" -> 720.
 * "best" and unrecognized values have no ceiling and are never parsed.
 */
export function qualityToHeight(quality: string): number | null {
  if (!isQualityTier(quality)) {
    return null;
  }
  return Number.parseInt(quality.slice(0, -1), 10);
}

/**
 * yt-dlp format expression for a request.
 * mp3 -> best audio (falling back to best); video -> best, optionally height-capped.
 */
export function buildFormatSelector(format: string, quality: string): string {
  if (format === "mp3") {
    return "bestaudio/best";
  }
  const height = qualityToHeight(quality);
  return height === null ? "best" : `best[height<=${height}]`;
}

export class VideoService {
  private readonly extractor: VideoExtractor;
  private readonly maxDurationSeconds: number;

  constructor(options: VideoServiceOptions) {
    this.extractor = options.extractor;
    this.maxDurationSeconds = options.maxDurationSeconds;
  }

  /**
   * Fetches metadata and rejects videos longer than the ceiling.
   */
  async probe(url: string): Promise<VideoMetadata> {
    const metadata = await this.call(() => this.extractor.probe(url));

    const duration = metadata.duration ?? 0;
    if (duration > this.maxDurationSeconds) {
      console.log(`[video] Rejected ${url}: ${duration}s exceeds ${this.maxDurationSeconds}s`);
      throw new VideoTooLongError(duration, this.maxDurationSeconds);
    }
    return metadata;
  }

  /**
   * Re-extracts with a format hint for the requested output and returns the catalog.
   */
  async resolve(url: string, format: string, quality: string): Promise<ExtractedVideo> {
    const formatSelector = buildFormatSelector(format, quality);
    return this.call(() => this.extractor.resolve(url, formatSelector));
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new ExtractionError(error.message, error);
      }
      throw new ExtractionError(String(error));
    }
  }
}
