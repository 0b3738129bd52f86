/**
 * Format Selector
 * Filters the extractor's format catalog by media kind, ranks it by quality and
 * shapes the top entries into download links.
 */

import type { ExtractedVideo, FormatDescriptor } from "../../types/video.js";

/** Longest list of download links returned per request. */
export const MAX_DOWNLOAD_LINKS = 5;

/** Codec value yt-dlp reports for an absent stream. */
const NO_CODEC = "none";

export type FormatKind = "audio" | "video" | "other";

interface BaseDownloadLink {
  format_id: string | null;
  url: string;
  ext: string | null;
  quality: string;
  filesize: number | null;
}

export interface VideoDownloadLink extends BaseDownloadLink {
  resolution: string;
  fps: number | null;
  vcodec: string | null;
  acodec: string | null;
}

export interface AudioDownloadLink extends BaseDownloadLink {
  bitrate: number | null;
  sample_rate: number | null;
}

/** Emitted when the extractor reports no catalog, only a top-level URL. */
export interface SingleDownloadLink {
  format_id: "single";
  url: string;
  ext: string;
  quality: string;
}

export type DownloadLink = VideoDownloadLink | AudioDownloadLink | SingleDownloadLink;

/**
 * audio: no video stream but an audio stream.
 * video: any video stream (a missing vcodec counts as video).
 * other: neither, e.g. storyboards reported with both codecs "none".
 */
export function classifyFormat(format: FormatDescriptor): FormatKind {
  if (format.vcodec !== NO_CODEC) {
    return "video";
  }
  return format.acodec !== NO_CODEC ? "audio" : "other";
}

function hasUrl(format: FormatDescriptor): format is FormatDescriptor & { url: string } {
  return typeof format.url === "string" && format.url.length > 0;
}

/**
 * Filters and ranks the catalog for the requested output. mp4 and webm share the
 * video filter; only the echoed label differs.
 * Ranking is descending by height (video) or abr (audio), missing values as 0.
 * Array.prototype.sort is stable, so ties keep catalog order.
 */
export function rankFormats(
  formats: FormatDescriptor[],
  format: string
): Array<FormatDescriptor & { url: string }> {
  const wanted: FormatKind = format === "mp3" ? "audio" : "video";
  const rankBy = (candidate: FormatDescriptor): number =>
    (wanted === "audio" ? candidate.abr : candidate.height) ?? 0;

  return formats
    .filter((candidate) => classifyFormat(candidate) === wanted)
    .filter(hasUrl)
    .sort((a, b) => rankBy(b) - rankBy(a))
    .slice(0, MAX_DOWNLOAD_LINKS);
}

/** "{width}x{height}", each missing dimension as "Unknown". */
export function formatResolution(format: FormatDescriptor): string {
  return `${format.width ?? "Unknown"}x${format.height ?? "Unknown"}`;
}

function toDownloadLink(
  format: FormatDescriptor & { url: string },
  output: string
): VideoDownloadLink | AudioDownloadLink {
  const base: BaseDownloadLink = {
    format_id: format.formatId,
    url: format.url,
    ext: format.ext,
    quality: format.formatNote ?? "Unknown",
    filesize: format.filesize,
  };

  if (output === "mp3") {
    return { ...base, bitrate: format.abr, sample_rate: format.asr };
  }
  return {
    ...base,
    resolution: formatResolution(format),
    fps: format.fps,
    vcodec: format.vcodec,
    acodec: format.acodec,
  };
}

/**
 * Produces the ranked download links for an extraction result.
 * Without a catalog, falls back to one link built from the top-level URL.
 */
export function selectFormats(
  extracted: ExtractedVideo,
  format: string,
  quality: string
): DownloadLink[] {
  if (extracted.formats === null) {
    return [
      {
        format_id: "single",
        url: extracted.directUrl ?? "",
        ext: format,
        quality,
      },
    ];
  }

  return rankFormats(extracted.formats, format).map((candidate) => toDownloadLink(candidate, format));
}
