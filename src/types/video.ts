/**
 * Video domain types shared by the extractor, the selector and the response builder.
 */

export const OUTPUT_FORMATS = ["mp4", "mp3", "webm"] as const;

export const QUALITY_TIERS = ["144p", "240p", "360p", "480p", "720p", "1080p"] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];
export const QUALITIES = [...QUALITY_TIERS, "best"] as const;

export function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

/** Snapshot of a video's metadata as reported by the extractor. */
export interface VideoMetadata {
  id: string | null;
  title: string | null;
  uploader: string | null;
  /** Seconds. */
  duration: number | null;
  viewCount: number | null;
  likeCount: number | null;
  description: string | null;
  thumbnail: string | null;
  /** YYYYMMDD, as the extractor reports it. */
  uploadDate: string | null;
  categories: string[];
  tags: string[];
  webpageUrl: string | null;
}

/** One encoded variant of a video. */
export interface FormatDescriptor {
  formatId: string | null;
  url: string | null;
  ext: string | null;
  /** Human-readable quality label, e.g. "720p" or "medium". */
  formatNote: string | null;
  filesize: number | null;
  width: number | null;
  height: number | null;
  fps: number | null;
  /** "none" when the variant carries no video stream. */
  vcodec: string | null;
  /** "none" when the variant carries no audio stream. */
  acodec: string | null;
  /** Average audio bitrate, kbit/s. */
  abr: number | null;
  /** Audio sample rate, Hz. */
  asr: number | null;
}

export interface ExtractedVideo {
  metadata: VideoMetadata;
  /** null when the platform reported no per-format catalog. */
  formats: FormatDescriptor[] | null;
  /** Top-level resolved URL, used when there is no catalog. */
  directUrl: string | null;
}

/**
 * Capability that turns a page URL into metadata and a format catalog.
 * Implementations never download media.
 */
export interface VideoExtractor {
  /** Metadata only, default format request. */
  probe(url: string): Promise<VideoMetadata>;
  /** Format-aware request; `formatSelector` is a yt-dlp format expression. */
  resolve(url: string, formatSelector: string): Promise<ExtractedVideo>;
}
