/**
 * yt-dlp Extractor
 * Resolves video pages into metadata and format catalogs by running yt-dlp in
 * metadata-only mode (--dump-single-json). Nothing is downloaded.
 */

import { execa } from "execa";
import { z } from "zod";
import type {
  ExtractedVideo,
  FormatDescriptor,
  VideoExtractor,
  VideoMetadata,
} from "../../types/video.js";
import { ExtractionError } from "../../utils/errors.js";

/** Runs an executable and resolves with its stdout; rejects on non-zero exit or timeout. */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<{ stdout: string }>;

export interface YtDlpOptions {
  /** Executable name or absolute path. */
  binaryPath: string;
  timeoutMs: number;
  cookiesPath?: string;
  /** Defaults to execa. */
  runner?: CommandRunner;
}

const execaRunner: CommandRunner = async (file, args, options) => {
  const { stdout } = await execa(file, args, options);
  return { stdout };
};

/** Probe requests use yt-dlp's default single-format pick. */
export const PROBE_FORMAT_SELECTOR = "best";

const rawFormatSchema = z.object({
  format_id: z.string().nullish(),
  url: z.string().nullish(),
  ext: z.string().nullish(),
  format_note: z.string().nullish(),
  filesize: z.number().nullish(),
  width: z.number().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  abr: z.number().nullish(),
  asr: z.number().nullish(),
});

const rawVideoInfoSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  duration: z.number().nullish(),
  view_count: z.number().nullish(),
  like_count: z.number().nullish(),
  description: z.string().nullish(),
  thumbnail: z.string().nullish(),
  upload_date: z.string().nullish(),
  categories: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
  webpage_url: z.string().nullish(),
  url: z.string().nullish(),
  formats: z.array(rawFormatSchema).nullish(),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;
export type RawVideoInfo = z.infer<typeof rawVideoInfoSchema>;

/**
 * Creates an extractor backed by the yt-dlp executable.
 */
export function createYtDlpExtractor(options: YtDlpOptions): VideoExtractor {
  return {
    async probe(url: string): Promise<VideoMetadata> {
      const info = await dumpVideoInfo(url, PROBE_FORMAT_SELECTOR, options);
      return toVideoMetadata(info);
    },

    async resolve(url: string, formatSelector: string): Promise<ExtractedVideo> {
      const info = await dumpVideoInfo(url, formatSelector, options);
      return toExtractedVideo(info);
    },
  };
}

/**
 * Builds the yt-dlp argument list. The URL goes after `--` so it is never read as a flag.
 */
export function buildYtDlpArgs(url: string, formatSelector: string, cookiesPath?: string): string[] {
  const args = [
    "--dump-single-json",
    "--no-playlist",
    "--no-warnings",
    "--quiet",
    "--format",
    formatSelector,
  ];
  if (cookiesPath) {
    args.push("--cookies", cookiesPath);
  }
  args.push("--", url);
  return args;
}

async function dumpVideoInfo(
  url: string,
  formatSelector: string,
  options: YtDlpOptions
): Promise<RawVideoInfo> {
  console.log(`[yt-dlp] Extracting ${url} (format: ${formatSelector})`);
  const startTime = Date.now();

  let stdout: string;
  try {
    const run = options.runner ?? execaRunner;
    const result = await run(
      options.binaryPath,
      buildYtDlpArgs(url, formatSelector, options.cookiesPath),
      { timeout: options.timeoutMs }
    );
    stdout = result.stdout;
  } catch (error) {
    throw toExtractionError(error, options.timeoutMs);
  }

  console.log(`[yt-dlp] Extraction finished in ${Date.now() - startTime}ms`);
  return parseVideoInfo(stdout);
}

/**
 * Parses and validates yt-dlp's JSON document.
 */
export function parseVideoInfo(stdout: string): RawVideoInfo {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new ExtractionError(
      "Extractor returned malformed JSON",
      error instanceof Error ? error : undefined
    );
  }

  const parsed = rawVideoInfoSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown field";
    throw new ExtractionError(`Extractor returned unexpected metadata (${where})`);
  }
  return parsed.data;
}

/**
 * Maps a failed execa run onto an ExtractionError.
 * yt-dlp reports its failures on stderr ("ERROR: [youtube] ...: Video unavailable").
 */
function toExtractionError(error: unknown, timeoutMs: number): ExtractionError {
  if (!(error instanceof Error)) {
    return new ExtractionError(String(error));
  }
  if ("timedOut" in error && error.timedOut === true) {
    return new ExtractionError(`Extraction timed out after ${Math.round(timeoutMs / 1000)}s`, error);
  }
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
  console.error(`[yt-dlp] Error:`, stderr || error.message);
  return new ExtractionError(stderr || error.message, error);
}

export function toVideoMetadata(info: RawVideoInfo): VideoMetadata {
  return {
    id: info.id ?? null,
    title: info.title ?? null,
    uploader: info.uploader ?? null,
    duration: info.duration ?? null,
    viewCount: info.view_count ?? null,
    likeCount: info.like_count ?? null,
    description: info.description ?? null,
    thumbnail: info.thumbnail ?? null,
    uploadDate: info.upload_date ?? null,
    categories: info.categories ?? [],
    tags: info.tags ?? [],
    webpageUrl: info.webpage_url ?? null,
  };
}

function toFormatDescriptor(format: RawFormat): FormatDescriptor {
  return {
    formatId: format.format_id ?? null,
    url: format.url ?? null,
    ext: format.ext ?? null,
    formatNote: format.format_note ?? null,
    filesize: format.filesize ?? null,
    width: format.width ?? null,
    height: format.height ?? null,
    fps: format.fps ?? null,
    vcodec: format.vcodec ?? null,
    acodec: format.acodec ?? null,
    abr: format.abr ?? null,
    asr: format.asr ?? null,
  };
}

export function toExtractedVideo(info: RawVideoInfo): ExtractedVideo {
  return {
    metadata: toVideoMetadata(info),
    formats: info.formats ? info.formats.map(toFormatDescriptor) : null,
    directUrl: info.url ?? null,
  };
}
