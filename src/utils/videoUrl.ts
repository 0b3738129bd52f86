/**
 * Video URL Utilities
 * Recognizes supported YouTube URL shapes and extracts the video id.
 * Pattern-based only, no network access.
 */

/** Tried in order; the first match wins. */
const VIDEO_ID_PATTERNS: RegExp[] = [
  // Watch page: youtube.com/watch?v=ID (v may follow other parameters; the first v wins)
  /youtube\.com\/watch\?(?:[^#\n]*?&)??v=([^&\n?#]+)/,
  // Short link: youtu.be/ID
  /youtu\.be\/([^&\n?#]+)/,
  // Embed: youtube.com/embed/ID
  /youtube\.com\/embed\/([^&\n?#]+)/,
  // Legacy: youtube.com/v/ID
  /youtube\.com\/v\/([^&\n?#]+)/,
];

export interface NormalizedVideoUrl {
  url: string;
  videoId: string;
}

/** Runs of %XX escapes; a lone or malformed "%" is not part of any run. */
const PERCENT_ESCAPES = /(?:%[0-9A-Fa-f]{2})+/g;

const utf8 = new TextDecoder("utf-8");

/**
 * Percent-decodes a URL escape run by escape run. Malformed escapes stay as
 * written; byte runs that are not valid UTF-8 decode to U+FFFD.
 */
export function decodeVideoUrl(rawUrl: string): string {
  return rawUrl.replace(PERCENT_ESCAPES, (run) => {
    const bytes = new Uint8Array(run.length / 3);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = Number.parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
    }
    return utf8.decode(bytes);
  });
}

/**
 * Extracts the video id from a supported URL, or null when the URL is not recognized.
 */
export function extractVideoId(rawUrl: string): string | null {
  return matchVideoId(decodeVideoUrl(rawUrl));
}

function matchVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Decodes the URL and pairs it with its video id.
 * Returns null for anything that is not a recognized video URL.
 */
export function normalizeVideoUrl(rawUrl: string): NormalizedVideoUrl | null {
  const url = decodeVideoUrl(rawUrl);
  const videoId = matchVideoId(url);
  return videoId ? { url, videoId } : null;
}
