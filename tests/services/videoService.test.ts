import { beforeEach, describe, expect, it } from "vitest";
import {
  VideoService,
  buildFormatSelector,
  qualityToHeight,
} from "../../src/services/business/videoService.js";
import { ExtractionError, VideoTooLongError } from "../../src/utils/errors.js";
import { FakeExtractor, makeMetadata } from "../helpers/fakeExtractor.js";

const URL = "https://www.youtube.com/watch?v=abc123";

describe("qualityToHeight", () => {
  it("strips the unit from a tier", () => {
    expect(qualityToHeight("720p")).toBe(720);
    expect(qualityToHeight("144p")).toBe(144);
    expect(qualityToHeight("1080p")).toBe(1080);
  });

  it("has no ceiling for best", () => {
    expect(qualityToHeight("best")).toBeNull();
  });

  it("has no ceiling for unrecognized values", () => {
    expect(qualityToHeight("4k")).toBeNull();
    expect(qualityToHeight("p")).toBeNull();
  });
});

describe("buildFormatSelector", () => {
  it("asks for the best audio on mp3 regardless of quality", () => {
    expect(buildFormatSelector("mp3", "best")).toBe("bestaudio/best");
    expect(buildFormatSelector("mp3", "360p")).toBe("bestaudio/best");
  });

  it("caps video height by tier", () => {
    expect(buildFormatSelector("mp4", "720p")).toBe("best[height<=720]");
    expect(buildFormatSelector("webm", "240p")).toBe("best[height<=240]");
  });

  it("uses best without a ceiling", () => {
    expect(buildFormatSelector("mp4", "best")).toBe("best");
  });

  it("falls back to best for unknown qualities and treats unknown formats as video", () => {
    expect(buildFormatSelector("mp4", "4k")).toBe("best");
    expect(buildFormatSelector("avi", "720p")).toBe("best[height<=720]");
  });
});

describe("VideoService", () => {
  let extractor: FakeExtractor;
  let service: VideoService;

  beforeEach(() => {
    extractor = new FakeExtractor();
    service = new VideoService({ extractor, maxDurationSeconds: 3600 });
  });

  describe("probe", () => {
    it("returns metadata within the ceiling", async () => {
      extractor.metadata = makeMetadata({ duration: 3600 });

      await expect(service.probe(URL)).resolves.toMatchObject({ duration: 3600 });
      expect(extractor.calls).toEqual([{ mode: "probe", url: URL }]);
    });

    it("rejects a video one second over the ceiling", async () => {
      extractor.metadata = makeMetadata({ duration: 3601 });

      const error = await service.probe(URL).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(VideoTooLongError);
      expect(error).toMatchObject({
        statusCode: 400,
        message: "Video too long (3601s). Maximum allowed: 3600s",
        details: { duration: 3601, max_duration: 3600 },
      });
    });

    it("treats an unknown duration as zero", async () => {
      extractor.metadata = makeMetadata({ duration: null });

      await expect(service.probe(URL)).resolves.toMatchObject({ duration: null });
    });

    it("honours a custom ceiling", async () => {
      service = new VideoService({ extractor, maxDurationSeconds: 60 });
      extractor.metadata = makeMetadata({ duration: 61 });

      await expect(service.probe(URL)).rejects.toThrow("Video too long (61s). Maximum allowed: 60s");
    });

    it("wraps extractor failures as ExtractionError with the original text", async () => {
      extractor.failure = new Error("ERROR: [youtube] abc123: Video unavailable");

      const error = await service.probe(URL).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExtractionError);
      expect(error).toMatchObject({
        statusCode: 400,
        message: "ERROR: [youtube] abc123: Video unavailable",
      });
    });

    it("passes application errors through unchanged", async () => {
      const original = new ExtractionError("Extraction timed out after 60s");
      extractor.failure = original;

      await expect(service.probe(URL)).rejects.toBe(original);
    });
  });

  describe("resolve", () => {
    it("sends the format selector for the request", async () => {
      await service.resolve(URL, "mp4", "720p");
      await service.resolve(URL, "mp3", "best");

      expect(extractor.calls).toEqual([
        { mode: "resolve", url: URL, formatSelector: "best[height<=720]" },
        { mode: "resolve", url: URL, formatSelector: "bestaudio/best" },
      ]);
    });

    it("does not retry a failed extraction", async () => {
      extractor.failure = new Error("network down");

      await expect(service.resolve(URL, "mp4", "best")).rejects.toThrow("network down");
      expect(extractor.calls).toHaveLength(1);
    });
  });
});
