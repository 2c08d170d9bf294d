/**
 * @file mediaFetcher.test.ts
 * @description Unit tests for MediaFetcher with a fake yt-dlp runner
 */

import { createHash } from "crypto";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import {
  CommandRunner,
  MediaFetcher,
  shortenAudioPath,
} from "../../../src/services/mediaFetcher";
import { CoverErrorCode, FailureKind } from "../../../src/errors/coverError";

// Mock Logger to keep console output clean
jest.mock("../../../src/utils/logger", () => ({
  Logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    success: jest.fn(),
  },
}));

const VIDEO_URL = "https://www.youtube.com/watch?v=abc123";

/**
 * @function fakeRunner
 * @description Writes a file named `fileName` into the output directory and prints its path
 */
const fakeRunner = (outputDir: string, fileName: string) =>
  jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(async () => {
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, "ID3");
    return { stdout: `[info] done\n${filePath}\n`, stderr: "" };
  });

describe("shortenAudioPath", () => {
  it("should keep paths of at most 200 characters", () => {
    const filePath = `/music/${"a".repeat(189)}.mp3`;
    expect(filePath).toHaveLength(200);
    expect(shortenAudioPath(filePath, "voice")).toBe(filePath);
  });

  it("should hash longer paths into {purpose}_{md5}.mp3", () => {
    const filePath = `/music/voice_${"b".repeat(200)}.mp3`;
    const digest = createHash("md5").update(filePath).digest("hex");
    expect(shortenAudioPath(filePath, "voice")).toBe(
      `/music/voice_${digest}.mp3`
    );
  });

  it("should be deterministic for the same original name", () => {
    const filePath = `/music/${"c".repeat(250)}.mp3`;
    expect(shortenAudioPath(filePath, "instrumental")).toBe(
      shortenAudioPath(filePath, "instrumental")
    );
  });
});

describe("MediaFetcher", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "media-fetcher-"));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("should return the path printed by the extraction tool", async () => {
    const runner = fakeRunner(outputDir, "voice_My Song.mp3");
    const fetcher = new MediaFetcher({ outputDir, runner });

    const result = await fetcher.fetch(VIDEO_URL, "voice");

    expect(result).toEqual({
      ok: true,
      value: path.join(outputDir, "voice_My Song.mp3"),
    });
  });

  it("should request best audio as 192K mp3 named after the purpose", async () => {
    const runner = fakeRunner(outputDir, "song.mp3");
    const fetcher = new MediaFetcher({
      outputDir,
      runner,
      binaryPath: "/opt/yt-dlp",
    });

    await fetcher.fetch(VIDEO_URL, "instrumental");

    expect(runner).toHaveBeenCalledTimes(1);
    const [binary, args] = runner.mock.calls[0];
    expect(binary).toBe("/opt/yt-dlp");
    expect(args).toEqual([
      "--no-playlist",
      "--format",
      "bestaudio/best",
      "--extract-audio",
      "--audio-format",
      "mp3",
      "--audio-quality",
      "192K",
      "--output",
      path.join(outputDir, "instrumental_%(title).50s.%(ext)s"),
      "--print",
      "after_move:filepath",
      VIDEO_URL,
    ]);
  });

  it("should rename outputs whose path exceeds 200 characters", async () => {
    const longName = `voice_${"x".repeat(210)}.mp3`;
    const runner = fakeRunner(outputDir, longName);
    const fetcher = new MediaFetcher({ outputDir, runner });
    const original = path.join(outputDir, longName);
    const digest = createHash("md5").update(original).digest("hex");

    const result = await fetcher.fetch(VIDEO_URL, "voice");

    const expected = path.join(outputDir, `voice_${digest}.mp3`);
    expect(result).toEqual({ ok: true, value: expected });
    await expect(fs.access(expected)).resolves.toBeUndefined();
    await expect(fs.access(original)).rejects.toThrow();
  });

  it("should reuse a cached download for the same url and purpose", async () => {
    const runner = fakeRunner(outputDir, "voice_cached.mp3");
    const fetcher = new MediaFetcher({ outputDir, runner });

    await fetcher.fetch(VIDEO_URL, "voice");
    const second = await fetcher.fetch(VIDEO_URL, "voice");

    expect(runner).toHaveBeenCalledTimes(1);
    expect(second).toEqual({
      ok: true,
      value: path.join(outputDir, "voice_cached.mp3"),
    });
  });

  it("should report an extraction failure for a non-http url", async () => {
    const runner = fakeRunner(outputDir, "never.mp3");
    const fetcher = new MediaFetcher({ outputDir, runner });

    const result = await fetcher.fetch("not a url", "voice");

    expect(runner).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(FailureKind.EXTRACTION);
      expect(result.error.code).toBe(CoverErrorCode.INVALID_REQUEST);
    }
  });

  it("should report tool errors without throwing", async () => {
    const runner = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(
      async () => {
        throw new Error("ERROR: Video unavailable");
      }
    );
    const fetcher = new MediaFetcher({ outputDir, runner });

    const result = await fetcher.fetch(VIDEO_URL, "voice");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(FailureKind.EXTRACTION);
      expect(result.error.code).toBe(CoverErrorCode.TOOL_ERROR);
      expect(result.error.details).toBe("ERROR: Video unavailable");
    }
  });

  it("should fail when the tool prints no output path", async () => {
    const runner = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(
      async () => ({ stdout: "\n\n", stderr: "" })
    );
    const fetcher = new MediaFetcher({ outputDir, runner });

    const result = await fetcher.fetch(VIDEO_URL, "voice");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(CoverErrorCode.INVALID_RESPONSE);
    }
  });

  it("should fail when the printed file does not exist", async () => {
    const missing = path.join(outputDir, "missing.mp3");
    const runner = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(
      async () => ({ stdout: `${missing}\n`, stderr: "" })
    );
    const fetcher = new MediaFetcher({ outputDir, runner });

    const result = await fetcher.fetch(VIDEO_URL, "voice");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toBe(`Extracted file not found: ${missing}`);
    }
  });
});
