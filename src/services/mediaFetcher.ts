/**
 * @file mediaFetcher.ts
 * @description Pulls the audio track of a video URL through yt-dlp and stores it as mp3
 */

import { execFile } from "child_process";
import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { CoverErrorCode, ExtractionError } from "../errors/coverError";
import { Outcome } from "../models/cover";
import { Logger } from "../utils/logger";
import { errorMessage } from "../utils/utils";

export const MAX_PATH_LENGTH = 200;

/**
 * @type CommandRunner
 * @description Runs an external binary and resolves with its stdout
 */
export type CommandRunner = (
  file: string,
  args: string[]
) => Promise<{ stdout: string; stderr: string }>;

/**
 * @function execFileRunner
 * @description Default CommandRunner backed by child_process.execFile
 */
export const execFileRunner: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { maxBuffer: 10 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({ stdout: String(stdout), stderr: String(stderr) });
      }
    );
  });

/**
 * @function shortenAudioPath
 * @description Replaces an over-long path with `{purpose}_{md5(path)}.mp3` in the same directory
 * @param {string} filePath - Path produced by the extraction tool
 * @param {string} purpose - Tag used as filename prefix
 * @param {number} [maxLength] - Longest path kept as is
 * @returns {string} The original path, or its hashed replacement
 */
export function shortenAudioPath(
  filePath: string,
  purpose: string,
  maxLength: number = MAX_PATH_LENGTH
): string {
  if (filePath.length <= maxLength) {
    return filePath;
  }
  const digest = createHash("md5").update(filePath).digest("hex");
  return path.join(path.dirname(filePath), `${purpose}_${digest}.mp3`);
}

/**
 * @interface MediaFetcherConfig
 * @description Configuration options for the media fetcher
 */
export interface MediaFetcherConfig {
  outputDir: string;
  binaryPath?: string;
  audioQuality?: string;
  runner?: CommandRunner;
}

/**
 * @class MediaFetcher
 * @description Downloads the best audio stream of a URL and converts it to mp3
 */
export class MediaFetcher {
  private readonly outputDir: string;
  private readonly binaryPath: string;
  private readonly audioQuality: string;
  private readonly runner: CommandRunner;
  private readonly cache: Map<string, string> = new Map();

  constructor(config: MediaFetcherConfig) {
    this.outputDir = config.outputDir;
    this.binaryPath = config.binaryPath || "yt-dlp";
    this.audioQuality = config.audioQuality || "192K";
    this.runner = config.runner || execFileRunner;
  }

  /**
   * @private
   * @method buildArgs
   * @description yt-dlp arguments: best audio, mp3 extraction, final path printed on stdout
   */
  private buildArgs(url: string, purpose: string): string[] {
    return [
      "--no-playlist",
      "--format",
      "bestaudio/best",
      "--extract-audio",
      "--audio-format",
      "mp3",
      "--audio-quality",
      this.audioQuality,
      "--output",
      path.join(this.outputDir, `${purpose}_%(title).50s.%(ext)s`),
      "--print",
      "after_move:filepath",
      url,
    ];
  }

  /**
   * @private
   * @method validateUrl
   * @description Rejects anything that is not an absolute http(s) URL
   */
  private validateUrl(url: string): ExtractionError | null {
    let protocol = "";
    try {
      protocol = new URL(url).protocol;
    } catch (error) {
      Logger.debug(`Unparsable URL ${url}: ${errorMessage(error)}`);
    }
    if (protocol === "http:" || protocol === "https:") {
      return null;
    }
    return new ExtractionError(
      CoverErrorCode.INVALID_REQUEST,
      `Not a playable media URL: ${url}`
    );
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * @method fetch
   * @description Downloads and transcodes the audio of a URL
   * @param {string} url - Video page or media URL
   * @param {string} purpose - Tag used as filename prefix
   * @returns {Promise<Outcome<string, ExtractionError>>} Local mp3 path, or the extraction failure
   */
  async fetch(
    url: string,
    purpose: string
  ): Promise<Outcome<string, ExtractionError>> {
    const invalid = this.validateUrl(url);
    if (invalid) {
      Logger.error(`Error downloading audio: ${invalid.details}`);
      return { ok: false, error: invalid };
    }

    const cacheKey = `${purpose}\n${url}`;
    const cached = this.cache.get(cacheKey);
    if (cached && (await this.exists(cached))) {
      Logger.debug(`Reusing ${cached} for ${url}`);
      return { ok: true, value: cached };
    }

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      Logger.info(`Extracting ${purpose} audio from ${url}...`);
      const { stdout } = await this.runner(
        this.binaryPath,
        this.buildArgs(url, purpose)
      );

      const printed = stdout
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .pop();
      if (!printed) {
        throw new ExtractionError(
          CoverErrorCode.INVALID_RESPONSE,
          "Extraction tool did not report an output file"
        );
      }

      let filePath = printed;
      const shortened = shortenAudioPath(filePath, purpose);
      if (shortened !== filePath) {
        await fs.rename(filePath, shortened);
        Logger.debug(`Renamed long output file to ${shortened}`);
        filePath = shortened;
      }

      if (!(await this.exists(filePath))) {
        throw new ExtractionError(
          CoverErrorCode.INVALID_RESPONSE,
          `Extracted file not found: ${filePath}`
        );
      }

      this.cache.set(cacheKey, filePath);
      Logger.success(`Extracted ${purpose} audio to ${filePath}`);
      return { ok: true, value: filePath };
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(
              CoverErrorCode.TOOL_ERROR,
              errorMessage(error)
            );
      Logger.error(`Error downloading audio: ${failure.details}`);
      return { ok: false, error: failure };
    }
  }
}
