/**
 * @file audioArtifacts.ts
 * @description Turns generated audio bytes into a temp file plus playback and download handles
 */

import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parseBuffer } from "music-metadata";
import { v4 as uuidv4 } from "uuid";
import { CoverArtifact, OutputFormat } from "../models/cover";
import { Logger } from "../utils/logger";
import { errorMessage } from "../utils/utils";

export const MIME_TYPES: Record<OutputFormat, string> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
};

/**
 * @function toDataUri
 * @description Base64 data URI of the audio with the MIME type of its format
 */
export function toDataUri(bytes: Buffer, format: OutputFormat): string {
  return `data:${MIME_TYPES[format]};base64,${bytes.toString("base64")}`;
}

/**
 * @function buildDownloadLink
 * @description HTML anchor that downloads the data URI under the given file name
 */
export function buildDownloadLink(
  dataUri: string,
  fileName: string,
  label: string = "AI Cover"
): string {
  return `<a href="${dataUri}" download="${fileName}">Download ${label}</a>`;
}

/**
 * @async
 * @function calculateDuration
 * @description Extracts the duration in seconds from in-memory audio; 0 when it cannot be read.
 */
export async function calculateDuration(
  bytes: Buffer,
  mimeType: string
): Promise<number> {
  try {
    const metadata = await parseBuffer(bytes, mimeType);
    return Math.floor(metadata.format.duration || 0);
  } catch (error) {
    Logger.warn(`Error obtaining audio duration: ${errorMessage(error)}`);
    return 0;
  }
}

/**
 * @class AudioArtifactStore
 * @description Writes each generated cover to its own temp file. Files live until the OS clears them.
 */
export class AudioArtifactStore {
  constructor(private readonly directory: string = os.tmpdir()) {}

  /**
   * @method save
   * @description Persists the bytes with the format's suffix and describes the result
   * @returns {Promise<CoverArtifact>} File location, MIME type, duration and download handles
   */
  async save(bytes: Buffer, format: OutputFormat): Promise<CoverArtifact> {
    await fs.mkdir(this.directory, { recursive: true });
    const fileName = `ai-cover-${uuidv4()}.${format}`;
    const filePath = path.join(this.directory, fileName);
    await fs.writeFile(filePath, bytes);

    const mimeType = MIME_TYPES[format];
    const dataUri = toDataUri(bytes, format);
    const durationSeconds = await calculateDuration(bytes, mimeType);
    Logger.debug(`Saved generated cover to ${filePath}`);

    return {
      filePath,
      fileName,
      format,
      mimeType,
      sizeBytes: bytes.length,
      durationSeconds,
      dataUri,
      downloadLink: buildDownloadLink(dataUri, fileName),
      createdAt: new Date().toISOString(),
    };
  }
}
