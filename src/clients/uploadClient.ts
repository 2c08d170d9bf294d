/**
 * @file uploadClient.ts
 * @description Client for the MiniMax music_upload endpoint
 */

import axios from "axios";
import { promises as fs } from "fs";
import path from "path";
import { CoverErrorCode, UploadError } from "../errors/coverError";
import { Outcome, UploadPurpose, UploadResult } from "../models/cover";
import { Logger } from "../utils/logger";
import { MinimaxClient, MinimaxClientConfig } from "./minimaxClient";
import { errorMessage, isRecord } from "../utils/utils";

const ID_FIELDS: Record<UploadPurpose, string> = {
  voice: "voice_id",
  song: "instrumental_id",
};

/**
 * @class UploadClient
 * @description Uploads reference audio and returns the id the service assigns to it
 */
export class UploadClient extends MinimaxClient {
  constructor(config: MinimaxClientConfig) {
    super(config, 30000);
  }

  private toUploadError(error: unknown): UploadError {
    if (error instanceof UploadError) return error;
    const { code, status, details } = this.describeError(error, "upload");
    return new UploadError(code, status, details);
  }

  /**
   * @method upload
   * @description Posts a local audio file as multipart form data
   * @param {string} filePath - Local audio file
   * @param {UploadPurpose} purpose - "voice" for vocals, "song" for an instrumental
   * @returns {Promise<Outcome<UploadResult, UploadError>>} The assigned id, or why none was obtained
   */
  async upload(
    filePath: string,
    purpose: UploadPurpose
  ): Promise<Outcome<UploadResult, UploadError>> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      const failure = new UploadError(
        CoverErrorCode.INVALID_REQUEST,
        400,
        `Cannot read ${filePath}: ${errorMessage(error)}`
      );
      Logger.error(`Error uploading ${purpose} audio file: ${failure.details}`);
      return { ok: false, error: failure };
    }

    try {
      const form = new FormData();
      form.append("file", new Blob([bytes]), path.basename(filePath));
      form.append("purpose", purpose);

      Logger.info(`Uploading ${purpose} audio ${path.basename(filePath)}...`);
      const response = await axios.post(`${this.baseUrl}/v1/music_upload`, form, {
        headers: this.getRequestHeaders(),
        timeout: this.timeout,
      });

      const body: unknown = response.data;
      if (!isRecord(body)) {
        throw new UploadError(
          CoverErrorCode.INVALID_RESPONSE,
          response.status,
          "Upload response is not a JSON object"
        );
      }

      const apiError = this.readBaseResponse(body);
      if (apiError) {
        throw new UploadError(CoverErrorCode.API_ERROR, response.status, apiError);
      }

      const field = ID_FIELDS[purpose];
      const assignedId = body[field];
      if (typeof assignedId !== "string" || !assignedId) {
        throw new UploadError(
          CoverErrorCode.INVALID_RESPONSE,
          response.status,
          `Upload response has no ${field}`
        );
      }

      Logger.success(`Obtained ${field}: ${assignedId}`);
      return { ok: true, value: { purpose, assignedId } };
    } catch (error) {
      const failure = this.toUploadError(error);
      Logger.error(`Error uploading ${purpose} audio file: ${failure.details}`);
      return { ok: false, error: failure };
    }
  }
}
