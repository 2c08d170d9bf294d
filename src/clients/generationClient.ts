/**
 * @file generationClient.ts
 * @description Client for the MiniMax music_generation endpoint
 */

import axios from "axios";
import {
  CoverErrorCode,
  GenerationError,
  ValidationError,
} from "../errors/coverError";
import {
  DEFAULT_AUDIO_SETTING,
  DEFAULT_MODEL,
  GenerationOptions,
  GenerationRequest,
  Outcome,
} from "../models/cover";
import { Logger } from "../utils/logger";
import { MinimaxClient, MinimaxClientConfig } from "./minimaxClient";
import { isRecord } from "../utils/utils";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * @function decodeHexAudio
 * @description Decodes the hex audio payload, or returns null when it is not whole-byte hex
 */
export function decodeHexAudio(hex: string): Buffer | null {
  const trimmed = hex.trim();
  if (!HEX_PATTERN.test(trimmed)) {
    return null;
  }
  return Buffer.from(trimmed, "hex");
}

/**
 * @class GenerationClient
 * @description Requests an AI cover from uploaded voice and instrumental references
 */
export class GenerationClient extends MinimaxClient {
  constructor(config: MinimaxClientConfig) {
    super(config, 60000);
  }

  /**
   * @method buildRequest
   * @description Fills in model, stream flag and audio setting defaults
   */
  buildRequest(options: GenerationOptions): GenerationRequest {
    return {
      refer_voice: options.referVoice,
      refer_instrumental: options.referInstrumental,
      lyrics: options.lyrics,
      model: options.model || DEFAULT_MODEL,
      stream: options.stream ?? false,
      audio_setting: options.audioSetting || { ...DEFAULT_AUDIO_SETTING },
    };
  }

  private validate(options: GenerationOptions): ValidationError | null {
    if (!options.lyrics.trim()) {
      return new ValidationError("Lyrics are required for music generation.");
    }
    if (!options.referVoice.trim() || !options.referInstrumental.trim()) {
      return new ValidationError(
        "Both a voice id and an instrumental id are required for music generation."
      );
    }
    return null;
  }

  private toGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) return error;
    const { code, status, details } = this.describeError(
      error,
      "music generation"
    );
    return new GenerationError(code, status, details);
  }

  /**
   * @method generate
   * @description Sends a generation request and decodes the returned audio
   * @param {GenerationOptions} options - Reference ids, formatted lyrics and audio settings
   * @returns {Promise<Outcome<Buffer>>} Raw audio bytes, or the validation / generation failure
   */
  async generate(options: GenerationOptions): Promise<Outcome<Buffer>> {
    const invalid = this.validate(options);
    if (invalid) {
      Logger.error(invalid.details || invalid.message);
      return { ok: false, error: invalid };
    }

    const payload = this.buildRequest(options);

    try {
      Logger.info(
        `Generating music with ${payload.model} (voice ${payload.refer_voice}, instrumental ${payload.refer_instrumental})...`
      );
      const response = await axios.post(
        `${this.baseUrl}/v1/music_generation`,
        payload,
        {
          headers: {
            ...this.getRequestHeaders(),
            "Content-Type": "application/json",
          },
          timeout: this.timeout,
        }
      );

      const body: unknown = response.data;
      if (!isRecord(body)) {
        throw new GenerationError(
          CoverErrorCode.INVALID_RESPONSE,
          response.status,
          "Generation response is not a JSON object"
        );
      }

      const apiError = this.readBaseResponse(body);
      if (apiError) {
        throw new GenerationError(
          CoverErrorCode.API_ERROR,
          response.status,
          apiError
        );
      }

      const audio = isRecord(body.data) ? body.data.audio : undefined;
      if (typeof audio !== "string" || !audio) {
        throw new GenerationError(
          CoverErrorCode.MISSING_AUDIO,
          response.status,
          "Audio data not found in API response"
        );
      }

      const bytes = decodeHexAudio(audio);
      if (!bytes) {
        throw new GenerationError(
          CoverErrorCode.MALFORMED_AUDIO,
          response.status,
          "Error converting audio data: payload is not valid hex"
        );
      }

      Logger.success(`Received ${bytes.length} bytes of generated audio`);
      return { ok: true, value: bytes };
    } catch (error) {
      const failure = this.toGenerationError(error);
      Logger.error(`Error generating music: ${failure.details}`);
      return { ok: false, error: failure };
    }
  }
}
