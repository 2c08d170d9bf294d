/**
 * @file cover.ts
 * @description Types for the upload and generation APIs and the generated artifact
 */

import { CoverError } from "../errors/coverError";

/**
 * @type UploadPurpose
 * @description How the upload endpoint should interpret an audio file
 */
export type UploadPurpose = "voice" | "song";

/**
 * @interface UploadResult
 * @description Identifier assigned by the upload endpoint
 */
export interface UploadResult {
  purpose: UploadPurpose;
  assignedId: string;
}

export type OutputFormat = "mp3" | "wav";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["mp3", "wav"];

/**
 * @interface AudioSetting
 * @description Encoding requested for generated audio
 */
export interface AudioSetting {
  sample_rate: number;
  bitrate: number;
  format: OutputFormat;
}

export const DEFAULT_AUDIO_SETTING: AudioSetting = {
  sample_rate: 44100,
  bitrate: 256000,
  format: "mp3",
};

export const DEFAULT_MODEL = "music-01";

/**
 * @interface GenerationOptions
 * @description Caller-facing options for a generation call
 */
export interface GenerationOptions {
  referVoice: string;
  referInstrumental: string;
  /** Lyrics already wrapped by formatLyrics */
  lyrics: string;
  model?: string;
  stream?: boolean;
  audioSetting?: AudioSetting;
}

/**
 * @interface GenerationRequest
 * @description Wire body of the music_generation endpoint
 */
export interface GenerationRequest {
  refer_voice: string;
  refer_instrumental: string;
  lyrics: string;
  model: string;
  stream: boolean;
  audio_setting: AudioSetting;
}

export type MixerBalance = "left" | "center" | "right";

export const MIXER_BALANCES: readonly MixerBalance[] = [
  "left",
  "center",
  "right",
];

/**
 * @interface MixerSettings
 * @description Mixer controls collected in the generation step. Not sent to the generation endpoint.
 */
export interface MixerSettings {
  volume: number;
  balance: MixerBalance;
}

export const DEFAULT_MIXER: MixerSettings = { volume: 75, balance: "center" };

/**
 * @interface CoverArtifact
 * @description A generated cover written to disk and ready for playback or download
 */
export interface CoverArtifact {
  filePath: string;
  fileName: string;
  format: OutputFormat;
  mimeType: string;
  sizeBytes: number;
  durationSeconds: number;
  dataUri: string;
  downloadLink: string;
  createdAt: string;
}

/**
 * @type Outcome
 * @description Result of an external call: a value, or the error that was reported
 */
export type Outcome<T, E extends CoverError = CoverError> =
  | { ok: true; value: T }
  | { ok: false; error: E };
