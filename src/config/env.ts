/**
 * @file env.ts
 * @description Environment configuration and validation
 */

import dotenv from "dotenv";

dotenv.config();

export interface EnvConfig {
  PORT: number;
  HOST: string;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MINIMAX_API_KEY: string;
  MINIMAX_BASE_URL: string;
  UPLOAD_TIMEOUT: number;
  GENERATION_TIMEOUT: number;
  DOWNLOAD_DIR: string;
  YT_DLP_PATH: string;
}

/**
 * @constant defaultConfig
 * @description Default configuration values
 */
export const defaultConfig: Omit<EnvConfig, "MINIMAX_API_KEY"> = {
  PORT: 8003,
  HOST: "localhost",
  NODE_ENV: "development",
  LOG_LEVEL: "info",
  MINIMAX_BASE_URL: "https://api.minimax.chat",
  UPLOAD_TIMEOUT: 30000,
  GENERATION_TIMEOUT: 60000, // 1 minute
  DOWNLOAD_DIR: "downloads",
  YT_DLP_PATH: "yt-dlp",
};

/**
 * @constant requiredEnvVars
 * @description List of required environment variables
 */
export const requiredEnvVars: (keyof EnvConfig)[] = ["MINIMAX_API_KEY"];
