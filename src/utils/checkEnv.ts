/**
 * @file checkEnv.ts
 * @description Environment validation utilities
 */

import { EnvConfig, defaultConfig, requiredEnvVars } from "../config/env";
import { Logger, parseLogLevel } from "./logger";

/**
 * @function readInt
 * @description Parses an integer variable, falling back to the default when unset or not a number
 */
function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * @function validateEnv
 * @description Validates environment variables and returns a complete config
 * @param {NodeJS.ProcessEnv} [env] - Source of the variables, process.env by default
 * @returns {EnvConfig} Complete configuration with defaults
 * @throws {Error} If required environment variables are missing
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const missingVars = requiredEnvVars.filter((varName) => !env[varName]);

  if (missingVars.length > 0) {
    const errorMessage = `Missing required environment variables: ${missingVars.join(
      ", "
    )}`;
    Logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  // Merge environment variables with defaults
  const config: EnvConfig = {
    PORT: readInt(env.PORT, defaultConfig.PORT),
    HOST: env.HOST || defaultConfig.HOST,
    NODE_ENV: env.NODE_ENV || defaultConfig.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL || defaultConfig.LOG_LEVEL,
    MINIMAX_API_KEY: env.MINIMAX_API_KEY || "",
    MINIMAX_BASE_URL: env.MINIMAX_BASE_URL || defaultConfig.MINIMAX_BASE_URL,
    UPLOAD_TIMEOUT: readInt(env.UPLOAD_TIMEOUT, defaultConfig.UPLOAD_TIMEOUT),
    GENERATION_TIMEOUT: readInt(
      env.GENERATION_TIMEOUT,
      defaultConfig.GENERATION_TIMEOUT
    ),
    DOWNLOAD_DIR: env.DOWNLOAD_DIR || defaultConfig.DOWNLOAD_DIR,
    YT_DLP_PATH: env.YT_DLP_PATH || defaultConfig.YT_DLP_PATH,
  };

  Logger.setLevel(parseLogLevel(config.LOG_LEVEL));
  Logger.debug("Environment configuration:", {
    ...config,
    MINIMAX_API_KEY: "***",
  });
  return config;
}

/**
 * @function getEnvConfig
 * @description Gets the validated environment configuration
 * @returns {EnvConfig} Complete configuration
 */
export function getEnvConfig(): EnvConfig {
  return validateEnv();
}
