/**
 * @file minimaxClient.ts
 * @description Shared plumbing for the MiniMax music endpoints
 */

import axios from "axios";
import { CoverErrorCode } from "../errors/coverError";
import { errorMessage, isRecord } from "../utils/utils";

export const DEFAULT_BASE_URL = "https://api.minimax.chat";

/**
 * @interface MinimaxClientConfig
 * @description Configuration options shared by the MiniMax clients
 */
export interface MinimaxClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
}

/**
 * @interface FailureDescription
 * @description Error code, HTTP status and message derived from a failed request
 */
export interface FailureDescription {
  code: CoverErrorCode;
  status: number;
  details: string;
}

/**
 * @class MinimaxClient
 * @description Base class holding credentials, endpoint and timeout
 */
export abstract class MinimaxClient {
  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeout: number;

  /**
   * @constructor
   * @param {MinimaxClientConfig} config - Credentials and transport options
   * @param {number} defaultTimeout - Timeout used when the config has none
   */
  constructor(config: MinimaxClientConfig, defaultTimeout: number) {
    if (!config.apiKey) {
      throw new Error("MiniMax API key is required");
    }
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeout = config.timeout || defaultTimeout;
  }

  /**
   * @protected
   * @method getRequestHeaders
   * @description Bearer authorization header for every request
   */
  protected getRequestHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  /**
   * @protected
   * @method readBaseResponse
   * @description Returns the service's own error message when base_resp reports a non-zero status
   */
  protected readBaseResponse(body: Record<string, unknown>): string | null {
    const baseResp = body.base_resp;
    if (!isRecord(baseResp)) return null;
    const statusCode = baseResp.status_code;
    if (typeof statusCode !== "number" || statusCode === 0) return null;
    const statusMsg =
      typeof baseResp.status_msg === "string" ? baseResp.status_msg : "";
    return `status_code ${statusCode}${statusMsg ? `: ${statusMsg}` : ""}`;
  }

  /**
   * @protected
   * @method describeError
   * @description Maps an axios or unknown error onto an error code and status
   */
  protected describeError(error: unknown, action: string): FailureDescription {
    if (axios.isAxiosError(error)) {
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return {
          code: CoverErrorCode.TIMEOUT,
          status: 408,
          details: `${action} timed out after ${this.timeout}ms`,
        };
      }
      if (error.response) {
        return {
          code:
            error.response.status === 401
              ? CoverErrorCode.INVALID_API_KEY
              : CoverErrorCode.API_ERROR,
          status: error.response.status,
          details: `${action} failed with HTTP ${error.response.status}`,
        };
      }
      return {
        code: CoverErrorCode.NETWORK_ERROR,
        status: 503,
        details: `Network error during ${action}: ${error.message}`,
      };
    }
    return {
      code: CoverErrorCode.UNKNOWN_ERROR,
      status: 500,
      details: `Unknown error during ${action}: ${errorMessage(error)}`,
    };
  }
}
