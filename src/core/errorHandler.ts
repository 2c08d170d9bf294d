/**
 * @file errorHandler.ts
 * @description Maps errors raised in HTTP handlers onto JSON responses
 */

import { Response } from "express";
import { CoverError } from "../errors/coverError";
import { Logger } from "../utils/logger";

/**
 * @class ErrorHandler
 * @description HTTP error responses for the cover studio API
 */
export class ErrorHandler {
  /**
   * @static
   * @method handleHttpError
   * @description Handles an error in an HTTP response
   * @param {unknown} error - Error to handle
   * @param {Response} res - Express response object
   */
  public static handleHttpError(error: unknown, res: Response): void {
    if (error instanceof CoverError) {
      Logger.warn(`HTTP Error: ${error.message}`);
      res.status(error.status).json({
        error: error.details || error.message,
        code: error.code,
        failure: error.kind,
      });
      return;
    }
    Logger.error(
      `HTTP Error: ${error instanceof Error ? error.message : String(error)}`
    );
    res.status(500).json({ error: "Internal server error" });
  }
}
