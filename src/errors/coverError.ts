/**
 * @enum {string}
 * @description Enumeration of possible error codes for cover creation operations
 */
export enum CoverErrorCode {
  INVALID_API_KEY = "INVALID_API_KEY",
  INVALID_REQUEST = "INVALID_REQUEST",
  API_ERROR = "API_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",
  TOOL_ERROR = "TOOL_ERROR",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  MISSING_AUDIO = "MISSING_AUDIO",
  MALFORMED_AUDIO = "MALFORMED_AUDIO",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * @enum {string}
 * @description The step of the pipeline a failure belongs to
 */
export enum FailureKind {
  EXTRACTION = "extraction",
  UPLOAD = "upload",
  GENERATION = "generation",
  VALIDATION = "validation",
}

/**
 * @class CoverError
 * @description Base error class for cover creation operations
 * @extends Error
 */
export class CoverError extends Error {
  /**
   * @constructor
   * @param {FailureKind} kind - Pipeline step that failed
   * @param {CoverErrorCode} code - The error code
   * @param {number} status - HTTP status code if applicable
   * @param {string} [details] - Additional error details
   */
  constructor(
    public readonly kind: FailureKind,
    public readonly code: CoverErrorCode,
    public readonly status: number,
    public readonly details?: string
  ) {
    super(`${code}: ${details || "An error occurred"}`);
    this.name = "CoverError";
    Object.setPrototypeOf(this, CoverError.prototype);
  }
}

/**
 * @class ExtractionError
 * @description Media download or transcode failed
 */
export class ExtractionError extends CoverError {
  constructor(code: CoverErrorCode, details?: string) {
    super(FailureKind.EXTRACTION, code, 500, details);
    this.name = "ExtractionError";
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

/**
 * @class UploadError
 * @description No id could be obtained from the upload endpoint
 */
export class UploadError extends CoverError {
  constructor(code: CoverErrorCode, status: number, details?: string) {
    super(FailureKind.UPLOAD, code, status, details);
    this.name = "UploadError";
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * @class GenerationError
 * @description The generation endpoint did not return usable audio
 */
export class GenerationError extends CoverError {
  constructor(code: CoverErrorCode, status: number, details?: string) {
    super(FailureKind.GENERATION, code, status, details);
    this.name = "GenerationError";
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * @class ValidationError
 * @description A command or request was rejected before any external call
 */
export class ValidationError extends CoverError {
  constructor(details: string) {
    super(FailureKind.VALIDATION, CoverErrorCode.INVALID_REQUEST, 400, details);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
