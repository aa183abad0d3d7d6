export enum OCRErrorCode {
  NO_FRAME = 'NO_FRAME',
  NO_LAYOUT_MATCH = 'NO_LAYOUT_MATCH',
  DEGENERATE_CROP = 'DEGENERATE_CROP',
  ENGINE_FAILURE = 'ENGINE_FAILURE',
  ENGINE_LOAD_FAILED = 'ENGINE_LOAD_FAILED',
  UNSUPPORTED_PIXEL_FORMAT = 'UNSUPPORTED_PIXEL_FORMAT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  PROJECTION_FAILED = 'PROJECTION_FAILED',
}

export interface ErrorMessage {
  code: OCRErrorCode;
  message: string;
  recoverySuggestion?: string;
}

export class OCRError extends Error {
  public readonly code: OCRErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: OCRErrorCode, recoverable: boolean = true, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OCRError';
    this.code = code;
    this.recoverable = recoverable;
  }
}
