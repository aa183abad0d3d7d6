import { OCRError, OCRErrorCode, type ErrorMessage } from '@/types/ocr-errors';

export const ERROR_MESSAGES: Record<OCRErrorCode, ErrorMessage> = {
  [OCRErrorCode.NO_FRAME]: {
    code: OCRErrorCode.NO_FRAME,
    message: 'No captured frame is available yet.',
    recoverySuggestion: 'Wait for the capture source to deliver a frame and trigger again.',
  },
  [OCRErrorCode.NO_LAYOUT_MATCH]: {
    code: OCRErrorCode.NO_LAYOUT_MATCH,
    message: 'No configured layout matches the captured frame.',
    recoverySuggestion: 'Add a layout for this resolution or relax its pixel checks.',
  },
  [OCRErrorCode.DEGENERATE_CROP]: {
    code: OCRErrorCode.DEGENERATE_CROP,
    message: 'The OCR region has zero width or height.',
    recoverySuggestion: 'Check the layout offset, size and reference resolution.',
  },
  [OCRErrorCode.ENGINE_FAILURE]: {
    code: OCRErrorCode.ENGINE_FAILURE,
    message: 'The OCR engine failed to process the region.',
    recoverySuggestion: 'Trigger OCR again; restart the engine if it keeps failing.',
  },
  [OCRErrorCode.ENGINE_LOAD_FAILED]: {
    code: OCRErrorCode.ENGINE_LOAD_FAILED,
    message: 'Failed to load OCR engine.',
    recoverySuggestion: 'Check that the language data can be downloaded or is cached locally.',
  },
  [OCRErrorCode.UNSUPPORTED_PIXEL_FORMAT]: {
    code: OCRErrorCode.UNSUPPORTED_PIXEL_FORMAT,
    message: 'The capture pixel format is not supported.',
    recoverySuggestion: 'Configure the capture source to deliver BGRA, RGBA, BGRx or RGBx frames.',
  },
  [OCRErrorCode.INVALID_CONFIG]: {
    code: OCRErrorCode.INVALID_CONFIG,
    message: 'The settings file is invalid.',
    recoverySuggestion: 'Fix the reported field or delete the file to regenerate defaults.',
  },
  [OCRErrorCode.PROJECTION_FAILED]: {
    code: OCRErrorCode.PROJECTION_FAILED,
    message: 'Could not map OCR coordinates to the screen.',
    recoverySuggestion: 'Make sure the overlay viewport has a non-zero size.',
  },
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  if (error instanceof OCRError) {
    const fallback = ERROR_MESSAGES[error.code];
    return {
      code: error.code,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  if (error instanceof Error) {
    return {
      code: OCRErrorCode.ENGINE_FAILURE,
      message: error.message || ERROR_MESSAGES[OCRErrorCode.ENGINE_FAILURE].message,
      recoverySuggestion: ERROR_MESSAGES[OCRErrorCode.ENGINE_FAILURE].recoverySuggestion,
    };
  }

  return {
    code: OCRErrorCode.ENGINE_FAILURE,
    message: ERROR_MESSAGES[OCRErrorCode.ENGINE_FAILURE].message,
    recoverySuggestion: ERROR_MESSAGES[OCRErrorCode.ENGINE_FAILURE].recoverySuggestion,
  };
}

export function logError(error: unknown): void {
  console.error('[OCR]', error);
}

export function logWarning(message: string, ...details: unknown[]): void {
  console.warn('[OCR]', message, ...details);
}

export function logInfo(message: string, ...details: unknown[]): void {
  console.info('[OCR]', message, ...details);
}

export function logDebug(message: string, ...details: unknown[]): void {
  if (process.env.OCR_DEBUG) {
    console.debug('[OCR]', message, ...details);
  }
}

const reportedOnce = new Set<string>();

/** Logs `message` the first time `key` is seen in this process. */
export function logErrorOnce(key: string, message: string): void {
  if (reportedOnce.has(key)) {
    return;
  }
  reportedOnce.add(key);
  console.error('[OCR]', message);
}

export function createDegenerateCropError(width: number, height: number): OCRError {
  return new OCRError(
    `OCR region is ${width}x${height}; both dimensions must be non-zero.`,
    OCRErrorCode.DEGENERATE_CROP,
    true
  );
}

export function createEngineFailureError(cause: unknown): OCRError {
  if (cause instanceof OCRError) {
    return cause;
  }
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new OCRError(
    `${ERROR_MESSAGES[OCRErrorCode.ENGINE_FAILURE].message} ${detail}`.trim(),
    OCRErrorCode.ENGINE_FAILURE,
    true,
    { cause }
  );
}

export function createEngineLoadError(engineId: string, cause: unknown): OCRError {
  const detail = cause instanceof Error ? cause.message : 'Unknown error';
  return new OCRError(
    `Failed to load OCR engine ${engineId}: ${detail}`,
    OCRErrorCode.ENGINE_LOAD_FAILED,
    true,
    { cause }
  );
}

export function createInvalidConfigError(message?: string): OCRError {
  return new OCRError(
    message ?? ERROR_MESSAGES[OCRErrorCode.INVALID_CONFIG].message,
    OCRErrorCode.INVALID_CONFIG,
    false
  );
}

export function createProjectionFailedError(): OCRError {
  return new OCRError(
    ERROR_MESSAGES[OCRErrorCode.PROJECTION_FAILED].message,
    OCRErrorCode.PROJECTION_FAILED,
    true
  );
}
