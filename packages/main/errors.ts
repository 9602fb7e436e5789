import { ERROR_CODES, ErrorCode } from '../shared/constants/index.js';

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class InputNotFoundError extends PipelineError {
  constructor(filePath: string) {
    super(ERROR_CODES.INPUT_NOT_FOUND, `Input file not found: ${filePath}`);
    this.name = 'InputNotFoundError';
  }
}

export class NoSpeechDetectedError extends PipelineError {
  constructor(message = 'No speech detected.') {
    super(ERROR_CODES.NO_SPEECH_DETECTED, message);
    this.name = 'NoSpeechDetectedError';
  }
}

export class NoRetainableContentError extends PipelineError {
  constructor(message = 'No media segments remain after trimming.') {
    super(ERROR_CODES.NO_RETAINABLE_CONTENT, message);
    this.name = 'NoRetainableContentError';
  }
}

export class TranscodeFailureError extends PipelineError {
  readonly diagnostics: string;

  constructor(message: string, diagnostics: string) {
    super(ERROR_CODES.TRANSCODE_FAILURE, message);
    this.name = 'TranscodeFailureError';
    this.diagnostics = diagnostics;
  }
}

export class SegmentationInputError extends PipelineError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_SEGMENTATION_INPUT, message);
    this.name = 'SegmentationInputError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_CONFIG, message);
    this.name = 'ConfigError';
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new DOMException('Operation cancelled', 'AbortError');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
