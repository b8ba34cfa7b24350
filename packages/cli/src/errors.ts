import { isGalleryError } from '@vsx-gallery/gallery';
import type { ExitCode } from './types.js';

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (isGalleryError(error)) {
    let exitCode: ExitCode = 1;
    if (error.code === 'CONFIG_ERROR') {
      exitCode = 3;
    } else if (error.code === 'CATALOG_ERROR') {
      exitCode = 4;
    }

    return new CliError(
      { code: error.code, message: error.message, suggestion: error.suggestion, exitCode },
      { cause: error },
    );
  }

  if (error instanceof Error) {
    return new CliError(
      {
        code: 'INTERNAL_ERROR',
        message: error.message,
        exitCode: 1,
        suggestion: 'Re-run with --verbose for more detail.',
      },
      { cause: error },
    );
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: 1,
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'INVALID_ARGUMENT',
    message,
    exitCode: 2,
    suggestion,
  });
}

export function validateError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'VALIDATION_ERROR',
    message,
    exitCode: 4,
    suggestion,
  });
}
