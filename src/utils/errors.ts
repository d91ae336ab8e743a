import { InstallerError, ErrorCodes, CommandResult } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure modes of the installer
 */

export class ResolutionError extends InstallerError {
  constructor(packageName: string) {
    super(
      `Unable to get primary namespace for package ${packageName}.\n` +
      `Ensure you have added a proper 'autoload' section with a psr-4 mapping to its ${FILE_PATTERNS.COMPOSER_JSON}.`,
      ErrorCodes.RESOLUTION_ERROR,
      { packageName }
    );
    this.name = 'ResolutionError';
  }
}

export class FileSystemError extends InstallerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class MalformedPackageMapError extends InstallerError {
  constructor(file: string, reason: string) {
    super(
      `${file} is invalid (${reason}). Package path configuration not updated.`,
      ErrorCodes.MALFORMED_PACKAGE_MAP,
      { file, reason }
    );
    this.name = 'MalformedPackageMapError';
  }
}

export class ValidationError extends InstallerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends InstallerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof InstallerError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
