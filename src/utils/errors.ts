import { NuforgeError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for every failure kind the resolver and installer report.
 * Resolution errors travel inside Result values; the CLI renders them by code.
 */

export class ParseError extends NuforgeError {
  constructor(input: string, reason: string) {
    super(`Cannot parse '${input}': ${reason}`, ErrorCodes.PARSE_ERROR, { input, reason });
    this.name = 'ParseError';
  }
}

export class UnresolvableError extends NuforgeError {
  constructor(
    packageName: string,
    details: {
      spec: string;
      sources: string[];
      requiredBy?: string;
    }
  ) {
    const via = details.requiredBy ? ` (required by ${details.requiredBy})` : '';
    const searched = details.sources.length > 0 ? details.sources.join(', ') : 'no enabled sources';
    super(
      `No source provides '${packageName}' matching '${details.spec}'${via}. Searched: ${searched}`,
      ErrorCodes.UNRESOLVABLE,
      { packageName, ...details }
    );
    this.name = 'UnresolvableError';
  }
}

export class AmbiguousProfileError extends NuforgeError {
  constructor(packageName: string, labels: string[], profile: string) {
    super(
      `No dependency group of '${packageName}' is compatible with profile '${profile}'. Published: ${labels.map((l) => l || '(any)').join(', ')}`,
      ErrorCodes.AMBIGUOUS_PROFILE,
      { packageName, labels, profile }
    );
    this.name = 'AmbiguousProfileError';
  }
}

export class InstallStepError extends NuforgeError {
  constructor(packageName: string, step: 'install' | 'uninstall', reason: string) {
    super(`Failed to ${step} '${packageName}': ${reason}`, ErrorCodes.INSTALL_STEP_FAILED, { packageName, step, reason });
    this.name = 'InstallStepError';
  }
}

export class ManifestConsistencyWarning extends NuforgeError {
  constructor(packageName: string, reason: string) {
    super(`Manifest and install folder disagree on '${packageName}': ${reason}`, ErrorCodes.MANIFEST_INCONSISTENT, {
      packageName,
      reason
    });
    this.name = 'ManifestConsistencyWarning';
  }
}

/** The manifest exists but cannot be parsed; nothing may act on its contents. */
export class ManifestReadError extends NuforgeError {
  constructor(path: string, reason: string) {
    super(`Cannot read manifest ${path}: ${reason}`, ErrorCodes.MANIFEST_UNREADABLE, { path, reason });
    this.name = 'ManifestReadError';
  }
}

export class SourceError extends NuforgeError {
  constructor(sourceName: string, message: string, details?: unknown) {
    super(`Source '${sourceName}': ${message}`, ErrorCodes.SOURCE_ERROR, details);
    this.name = 'SourceError';
  }
}

export class FileSystemError extends NuforgeError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends NuforgeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof NuforgeError) {
    // Details only surface in verbose mode
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
