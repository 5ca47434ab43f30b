// Core types for nuforge

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Configuration types

export type SourceProtocol = 'local' | 'v2' | 'v3';

export interface SourceConfig {
  name: string;
  /** Feed URL or local directory. */
  source: string;
  protocolVersion?: string;
  enabled?: boolean;
  username?: string;
  password?: string;
  updateBatchSize?: number;
  supportsPackageIdSearchFilter?: boolean;
}

export type RuntimeCompatibility = 'legacy-runtime' | 'standard-runtime';

export interface ProfileConfig {
  nativeLabel?: string;
  hostVersion?: string;
  compatibility?: RuntimeCompatibility;
}

export interface NuforgeConfig {
  repositoryPath: string;
  manifestPath: string;
  sources: SourceConfig[];
  profile: ProfileConfig;
  timeoutMs: number;
  /** Directory downloaded archives are kept in; see `resolveCacheDirectory`. */
  cachePath?: string;
  installFromCache: boolean;
}

// Error types

export class NuforgeError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'NuforgeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PARSE_ERROR = 'PARSE_ERROR',
  UNRESOLVABLE = 'UNRESOLVABLE',
  AMBIGUOUS_PROFILE = 'AMBIGUOUS_PROFILE',
  INSTALL_STEP_FAILED = 'INSTALL_STEP_FAILED',
  MANIFEST_INCONSISTENT = 'MANIFEST_INCONSISTENT',
  MANIFEST_UNREADABLE = 'MANIFEST_UNREADABLE',
  SOURCE_ERROR = 'SOURCE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
