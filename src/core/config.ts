import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS, NUGET_ORG_SOURCE } from '../constants/index.js';
import type { NuforgeConfig, ProfileConfig, RuntimeCompatibility, SourceConfig } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_NATIVE_LABEL } from './platform/profile-tiers.js';
import type { PlatformProfileProvider, TargetProfile } from './platform/target-profile-resolver.js';

/**
 * Project configuration, read from `nuforge.jsonc` (or `nuforge.json`) in the
 * working directory. Comments and trailing commas are accepted.
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

export type Environment = Record<string, string | undefined>;

function defaultConfig(): NuforgeConfig {
  return {
    repositoryPath: DEFAULTS.REPOSITORY_PATH,
    manifestPath: FILE_PATTERNS.MANIFEST_YML,
    sources: [{ ...NUGET_ORG_SOURCE }],
    profile: {},
    timeoutMs: DEFAULTS.TIMEOUT_MS,
    installFromCache: true
  };
}

/**
 * Expand `%NAME%` and `${NAME}` from the environment. Unknown names are left
 * as written.
 */
export function expandEnvironment(text: string, env: Environment = process.env): string {
  const lookup = (match: string, name: string): string => env[name] ?? match;
  return text.replace(/%([A-Za-z_][A-Za-z0-9_]*)%/g, lookup).replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, lookup);
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: RawObject, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalBoolean(raw: RawObject, key: string, where: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}.${key} must be true or false`);
  }
  return value;
}

function optionalPositiveInteger(raw: RawObject, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${where}.${key} must be a positive integer`);
  }
  return value;
}

function parseSource(raw: unknown, index: number, env: Environment): SourceConfig {
  const where = `sources[${index}]`;
  if (!isObject(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const name = optionalString(raw, 'name', where);
  const location = optionalString(raw, 'source', where);
  if (!name || !location) {
    throw new ConfigError(`${where} needs both 'name' and 'source'`);
  }

  const password = optionalString(raw, 'password', where);
  return {
    name,
    source: expandEnvironment(location, env),
    protocolVersion: optionalString(raw, 'protocolVersion', where),
    enabled: optionalBoolean(raw, 'enabled', where),
    username: optionalString(raw, 'username', where),
    password: password === undefined ? undefined : expandEnvironment(password, env),
    updateBatchSize: optionalPositiveInteger(raw, 'updateBatchSize', where),
    supportsPackageIdSearchFilter: optionalBoolean(raw, 'supportsPackageIdSearchFilter', where)
  };
}

function isCompatibility(value: string): value is RuntimeCompatibility {
  return value === 'legacy-runtime' || value === 'standard-runtime';
}

function parseProfile(raw: unknown): ProfileConfig {
  if (raw === undefined) return {};
  if (!isObject(raw)) {
    throw new ConfigError('profile must be an object');
  }
  const compatibility = optionalString(raw, 'compatibility', 'profile');
  if (compatibility !== undefined && !isCompatibility(compatibility)) {
    throw new ConfigError(`profile.compatibility must be 'legacy-runtime' or 'standard-runtime', got '${compatibility}'`);
  }
  return {
    nativeLabel: optionalString(raw, 'nativeLabel', 'profile'),
    hostVersion: optionalString(raw, 'hostVersion', 'profile'),
    compatibility
  };
}

/**
 * Validate a parsed config document and fill in defaults.
 */
export function parseConfig(raw: unknown, env: Environment = process.env): NuforgeConfig {
  if (!isObject(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  const defaults = defaultConfig();

  let sources = defaults.sources;
  if (raw.sources !== undefined) {
    if (!Array.isArray(raw.sources)) {
      throw new ConfigError('sources must be an array');
    }
    sources = raw.sources.map((entry, index) => parseSource(entry, index, env));
  }
  const cachePath = optionalString(raw, 'cachePath', 'config');

  return {
    repositoryPath: optionalString(raw, 'repositoryPath', 'config') ?? defaults.repositoryPath,
    manifestPath: optionalString(raw, 'manifestPath', 'config') ?? defaults.manifestPath,
    sources,
    profile: parseProfile(raw.profile),
    timeoutMs: optionalPositiveInteger(raw, 'timeoutMs', 'config') ?? defaults.timeoutMs,
    cachePath: cachePath === undefined ? undefined : expandEnvironment(cachePath, env),
    installFromCache: optionalBoolean(raw, 'installFromCache', 'config') ?? defaults.installFromCache
  };
}

/**
 * Archive cache directory: `cachePath` from the config (relative to `cwd`),
 * else `NUFORGE_CACHE_PATH`, else `~/.nuforge/cache`.
 */
export function resolveCacheDirectory(config: NuforgeConfig, cwd: string, env: Environment = process.env): string {
  if (config.cachePath) {
    return resolve(cwd, config.cachePath);
  }
  const fromEnvironment = env[ENV_VARS.CACHE_PATH];
  if (fromEnvironment) {
    return resolve(cwd, fromEnvironment);
  }
  return join(homedir(), DEFAULTS.CACHE_DIRECTORY);
}

export function profileFromConfig(config: NuforgeConfig): TargetProfile {
  return {
    nativeLabel: config.profile.nativeLabel ?? DEFAULT_NATIVE_LABEL,
    hostVersion: config.profile.hostVersion ?? DEFAULTS.HOST_VERSION,
    compatibility: config.profile.compatibility ?? 'standard-runtime'
  };
}

export class ConfigManager implements PlatformProfileProvider {
  private config: NuforgeConfig | null = null;
  private configPath: string | null = null;
  private readonly cwd: string;
  private readonly env: Environment;

  constructor(cwd: string, env: Environment = process.env) {
    this.cwd = cwd;
    this.env = env;
  }

  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.cwd, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration, falling back to defaults when no file exists.
   * The result is cached for the life of the manager.
   */
  async load(): Promise<NuforgeConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug(`No ${FILE_PATTERNS.CONFIG_JSONC} in ${this.cwd}, using defaults`);
      this.config = defaultConfig();
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${configPath}: ${errorMessage(error)}`, { configPath });
    }

    this.configPath = configPath;
    this.config = parseConfig(raw, this.env);
    return this.config;
  }

  /** Path of the loaded config file, or null when defaults are in use. */
  getConfigFilePath(): string | null {
    return this.configPath;
  }

  /** Resolve a configured path against the working directory. */
  resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.cwd, path);
  }

  cacheDirectory(): string {
    if (!this.config) {
      throw new ConfigError('Configuration has not been loaded');
    }
    return resolveCacheDirectory(this.config, this.cwd, this.env);
  }

  getProfile(): TargetProfile {
    if (!this.config) {
      throw new ConfigError('Configuration has not been loaded');
    }
    return profileFromConfig(this.config);
  }
}
