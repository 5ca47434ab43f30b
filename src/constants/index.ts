/**
 * Shared constants for the nuforge CLI
 */

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'nuforge.jsonc',
  CONFIG_JSON: 'nuforge.json',
  MANIFEST_YML: 'packages.yml',
  PACKAGE_ARCHIVE: '.nupkg',
  PACKAGE_MANIFEST: '.nuspec'
} as const;

export const DEFAULTS = {
  REPOSITORY_PATH: 'Packages',
  TIMEOUT_MS: 30_000,
  HOST_VERSION: '2021.3.0',
  SEARCH_PAGE_SIZE: 20,
  /** Under the home directory. */
  CACHE_DIRECTORY: '.nuforge/cache'
} as const;

export const ENV_VARS = {
  CACHE_PATH: 'NUFORGE_CACHE_PATH'
} as const;

export const NUGET_ORG_SOURCE = {
  name: 'nuget.org',
  source: 'https://api.nuget.org/v3/index.json',
  protocolVersion: '3'
} as const;
