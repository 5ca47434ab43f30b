import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { findRecord, type InstalledPackageRecord } from '../manifest/manifest-store.js';
import type { TargetProfileResolver } from '../platform/target-profile-resolver.js';
import { silentProgress, type ProgressPort } from '../ports/progress.js';
import type { PackageSource } from '../sources/package-source.js';
import type { DependencyGroup, PackageMetadata } from '../sources/types.js';
import {
  identifierAccepts,
  identifierKey,
  nameKey,
  pinnedIdentifier,
  type PackageIdentifier
} from '../version/package-identifier.js';
import { formatSpec, formatVersion, type SemanticVersion } from '../version/package-version.js';

export interface ResolutionContextOptions {
  sources: readonly PackageSource[];
  resolver: TargetProfileResolver;
  /** Snapshot of what counts as installed for this run. */
  installed: readonly InstalledPackageRecord[];
  /** Versions a request should resolve to when they satisfy it, e.g. the manifest during restore. */
  preferred?: readonly InstalledPackageRecord[];
  progress?: ProgressPort;
  signal?: AbortSignal;
}

/**
 * State for one resolution run: the installed snapshot, the enabled sources in
 * priority order, the profile resolver, and the in-flight fetch caches that
 * make each identifier fetch once per run.
 */
export class ResolutionContext {
  readonly sources: readonly PackageSource[];
  readonly resolver: TargetProfileResolver;
  readonly progress: ProgressPort;
  readonly signal?: AbortSignal;
  private readonly installed: readonly InstalledPackageRecord[];
  private readonly preferred: readonly InstalledPackageRecord[];
  private readonly matches = new Map<string, Promise<PackageMetadata | undefined>>();
  private readonly details = new Map<string, Promise<DependencyGroup[]>>();

  constructor(options: ResolutionContextOptions) {
    this.sources = options.sources.filter((source) => source.enabled);
    this.resolver = options.resolver;
    this.installed = options.installed;
    this.preferred = options.preferred ?? [];
    this.progress = options.progress ?? silentProgress;
    this.signal = options.signal;
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  get sourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }

  installedRecord(name: string): InstalledPackageRecord | undefined {
    return findRecord(this.installed, name);
  }

  /** Narrow a request to its preferred version when that version satisfies it. */
  preferredRequest(identifier: PackageIdentifier): PackageIdentifier {
    const record = findRecord(this.preferred, identifier.name);
    if (!record || !identifierAccepts(identifier, record.version)) {
      return identifier;
    }
    return pinnedIdentifier(identifier.name, record.version, identifier.manuallyRequested);
  }

  /** Best match across enabled sources; the first source with a hit wins. */
  findBestMatch(identifier: PackageIdentifier): Promise<PackageMetadata | undefined> {
    const key = identifierKey(identifier);
    let pending = this.matches.get(key);
    if (!pending) {
      pending = this.queryBestMatch(identifier);
      this.matches.set(key, pending);
    }
    return pending;
  }

  private async queryBestMatch(identifier: PackageIdentifier): Promise<PackageMetadata | undefined> {
    for (const source of this.sources) {
      let match: PackageMetadata | undefined;
      try {
        match = await source.findBestMatch(identifier);
      } catch (error) {
        this.warn(`Source '${source.name}' failed to look up ${identifier.name}: ${errorMessage(error)}`);
        continue;
      }
      if (!match) continue;

      if (!identifierAccepts(identifier, match.version)) {
        this.progress.emit({
          type: 'resolve:fallback',
          package: identifier.name,
          requested: formatSpec(identifier.spec),
          substituted: formatVersion(match.version),
          source: source.name
        });
      }
      return match;
    }
    return undefined;
  }

  /** Dependency groups of a resolved package, from the source that produced it. */
  dependencyGroups(metadata: PackageMetadata): Promise<DependencyGroup[]> {
    return this.memoizedDetail(metadata.identifier.name, metadata.version, metadata.sourceRef);
  }

  /**
   * Dependency groups of an installed package. Sources are tried in order;
   * undefined when none of them knows the version.
   */
  async installedDependencyGroups(record: InstalledPackageRecord): Promise<DependencyGroup[] | undefined> {
    try {
      return await this.memoizedDetail(record.name, record.version);
    } catch (error) {
      this.warn(`Cannot read dependencies of ${record.name} ${formatVersion(record.version)}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** Dependencies an installed package needs on the active profile. */
  async installedDependencies(record: InstalledPackageRecord): Promise<PackageIdentifier[] | undefined> {
    const groups = await this.installedDependencyGroups(record);
    if (!groups) {
      return undefined;
    }
    const selected = this.resolver.selectGroup(record.name, groups);
    if (!selected.success) {
      this.warn(selected.error.message);
      return undefined;
    }
    return selected.value?.dependencies ?? [];
  }

  private memoizedDetail(name: string, version: SemanticVersion, sourceRef?: string): Promise<DependencyGroup[]> {
    const key = `${nameKey(name)}@${formatVersion(version).toLowerCase()}`;
    let pending = this.details.get(key);
    if (!pending) {
      pending = this.queryDetail(name, version, sourceRef);
      this.details.set(key, pending);
    }
    return pending;
  }

  private async queryDetail(name: string, version: SemanticVersion, sourceRef?: string): Promise<DependencyGroup[]> {
    const preferred = sourceRef === undefined ? undefined : this.sources.find((source) => source.name === sourceRef);
    if (preferred) {
      return preferred.fetchDependencyGroups(name, version);
    }

    let lastError: unknown = new Error(`no enabled source lists ${name} ${formatVersion(version)}`);
    for (const source of this.sources) {
      try {
        return await source.fetchDependencyGroups(name, version);
      } catch (error) {
        logger.debug(`Source '${source.name}' has no detail for ${name} ${formatVersion(version)}: ${errorMessage(error)}`);
        lastError = error;
      }
    }
    throw lastError;
  }

  private warn(message: string): void {
    logger.warn(message);
    this.progress.log('warn', message);
  }
}
