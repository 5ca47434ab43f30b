import type { SourceProtocol } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import {
  formatIdentifier,
  identifierFromVersion,
  nameKey,
  type PackageIdentifier
} from '../version/package-identifier.js';
import {
  formatSpec,
  formatVersion,
  sortVersionsAscending,
  type SemanticVersion
} from '../version/package-version.js';
import {
  chunk,
  dedupeSummaries,
  newerVersions,
  pickBestVersion,
  pickFallbackVersion,
  withoutPrerelease
} from './source-helpers.js';
import type {
  DependencyGroup,
  FeedFetcher,
  PackageMetadata,
  PackageSummary,
  SearchRequest,
  UpdateQueryOptions
} from './types.js';

export interface PackageSourceOptions {
  name: string;
  enabled?: boolean;
  fetcher: FeedFetcher;
}

/**
 * A configured package feed. Filtering, matching, paging and update batching
 * live here; how entries are fetched is the fetcher's concern.
 */
export class PackageSource {
  readonly name: string;
  readonly enabled: boolean;
  private readonly fetcher: FeedFetcher;

  constructor(options: PackageSourceOptions) {
    this.name = options.name;
    this.enabled = options.enabled ?? true;
    this.fetcher = options.fetcher;
  }

  get protocol(): SourceProtocol {
    return this.fetcher.protocol;
  }

  /** Known versions of a package, ascending. */
  async findVersions(name: string): Promise<SemanticVersion[]> {
    return sortVersionsAscending(await this.fetcher.listVersions(name));
  }

  /**
   * Highest version in range. When nothing is in range and the version spec has a
   * minimum, the lowest version above that minimum is returned with a warning.
   */
  async findBestMatch(identifier: PackageIdentifier): Promise<PackageMetadata | undefined> {
    const versions = await this.findVersions(identifier.name);
    if (versions.length === 0) {
      return undefined;
    }

    let chosen = pickBestVersion(versions, identifier.spec);
    if (chosen === undefined) {
      chosen = pickFallbackVersion(versions, identifier.spec);
      if (chosen === undefined) {
        return undefined;
      }
      logger.warn(
        `No version of ${identifier.name} in ${this.name} matches '${formatSpec(identifier.spec)}'; substituting ${formatVersion(chosen)}`
      );
    }

    return {
      identifier: identifierFromVersion(identifier.name, chosen, identifier.manuallyRequested),
      version: chosen,
      availableVersions: versions,
      authors: [],
      sourceRef: this.name
    };
  }

  async fetchDependencyGroups(name: string, version: SemanticVersion): Promise<DependencyGroup[]> {
    return this.fetcher.fetchDependencyGroups(name, version);
  }

  async search(request: SearchRequest): Promise<PackageMetadata[]> {
    const summaries = await this.fetcher.search(request);
    const filtered = request.includePrerelease ? summaries : withoutPrerelease(summaries);
    const listing = dedupeSummaries(filtered, this.name, request.includeAllVersions);
    logger.debug(`Search '${request.term}' in ${this.name} returned ${listing.length} package(s)`);
    return listing;
  }

  /**
   * Newer releases of each installed package, queried in batches of the
   * fetcher's update batch size.
   */
  async getUpdates(installed: readonly PackageIdentifier[], options: UpdateQueryOptions): Promise<PackageMetadata[]> {
    const current = new Map<string, { identifier: PackageIdentifier; version: SemanticVersion }>();
    for (const identifier of installed) {
      if (identifier.spec.kind !== 'version') {
        logger.debug(`Skipping update check for ${formatIdentifier(identifier)}: not a concrete version`);
        continue;
      }
      current.set(nameKey(identifier.name), { identifier, version: identifier.spec.version });
    }

    const updates: PackageMetadata[] = [];
    for (const batch of chunk([...current.values()], this.fetcher.updateBatchSize)) {
      const summaries = await this.fetcher.lookupBatch(
        batch.map((entry) => ({ id: entry.identifier.name, version: entry.version })),
        options.includePrerelease
      );
      const byName = new Map<string, PackageSummary[]>();
      for (const summary of summaries) {
        const list = byName.get(nameKey(summary.id)) ?? [];
        list.push(summary);
        byName.set(nameKey(summary.id), list);
      }

      for (const entry of batch) {
        const key = nameKey(entry.identifier.name);
        const found = byName.get(key) ?? [];
        const available = found.flatMap((summary) => [summary.version, ...summary.versions]);
        const newer = newerVersions(entry.version, available, options.includePrerelease);
        if (newer.length === 0) continue;

        const targets = options.includeAllVersions ? [...newer].reverse() : newer.slice(-1);
        const template = found[0];
        for (const target of targets) {
          updates.push({
            identifier: identifierFromVersion(template?.id ?? entry.identifier.name, target, entry.identifier.manuallyRequested),
            version: target,
            availableVersions: sortVersionsAscending(available),
            title: template?.title,
            description: template?.description,
            authors: template?.authors ?? [],
            downloadCount: template?.downloadCount,
            sourceRef: this.name
          });
        }
      }
    }

    logger.debug(`${this.name}: ${updates.length} update(s) for ${current.size} installed package(s)`);
    return updates;
  }

  async download(name: string, version: SemanticVersion): Promise<Uint8Array> {
    return this.fetcher.download(name, version);
  }
}
