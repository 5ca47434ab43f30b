import type { SourceProtocol } from '../../types/index.js';
import type { PackageIdentifier } from '../version/package-identifier.js';
import type { SemanticVersion } from '../version/package-version.js';

export interface DependencyGroup {
  /** Platform label the author published the group for; empty means any. */
  platformProfileLabel: string;
  dependencies: PackageIdentifier[];
}

/**
 * Raw listing entry as a feed returns it, before filtering and de-duplication.
 */
export interface PackageSummary {
  id: string;
  version: SemanticVersion;
  /** Every version the feed reported alongside this entry, if any. */
  versions: SemanticVersion[];
  title?: string;
  description?: string;
  authors?: string[];
  downloadCount?: number;
}

/**
 * Summary half of a package's metadata. Dependency groups are the separately
 * fetched detail, see `PackageSource.fetchDependencyGroups`.
 */
export interface PackageMetadata {
  readonly identifier: PackageIdentifier;
  /** The concrete version `identifier` pins. */
  readonly version: SemanticVersion;
  readonly availableVersions: readonly SemanticVersion[];
  readonly title?: string;
  readonly description?: string;
  readonly authors: readonly string[];
  readonly downloadCount?: number;
  /** Name of the source that produced this entry. */
  readonly sourceRef: string;
}

export interface FeedSearchRequest {
  term: string;
  includePrerelease: boolean;
  pageSize: number;
  pageOffset: number;
}

export interface SearchRequest extends FeedSearchRequest {
  includeAllVersions: boolean;
}

export interface UpdateQueryOptions {
  includePrerelease: boolean;
  /** Report every newer version instead of only the newest. */
  includeAllVersions: boolean;
}

export interface InstalledVersion {
  id: string;
  version: SemanticVersion;
}

/**
 * The one thing source variants do differently: fetching.
 */
export interface FeedFetcher {
  readonly protocol: SourceProtocol;
  /** Largest number of ids one update query may carry. */
  readonly updateBatchSize: number;
  listVersions(id: string): Promise<SemanticVersion[]>;
  fetchDependencyGroups(id: string, version: SemanticVersion): Promise<DependencyGroup[]>;
  search(request: FeedSearchRequest): Promise<PackageSummary[]>;
  /** Listing entries for a batch of installed packages, used for update checks. */
  lookupBatch(installed: InstalledVersion[], includePrerelease: boolean): Promise<PackageSummary[]>;
  download(id: string, version: SemanticVersion): Promise<Uint8Array>;
}
