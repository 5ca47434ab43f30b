/**
 * Fetcher for service-index (protocol v3) feeds.
 *
 * Endpoints come from the feed's `index.json`:
 *   SearchQueryService             search and batched update lookups
 *   PackageBaseAddress/3.0.0       version lists and archive downloads
 *   RegistrationsBaseUrl/3.6.0     dependency groups (paged registration index)
 */

import { SourceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createIdentifier, type PackageIdentifier } from '../version/package-identifier.js';
import {
  compareVersions,
  formatVersion,
  parseVersion,
  sortVersionsAscending,
  versionsEqual,
  type SemanticVersion
} from '../version/package-version.js';
import { chunk } from './source-helpers.js';
import { getJson, type RemoteTransport } from './transport.js';
import type { DependencyGroup, FeedFetcher, FeedSearchRequest, InstalledVersion, PackageSummary } from './types.js';

export const SERVICE_INDEX_UPDATE_BATCH_SIZE = 20;

const SEARCH_TYPES = ['SearchQueryService/3.5.0', 'SearchQueryService/3.0.0-rc', 'SearchQueryService'];
const PACKAGE_BASE_TYPES = ['PackageBaseAddress/3.0.0'];
const REGISTRATION_TYPES = ['RegistrationsBaseUrl/3.6.0', 'RegistrationsBaseUrl/3.4.0', 'RegistrationsBaseUrl'];

export interface ServiceEndpoints {
  search?: string;
  packageBase?: string;
  registrations?: string;
}

export interface ServiceIndexFeedFetcherOptions {
  sourceName: string;
  url: string;
  transport: RemoteTransport;
  updateBatchSize?: number;
  /** Whether the search endpoint understands `packageid:` filters. */
  supportsPackageIdSearchFilter?: boolean;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function withSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function parseServiceIndex(document: unknown): ServiceEndpoints {
  const resources = isRecord(document) ? asArray(document.resources) : [];
  const byType = new Map<string, string>();
  for (const resource of resources) {
    if (!isRecord(resource)) continue;
    const id = asString(resource['@id']);
    const types = Array.isArray(resource['@type']) ? asArray(resource['@type']) : [resource['@type']];
    for (const type of types) {
      if (id && typeof type === 'string' && !byType.has(type)) {
        byType.set(type, id);
      }
    }
  }

  const pick = (candidates: string[]): string | undefined =>
    candidates.map((type) => byType.get(type)).find((id): id is string => id !== undefined);

  return {
    search: pick(SEARCH_TYPES),
    packageBase: pick(PACKAGE_BASE_TYPES),
    registrations: pick(REGISTRATION_TYPES)
  };
}

function parseAuthors(value: unknown): string[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((author) => author.trim())
      .filter((author) => author.length > 0);
  }
  return asArray(value).filter((author): author is string => typeof author === 'string');
}

export function parseSearchResponse(document: unknown): PackageSummary[] {
  const summaries: PackageSummary[] = [];
  for (const item of isRecord(document) ? asArray(document.data) : []) {
    if (!isRecord(item)) continue;
    const id = asString(item.id);
    const version = parseVersion(asString(item.version) ?? '');
    if (!id || !version.isValid) continue;

    const versions = asArray(item.versions)
      .map((entry) => (isRecord(entry) ? parseVersion(asString(entry.version) ?? '') : undefined))
      .filter((entry): entry is SemanticVersion => entry !== undefined && entry.isValid);

    summaries.push({
      id,
      version,
      versions,
      title: asString(item.title),
      description: asString(item.description),
      authors: parseAuthors(item.authors),
      downloadCount: typeof item.totalDownloads === 'number' ? item.totalDownloads : undefined
    });
  }
  return summaries;
}

export function parseCatalogDependencyGroups(owner: string, catalogEntry: JsonRecord): DependencyGroup[] {
  return asArray(catalogEntry.dependencyGroups)
    .filter(isRecord)
    .map((group) => {
      const dependencies: PackageIdentifier[] = [];
      for (const dependency of asArray(group.dependencies)) {
        if (!isRecord(dependency)) continue;
        const id = asString(dependency.id) ?? '';
        const identifier = createIdentifier(id, asString(dependency.range) ?? '');
        if (!identifier.success) {
          logger.warn(`Ignoring dependency '${id}' of ${owner}: ${identifier.error.message}`);
          continue;
        }
        dependencies.push(identifier.value);
      }
      return { platformProfileLabel: asString(group.targetFramework) ?? '', dependencies };
    });
}

export class ServiceIndexFeedFetcher implements FeedFetcher {
  readonly protocol = 'v3' as const;
  readonly updateBatchSize: number;
  private readonly sourceName: string;
  private readonly indexUrl: string;
  private readonly transport: RemoteTransport;
  private readonly supportsPackageIdSearchFilter: boolean;
  private endpoints?: Promise<ServiceEndpoints>;

  constructor(options: ServiceIndexFeedFetcherOptions) {
    this.sourceName = options.sourceName;
    this.indexUrl = options.url;
    this.transport = options.transport;
    this.updateBatchSize = options.updateBatchSize ?? SERVICE_INDEX_UPDATE_BATCH_SIZE;
    this.supportsPackageIdSearchFilter = options.supportsPackageIdSearchFilter ?? true;
  }

  private resolveEndpoints(): Promise<ServiceEndpoints> {
    if (!this.endpoints) {
      // A failed index lookup is retried on the next call
      this.endpoints = getJson(this.transport, this.sourceName, this.indexUrl).then(parseServiceIndex, (error: unknown) => {
        this.endpoints = undefined;
        throw error;
      });
    }
    return this.endpoints;
  }

  private async requireEndpoint(key: keyof ServiceEndpoints): Promise<string> {
    const endpoint = (await this.resolveEndpoints())[key];
    if (!endpoint) {
      throw new SourceError(this.sourceName, `service index has no ${key} resource`, { url: this.indexUrl });
    }
    return endpoint;
  }

  async listVersions(id: string): Promise<SemanticVersion[]> {
    const base = withSlash(await this.requireEndpoint('packageBase'));
    const url = `${base}${id.toLowerCase()}/index.json`;
    const response = await this.transport.getText(url);
    if (response.status === 404) {
      return [];
    }
    if (!response.ok) {
      throw new SourceError(this.sourceName, `GET ${url} returned ${response.status}`, { url });
    }

    let document: unknown;
    try {
      document = JSON.parse(response.body);
    } catch {
      throw new SourceError(this.sourceName, `invalid version list for ${id}`, { url });
    }
    return asArray(isRecord(document) ? document.versions : undefined)
      .map((entry) => parseVersion(asString(entry) ?? ''))
      .filter((version) => version.isValid);
  }

  private async catalogEntryOf(leaf: JsonRecord): Promise<JsonRecord | undefined> {
    const entry = leaf.catalogEntry;
    if (typeof entry === 'string') {
      const fetched = await getJson(this.transport, this.sourceName, entry);
      return isRecord(fetched) ? fetched : undefined;
    }
    return isRecord(entry) ? entry : undefined;
  }

  private async pageLeaves(page: JsonRecord): Promise<JsonRecord[]> {
    if (Array.isArray(page.items)) {
      return asArray(page.items).filter(isRecord);
    }
    const pageUrl = asString(page['@id']);
    if (!pageUrl) {
      return [];
    }
    const fetched = await getJson(this.transport, this.sourceName, pageUrl);
    return isRecord(fetched) ? asArray(fetched.items).filter(isRecord) : [];
  }

  async fetchDependencyGroups(id: string, version: SemanticVersion): Promise<DependencyGroup[]> {
    const base = withSlash(await this.requireEndpoint('registrations'));
    const index = await getJson(this.transport, this.sourceName, `${base}${id.toLowerCase()}/index.json`);

    for (const page of isRecord(index) ? asArray(index.items).filter(isRecord) : []) {
      const lower = parseVersion(asString(page.lower) ?? '');
      const upper = parseVersion(asString(page.upper) ?? '');
      if (lower.isValid && compareVersions(version, lower) < 0) continue;
      if (upper.isValid && compareVersions(version, upper) > 0) continue;

      for (const leaf of await this.pageLeaves(page)) {
        const catalogEntry = await this.catalogEntryOf(leaf);
        if (!catalogEntry) continue;
        const leafVersion = parseVersion(asString(catalogEntry.version) ?? '');
        if (leafVersion.isValid && versionsEqual(leafVersion, version)) {
          return parseCatalogDependencyGroups(id, catalogEntry);
        }
      }
    }

    throw new SourceError(this.sourceName, `${id} ${formatVersion(version)} not found in registration index`);
  }

  async search(request: FeedSearchRequest): Promise<PackageSummary[]> {
    const url =
      `${await this.requireEndpoint('search')}?semVerLevel=2.0.0` +
      `&q=${encodeURIComponent(request.term)}` +
      `&skip=${request.pageOffset}` +
      `&take=${request.pageSize}` +
      `&prerelease=${request.includePrerelease}`;
    return parseSearchResponse(await getJson(this.transport, this.sourceName, url));
  }

  async lookupBatch(installed: InstalledVersion[], includePrerelease: boolean): Promise<PackageSummary[]> {
    const summaries: PackageSummary[] = [];

    if (!this.supportsPackageIdSearchFilter) {
      for (const entry of installed) {
        const versions = sortVersionsAscending(await this.listVersions(entry.id));
        const newest = versions[versions.length - 1];
        if (newest) {
          summaries.push({ id: entry.id, version: newest, versions });
        }
      }
      return summaries;
    }

    for (const batch of chunk(installed, this.updateBatchSize)) {
      const query = batch.map((entry) => `packageid:${entry.id}`).join(' ');
      summaries.push(
        ...(await this.search({ term: query, includePrerelease, pageSize: batch.length, pageOffset: 0 }))
      );
    }
    return summaries;
  }

  async download(id: string, version: SemanticVersion): Promise<Uint8Array> {
    const base = withSlash(await this.requireEndpoint('packageBase'));
    const lowerId = id.toLowerCase();
    const lowerVersion = formatVersion(version).toLowerCase();
    return this.transport.getBytes(`${base}${lowerId}/${lowerVersion}/${lowerId}.${lowerVersion}.nupkg`);
  }
}
