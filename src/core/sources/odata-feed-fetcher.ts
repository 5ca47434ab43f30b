/**
 * Fetcher for OData (protocol v2) feeds.
 *
 * Query shapes:
 *   FindPackagesById()?id='Foo'&$top=1000
 *   Packages(Id='Foo',Version='1.0.0')
 *   Search()?$filter=IsLatestVersion&$orderby=DownloadCount desc&$skip=0&$top=15&searchTerm='foo'&...
 *   GetUpdates()?packageIds='A|B'&versions='1.0.0|2.0.0'&...
 */

import { SourceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatVersion, type SemanticVersion } from '../version/package-version.js';
import { chunk } from './source-helpers.js';
import { parseODataFeed, type ODataEntry } from './odata-parser.js';
import type { RemoteTransport } from './transport.js';
import type { DependencyGroup, FeedFetcher, FeedSearchRequest, InstalledVersion, PackageSummary } from './types.js';

export const ODATA_UPDATE_BATCH_SIZE = 10;
const FIND_BY_ID_LIMIT = 1000;

export interface ODataFeedFetcherOptions {
  sourceName: string;
  url: string;
  transport: RemoteTransport;
  updateBatchSize?: number;
}

function quote(value: string): string {
  return encodeURIComponent(value.replace(/'/g, "''"));
}

export class ODataFeedFetcher implements FeedFetcher {
  readonly protocol = 'v2' as const;
  readonly updateBatchSize: number;
  private readonly sourceName: string;
  private readonly baseUrl: string;
  private readonly transport: RemoteTransport;

  constructor(options: ODataFeedFetcherOptions) {
    this.sourceName = options.sourceName;
    this.baseUrl = options.url.endsWith('/') ? options.url : `${options.url}/`;
    this.transport = options.transport;
    this.updateBatchSize = options.updateBatchSize ?? ODATA_UPDATE_BATCH_SIZE;
  }

  private async getEntries(url: string, allowNotFound = false): Promise<ODataEntry[] | undefined> {
    const response = await this.transport.getText(url);
    if (response.status === 404 && allowNotFound) {
      return undefined;
    }
    if (!response.ok) {
      throw new SourceError(this.sourceName, `GET ${url} returned ${response.status}`, { url, status: response.status });
    }
    return parseODataFeed(response.body);
  }

  private async findById(id: string): Promise<ODataEntry[]> {
    const url = `${this.baseUrl}FindPackagesById()?id='${quote(id)}'&$top=${FIND_BY_ID_LIMIT}`;
    return (await this.getEntries(url, true)) ?? [];
  }

  private async findEntry(id: string, version: SemanticVersion): Promise<ODataEntry | undefined> {
    const url = `${this.baseUrl}Packages(Id='${quote(id)}',Version='${quote(formatVersion(version))}')`;
    const entries = await this.getEntries(url, true);
    return entries?.[0];
  }

  async listVersions(id: string): Promise<SemanticVersion[]> {
    const entries = await this.findById(id);
    return entries.map((entry) => entry.summary.version);
  }

  async fetchDependencyGroups(id: string, version: SemanticVersion): Promise<DependencyGroup[]> {
    const entry = await this.findEntry(id, version);
    if (!entry) {
      throw new SourceError(this.sourceName, `${id} ${formatVersion(version)} not found`);
    }
    return entry.dependencyGroups;
  }

  async search(request: FeedSearchRequest): Promise<PackageSummary[]> {
    const filter = request.includePrerelease ? 'IsAbsoluteLatestVersion' : 'IsLatestVersion';
    const url =
      `${this.baseUrl}Search()?$filter=${filter}` +
      `&$orderby=DownloadCount desc` +
      `&$skip=${request.pageOffset}` +
      `&$top=${request.pageSize}` +
      `&searchTerm='${quote(request.term)}'` +
      `&targetFramework=''` +
      `&includePrerelease=${request.includePrerelease}`;
    const entries = (await this.getEntries(url)) ?? [];
    return entries.map((entry) => entry.summary);
  }

  async lookupBatch(installed: InstalledVersion[], includePrerelease: boolean): Promise<PackageSummary[]> {
    const summaries: PackageSummary[] = [];
    for (const batch of chunk(installed, this.updateBatchSize)) {
      const ids = batch.map((entry) => entry.id).join('|');
      const versions = batch.map((entry) => formatVersion(entry.version)).join('|');
      const url =
        `${this.baseUrl}GetUpdates()?packageIds='${quote(ids)}'` +
        `&versions='${quote(versions)}'` +
        `&includePrerelease=${includePrerelease}` +
        `&targetFrameworks=''&versionConstraints=''&includeAllVersions=true`;

      const entries = await this.getEntries(url, true);
      if (entries) {
        summaries.push(...entries.map((entry) => entry.summary));
        continue;
      }

      logger.debug(`${this.sourceName} has no GetUpdates endpoint; listing versions per package`);
      for (const entry of batch) {
        summaries.push(...(await this.findById(entry.id)).map((found) => found.summary));
      }
    }
    return summaries;
  }

  async download(id: string, version: SemanticVersion): Promise<Uint8Array> {
    const entry = await this.findEntry(id, version);
    const url = entry?.downloadUrl ?? `${this.baseUrl}package/${encodeURIComponent(id)}/${formatVersion(version)}`;
    return this.transport.getBytes(url);
  }
}
