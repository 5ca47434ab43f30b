/**
 * Fetcher for a package folder on disk.
 *
 * Two layouts are recognized, and may be mixed:
 *   flat:          <root>/<id>.<version>.nupkg
 *   hierarchical:  <root>/<id>/<version>/<id>.<version>.nupkg (optionally with <id>.nuspec beside it)
 */

import { dirname, join } from 'path';
import { minimatch } from 'minimatch';
import { SourceError } from '../../utils/errors.js';
import { isDirectory, listDirectories, listFiles, readBinaryFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { nameKey, namesEqual } from '../version/package-identifier.js';
import { formatVersion, parseVersion, versionsEqual, type SemanticVersion } from '../version/package-version.js';
import { readArchiveManifest } from './package-archive.js';
import { parseNuspec } from './nuspec-parser.js';
import type { DependencyGroup, FeedFetcher, FeedSearchRequest, InstalledVersion, PackageSummary } from './types.js';

const PACKAGE_EXTENSION = '.nupkg';
const SYMBOLS_EXTENSION = '.symbols.nupkg';

export interface LocalPackageFile {
  id: string;
  version: SemanticVersion;
  path: string;
  layout: 'flat' | 'hierarchical';
}

export interface LocalFeedFetcherOptions {
  sourceName: string;
  path: string;
}

function isPackageFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith(PACKAGE_EXTENSION) && !lower.endsWith(SYMBOLS_EXTENSION);
}

/**
 * Split `<id>.<version>.nupkg` at the first dot that starts a valid version.
 */
export function parsePackageFileName(fileName: string): { id: string; version: SemanticVersion } | undefined {
  if (!isPackageFile(fileName)) {
    return undefined;
  }
  const stem = fileName.slice(0, -PACKAGE_EXTENSION.length);
  for (let dot = stem.indexOf('.'); dot > 0; dot = stem.indexOf('.', dot + 1)) {
    const versionText = stem.slice(dot + 1);
    if (!/^\d/.test(versionText)) continue;
    const version = parseVersion(versionText);
    if (version.isValid) {
      return { id: stem.slice(0, dot), version };
    }
  }
  return undefined;
}

export class LocalFeedFetcher implements FeedFetcher {
  readonly protocol = 'local' as const;
  // One folder scan answers any number of ids
  readonly updateBatchSize = Number.MAX_SAFE_INTEGER;
  private readonly sourceName: string;
  private readonly root: string;

  constructor(options: LocalFeedFetcherOptions) {
    this.sourceName = options.sourceName;
    this.root = options.path;
  }

  async scan(): Promise<LocalPackageFile[]> {
    if (!(await isDirectory(this.root))) {
      throw new SourceError(this.sourceName, `package folder '${this.root}' does not exist`);
    }

    const packages: LocalPackageFile[] = [];
    for (const fileName of await listFiles(this.root)) {
      const parsed = parsePackageFileName(fileName);
      if (parsed) {
        packages.push({ ...parsed, path: join(this.root, fileName), layout: 'flat' });
      }
    }

    for (const idDir of await listDirectories(this.root)) {
      for (const versionDir of await listDirectories(join(this.root, idDir))) {
        const version = parseVersion(versionDir);
        if (!version.isValid) continue;

        const folder = join(this.root, idDir, versionDir);
        const candidates = (await listFiles(folder)).filter(isPackageFile);
        const expected = `${idDir}.${versionDir}${PACKAGE_EXTENSION}`.toLowerCase();
        const fileName = candidates.find((name) => name.toLowerCase() === expected) ?? candidates[0];
        if (!fileName) continue;

        packages.push({
          id: parsePackageFileName(fileName)?.id ?? idDir,
          version,
          path: join(folder, fileName),
          layout: 'hierarchical'
        });
      }
    }

    logger.debug(`Scanned ${packages.length} package file(s) in ${this.root}`);
    return packages;
  }

  private async locate(id: string, version: SemanticVersion): Promise<LocalPackageFile> {
    const found = (await this.scan()).find((entry) => namesEqual(entry.id, id) && versionsEqual(entry.version, version));
    if (!found) {
      throw new SourceError(this.sourceName, `${id} ${formatVersion(version)} not found in ${this.root}`);
    }
    return found;
  }

  async listVersions(id: string): Promise<SemanticVersion[]> {
    return (await this.scan()).filter((entry) => namesEqual(entry.id, id)).map((entry) => entry.version);
  }

  async fetchDependencyGroups(id: string, version: SemanticVersion): Promise<DependencyGroup[]> {
    const file = await this.locate(id, version);

    if (file.layout === 'hierarchical') {
      const folder = dirname(file.path);
      const nuspecName = (await listFiles(folder)).find((name) => name.toLowerCase().endsWith('.nuspec'));
      if (nuspecName) {
        const document = parseNuspec(await readTextFile(join(folder, nuspecName)));
        if (document) {
          return document.dependencyGroups;
        }
      }
    }

    const manifest = readArchiveManifest(await readBinaryFile(file.path), file.path);
    return manifest?.dependencyGroups ?? [];
  }

  /**
   * Every entry whose id matches `*term*`. Local folders are not paged: the
   * first page holds everything and later pages are empty.
   */
  async search(request: FeedSearchRequest): Promise<PackageSummary[]> {
    if (request.pageOffset !== 0) {
      return [];
    }

    const pattern = `*${request.term.trim()}*`;
    const matches = (await this.scan()).filter((entry) => minimatch(entry.id, pattern, { nocase: true, dot: true }));

    const summaries: PackageSummary[] = [];
    for (const entry of matches) {
      const manifest = readArchiveManifest(await readBinaryFile(entry.path), entry.path);
      summaries.push({
        id: entry.id,
        version: entry.version,
        versions: [],
        title: manifest?.title,
        description: manifest?.description,
        authors: manifest?.authors ?? []
      });
    }
    return summaries;
  }

  async lookupBatch(installed: InstalledVersion[], _includePrerelease: boolean): Promise<PackageSummary[]> {
    const all = await this.scan();
    const wanted = new Set(installed.map((entry) => nameKey(entry.id)));
    return all
      .filter((entry) => wanted.has(nameKey(entry.id)))
      .map((entry) => ({ id: entry.id, version: entry.version, versions: [] }));
  }

  async download(id: string, version: SemanticVersion): Promise<Uint8Array> {
    const file = await this.locate(id, version);
    return readBinaryFile(file.path);
  }
}
