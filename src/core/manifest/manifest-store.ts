import * as yaml from 'js-yaml';
import { errorMessage, ManifestReadError } from '../../utils/errors.js';
import { exists, readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { fail, ok, type Result } from '../../utils/result.js';
import { identifierFromVersion, nameKey, namesEqual, type PackageIdentifier } from '../version/package-identifier.js';
import {
  compareVersions,
  formatVersion,
  parseVersion,
  versionsEqual,
  type Ordering,
  type SemanticVersion
} from '../version/package-version.js';

const HEADER_COMMENT = '# This file is managed by nuforge. Do not edit manually.';

export interface InstalledPackageRecord {
  name: string;
  version: SemanticVersion;
  manuallyInstalled: boolean;
}

interface SerializedRecord {
  id: string;
  version: string;
  manuallyInstalled: boolean;
}

export function recordIdentifier(record: InstalledPackageRecord): PackageIdentifier {
  return identifierFromVersion(record.name, record.version, record.manuallyInstalled);
}

export function findRecord(records: readonly InstalledPackageRecord[], name: string): InstalledPackageRecord | undefined {
  return records.find((record) => namesEqual(record.name, name));
}

/**
 * Name ascending (case-insensitive, empty names first), then version ascending.
 */
export function compareRecords(a: InstalledPackageRecord, b: InstalledPackageRecord): Ordering {
  const left = nameKey(a.name);
  const right = nameKey(b.name);
  if (left !== right) {
    if (left.length === 0) return -1;
    if (right.length === 0) return 1;
    return left < right ? -1 : 1;
  }
  return compareVersions(a.version, b.version);
}

export function sortRecords(records: readonly InstalledPackageRecord[]): InstalledPackageRecord[] {
  return [...records].sort(compareRecords);
}

/**
 * Add or replace the record for a package name. A lower recorded version is
 * replaced; a higher one is kept. The manual flag survives either way.
 */
export function upsertRecord(
  records: readonly InstalledPackageRecord[],
  record: InstalledPackageRecord
): InstalledPackageRecord[] {
  const index = records.findIndex((existing) => namesEqual(existing.name, record.name));
  const existing = index >= 0 ? records[index] : undefined;
  if (!existing) {
    return [...records, record];
  }

  const manuallyInstalled = existing.manuallyInstalled || record.manuallyInstalled;
  const next = [...records];
  const order = compareVersions(existing.version, record.version);
  if (order < 0) {
    logger.warn(
      `Manifest already lists ${existing.name} ${formatVersion(existing.version)}; replacing it with ${formatVersion(record.version)}`
    );
    next[index] = { ...record, manuallyInstalled };
  } else if (order > 0) {
    logger.warn(
      `Manifest already lists ${existing.name} ${formatVersion(existing.version)}; keeping it over ${formatVersion(record.version)}`
    );
    next[index] = { ...existing, manuallyInstalled };
  } else {
    next[index] = { ...existing, manuallyInstalled };
  }
  return next;
}

export function removeRecord(
  records: readonly InstalledPackageRecord[],
  name: string,
  version?: SemanticVersion
): InstalledPackageRecord[] {
  return records.filter(
    (record) => !(namesEqual(record.name, name) && (version === undefined || versionsEqual(record.version, version)))
  );
}

function sanitizeRecord(entry: unknown): InstalledPackageRecord | null {
  if (typeof entry !== 'object' || entry === null) return null;

  const rawId = 'id' in entry ? entry.id : undefined;
  const rawVersion = 'version' in entry ? entry.version : undefined;
  if (typeof rawId !== 'string' || rawId.trim().length === 0) {
    return null;
  }
  const version = parseVersion(typeof rawVersion === 'number' ? String(rawVersion) : typeof rawVersion === 'string' ? rawVersion : '');
  if (!version.isValid) {
    logger.warn(`Ignoring manifest entry '${rawId}': invalid version`);
    return null;
  }

  const rawManual = 'manuallyInstalled' in entry ? entry.manuallyInstalled : undefined;
  return { name: rawId.trim(), version, manuallyInstalled: rawManual === true };
}

function sanitizeManifest(data: unknown): InstalledPackageRecord[] | string {
  if (data === undefined || data === null) return [];
  if (typeof data !== 'object' || Array.isArray(data)) return 'expected a mapping at the top level';
  const section = 'packages' in data ? data.packages : undefined;
  if (section === undefined || section === null) return 'missing packages list';
  if (!Array.isArray(section)) return 'packages must be a list';
  return section.map(sanitizeRecord).filter((record): record is InstalledPackageRecord => record !== null);
}

/**
 * The installed-package manifest (`packages.yml`). Every read goes to disk;
 * every write replaces the file atomically.
 *
 * A missing file reads as no packages. A file that exists but cannot be
 * parsed is a `ManifestReadError`: callers must not act on it or write over it.
 */
export class ManifestStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async read(): Promise<Result<InstalledPackageRecord[], ManifestReadError>> {
    if (!(await exists(this.path))) {
      return ok([]);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(await readTextFile(this.path));
    } catch (error) {
      return fail(new ManifestReadError(this.path, errorMessage(error)));
    }

    const records = sanitizeManifest(parsed);
    if (typeof records === 'string') {
      return fail(new ManifestReadError(this.path, records));
    }
    return ok(sortRecords(records));
  }

  async write(records: readonly InstalledPackageRecord[]): Promise<void> {
    const packages: SerializedRecord[] = sortRecords(records).map((record) => ({
      id: record.name,
      version: formatVersion(record.version),
      manuallyInstalled: record.manuallyInstalled
    }));

    const body = yaml.dump({ packages }, { lineWidth: 120 });
    await writeTextFileAtomic(this.path, `${HEADER_COMMENT}\n\n${body}`);
  }
}
