/**
 * In-process stand-ins for feeds, transports and the installer, shared by the
 * core tests. Nothing here touches the network.
 */

import { join } from 'node:path';
import { strFromU8, strToU8, zipSync } from 'fflate';
import type { NuforgeError } from '../src/types/index.js';
import { InstallStepError, SourceError } from '../src/utils/errors.js';
import { fail, ok, type Result } from '../src/utils/result.js';
import { PackageOrchestrator } from '../src/core/install/orchestrator.js';
import type { InstallerPort } from '../src/core/install/types.js';
import { ManifestStore } from '../src/core/manifest/manifest-store.js';
import type { PlatformProfileProvider, TargetProfile } from '../src/core/platform/target-profile-resolver.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import { createRecordingProgress } from '../src/core/ports/progress.js';
import { PackageSource } from '../src/core/sources/package-source.js';
import type { RemoteTransport, TransportResponse } from '../src/core/sources/transport.js';
import type {
  DependencyGroup,
  FeedFetcher,
  FeedSearchRequest,
  InstalledVersion,
  PackageMetadata,
  PackageSummary
} from '../src/core/sources/types.js';
import {
  concreteVersion,
  createIdentifier,
  formatIdentifier,
  identifierFromVersion,
  nameKey,
  namesEqual,
  type PackageIdentifier
} from '../src/core/version/package-identifier.js';
import {
  formatVersion,
  tryParseVersion,
  versionsEqual,
  type SemanticVersion
} from '../src/core/version/package-version.js';

// ============================================================================
// Value builders
// ============================================================================

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw result.error instanceof Error ? result.error : new Error(String(result.error));
  }
  return result.value;
}

export function v(text: string): SemanticVersion {
  return unwrap(tryParseVersion(text));
}

export function ident(name: string, spec = '', manuallyRequested = true): PackageIdentifier {
  return unwrap(createIdentifier(name, spec, manuallyRequested));
}

/** A dependency group; each dependency is `[name, spec]`. */
export function group(label: string, ...dependencies: Array<[string, string]>): DependencyGroup {
  return {
    platformProfileLabel: label,
    dependencies: dependencies.map(([name, spec]) => ident(name, spec, false))
  };
}

export function versionTexts(versions: readonly SemanticVersion[]): string[] {
  return versions.map(formatVersion);
}

export function labels(identifiers: readonly PackageIdentifier[]): string[] {
  return identifiers.map(formatIdentifier);
}

// ============================================================================
// Feeds
// ============================================================================

export interface FakePackage {
  id: string;
  version: string;
  groups?: DependencyGroup[];
  description?: string;
  downloadCount?: number;
  /** Bytes `download` answers with; a plain-text stand-in otherwise. */
  archive?: Uint8Array;
}

interface StoredPackage {
  id: string;
  version: SemanticVersion;
  groups: DependencyGroup[];
  description?: string;
  downloadCount?: number;
  archive?: Uint8Array;
}

/**
 * Feed held in memory. Every call is recorded so tests can assert how often
 * a package was looked up.
 */
export class InMemoryFeedFetcher implements FeedFetcher {
  readonly protocol = 'local' as const;
  readonly updateBatchSize: number;
  readonly calls: {
    listVersions: string[];
    dependencyGroups: string[];
    lookupBatches: string[][];
    downloads: string[];
  } = { listVersions: [], dependencyGroups: [], lookupBatches: [], downloads: [] };
  /** When set, every lookup rejects with this error. */
  failWith?: Error;
  /** When set, only dependency lookups reject with this error. */
  failDetailsWith?: Error;
  /** Called on every dependency lookup, before it answers. */
  onDependencyGroups?: (id: string) => void;
  private readonly packages: StoredPackage[];

  constructor(packages: FakePackage[] = [], options: { updateBatchSize?: number } = {}) {
    this.packages = packages.map((entry) => ({
      id: entry.id,
      version: v(entry.version),
      groups: entry.groups ?? [],
      description: entry.description,
      downloadCount: entry.downloadCount,
      archive: entry.archive
    }));
    this.updateBatchSize = options.updateBatchSize ?? 100;
  }

  private named(id: string): StoredPackage[] {
    return this.packages.filter((entry) => namesEqual(entry.id, id));
  }

  private summary(entry: StoredPackage): PackageSummary {
    return {
      id: entry.id,
      version: entry.version,
      versions: [],
      description: entry.description,
      authors: [],
      downloadCount: entry.downloadCount
    };
  }

  private guard(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }

  async listVersions(id: string): Promise<SemanticVersion[]> {
    this.calls.listVersions.push(id);
    this.guard();
    return this.named(id).map((entry) => entry.version);
  }

  async fetchDependencyGroups(id: string, version: SemanticVersion): Promise<DependencyGroup[]> {
    this.calls.dependencyGroups.push(`${id}@${formatVersion(version)}`);
    this.onDependencyGroups?.(id);
    this.guard();
    if (this.failDetailsWith) {
      throw this.failDetailsWith;
    }
    const found = this.named(id).find((entry) => versionsEqual(entry.version, version));
    if (!found) {
      throw new SourceError('memory', `${id} ${formatVersion(version)} not found`);
    }
    return found.groups;
  }

  async search(request: FeedSearchRequest): Promise<PackageSummary[]> {
    this.guard();
    const term = request.term.toLowerCase();
    const matches = this.packages.filter((entry) => entry.id.toLowerCase().includes(term));
    return matches.slice(request.pageOffset, request.pageOffset + request.pageSize).map((entry) => this.summary(entry));
  }

  async lookupBatch(installed: InstalledVersion[], _includePrerelease: boolean): Promise<PackageSummary[]> {
    this.calls.lookupBatches.push(installed.map((entry) => entry.id));
    this.guard();
    const wanted = new Set(installed.map((entry) => nameKey(entry.id)));
    return this.packages.filter((entry) => wanted.has(nameKey(entry.id))).map((entry) => this.summary(entry));
  }

  async download(id: string, version: SemanticVersion): Promise<Uint8Array> {
    this.calls.downloads.push(`${id}@${formatVersion(version)}`);
    this.guard();
    const stored = this.named(id).find((entry) => versionsEqual(entry.version, version));
    return stored?.archive ?? strToU8(`${id} ${formatVersion(version)}`);
  }
}

export function memorySource(
  name: string,
  packages: FakePackage[] = [],
  options: { enabled?: boolean; updateBatchSize?: number } = {}
): { source: PackageSource; fetcher: InMemoryFeedFetcher } {
  const fetcher = new InMemoryFeedFetcher(packages, { updateBatchSize: options.updateBatchSize });
  return { source: new PackageSource({ name, enabled: options.enabled, fetcher }), fetcher };
}

/**
 * Transport answering from a URL table. Unknown URLs answer 404.
 */
export class InMemoryTransport implements RemoteTransport {
  readonly requests: string[] = [];
  private readonly routes = new Map<string, { status: number; body: string | Uint8Array }>();

  route(url: string, body: string | Uint8Array, status = 200): this {
    this.routes.set(url, { status, body });
    return this;
  }

  json(url: string, document: unknown, status = 200): this {
    return this.route(url, JSON.stringify(document), status);
  }

  count(url: string): number {
    return this.requests.filter((request) => request === url).length;
  }

  async getText(url: string): Promise<TransportResponse> {
    this.requests.push(url);
    const found = this.routes.get(url);
    if (!found) {
      return { status: 404, ok: false, body: '' };
    }
    const body = typeof found.body === 'string' ? found.body : strFromU8(found.body);
    return { status: found.status, ok: found.status >= 200 && found.status < 300, body };
  }

  async getBytes(url: string): Promise<Uint8Array> {
    this.requests.push(url);
    const found = this.routes.get(url);
    if (!found || found.status !== 200) {
      throw new SourceError('memory', `download failed with ${found?.status ?? 404}`, { url });
    }
    return typeof found.body === 'string' ? strToU8(found.body) : found.body;
  }
}

// ============================================================================
// Package archives
// ============================================================================

export interface NuspecOptions {
  id: string;
  version: string;
  description?: string;
  authors?: string;
  /** `[targetFramework, [[id, range], ...]]` pairs rendered as groups. */
  groups?: Array<[string, Array<[string, string]>]>;
}

export function nuspecXml(options: NuspecOptions): string {
  const groups = (options.groups ?? [])
    .map(([framework, dependencies]) => {
      const entries = dependencies.map(([id, range]) => `        <dependency id="${id}" version="${range}" />`).join('\n');
      return `      <group targetFramework="${framework}">\n${entries}\n      </group>`;
    })
    .join('\n');

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<package xmlns="http://schemas.microsoft.com/packaging/2013/05/nuspec.xsd">',
    '  <metadata>',
    `    <id>${options.id}</id>`,
    `    <version>${options.version}</version>`,
    `    <authors>${options.authors ?? 'Test Author'}</authors>`,
    `    <description>${options.description ?? `${options.id} test package`}</description>`,
    groups ? `    <dependencies>\n${groups}\n    </dependencies>` : '',
    '  </metadata>',
    '</package>'
  ].join('\n');
}

/** A `.nupkg` with the given nuspec at its root and one library file. */
export function buildArchive(nuspec: string, nuspecName = 'Package.nuspec'): Uint8Array {
  return zipSync({
    [nuspecName]: strToU8(nuspec),
    'lib/netstandard2.0/Library.dll': strToU8('not really a dll')
  });
}

// ============================================================================
// Installer and profile
// ============================================================================

/**
 * Installer that keeps the "disk" in memory and logs every call as
 * `install Name.Version` or `uninstall Name.Version`.
 */
export class RecordingInstaller implements InstallerPort {
  readonly onDisk: PackageIdentifier[] = [];
  readonly log: string[] = [];
  readonly failInstall = new Set<string>();
  readonly failUninstall = new Set<string>();
  listingError?: NuforgeError;
  onInstall?: (metadata: PackageMetadata) => void;

  seed(name: string, version: string): this {
    this.onDisk.push(identifierFromVersion(name, v(version)));
    return this;
  }

  async install(metadata: PackageMetadata, _installRoot: string): Promise<Result<void, InstallStepError>> {
    const name = metadata.identifier.name;
    if (this.failInstall.has(nameKey(name))) {
      this.log.push(`install-failed ${formatIdentifier(metadata.identifier)}`);
      return fail(new InstallStepError(name, 'install', 'disk full'));
    }
    this.log.push(`install ${formatIdentifier(metadata.identifier)}`);
    this.onDisk.push(identifierFromVersion(name, metadata.version));
    this.onInstall?.(metadata);
    return ok(undefined);
  }

  async uninstall(identifier: PackageIdentifier): Promise<Result<void, InstallStepError>> {
    if (this.failUninstall.has(nameKey(identifier.name))) {
      return fail(new InstallStepError(identifier.name, 'uninstall', 'file in use'));
    }
    this.log.push(`uninstall ${formatIdentifier(identifier)}`);
    const version = concreteVersion(identifier);
    const index = this.onDisk.findIndex((entry) => {
      const installed = concreteVersion(entry);
      return namesEqual(entry.name, identifier.name) && installed !== undefined && version !== undefined && versionsEqual(installed, version);
    });
    if (index >= 0) {
      this.onDisk.splice(index, 1);
    }
    return ok(undefined);
  }

  async listInstalled(): Promise<Result<PackageIdentifier[], NuforgeError>> {
    if (this.listingError) {
      return fail(this.listingError);
    }
    return ok([...this.onDisk]);
  }
}

export const STANDARD_PROFILE: TargetProfile = {
  nativeLabel: 'unity',
  hostVersion: '2021.3.0',
  compatibility: 'standard-runtime'
};

export function fixedProfile(overrides: Partial<TargetProfile> = {}): PlatformProfileProvider {
  const profile = { ...STANDARD_PROFILE, ...overrides };
  return { getProfile: () => profile };
}

export function createTestOrchestrator(
  dir: string,
  sources: PackageSource[],
  installer: RecordingInstaller = new RecordingInstaller()
): {
  orchestrator: PackageOrchestrator;
  manifest: ManifestStore;
  installer: RecordingInstaller;
  progress: ReturnType<typeof createRecordingProgress>;
} {
  const manifest = new ManifestStore(join(dir, 'packages.yml'));
  const progress = createRecordingProgress();
  const orchestrator = new PackageOrchestrator({
    sources,
    installer,
    manifest,
    profileProvider: fixedProfile(),
    installRoot: join(dir, 'Packages'),
    progress
  });
  return { orchestrator, manifest, installer, progress };
}

// ============================================================================
// Output
// ============================================================================

/** OutputPort that records each call as `level message`. */
export function createRecordingOutput(): OutputPort & { lines: string[] } {
  const lines: string[] = [];
  const spinner: UnifiedSpinner = {
    start: (message) => lines.push(`spinner:start ${message}`),
    stop: (message) => lines.push(`spinner:stop ${message ?? ''}`),
    message: (text) => lines.push(`spinner:message ${text}`)
  };
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    step: (message) => lines.push(`step ${message}`),
    message: (message) => lines.push(`message ${message}`),
    success: (message) => lines.push(`success ${message}`),
    error: (message) => lines.push(`error ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    note: (content, title) => lines.push(`note ${title ?? ''} ${content}`),
    spinner: () => spinner
  };
}
