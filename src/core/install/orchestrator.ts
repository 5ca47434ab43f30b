/**
 * Package orchestrator.
 *
 * Drives every lifecycle operation: resolve a plan against the enabled
 * sources, commit it one step at a time through the installer, and keep the
 * manifest in step with what has actually been committed.
 *
 * The manifest is re-read at the start of each operation and rewritten after
 * every committed step, so an interrupted run leaves it consistent with the
 * packages already on disk. Nothing is rolled back: a failed step ends the
 * run in the partially-failed state and `reconcile` is the remedy.
 */

import type { NuforgeError } from '../../types/index.js';
import { errorMessage, InstallStepError, ManifestConsistencyWarning, type ManifestReadError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { fail, ok, type Result } from '../../utils/result.js';
import {
  findRecord,
  recordIdentifier,
  removeRecord,
  upsertRecord,
  type InstalledPackageRecord,
  type ManifestStore
} from '../manifest/manifest-store.js';
import { TargetProfileResolver, type PlatformProfileProvider } from '../platform/target-profile-resolver.js';
import { silentProgress, type ProgressPort } from '../ports/progress.js';
import type { PackageSource } from '../sources/package-source.js';
import type { PackageMetadata, SearchRequest } from '../sources/types.js';
import {
  concreteVersion,
  formatIdentifier,
  identifierFromSpec,
  identifierFromVersion,
  nameKey,
  namesEqual,
  pinnedIdentifier,
  type PackageIdentifier
} from '../version/package-identifier.js';
import { ANY_VERSION, formatVersion, versionsEqual, type SemanticVersion } from '../version/package-version.js';
import { resolvePlan } from './dependency-resolver.js';
import { ResolutionContext } from './resolution-context.js';
import type {
  InstallerPort,
  InstallOptions,
  InstallOutcome,
  PlanStep,
  ReconcileReport,
  ResolutionPlan,
  RestoreResult,
  UninstallOptions,
  UninstallOutcome,
  UpdateOptions
} from './types.js';

export interface PackageOrchestratorOptions {
  /** Sources in priority order; disabled ones are skipped. */
  sources: readonly PackageSource[];
  installer: InstallerPort;
  manifest: ManifestStore;
  profileProvider: PlatformProfileProvider;
  installRoot: string;
  progress?: ProgressPort;
}

export interface UpdateCheckOptions {
  includePrerelease?: boolean;
  includeAllVersions?: boolean;
}

function isOnDisk(onDisk: readonly PackageIdentifier[], name: string, version: SemanticVersion): boolean {
  return onDisk.some((identifier) => {
    const installed = concreteVersion(identifier);
    return namesEqual(identifier.name, name) && installed !== undefined && versionsEqual(installed, version);
  });
}

export class PackageOrchestrator {
  private readonly sources: readonly PackageSource[];
  private readonly installer: InstallerPort;
  private readonly manifest: ManifestStore;
  private readonly profileProvider: PlatformProfileProvider;
  private readonly installRoot: string;
  private readonly progress: ProgressPort;

  constructor(options: PackageOrchestratorOptions) {
    this.sources = options.sources;
    this.installer = options.installer;
    this.manifest = options.manifest;
    this.profileProvider = options.profileProvider;
    this.installRoot = options.installRoot;
    this.progress = options.progress ?? silentProgress;
  }

  private get enabledSources(): PackageSource[] {
    return this.sources.filter((source) => source.enabled);
  }

  private createContext(
    installed: readonly InstalledPackageRecord[],
    signal?: AbortSignal,
    preferred?: readonly InstalledPackageRecord[]
  ): ResolutionContext {
    return new ResolutionContext({
      sources: this.sources,
      resolver: new TargetProfileResolver(this.profileProvider.getProfile()),
      installed,
      preferred,
      progress: this.progress,
      signal
    });
  }

  // ==========================================================================
  // Install
  // ==========================================================================

  async install(identifier: PackageIdentifier, options: InstallOptions = {}): Promise<InstallOutcome> {
    return this.installAll([identifier], options);
  }

  async installAll(identifiers: readonly PackageIdentifier[], options: InstallOptions = {}): Promise<InstallOutcome> {
    const read = await this.readManifest();
    if (!read.success) {
      return { state: 'failed', error: read.error };
    }
    return this.resolveAndCommit(identifiers, read.value, read.value, options);
  }

  /** Read the manifest, reporting an unreadable one so no caller writes over it. */
  private async readManifest(): Promise<Result<InstalledPackageRecord[], ManifestReadError>> {
    const read = await this.manifest.read();
    if (!read.success) {
      logger.error(read.error.message);
      this.progress.log('error', `${read.error.message}. Fix or remove the file; it was left untouched.`);
    }
    return read;
  }

  private async saveManifest(
    name: string,
    step: 'install' | 'uninstall',
    records: readonly InstalledPackageRecord[]
  ): Promise<Result<void, InstallStepError>> {
    try {
      await this.manifest.write(records);
      return ok(undefined);
    } catch (error) {
      return fail(new InstallStepError(name, step, `the manifest could not be written: ${errorMessage(error)}`));
    }
  }

  private async resolveAndCommit(
    roots: readonly PackageIdentifier[],
    installed: readonly InstalledPackageRecord[],
    records: readonly InstalledPackageRecord[],
    options: InstallOptions,
    preferred?: readonly InstalledPackageRecord[]
  ): Promise<InstallOutcome> {
    if (options.signal?.aborted) {
      return { state: 'cancelled', committed: [] };
    }

    const context = this.createContext(installed, options.signal, preferred);
    const planned = await resolvePlan(context, roots, options);
    if (context.cancelled) {
      logger.info('Resolution cancelled before any package was installed');
      return { state: 'cancelled', committed: [] };
    }
    if (!planned.success) {
      logger.debug(planned.error.message);
      return { state: 'unresolvable', error: planned.error };
    }

    if (planned.value.steps.length === 0) {
      return { state: 'already-satisfied', satisfied: planned.value.satisfied };
    }
    return this.commit(planned.value, records, options.signal);
  }

  private async commit(
    plan: ResolutionPlan,
    records: readonly InstalledPackageRecord[],
    signal?: AbortSignal
  ): Promise<InstallOutcome> {
    const committed: PackageIdentifier[] = [];
    let current = [...records];
    const total = plan.steps.length;

    this.progress.emit({
      type: 'install:start',
      packages: plan.steps.map((step) => formatIdentifier(step.metadata.identifier))
    });

    for (const [index, step] of plan.steps.entries()) {
      if (signal?.aborted) {
        logger.info(`Install cancelled after ${committed.length} of ${total} package(s)`);
        this.progress.emit({
          type: 'install:complete',
          summary: { installed: committed.length, failed: 0, skipped: total - index }
        });
        return { state: 'cancelled', committed };
      }

      const label = formatIdentifier(step.metadata.identifier);
      this.progress.emit({ type: 'install:step', package: label, status: 'installing' });

      const applied = await this.applyStep(step, current);
      if (!applied.success) {
        this.progress.emit({ type: 'install:step', package: label, status: 'failed', detail: applied.error.message });
        this.progress.emit({
          type: 'install:complete',
          summary: { installed: committed.length, failed: 1, skipped: total - index - 1 }
        });
        logger.error(applied.error.message);
        return { state: 'partially-failed', error: applied.error, committed };
      }

      current = applied.value;
      committed.push(identifierFromVersion(step.metadata.identifier.name, step.metadata.version, step.manuallyInstalled));
      this.progress.emit({ type: 'install:step', package: label, status: 'installed' });
    }

    this.progress.emit({
      type: 'install:complete',
      summary: { installed: committed.length, failed: 0, skipped: plan.satisfied.length }
    });
    return { state: 'installed', installed: committed, satisfied: plan.satisfied };
  }

  /**
   * Uninstall the replaced version (if any), install the new one, and write
   * the manifest after each half.
   */
  private async applyStep(
    step: PlanStep,
    records: readonly InstalledPackageRecord[]
  ): Promise<Result<InstalledPackageRecord[], InstallStepError>> {
    const name = step.metadata.identifier.name;
    let current = [...records];

    const replaced = step.replaces;
    if (replaced) {
      const removed = await this.callInstaller(name, 'uninstall', () =>
        this.installer.uninstall(recordIdentifier(replaced))
      );
      if (!removed.success) {
        return removed;
      }
      current = removeRecord(current, replaced.name, replaced.version);
      const saved = await this.saveManifest(name, 'uninstall', current);
      if (!saved.success) {
        return saved;
      }
    }

    const installed = await this.callInstaller(name, 'install', () =>
      this.installer.install(step.metadata, this.installRoot)
    );
    if (!installed.success) {
      return installed;
    }

    current = upsertRecord(current, {
      name,
      version: step.metadata.version,
      manuallyInstalled: step.manuallyInstalled
    });
    const saved = await this.saveManifest(name, 'install', current);
    if (!saved.success) {
      return saved;
    }
    return ok(current);
  }

  private async callInstaller(
    name: string,
    step: 'install' | 'uninstall',
    call: () => Promise<Result<void, InstallStepError>>
  ): Promise<Result<void, InstallStepError>> {
    try {
      return await call();
    } catch (error) {
      return fail(new InstallStepError(name, step, errorMessage(error)));
    }
  }

  // ==========================================================================
  // Restore
  // ==========================================================================

  /**
   * Install every manifest record that is missing on disk, then reconcile.
   * Dependencies resolve to their recorded versions where those satisfy the
   * dependent. When no record is flagged manual, packages nothing else
   * depends on are flagged first.
   */
  async restore(options: InstallOptions = {}): Promise<RestoreResult> {
    const read = await this.readManifest();
    if (!read.success) {
      return { outcome: { state: 'failed', error: read.error }, reconcile: await this.reconcile() };
    }
    const listed = await this.installer.listInstalled();
    if (!listed.success) {
      this.reportListingFailure(listed.error);
      return { outcome: { state: 'failed', error: listed.error }, reconcile: await this.reconcile() };
    }

    let records = read.value;
    const onDisk = listed.value;
    const present = records.filter((record) => isOnDisk(onDisk, record.name, record.version));

    if (records.length > 0 && !records.some((record) => record.manuallyInstalled)) {
      records = await this.markRootPackages(records, present);
    }

    const missing = records.filter((record) => !isOnDisk(onDisk, record.name, record.version));
    logger.info(`Restoring ${missing.length} of ${records.length} package(s)`);

    const outcome: InstallOutcome =
      missing.length === 0
        ? { state: 'already-satisfied', satisfied: records.map(recordIdentifier) }
        : await this.resolveAndCommit(
            missing.map((record) => pinnedIdentifier(record.name, record.version, record.manuallyInstalled)),
            present,
            records,
            options,
            records
          );

    return { outcome, reconcile: await this.reconcile() };
  }

  private async markRootPackages(
    records: InstalledPackageRecord[],
    present: readonly InstalledPackageRecord[]
  ): Promise<InstalledPackageRecord[]> {
    const context = this.createContext(present);
    const required = new Set<string>();
    for (const record of records) {
      for (const dependency of (await context.installedDependencies(record)) ?? []) {
        required.add(nameKey(dependency.name));
      }
    }

    const marked = records.map((record) =>
      required.has(nameKey(record.name)) ? record : { ...record, manuallyInstalled: true }
    );
    const roots = marked.filter((record) => record.manuallyInstalled).map((record) => record.name);
    logger.info(`Flagging root package(s) as manually installed: ${roots.join(', ') || '(none)'}`);
    try {
      await this.manifest.write(marked);
    } catch (error) {
      const message = `Cannot record root packages in the manifest: ${errorMessage(error)}`;
      logger.warn(message);
      this.progress.log('warn', message);
    }
    return marked;
  }

  // ==========================================================================
  // Uninstall
  // ==========================================================================

  /**
   * Remove a package, then any non-manual dependency that no remaining
   * package still needs.
   */
  async uninstall(name: string, options: UninstallOptions = {}): Promise<UninstallOutcome> {
    const read = await this.readManifest();
    if (!read.success) {
      return { state: 'failed', error: read.error, removed: [] };
    }
    let current = read.value;
    const record = findRecord(current, name);
    if (!record) {
      logger.info(`${name} is not installed`);
      return { state: 'not-installed', name };
    }

    const removeDependencies = options.removeDependencies ?? true;
    const context = this.createContext(current, options.signal);
    const queue = removeDependencies ? [...((await context.installedDependencies(record)) ?? [])] : [];
    const removed: PackageIdentifier[] = [];

    this.progress.emit({ type: 'uninstall:start', packages: [formatIdentifier(recordIdentifier(record))] });

    const finish = (outcome: UninstallOutcome): UninstallOutcome => {
      const failed = outcome.state === 'failed' ? 1 : 0;
      this.progress.emit({ type: 'uninstall:complete', summary: { removed: removed.length, failed } });
      return outcome;
    };

    let target: InstalledPackageRecord | undefined = record;
    while (target) {
      if (options.signal?.aborted) {
        return finish({ state: 'cancelled', removed });
      }
      const result = await this.removeStep(target, current);
      if (!result.success) {
        return finish({ state: 'failed', error: result.error, removed });
      }
      current = result.value;
      removed.push(recordIdentifier(target));

      target = undefined;
      while (!target && queue.length > 0) {
        const dependency = queue.shift();
        const candidate = dependency ? findRecord(current, dependency.name) : undefined;
        if (!candidate || candidate.manuallyInstalled) continue;
        if (await this.isStillRequired(context, candidate, current)) continue;
        queue.push(...((await context.installedDependencies(candidate)) ?? []));
        target = candidate;
      }
    }

    return finish({ state: 'removed', removed });
  }

  private async isStillRequired(
    context: ResolutionContext,
    candidate: InstalledPackageRecord,
    records: readonly InstalledPackageRecord[]
  ): Promise<boolean> {
    for (const other of records) {
      if (namesEqual(other.name, candidate.name)) continue;
      const dependencies = await context.installedDependencies(other);
      if (dependencies === undefined) {
        logger.debug(`Keeping ${candidate.name}: dependencies of ${other.name} are unknown`);
        return true;
      }
      if (dependencies.some((dependency) => namesEqual(dependency.name, candidate.name))) {
        logger.debug(`Keeping ${candidate.name}: still required by ${other.name}`);
        return true;
      }
    }
    return false;
  }

  async uninstallAll(options: Pick<UninstallOptions, 'signal'> = {}): Promise<UninstallOutcome> {
    const read = await this.readManifest();
    if (!read.success) {
      return { state: 'failed', error: read.error, removed: [] };
    }
    let current = read.value;
    const removed: PackageIdentifier[] = [];
    this.progress.emit({ type: 'uninstall:start', packages: current.map((record) => formatIdentifier(recordIdentifier(record))) });

    for (const record of [...current]) {
      if (options.signal?.aborted) {
        this.progress.emit({ type: 'uninstall:complete', summary: { removed: removed.length, failed: 0 } });
        return { state: 'cancelled', removed };
      }
      const result = await this.removeStep(record, current);
      if (!result.success) {
        this.progress.emit({ type: 'uninstall:complete', summary: { removed: removed.length, failed: 1 } });
        return { state: 'failed', error: result.error, removed };
      }
      current = result.value;
      removed.push(recordIdentifier(record));
    }

    this.progress.emit({ type: 'uninstall:complete', summary: { removed: removed.length, failed: 0 } });
    return { state: 'removed', removed };
  }

  private async removeStep(
    record: InstalledPackageRecord,
    records: readonly InstalledPackageRecord[]
  ): Promise<Result<InstalledPackageRecord[], InstallStepError>> {
    const identifier = recordIdentifier(record);
    const label = formatIdentifier(identifier);
    this.progress.emit({ type: 'uninstall:step', package: label, status: 'removing' });

    const result = await this.callInstaller(record.name, 'uninstall', () => this.installer.uninstall(identifier));
    if (!result.success) {
      this.progress.emit({ type: 'uninstall:step', package: label, status: 'failed', detail: result.error.message });
      logger.error(result.error.message);
      return result;
    }

    const next = removeRecord(records, record.name, record.version);
    const saved = await this.saveManifest(record.name, 'uninstall', next);
    if (!saved.success) {
      this.progress.emit({ type: 'uninstall:step', package: label, status: 'failed', detail: saved.error.message });
      logger.error(saved.error.message);
      return saved;
    }
    this.progress.emit({ type: 'uninstall:step', package: label, status: 'removed' });
    return ok(next);
  }

  // ==========================================================================
  // Update
  // ==========================================================================

  /**
   * Move one package to the given version, or to the newest release the
   * sources report. A package that is not installed is installed.
   */
  async update(name: string, options: UpdateOptions = {}): Promise<InstallOutcome> {
    const read = await this.readManifest();
    if (!read.success) {
      return { state: 'failed', error: read.error };
    }
    const records = read.value;
    const record = findRecord(records, name);
    const installOptions: InstallOptions = { forceUpgrade: true, signal: options.signal };

    if (options.version) {
      const target = pinnedIdentifier(record?.name ?? name, options.version, record?.manuallyInstalled ?? true);
      return this.resolveAndCommit([target], records, records, { ...installOptions, allowDowngrade: true });
    }

    if (!record) {
      return this.resolveAndCommit([identifierFromSpec(name, ANY_VERSION, true)], records, records, installOptions);
    }

    const updates = await this.collectUpdates([record], { includePrerelease: options.includePrerelease });
    const newest = updates.find((update) => namesEqual(update.identifier.name, record.name));
    if (!newest) {
      logger.info(`${record.name} ${formatVersion(record.version)} is up to date`);
      return { state: 'already-satisfied', satisfied: [recordIdentifier(record)] };
    }

    return this.resolveAndCommit(
      [pinnedIdentifier(record.name, newest.version, record.manuallyInstalled)],
      records,
      records,
      installOptions
    );
  }

  async updateAll(options: Omit<UpdateOptions, 'version'> = {}): Promise<InstallOutcome> {
    const read = await this.readManifest();
    if (!read.success) {
      return { state: 'failed', error: read.error };
    }
    const records = read.value;
    const updates = await this.collectUpdates(records, { includePrerelease: options.includePrerelease });
    if (updates.length === 0) {
      return { state: 'already-satisfied', satisfied: records.map(recordIdentifier) };
    }

    const targets = updates.map((update) => {
      const record = findRecord(records, update.identifier.name);
      return pinnedIdentifier(record?.name ?? update.identifier.name, update.version, record?.manuallyInstalled ?? false);
    });
    return this.resolveAndCommit(targets, records, records, { forceUpgrade: true, signal: options.signal });
  }

  /** Newer versions of installed packages; the first source to report a package wins. */
  async checkForUpdates(options: UpdateCheckOptions = {}): Promise<Result<PackageMetadata[], ManifestReadError>> {
    const read = await this.readManifest();
    if (!read.success) {
      return read;
    }
    return ok(await this.collectUpdates(read.value, options));
  }

  private async collectUpdates(
    records: readonly InstalledPackageRecord[],
    options: UpdateCheckOptions
  ): Promise<PackageMetadata[]> {
    const found = new Map<string, PackageMetadata[]>();

    for (const source of this.enabledSources) {
      const pending = records.filter((record) => !found.has(nameKey(record.name))).map(recordIdentifier);
      if (pending.length === 0) break;

      let updates: PackageMetadata[];
      try {
        updates = await source.getUpdates(pending, {
          includePrerelease: options.includePrerelease ?? false,
          includeAllVersions: options.includeAllVersions ?? false
        });
      } catch (error) {
        const message = `Source '${source.name}' failed to report updates: ${errorMessage(error)}`;
        logger.warn(message);
        this.progress.log('warn', message);
        continue;
      }

      for (const update of updates) {
        const key = nameKey(update.identifier.name);
        found.set(key, [...(found.get(key) ?? []), update]);
      }
    }

    return [...found.values()].flat();
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Search every enabled source. Results keep source priority order; the same
   * name and version from a later source is dropped.
   */
  async search(request: SearchRequest): Promise<PackageMetadata[]> {
    this.progress.emit({ type: 'search:start', query: request.term });
    const seen = new Set<string>();
    const results: PackageMetadata[] = [];

    for (const source of this.enabledSources) {
      let listing: PackageMetadata[];
      try {
        listing = await source.search(request);
      } catch (error) {
        const message = `Search failed on source '${source.name}': ${errorMessage(error)}`;
        logger.warn(message);
        this.progress.log('warn', message);
        continue;
      }

      for (const entry of listing) {
        const key = `${nameKey(entry.identifier.name)}@${formatVersion(entry.version).toLowerCase()}`;
        if (seen.has(key)) continue;
        seen.add(key);
        results.push(entry);
      }
    }

    this.progress.emit({ type: 'search:complete', resultCount: results.length });
    return results;
  }

  // ==========================================================================
  // Reconcile
  // ==========================================================================

  /**
   * Remove on-disk installs the manifest does not list and report manifest
   * records with nothing on disk. Never throws. When either side cannot be
   * read, nothing is removed and the report carries the error.
   */
  async reconcile(): Promise<ReconcileReport> {
    const report: ReconcileReport = { orphans: [], removed: [], inconsistencies: [] };

    try {
      const read = await this.readManifest();
      if (!read.success) {
        report.error = read.error;
        return report;
      }
      const records = read.value;
      const listed = await this.installer.listInstalled();
      if (!listed.success) {
        this.reportListingFailure(listed.error);
        report.error = listed.error;
        return report;
      }

      for (const identifier of listed.value) {
        const version = concreteVersion(identifier);
        const known = records.some(
          (record) => namesEqual(record.name, identifier.name) && version !== undefined && versionsEqual(record.version, version)
        );
        if (known) continue;

        report.orphans.push(identifier);
        const result = await this.callInstaller(identifier.name, 'uninstall', () => this.installer.uninstall(identifier));
        if (result.success) {
          report.removed.push(identifier);
          logger.info(`Removed orphaned install ${formatIdentifier(identifier)}`);
        } else {
          logger.warn(result.error.message);
        }
        this.progress.emit({ type: 'reconcile:orphan', package: formatIdentifier(identifier), removed: result.success });
      }

      for (const record of records) {
        if (isOnDisk(listed.value, record.name, record.version)) continue;
        const warning = new ManifestConsistencyWarning(record.name, `version ${formatVersion(record.version)} is not installed`);
        report.inconsistencies.push(warning);
        logger.warn(warning.message);
        this.progress.emit({ type: 'manifest:inconsistent', package: record.name, detail: warning.message });
      }
    } catch (error) {
      logger.error(`Reconciliation stopped early: ${errorMessage(error)}`);
      this.progress.log('error', `Reconciliation stopped early: ${errorMessage(error)}`);
    }

    return report;
  }

  private reportListingFailure(error: NuforgeError): void {
    const message = `Cannot list installed packages: ${error.message}`;
    logger.warn(message);
    this.progress.log('warn', message);
  }
}
