import type { NuforgeError } from '../../types/index.js';
import type {
  AmbiguousProfileError,
  InstallStepError,
  ManifestConsistencyWarning,
  SourceError,
  UnresolvableError
} from '../../utils/errors.js';
import type { Result } from '../../utils/result.js';
import type { InstalledPackageRecord } from '../manifest/manifest-store.js';
import type { PackageMetadata } from '../sources/types.js';
import type { PackageIdentifier } from '../version/package-identifier.js';
import type { SemanticVersion } from '../version/package-version.js';

export type InstallFailure = InstallStepError;
export type UninstallFailure = InstallStepError;

/**
 * Puts package payloads in place and takes them away again. The orchestrator
 * calls it once per plan step and never looks at the files it touches.
 */
export interface InstallerPort {
  install(metadata: PackageMetadata, installRoot: string): Promise<Result<void, InstallFailure>>;
  uninstall(identifier: PackageIdentifier): Promise<Result<void, UninstallFailure>>;
  /** Packages currently present under the install root. */
  listInstalled(): Promise<Result<PackageIdentifier[], NuforgeError>>;
}

/** Why a plan could not be built; a source that fails a detail fetch ends the walk. */
export type ResolutionFailure = UnresolvableError | AmbiguousProfileError | SourceError;

export interface PlanStep {
  metadata: PackageMetadata;
  /** Installed record this step replaces, for upgrades and downgrades. */
  replaces?: InstalledPackageRecord;
  manuallyInstalled: boolean;
  /** Name keys of the dependencies chosen for this step, in declared order. */
  dependencies: string[];
}

export interface ResolutionPlan {
  /** Dependency-first commit order. */
  steps: PlanStep[];
  /** Requested identifiers an installed package already satisfies. */
  satisfied: PackageIdentifier[];
}

export interface InstallOptions {
  /** Resolve requested packages even when the installed version is in range. */
  forceUpgrade?: boolean;
  /** Let a lower resolved version replace a higher installed one. */
  allowDowngrade?: boolean;
  signal?: AbortSignal;
}

export type InstallOutcome =
  | { state: 'already-satisfied'; satisfied: PackageIdentifier[] }
  | { state: 'installed'; installed: PackageIdentifier[]; satisfied: PackageIdentifier[] }
  | { state: 'unresolvable'; error: ResolutionFailure }
  | { state: 'partially-failed'; error: InstallStepError; committed: PackageIdentifier[] }
  | { state: 'cancelled'; committed: PackageIdentifier[] }
  /** Nothing was attempted: the manifest or the install folder could not be read. */
  | { state: 'failed'; error: NuforgeError };

export interface UninstallOptions {
  /** Also remove non-manual dependencies nothing else needs. Default true. */
  removeDependencies?: boolean;
  signal?: AbortSignal;
}

export type UninstallOutcome =
  | { state: 'not-installed'; name: string }
  | { state: 'removed'; removed: PackageIdentifier[] }
  | { state: 'failed'; error: NuforgeError; removed: PackageIdentifier[] }
  | { state: 'cancelled'; removed: PackageIdentifier[] };

export interface UpdateOptions {
  /** Target version; the newest available release when absent. */
  version?: SemanticVersion;
  includePrerelease?: boolean;
  signal?: AbortSignal;
}

export interface ReconcileReport {
  /** On-disk installs the manifest does not list. */
  orphans: PackageIdentifier[];
  removed: PackageIdentifier[];
  /** Manifest records with nothing on disk. */
  inconsistencies: ManifestConsistencyWarning[];
  /** Set when the manifest or the install folder could not be read; nothing was removed. */
  error?: NuforgeError;
}

export interface RestoreResult {
  outcome: InstallOutcome;
  reconcile: ReconcileReport;
}
