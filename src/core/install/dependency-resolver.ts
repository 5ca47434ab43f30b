/**
 * Dependency walk: turns requested identifiers into a de-duplicated,
 * dependency-first install plan.
 */

import { errorMessage, SourceError, UnresolvableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { fail, ok, type Result } from '../../utils/result.js';
import type { DependencyGroup, PackageMetadata } from '../sources/types.js';
import {
  formatIdentifier,
  identifierAccepts,
  nameKey,
  type PackageIdentifier
} from '../version/package-identifier.js';
import { compareVersions, formatSpec, formatVersion, versionsEqual, type SemanticVersion } from '../version/package-version.js';
import type { ResolutionContext } from './resolution-context.js';
import type { PlanStep, ResolutionFailure, ResolutionPlan } from './types.js';

export interface ResolvePlanOptions {
  forceUpgrade?: boolean;
  allowDowngrade?: boolean;
}

class PlanBuilder {
  private readonly planned = new Map<string, PlanStep>();
  private readonly visiting = new Set<string>();
  private readonly satisfied: PackageIdentifier[] = [];

  constructor(
    private readonly context: ResolutionContext,
    private readonly options: ResolvePlanOptions
  ) {}

  async visit(identifier: PackageIdentifier, requiredBy?: string): Promise<Result<void, ResolutionFailure>> {
    const key = nameKey(identifier.name);
    const isRoot = requiredBy === undefined;

    // 1. Cycle guard
    if (this.visiting.has(key)) {
      logger.debug(`Skipping ${identifier.name}: dependency cycle through ${requiredBy ?? 'the request'}`);
      return ok(undefined);
    }

    // 2. Already queued in range
    const queued = this.planned.get(key);
    if (queued && identifierAccepts(identifier, queued.metadata.version)) {
      if (identifier.manuallyRequested) {
        queued.manuallyInstalled = true;
      }
      logger.debug(`${identifier.name} already queued at ${formatVersion(queued.metadata.version)}`);
      return ok(undefined);
    }

    // 3. Installed and satisfying
    const installed = this.context.installedRecord(identifier.name);
    const forced = isRoot && this.options.forceUpgrade === true;
    if (!queued && installed && identifierAccepts(identifier, installed.version) && !forced) {
      this.markSatisfied(identifier, installed.version);
      return ok(undefined);
    }

    // 4. Resolve against the sources; a cancelled run stops fetching
    if (this.context.cancelled) {
      return ok(undefined);
    }
    this.context.progress.emit({ type: 'resolve:start', package: identifier.name, spec: formatSpec(identifier.spec) });
    const match = await this.context.findBestMatch(this.context.preferredRequest(identifier));
    if (!match) {
      const error = new UnresolvableError(identifier.name, {
        spec: formatSpec(identifier.spec),
        sources: this.context.sourceNames,
        requiredBy
      });
      this.context.progress.emit({ type: 'resolve:failed', package: identifier.name, detail: error.message });
      return fail(error);
    }

    if (queued) {
      if (compareVersions(match.version, queued.metadata.version) <= 0) {
        logger.debug(
          `${identifier.name} stays at queued ${formatVersion(queued.metadata.version)} over ${formatVersion(match.version)}`
        );
        return ok(undefined);
      }
      logger.debug(
        `Upgrading queued ${identifier.name} from ${formatVersion(queued.metadata.version)} to ${formatVersion(match.version)}`
      );
    } else if (installed) {
      const order = compareVersions(installed.version, match.version);
      if (order === 0 || (order > 0 && this.options.allowDowngrade !== true)) {
        if (order > 0) {
          logger.info(
            `${identifier.name} ${formatVersion(installed.version)} is installed; the requirement '${formatSpec(identifier.spec)}' is already satisfied by a newer release`
          );
        }
        this.markSatisfied(identifier, installed.version);
        return ok(undefined);
      }
    }

    this.context.progress.emit({
      type: 'resolve:resolved',
      package: identifier.name,
      version: formatVersion(match.version),
      source: match.sourceRef
    });

    // 5. Dependency group for the active profile
    let groups: DependencyGroup[];
    try {
      groups = await this.context.dependencyGroups(match);
    } catch (error) {
      const failure =
        error instanceof SourceError
          ? error
          : new SourceError(match.sourceRef, `cannot read dependencies of ${formatIdentifier(match.identifier)}: ${errorMessage(error)}`);
      this.context.progress.emit({ type: 'resolve:failed', package: identifier.name, detail: failure.message });
      return fail(failure);
    }
    const selection = this.context.resolver.selectGroup(identifier.name, groups);
    if (!selection.success) {
      this.context.progress.emit({ type: 'resolve:failed', package: identifier.name, detail: selection.error.message });
      return selection;
    }

    const step = this.enqueue(key, match, identifier, queued);

    // 6. Recurse in declared order
    this.visiting.add(key);
    try {
      for (const dependency of selection.value?.dependencies ?? []) {
        step.dependencies.push(nameKey(dependency.name));
        const result = await this.visit(dependency, formatIdentifier(match.identifier));
        if (!result.success) {
          return result;
        }
      }
    } finally {
      this.visiting.delete(key);
    }
    return ok(undefined);
  }

  private enqueue(key: string, match: PackageMetadata, identifier: PackageIdentifier, queued?: PlanStep): PlanStep {
    const installed = this.context.installedRecord(identifier.name);
    const manuallyInstalled =
      identifier.manuallyRequested || (queued?.manuallyInstalled ?? false) || (installed?.manuallyInstalled ?? false);

    if (queued) {
      queued.metadata = match;
      queued.manuallyInstalled = manuallyInstalled;
      queued.dependencies = [];
      return queued;
    }

    const step: PlanStep = {
      metadata: match,
      replaces: installed && !versionsEqual(installed.version, match.version) ? installed : undefined,
      manuallyInstalled,
      dependencies: []
    };
    this.planned.set(key, step);
    return step;
  }

  private markSatisfied(identifier: PackageIdentifier, version: SemanticVersion): void {
    this.context.progress.emit({ type: 'resolve:satisfied', package: identifier.name, installed: formatVersion(version) });
    if (identifier.manuallyRequested) {
      this.satisfied.push(identifier);
    }
  }

  /** Post-order walk from the roots: every dependency precedes its dependents. */
  build(roots: readonly PackageIdentifier[]): ResolutionPlan {
    const ordered: PlanStep[] = [];
    const done = new Set<string>();

    const place = (key: string): void => {
      if (done.has(key)) return;
      done.add(key);
      const step = this.planned.get(key);
      if (!step) return;
      for (const dependency of step.dependencies) {
        place(dependency);
      }
      ordered.push(step);
    };

    for (const root of roots) {
      place(nameKey(root.name));
    }
    for (const key of this.planned.keys()) {
      place(key);
    }
    return { steps: ordered, satisfied: this.satisfied };
  }
}

/**
 * Resolve every root and its dependency closure. The walk is sequential; the
 * first unresolvable identifier, incompatible package or failed detail fetch
 * ends it. Once the context is cancelled no further fetch starts and the
 * partial plan must be discarded.
 */
export async function resolvePlan(
  context: ResolutionContext,
  roots: readonly PackageIdentifier[],
  options: ResolvePlanOptions = {}
): Promise<Result<ResolutionPlan, ResolutionFailure>> {
  const builder = new PlanBuilder(context, options);
  for (const root of roots) {
    const result = await builder.visit(root);
    if (!result.success) {
      return result;
    }
  }
  const plan = builder.build(roots);
  logger.debug(`Resolved plan: ${plan.steps.map((step) => formatIdentifier(step.metadata.identifier)).join(', ') || '(empty)'}`);
  return ok(plan);
}
