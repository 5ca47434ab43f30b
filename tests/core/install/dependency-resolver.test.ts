import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AmbiguousProfileError, UnresolvableError } from '../../../src/utils/errors.js';
import { resolvePlan, type ResolvePlanOptions } from '../../../src/core/install/dependency-resolver.js';
import { ResolutionContext } from '../../../src/core/install/resolution-context.js';
import type { ResolutionPlan } from '../../../src/core/install/types.js';
import type { InstalledPackageRecord } from '../../../src/core/manifest/manifest-store.js';
import { TargetProfileResolver } from '../../../src/core/platform/target-profile-resolver.js';
import { createRecordingProgress } from '../../../src/core/ports/progress.js';
import type { PackageSource } from '../../../src/core/sources/package-source.js';
import { formatIdentifier, type PackageIdentifier } from '../../../src/core/version/package-identifier.js';
import { formatVersion } from '../../../src/core/version/package-version.js';
import { STANDARD_PROFILE, group, ident, labels, memorySource, unwrap, v } from '../../test-helpers.js';

const STANDARD = 'netstandard2.0';

function record(name: string, version: string, manuallyInstalled = true): InstalledPackageRecord {
  return { name, version: v(version), manuallyInstalled };
}

interface ContextOptions {
  installed?: InstalledPackageRecord[];
  preferred?: InstalledPackageRecord[];
}

function createContext(sources: PackageSource[], options: ContextOptions = {}) {
  const progress = createRecordingProgress();
  const context = new ResolutionContext({
    sources,
    resolver: new TargetProfileResolver(STANDARD_PROFILE),
    installed: options.installed ?? [],
    preferred: options.preferred,
    progress
  });
  return { context, progress };
}

function stepLabels(plan: ResolutionPlan): string[] {
  return plan.steps.map((step) => formatIdentifier(step.metadata.identifier));
}

async function plan(
  sources: PackageSource[],
  roots: PackageIdentifier[],
  options: ContextOptions & ResolvePlanOptions = {}
): Promise<ResolutionPlan> {
  const { context } = createContext(sources, options);
  return unwrap(await resolvePlan(context, roots, options));
}

describe('dependency resolver', () => {
  // ==========================================================================
  // Plans
  // ==========================================================================

  it('orders a diamond dependency-first and fetches the shared package once', async () => {
    const { source, fetcher } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '1.0'], ['C', '1.0'])] },
      { id: 'B', version: '1.0.0', groups: [group(STANDARD, ['D', '1.0'])] },
      { id: 'C', version: '1.0.0', groups: [group(STANDARD, ['D', '1.0'])] },
      { id: 'D', version: '1.0.0' },
      { id: 'D', version: '1.2.0' }
    ]);

    const result = await plan([source], [ident('A', '1.0')]);

    assert.deepEqual(stepLabels(result), ['D.1.2.0', 'B.1.0.0', 'C.1.0.0', 'A.1.0.0']);
    assert.deepEqual(
      result.steps.map((step) => step.manuallyInstalled),
      [false, false, false, true]
    );
    assert.deepEqual(fetcher.calls.listVersions, ['A', 'B', 'D', 'C']);
    assert.deepEqual(fetcher.calls.dependencyGroups, ['A@1.0.0', 'B@1.0.0', 'D@1.2.0', 'C@1.0.0']);
  });

  it('upgrades a queued package in place when a later requirement needs more', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '[1.0,1.2)'], ['C', '1.0'])] },
      { id: 'B', version: '1.0.0' },
      { id: 'B', version: '1.1.0' },
      { id: 'B', version: '1.3.0' },
      { id: 'C', version: '1.0.0', groups: [group(STANDARD, ['B', '[1.2,)'])] }
    ]);

    const result = await plan([source], [ident('A')]);
    assert.deepEqual(stepLabels(result), ['B.1.3.0', 'C.1.0.0', 'A.1.0.0']);
  });

  it('breaks dependency cycles', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '1.0'])] },
      { id: 'B', version: '1.0.0', groups: [group(STANDARD, ['A', '1.0'])] }
    ]);

    assert.deepEqual(stepLabels(await plan([source], [ident('A')])), ['B.1.0.0', 'A.1.0.0']);
  });

  it('treats packages without groups as having no dependencies', async () => {
    const { source } = memorySource('feed', [{ id: 'Solo', version: '2.0.0' }]);
    assert.deepEqual(stepLabels(await plan([source], [ident('Solo')])), ['Solo.2.0.0']);
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  it('fails with the requiring package when a dependency is unavailable', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['Missing', '1.0'])] }
    ]);
    const { context, progress } = createContext([source]);

    const result = await resolvePlan(context, [ident('A')]);
    assert.equal(result.success, false);
    if (result.success) return;
    assert.ok(result.error instanceof UnresolvableError);
    assert.equal(result.error.message, "No source provides 'Missing' matching '1.0.0' (required by A.1.0.0). Searched: feed");
    assert.deepEqual(progress.events.at(-1), { type: 'resolve:failed', package: 'Missing', detail: result.error.message });
  });

  it('names the lack of sources when every source is disabled', async () => {
    const { source } = memorySource('off', [{ id: 'A', version: '1.0.0' }], { enabled: false });
    const { context } = createContext([source]);

    const result = await resolvePlan(context, [ident('A')]);
    assert.equal(result.success ? '' : result.error.message, "No source provides 'A' matching ''. Searched: no enabled sources");
  });

  it('fails when no dependency group fits the profile', async () => {
    const { source } = memorySource('feed', [{ id: 'A', version: '1.0.0', groups: [group('net45', ['B', '1.0'])] }]);
    const { context } = createContext([source]);

    const result = await resolvePlan(context, [ident('A')]);
    assert.equal(result.success, false);
    if (result.success) return;
    assert.ok(result.error instanceof AmbiguousProfileError);
    assert.equal(
      result.error.message,
      "No dependency group of 'A' is compatible with profile 'unity/standard-runtime@2021.3.0'. Published: net45"
    );
  });

  // ==========================================================================
  // Installed packages
  // ==========================================================================

  it('skips requests an installed version satisfies', async () => {
    const { source, fetcher } = memorySource('feed', [{ id: 'Foo', version: '1.8.0' }]);

    const result = await plan([source], [ident('Foo', '[1.0,2.0)')], { installed: [record('Foo', '1.5.0')] });

    assert.deepEqual(result.steps, []);
    assert.deepEqual(labels(result.satisfied), ['Foo.[1.0.0,2.0.0)']);
    assert.deepEqual(fetcher.calls.listVersions, []);
  });

  it('resolves satisfied roots again when forced and records the replaced install', async () => {
    const { source } = memorySource('feed', [
      { id: 'Foo', version: '1.5.0' },
      { id: 'Foo', version: '1.8.0' }
    ]);

    const result = await plan([source], [ident('Foo', '[1.0,2.0)')], {
      installed: [record('Foo', '1.5.0')],
      forceUpgrade: true
    });

    assert.deepEqual(stepLabels(result), ['Foo.1.8.0']);
    const replaced = result.steps[0]?.replaces;
    assert.equal(replaced && formatVersion(replaced.version), '1.5.0');
  });

  it('keeps a newer install unless downgrades are allowed', async () => {
    const { source } = memorySource('feed', [
      { id: 'Foo', version: '1.2.0' },
      { id: 'Foo', version: '2.0.0' }
    ]);
    const installed = [record('Foo', '2.0.0')];

    const kept = await plan([source], [ident('Foo', '[1.0,1.5)')], { installed });
    assert.deepEqual(kept.steps, []);
    assert.deepEqual(labels(kept.satisfied), ['Foo.[1.0.0,1.5.0)']);

    const downgraded = await plan([source], [ident('Foo', '[1.0,1.5)')], { installed, allowDowngrade: true });
    assert.deepEqual(stepLabels(downgraded), ['Foo.1.2.0']);
    const replaced = downgraded.steps[0]?.replaces;
    assert.equal(replaced && formatVersion(replaced.version), '2.0.0');
  });

  it('keeps the manual flag of an installed dependency', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '2.0'])] },
      { id: 'B', version: '2.0.0' }
    ]);

    const result = await plan([source], [ident('A')], { installed: [record('B', '1.0.0', true)] });
    assert.deepEqual(
      result.steps.map((step) => `${formatIdentifier(step.metadata.identifier)} ${step.manuallyInstalled}`),
      ['B.2.0.0 true', 'A.1.0.0 true']
    );
  });

  // ==========================================================================
  // Sources
  // ==========================================================================

  it('moves on to the next source when one fails', async () => {
    const broken = memorySource('broken');
    broken.fetcher.failWith = new Error('offline');
    const healthy = memorySource('feed', [{ id: 'Foo', version: '1.0.0' }]);
    const { context, progress } = createContext([broken.source, healthy.source]);

    const result = unwrap(await resolvePlan(context, [ident('Foo')]));

    assert.equal(result.steps[0]?.metadata.sourceRef, 'feed');
    assert.deepEqual(progress.messages, ["warn: Source 'broken' failed to look up Foo: offline"]);
  });

  it('reports a substituted version when nothing is in range', async () => {
    const { source } = memorySource('feed', [
      { id: 'Foo', version: '1.0.0' },
      { id: 'Foo', version: '3.0.0' }
    ]);
    const { context, progress } = createContext([source]);

    const result = unwrap(await resolvePlan(context, [ident('Foo', '[2.0,2.5)')]));

    assert.deepEqual(stepLabels(result), ['Foo.3.0.0']);
    assert.ok(
      progress.events.some(
        (event) =>
          event.type === 'resolve:fallback' &&
          event.package === 'Foo' &&
          event.requested === '[2.0.0,2.5.0)' &&
          event.substituted === '3.0.0' &&
          event.source === 'feed'
      )
    );
  });

  // ==========================================================================
  // Preferred versions
  // ==========================================================================

  it('pins requests to preferred versions they accept', () => {
    const { context } = createContext([], { preferred: [record('B', '1.0.0', false)] });

    assert.equal(formatIdentifier(context.preferredRequest(ident('B', '1.0'))), 'B.[1.0.0]');
    assert.equal(formatIdentifier(context.preferredRequest(ident('B', '2.0'))), 'B.2.0.0');
    assert.equal(formatIdentifier(context.preferredRequest(ident('C', '1.0'))), 'C.1.0.0');
  });

  it('resolves to the preferred version over a newer release', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '1.0'])] },
      { id: 'B', version: '1.0.0' },
      { id: 'B', version: '1.1.0' }
    ]);

    const result = await plan([source], [ident('A')], { preferred: [record('B', '1.0.0', false)] });
    assert.deepEqual(stepLabels(result), ['B.1.0.0', 'A.1.0.0']);
  });

  it('reads the dependencies of installed packages', async () => {
    const { source } = memorySource('feed', [
      { id: 'A', version: '1.0.0', groups: [group(STANDARD, ['B', '1.0'])] }
    ]);
    const { context, progress } = createContext([source]);

    const known = await context.installedDependencies(record('A', '1.0.0'));
    assert.deepEqual(labels(known ?? []), ['B.1.0.0']);

    assert.equal(await context.installedDependencies(record('A', '9.0.0')), undefined);
    assert.deepEqual(progress.messages, ['warn: Cannot read dependencies of A 9.0.0: Source \'memory\': A 9.0.0 not found']);
  });
});
