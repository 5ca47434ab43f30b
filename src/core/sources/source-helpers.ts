/**
 * Filtering, de-duplication and version picking shared by every source variant.
 */

import { identifierFromVersion, nameKey } from '../version/package-identifier.js';
import {
  compareVersions,
  formatVersion,
  inRange,
  isPrereleaseVersion,
  sortVersionsAscending,
  specIsPrerelease,
  specMinimum,
  type SemanticVersion,
  type VersionSpec
} from '../version/package-version.js';
import type { PackageMetadata, PackageSummary } from './types.js';

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    batches.push(items.slice(i, i + step));
  }
  return batches;
}

function toMetadata(
  summary: PackageSummary,
  sourceRef: string,
  availableVersions: readonly SemanticVersion[] = sortVersionsAscending([summary.version, ...summary.versions])
): PackageMetadata {
  return {
    identifier: identifierFromVersion(summary.id, summary.version),
    version: summary.version,
    availableVersions,
    title: summary.title,
    description: summary.description,
    authors: summary.authors ?? [],
    downloadCount: summary.downloadCount,
    sourceRef
  };
}

export function withoutPrerelease(summaries: readonly PackageSummary[]): PackageSummary[] {
  return summaries
    .filter((summary) => !isPrereleaseVersion(summary.version))
    .map((summary) => ({ ...summary, versions: summary.versions.filter((version) => !isPrereleaseVersion(version)) }));
}

/**
 * Collapse listing entries by name (ignoring case), keeping the newest entry
 * and accumulating every version seen. With `includeAllVersions` every entry
 * is kept, newest first within a name. First-seen name order is preserved.
 */
export function dedupeSummaries(
  summaries: readonly PackageSummary[],
  sourceRef: string,
  includeAllVersions: boolean
): PackageMetadata[] {
  const groups = new Map<string, PackageSummary[]>();
  for (const summary of summaries) {
    const key = nameKey(summary.id);
    const group = groups.get(key);
    if (group) {
      group.push(summary);
    } else {
      groups.set(key, [summary]);
    }
  }

  const result: PackageMetadata[] = [];
  for (const group of groups.values()) {
    const versions = sortVersionsAscending(group.flatMap((summary) => [summary.version, ...summary.versions]));
    const ordered = [...group].sort((a, b) => compareVersions(b.version, a.version));

    if (includeAllVersions) {
      const seen = new Set<string>();
      for (const summary of ordered) {
        const key = formatVersion(summary.version).toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        result.push(toMetadata(summary, sourceRef, versions));
      }
      continue;
    }

    const newest = ordered[0];
    if (newest) {
      result.push(toMetadata(newest, sourceRef, versions));
    }
  }
  return result;
}

/**
 * Highest version satisfying the version spec. Releases win over pre-releases unless
 * the version spec itself names a pre-release or only pre-releases match.
 */
export function pickBestVersion(ascending: readonly SemanticVersion[], spec: VersionSpec): SemanticVersion | undefined {
  const matching = ascending.filter((version) => inRange(spec, version));
  if (!specIsPrerelease(spec)) {
    const releases = matching.filter((version) => !isPrereleaseVersion(version));
    if (releases.length > 0) {
      return releases[releases.length - 1];
    }
  }
  return matching[matching.length - 1];
}

/**
 * Lowest version above the version spec's minimum, for when nothing is in range.
 */
export function pickFallbackVersion(ascending: readonly SemanticVersion[], spec: VersionSpec): SemanticVersion | undefined {
  const minimum = specMinimum(spec);
  if (!minimum) {
    return undefined;
  }
  return ascending.find((version) => {
    const compare = compareVersions(version, minimum.version);
    return minimum.inclusive ? compare >= 0 : compare > 0;
  });
}

/** Versions of `installed` that an update may move to: strictly newer only. */
export function newerVersions(
  installed: SemanticVersion,
  available: readonly SemanticVersion[],
  includePrerelease: boolean
): SemanticVersion[] {
  return sortVersionsAscending(available).filter(
    (version) => compareVersions(version, installed) > 0 && (includePrerelease || !isPrereleaseVersion(version))
  );
}
