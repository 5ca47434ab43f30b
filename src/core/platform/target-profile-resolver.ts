/**
 * Target-profile resolution.
 *
 * Every "is this label usable on my platform" decision goes through the ordered
 * tier table below: the native label first, then the framework and standard
 * generations the active profile can consume, then the catch-all empty label.
 */

import * as semver from 'semver';
import type { RuntimeCompatibility } from '../../types/index.js';
import { AmbiguousProfileError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { fail, ok, type Result } from '../../utils/result.js';
import { DEFAULT_NATIVE_LABEL, PROFILE_TIERS, type TierEntry } from './profile-tiers.js';

export interface TargetProfile {
  nativeLabel: string;
  /** Host application version, e.g. `2022.3.10f1`. */
  hostVersion: string;
  compatibility: RuntimeCompatibility;
}

export interface PlatformProfileProvider {
  getProfile(): TargetProfile;
}

export const TIER_WIDTH = 1000;

export function normalizeLabel(label: string): string {
  const compact = label.trim().toLowerCase().replace(/\./g, '');
  if (compact.startsWith('netframework')) {
    return `net${compact.slice('netframework'.length)}`;
  }
  return compact;
}

export function describeProfile(profile: TargetProfile): string {
  return `${profile.nativeLabel}/${profile.compatibility}@${profile.hostVersion}`;
}

function hostSupports(entry: TierEntry, hostVersion: semver.SemVer | null): boolean {
  if (!entry.minHostVersion) {
    return true;
  }
  const minimum = semver.coerce(entry.minHostVersion);
  return hostVersion !== null && minimum !== null && semver.gte(hostVersion, minimum);
}

export function buildTiers(profile: TargetProfile): string[][] {
  const hostVersion = semver.coerce(profile.hostVersion);
  if (hostVersion === null) {
    logger.debug(`Host version '${profile.hostVersion}' is not comparable; version-gated labels are skipped`);
  }

  const tiers: string[][] = [[normalizeLabel(profile.nativeLabel || DEFAULT_NATIVE_LABEL)]];
  for (const tier of PROFILE_TIERS) {
    if (tier.compatibility.length > 0 && !tier.compatibility.includes(profile.compatibility)) {
      continue;
    }
    tiers.push(tier.entries.filter((entry) => hostSupports(entry, hostVersion)).map((entry) => entry.label));
  }
  tiers.push(['']);
  return tiers;
}

export class TargetProfileResolver {
  readonly profile: TargetProfile;
  private readonly tiers: string[][];

  constructor(profile: TargetProfile) {
    this.profile = profile;
    this.tiers = buildTiers(profile);
  }

  /** `tierIndex * 1000 + position`, or Infinity when no tier lists the label. */
  score(label: string): number {
    const normalized = normalizeLabel(label);
    for (let tierIndex = 0; tierIndex < this.tiers.length; tierIndex++) {
      const tier = this.tiers[tierIndex] ?? [];
      const position = tier.findIndex((entry) => entry === label || entry === normalized);
      if (position >= 0) {
        return tierIndex * TIER_WIDTH + position;
      }
    }
    return Number.POSITIVE_INFINITY;
  }

  /**
   * Pick the lowest-scoring candidate. Candidates that normalize to the same
   * label keep their input order.
   */
  selectBest<T>(candidates: readonly T[], labelOf: (candidate: T) => string): T | undefined {
    let best: T | undefined;
    let bestScore = Number.POSITIVE_INFINITY;
    for (const candidate of candidates) {
      const candidateScore = this.score(labelOf(candidate));
      if (candidateScore < bestScore) {
        best = candidate;
        bestScore = candidateScore;
      }
    }
    return best;
  }

  selectLabel(labels: readonly string[]): string | undefined {
    return this.selectBest(labels, (label) => label);
  }

  /**
   * Select the dependency group for a package. A package that publishes no
   * groups has no dependencies; groups with no compatible label are an error.
   */
  selectGroup<G extends { platformProfileLabel: string }>(
    packageName: string,
    groups: readonly G[]
  ): Result<G | undefined, AmbiguousProfileError> {
    if (groups.length === 0) {
      return ok(undefined);
    }

    const best = this.selectBest(groups, (group) => group.platformProfileLabel);
    if (best === undefined) {
      return fail(
        new AmbiguousProfileError(
          packageName,
          groups.map((group) => group.platformProfileLabel),
          describeProfile(this.profile)
        )
      );
    }

    logger.debug(`Selecting '${best.platformProfileLabel || '(any)'}' as the dependency group of ${packageName}`);
    return ok(best);
  }
}
