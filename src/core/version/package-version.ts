/**
 * Package version model.
 *
 * Versions have up to four numeric parts (`major.minor.patch.revision`), an optional
 * dot-separated pre-release suffix after `-` and optional build metadata after `+`.
 * Build metadata is kept for display only and never participates in ordering.
 *
 * Specs are either a single version (minimum inclusive, no maximum), an interval
 * in bracket notation (`[1.0,2.0)`, `(,1.0]`, `[1.0]`), or empty (anything matches).
 */

import { ParseError } from '../../utils/errors.js';
import { fail, ok, type Result } from '../../utils/result.js';

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly revision: number;
  readonly preReleaseLabels: readonly string[];
  readonly buildMetadata?: string;
  readonly isValid: boolean;
  /** Text the version was parsed from. */
  readonly original: string;
}

export type VersionSpec =
  | { readonly kind: 'any' }
  | { readonly kind: 'version'; readonly version: SemanticVersion }
  | {
      readonly kind: 'range';
      readonly min?: SemanticVersion;
      readonly minInclusive: boolean;
      readonly max?: SemanticVersion;
      readonly maxInclusive: boolean;
    };

export type Ordering = -1 | 0 | 1;

const NUMERIC_PART = /^\d+$/;
const LABEL = /^[0-9A-Za-z-]+$/;

export const ANY_VERSION: VersionSpec = Object.freeze({ kind: 'any' });

function invalidVersion(original: string): SemanticVersion {
  return Object.freeze({
    major: -1,
    minor: -1,
    patch: -1,
    revision: -1,
    preReleaseLabels: Object.freeze([]),
    isValid: false,
    original
  });
}

// ============================================================================
// Parsing
// ============================================================================

function parseVersionParts(text: string): SemanticVersion | string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 'version is empty';
  }

  let core = trimmed;
  let buildMetadata: string | undefined;
  const plusIndex = core.indexOf('+');
  if (plusIndex === 0) {
    return 'version starts with build metadata';
  }
  if (plusIndex > 0) {
    buildMetadata = core.slice(plusIndex + 1);
    core = core.slice(0, plusIndex);
    if (buildMetadata.length === 0) {
      return 'build metadata is empty';
    }
  }

  let preReleaseLabels: string[] = [];
  const dashIndex = core.indexOf('-');
  if (dashIndex === 0) {
    return 'version starts with a pre-release suffix';
  }
  if (dashIndex > 0) {
    preReleaseLabels = core.slice(dashIndex + 1).split('.');
    core = core.slice(0, dashIndex);
    if (preReleaseLabels.some((label) => !LABEL.test(label))) {
      return 'pre-release labels must be non-empty alphanumerics';
    }
  }

  const parts = core.split('.');
  if (parts.length > 4) {
    return 'more than four numeric parts';
  }
  if (parts.some((part) => !NUMERIC_PART.test(part))) {
    return 'numeric parts must be non-negative integers';
  }

  const [major = 0, minor = 0, patch = 0, revision = 0] = parts.map((part) => Number.parseInt(part, 10));

  return Object.freeze({
    major,
    minor,
    patch,
    revision,
    preReleaseLabels: Object.freeze(preReleaseLabels),
    buildMetadata,
    isValid: true,
    original: trimmed
  });
}

/**
 * Parse a version string. Malformed input yields the invalid sentinel
 * (all numeric parts -1, `isValid` false); check `isValid` before range logic.
 */
export function parseVersion(text: string): SemanticVersion {
  const parsed = parseVersionParts(text);
  return typeof parsed === 'string' ? invalidVersion(text) : parsed;
}

export function tryParseVersion(text: string): Result<SemanticVersion, ParseError> {
  const parsed = parseVersionParts(text);
  return typeof parsed === 'string' ? fail(new ParseError(text, parsed)) : ok(parsed);
}

export function isRangeText(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.startsWith('[') || trimmed.startsWith('(');
}

/**
 * Parse a version spec: empty text, a single version, or bracket range notation.
 */
export function parseVersionSpec(text: string): Result<VersionSpec, ParseError> {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return ok(ANY_VERSION);
  }

  if (!isRangeText(trimmed)) {
    const version = tryParseVersion(trimmed);
    return version.success ? ok({ kind: 'version', version: version.value }) : version;
  }

  const last = trimmed[trimmed.length - 1];
  if (last !== ']' && last !== ')') {
    return fail(new ParseError(text, 'range is not closed with ] or )'));
  }

  const minInclusive = trimmed.startsWith('[');
  const maxInclusive = last === ']';
  const parts = trimmed.slice(1, -1).split(',');
  if (parts.length > 2) {
    return fail(new ParseError(text, 'range has more than two bounds'));
  }

  const minText = parts[0]?.trim() ?? '';
  const maxText = parts.length === 2 ? (parts[1]?.trim() ?? '') : '';
  if (minText.length === 0 && maxText.length === 0) {
    return fail(new ParseError(text, 'range has no bounds'));
  }

  let min: SemanticVersion | undefined;
  if (minText.length > 0) {
    const parsed = tryParseVersion(minText);
    if (!parsed.success) return parsed;
    min = parsed.value;
  }

  let max: SemanticVersion | undefined;
  if (maxText.length > 0) {
    const parsed = tryParseVersion(maxText);
    if (!parsed.success) return parsed;
    max = parsed.value;
  }

  if (min && max && compareVersions(min, max) > 0) {
    return fail(new ParseError(text, 'minimum is greater than maximum'));
  }

  return ok({ kind: 'range', min, minInclusive, max, maxInclusive });
}

// ============================================================================
// Ordering
// ============================================================================

function sign(value: number): Ordering {
  return value < 0 ? -1 : value > 0 ? 1 : 0;
}

function compareLabels(a: string, b: string): Ordering {
  const aNumeric = NUMERIC_PART.test(a);
  const bNumeric = NUMERIC_PART.test(b);

  if (aNumeric && bNumeric) {
    return sign(Number(a) - Number(b));
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;

  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Total order over versions. A release sorts above any pre-release of the same
 * numbers; build metadata is ignored.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): Ordering {
  const numeric =
    sign(a.major - b.major) || sign(a.minor - b.minor) || sign(a.patch - b.patch) || sign(a.revision - b.revision);
  if (numeric !== 0) return numeric;

  const aLabels = a.preReleaseLabels;
  const bLabels = b.preReleaseLabels;
  if (aLabels.length === 0 || bLabels.length === 0) {
    return sign(bLabels.length - aLabels.length);
  }

  const shared = Math.min(aLabels.length, bLabels.length);
  for (let i = 0; i < shared; i++) {
    const result = compareLabels(aLabels[i] ?? '', bLabels[i] ?? '');
    if (result !== 0) return result;
  }

  return sign(aLabels.length - bLabels.length);
}

export function versionsEqual(a: SemanticVersion, b: SemanticVersion): boolean {
  return compareVersions(a, b) === 0;
}

export function isPrereleaseVersion(version: SemanticVersion): boolean {
  return version.preReleaseLabels.length > 0;
}

export function sortVersionsAscending(versions: Iterable<SemanticVersion>): SemanticVersion[] {
  const unique: SemanticVersion[] = [];
  for (const version of versions) {
    if (!version.isValid) continue;
    if (unique.some((existing) => versionsEqual(existing, version))) continue;
    unique.push(version);
  }
  return unique.sort(compareVersions);
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Normalized form: `major.minor.patch`, the revision only when non-zero,
 * then the pre-release suffix. Build metadata is dropped.
 */
export function formatVersion(version: SemanticVersion): string {
  if (!version.isValid) {
    return version.original;
  }
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.revision !== 0) {
    text += `.${version.revision}`;
  }
  if (version.preReleaseLabels.length > 0) {
    text += `-${version.preReleaseLabels.join('.')}`;
  }
  return text;
}

export function formatVersionForDisplay(version: SemanticVersion): string {
  const base = formatVersion(version);
  return version.buildMetadata ? `${base}+${version.buildMetadata}` : base;
}

export function isPinned(spec: VersionSpec): boolean {
  return spec.kind === 'range' && spec.min !== undefined && spec.max === undefined && spec.maxInclusive;
}

export function formatSpec(spec: VersionSpec): string {
  switch (spec.kind) {
    case 'any':
      return '';
    case 'version':
      return formatVersion(spec.version);
    case 'range': {
      const open = spec.minInclusive ? '[' : '(';
      const close = spec.maxInclusive ? ']' : ')';
      const min = spec.min ? formatVersion(spec.min) : '';
      if (isPinned(spec)) {
        return `${open}${min}${close}`;
      }
      const max = spec.max ? formatVersion(spec.max) : '';
      return `${open}${min},${max}${close}`;
    }
  }
}

// ============================================================================
// Range semantics
// ============================================================================

/**
 * Position of `candidate` relative to a range: -1 below, 0 inside, 1 above.
 * An inclusive maximum with no maximum version pins the minimum exactly.
 */
export function compareToRange(spec: Extract<VersionSpec, { kind: 'range' }>, candidate: SemanticVersion): Ordering {
  if (spec.min) {
    const compare = compareVersions(spec.min, candidate);
    if (spec.minInclusive ? compare > 0 : compare >= 0) {
      return -1;
    }
  }

  if (spec.max) {
    const compare = compareVersions(spec.max, candidate);
    if (spec.maxInclusive ? compare < 0 : compare <= 0) {
      return 1;
    }
  } else if (spec.maxInclusive && spec.min) {
    return compareVersions(candidate, spec.min);
  }

  return 0;
}

/**
 * Whether a concrete version satisfies a spec. A single version is a
 * minimum-inclusive floor.
 */
export function inRange(spec: VersionSpec, candidate: SemanticVersion): boolean {
  if (spec.kind === 'any') {
    return true;
  }
  if (!candidate.isValid) {
    return false;
  }
  if (spec.kind === 'version') {
    return compareVersions(candidate, spec.version) >= 0;
  }
  return compareToRange(spec, candidate) === 0;
}

/**
 * Spec-against-spec membership used when merging requirements.
 *
 * A single version never contains a range. Two ranges intersect when one of
 * `other`'s bounds lies inside `spec`, except where that bound is exclusive and
 * coincides with the opposite bound of `spec`.
 */
export function specIntersects(spec: VersionSpec, other: VersionSpec): boolean {
  if (spec.kind === 'any') {
    return true;
  }

  switch (other.kind) {
    case 'any':
      return false;
    case 'range': {
      if (spec.kind !== 'range') {
        return false;
      }
      const minInside =
        other.min !== undefined &&
        compareToRange(spec, other.min) === 0 &&
        (other.minInclusive || spec.max === undefined || !versionsEqual(other.min, spec.max));
      const maxInside =
        other.max !== undefined &&
        compareToRange(spec, other.max) === 0 &&
        (other.maxInclusive || spec.min === undefined || !versionsEqual(other.max, spec.min));
      return minInside || maxInside;
    }
    case 'version':
      return inRange(spec, other.version);
  }
}

/** Lower bound of a spec, if it has one. */
export function specMinimum(spec: VersionSpec): { version: SemanticVersion; inclusive: boolean } | undefined {
  if (spec.kind === 'version') {
    return { version: spec.version, inclusive: true };
  }
  if (spec.kind === 'range' && spec.min) {
    return { version: spec.min, inclusive: spec.minInclusive };
  }
  return undefined;
}

export function specIsPrerelease(spec: VersionSpec): boolean {
  if (spec.kind === 'version') {
    return isPrereleaseVersion(spec.version);
  }
  if (spec.kind === 'range') {
    return (spec.min !== undefined && isPrereleaseVersion(spec.min)) || (spec.max !== undefined && isPrereleaseVersion(spec.max));
  }
  return false;
}

/**
 * Ordering between specs: ranges compare by normalized text (case-insensitive),
 * plain versions by version order.
 */
export function compareSpecs(a: VersionSpec, b: VersionSpec): Ordering {
  if (a.kind === 'version' && b.kind === 'version') {
    return compareVersions(a.version, b.version);
  }
  const left = formatSpec(a).toLowerCase();
  const right = formatSpec(b).toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}
