import { ParseError } from '../../utils/errors.js';
import { fail, ok, type Result } from '../../utils/result.js';
import {
  compareSpecs,
  formatSpec,
  inRange,
  parseVersionSpec,
  specIntersects,
  specIsPrerelease,
  type Ordering,
  type SemanticVersion,
  type VersionSpec
} from './package-version.js';

/**
 * A package name paired with a version or version range.
 * Names are case-insensitive; the version spec decides which versions are acceptable.
 */
export interface PackageIdentifier {
  readonly name: string;
  readonly spec: VersionSpec;
  readonly manuallyRequested: boolean;
}

export function createIdentifier(
  name: string,
  specText: string,
  manuallyRequested = false
): Result<PackageIdentifier, ParseError> {
  const trimmedName = name.trim();
  if (trimmedName.length === 0) {
    return fail(new ParseError(name, 'package name is empty'));
  }
  const spec = parseVersionSpec(specText);
  if (!spec.success) {
    return spec;
  }
  return ok(identifierFromSpec(trimmedName, spec.value, manuallyRequested));
}

export function identifierFromSpec(name: string, spec: VersionSpec, manuallyRequested = false): PackageIdentifier {
  return Object.freeze({ name, spec, manuallyRequested });
}

export function identifierFromVersion(name: string, version: SemanticVersion, manuallyRequested = false): PackageIdentifier {
  return identifierFromSpec(name, { kind: 'version', version }, manuallyRequested);
}

/** Identifier accepting exactly one version (`[x]`). */
export function pinnedIdentifier(name: string, version: SemanticVersion, manuallyRequested = false): PackageIdentifier {
  return identifierFromSpec(name, { kind: 'range', min: version, minInclusive: true, maxInclusive: true }, manuallyRequested);
}

/** The version a concrete identifier names; undefined for ranges. */
export function concreteVersion(identifier: PackageIdentifier): SemanticVersion | undefined {
  return identifier.spec.kind === 'version' ? identifier.spec.version : undefined;
}

/**
 * Parse a CLI reference such as `Newtonsoft.Json@[13.0,14.0)` or a bare name.
 */
export function parsePackageReference(reference: string, manuallyRequested = true): Result<PackageIdentifier, ParseError> {
  const at = reference.indexOf('@', 1);
  if (at < 0) {
    return createIdentifier(reference, '', manuallyRequested);
  }
  return createIdentifier(reference.slice(0, at), reference.slice(at + 1), manuallyRequested);
}

export function namesEqual(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function nameKey(name: string): string {
  return name.toLowerCase();
}

export function hasVersionRange(identifier: PackageIdentifier): boolean {
  return identifier.spec.kind === 'range';
}

export function isPrerelease(identifier: PackageIdentifier): boolean {
  return specIsPrerelease(identifier.spec);
}

/** Whether a concrete version satisfies the identifier's spec. */
export function identifierAccepts(identifier: PackageIdentifier, candidate: SemanticVersion): boolean {
  return inRange(identifier.spec, candidate);
}

/**
 * Whether `other` falls in the range of `identifier`. Names must match;
 * range-against-range uses the intersection rule of the version model.
 */
export function identifierInRange(identifier: PackageIdentifier, other: PackageIdentifier): boolean {
  return namesEqual(identifier.name, other.name) && specIntersects(identifier.spec, other.spec);
}

export function compareIdentifiers(a: PackageIdentifier, b: PackageIdentifier): Ordering {
  const left = nameKey(a.name);
  const right = nameKey(b.name);
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  return compareSpecs(a.spec, b.spec);
}

/** Same name and same normalized version text, both ignoring case. */
export function identifiersEqual(a: PackageIdentifier, b: PackageIdentifier): boolean {
  return identifierKey(a) === identifierKey(b);
}

export function identifierKey(identifier: PackageIdentifier): string {
  return `${nameKey(identifier.name)}@${formatSpec(identifier.spec).toLowerCase()}`;
}

export function formatIdentifier(identifier: PackageIdentifier): string {
  const version = formatSpec(identifier.spec);
  return version ? `${identifier.name}.${version}` : identifier.name;
}

/** Folder an installed package lives in under the install root. */
export function installFolderName(identifier: PackageIdentifier): string {
  return formatIdentifier(identifier);
}
