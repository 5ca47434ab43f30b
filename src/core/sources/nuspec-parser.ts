import { logger } from '../../utils/logger.js';
import { elementText, findElement, findElements } from '../../utils/xml.js';
import { createIdentifier, type PackageIdentifier } from '../version/package-identifier.js';
import { parseVersion, type SemanticVersion } from '../version/package-version.js';
import type { DependencyGroup } from './types.js';

export interface NuspecDocument {
  id: string;
  version: SemanticVersion;
  title?: string;
  description?: string;
  authors: string[];
  dependencyGroups: DependencyGroup[];
}

function readDependencies(owner: string, xml: string): PackageIdentifier[] {
  const dependencies: PackageIdentifier[] = [];
  for (const element of findElements(xml, 'dependency')) {
    const id = element.attributes.id ?? '';
    const identifier = createIdentifier(id, element.attributes.version ?? '');
    if (!identifier.success) {
      logger.warn(`Ignoring dependency '${id}' of ${owner}: ${identifier.error.message}`);
      continue;
    }
    dependencies.push(identifier.value);
  }
  return dependencies;
}

/**
 * Dependency groups of a nuspec. Ungrouped `<dependency>` entries form a
 * single group with the empty label.
 */
export function parseNuspecDependencies(owner: string, xml: string): DependencyGroup[] {
  const section = findElement(xml, 'dependencies');
  if (!section) {
    return [];
  }

  const groups = findElements(section.inner, 'group');
  if (groups.length === 0) {
    const dependencies = readDependencies(owner, section.inner);
    return dependencies.length > 0 ? [{ platformProfileLabel: '', dependencies }] : [];
  }

  return groups.map((group) => ({
    platformProfileLabel: group.attributes.targetFramework ?? '',
    dependencies: readDependencies(owner, group.inner)
  }));
}

export function parseNuspec(xml: string): NuspecDocument | undefined {
  const metadata = findElement(xml, 'metadata');
  if (!metadata) {
    return undefined;
  }

  const id = elementText(metadata.inner, 'id');
  const versionText = elementText(metadata.inner, 'version');
  if (!id || !versionText) {
    return undefined;
  }

  const authors = elementText(metadata.inner, 'authors') ?? '';
  return {
    id,
    version: parseVersion(versionText),
    title: elementText(metadata.inner, 'title'),
    description: elementText(metadata.inner, 'description'),
    authors: authors
      .split(',')
      .map((author) => author.trim())
      .filter((author) => author.length > 0),
    dependencyGroups: parseNuspecDependencies(id, metadata.inner)
  };
}
