import { logger } from '../../utils/logger.js';
import { elementText, findElement, findElements } from '../../utils/xml.js';
import { createIdentifier } from '../version/package-identifier.js';
import { parseVersion } from '../version/package-version.js';
import type { DependencyGroup, PackageSummary } from './types.js';

export interface ODataEntry {
  summary: PackageSummary;
  downloadUrl?: string;
  dependencyGroups: DependencyGroup[];
}

/**
 * Parse the `id:range:framework|...` dependency notation of OData feeds.
 * Entries with an empty id or range are dropped, but their framework still
 * yields a (possibly empty) group.
 */
export function parseODataDependencies(owner: string, raw: string): DependencyGroup[] {
  if (raw.trim().length === 0) {
    return [];
  }

  const groups = new Map<string, DependencyGroup>();
  for (const entry of raw.split('|')) {
    const [id = '', range = '', framework = ''] = entry.split(':');

    let group = groups.get(framework);
    if (!group) {
      group = { platformProfileLabel: framework, dependencies: [] };
      groups.set(framework, group);
    }

    if (id.trim().length === 0 || range.trim().length === 0) {
      continue;
    }

    const identifier = createIdentifier(id, range);
    if (!identifier.success) {
      logger.warn(`Ignoring dependency '${id}' of ${owner}: ${identifier.error.message}`);
      continue;
    }
    group.dependencies.push(identifier.value);
  }

  return [...groups.values()];
}

export function parseODataFeed(xml: string): ODataEntry[] {
  const entries: ODataEntry[] = [];

  for (const entry of findElements(xml, 'entry')) {
    const id = elementText(entry.inner, 'title');
    const properties = findElement(entry.inner, 'm:properties');
    if (!id || !properties) {
      logger.debug('Skipping OData entry without a title or properties');
      continue;
    }

    const version = parseVersion(elementText(properties.inner, 'd:Version') ?? '');
    if (!version.isValid) {
      logger.debug(`Skipping OData entry ${id} with an invalid version`);
      continue;
    }

    const downloads = Number.parseInt(elementText(properties.inner, 'd:DownloadCount') ?? '', 10);
    const authors = elementText(properties.inner, 'd:Authors') ?? '';

    entries.push({
      summary: {
        id,
        version,
        versions: [],
        title: elementText(properties.inner, 'd:Title') || undefined,
        description: elementText(properties.inner, 'd:Description') || undefined,
        authors: authors
          .split(',')
          .map((author) => author.trim())
          .filter((author) => author.length > 0),
        downloadCount: Number.isNaN(downloads) ? undefined : downloads
      },
      downloadUrl: findElement(entry.inner, 'content')?.attributes.src,
      dependencyGroups: parseODataDependencies(id, elementText(properties.inner, 'd:Dependencies') ?? '')
    });
  }

  return entries;
}
