import { Command } from 'commander';
import { DEFAULTS } from '../constants/index.js';
import type { PackageMetadata } from '../core/sources/types.js';
import { formatVersion } from '../core/version/package-version.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor, parseCount } from './shared.js';

interface SearchCommandOptions {
  prerelease?: boolean;
  allVersions?: boolean;
  take: string;
  skip: string;
}

export function formatSearchLine(entry: PackageMetadata): string {
  const downloads = entry.downloadCount === undefined ? '' : ` (${entry.downloadCount} downloads)`;
  const description = entry.description ? ` - ${entry.description.split('\n')[0]}` : '';
  return `${entry.identifier.name} ${formatVersion(entry.version)} [${entry.sourceRef}]${downloads}${description}`;
}

async function searchCommand(term: string, options: SearchCommandOptions, command: Command): Promise<void> {
  const pageSize = parseCount(options.take, '--take');
  const pageOffset = parseCount(options.skip, '--skip');

  const ctx = await contextFor(command);
  const spinner = ctx.output.spinner();
  spinner.start(`Searching for '${term}'`);
  const results = await ctx.orchestrator.search({
    term,
    includePrerelease: options.prerelease === true,
    includeAllVersions: options.allVersions === true,
    pageSize,
    pageOffset
  });
  spinner.stop(`${results.length} result(s)`);

  if (results.length === 0) {
    ctx.output.info(`No packages match '${term}'`);
    return;
  }
  ctx.output.note(results.map(formatSearchLine).join('\n'), 'Packages');
}

export function setupSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search the configured sources')
    .argument('<term>', 'search term')
    .option('--prerelease', 'include pre-release versions')
    .option('--all-versions', 'list every version instead of the newest')
    .option('--take <n>', 'page size', String(DEFAULTS.SEARCH_PAGE_SIZE))
    .option('--skip <n>', 'entries to skip', '0')
    .action(
      withErrorHandling(async (term: string, options: SearchCommandOptions, command: Command) => {
        await searchCommand(term, options, command);
      })
    );
}
