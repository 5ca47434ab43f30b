import { Command } from 'commander';
import { findRecord } from '../core/manifest/manifest-store.js';
import { formatVersion } from '../core/version/package-version.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor } from './shared.js';

interface OutdatedCommandOptions {
  prerelease?: boolean;
  allVersions?: boolean;
}

export function setupOutdatedCommand(program: Command): void {
  program
    .command('outdated')
    .description('Show installed packages with newer releases')
    .option('--prerelease', 'consider pre-release versions')
    .option('--all-versions', 'list every newer version')
    .action(
      withErrorHandling(async (options: OutdatedCommandOptions, command: Command) => {
        const ctx = await contextFor(command);
        const read = await ctx.manifest.read();
        if (!read.success) {
          throw read.error;
        }
        const records = read.value;
        const checked = await ctx.orchestrator.checkForUpdates({
          includePrerelease: options.prerelease === true,
          includeAllVersions: options.allVersions === true
        });
        if (!checked.success) {
          throw checked.error;
        }
        const updates = checked.value;

        if (updates.length === 0) {
          ctx.output.success('Everything is up to date');
          return;
        }

        const lines = updates.map((update) => {
          const record = findRecord(records, update.identifier.name);
          const current = record ? formatVersion(record.version) : '?';
          return `${update.identifier.name} ${current} -> ${formatVersion(update.version)} [${update.sourceRef}]`;
        });
        ctx.output.note(lines.join('\n'), 'Updates available');
      })
    );
}
