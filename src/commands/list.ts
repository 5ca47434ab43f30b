import { Command } from 'commander';
import type { InstalledPackageRecord } from '../core/manifest/manifest-store.js';
import { concreteVersion, namesEqual, type PackageIdentifier } from '../core/version/package-identifier.js';
import { formatVersion, versionsEqual } from '../core/version/package-version.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor } from './shared.js';

const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

export function formatRecordLine(record: InstalledPackageRecord, onDisk: readonly PackageIdentifier[]): string {
  const present = onDisk.some((identifier) => {
    const version = concreteVersion(identifier);
    return namesEqual(identifier.name, record.name) && version !== undefined && versionsEqual(version, record.version);
  });
  const manual = record.manuallyInstalled ? '' : dim(' (dependency)');
  const missing = present ? '' : red(' (missing)');
  return `${record.name}@${formatVersion(record.version)}${manual}${missing}`;
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed packages')
    .action(
      withErrorHandling(async (_options: Record<string, unknown>, command: Command) => {
        const ctx = await contextFor(command);
        const read = await ctx.manifest.read();
        if (!read.success) {
          throw read.error;
        }
        const records = read.value;
        const listed = await ctx.installer.listInstalled();
        if (!listed.success) {
          throw listed.error;
        }

        if (records.length === 0) {
          ctx.output.info('No packages installed');
          return;
        }
        ctx.output.note(records.map((record) => formatRecordLine(record, listed.value)).join('\n'), ctx.manifest.path);
      })
    );
}
