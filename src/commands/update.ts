import { Command } from 'commander';
import { reportInstallOutcome } from '../core/install/install-reporting.js';
import { tryParseVersion, type SemanticVersion } from '../core/version/package-version.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor, withInterrupt } from './shared.js';

interface UpdateCommandOptions {
  version?: string;
  prerelease?: boolean;
}

async function updateCommand(name: string | undefined, options: UpdateCommandOptions, command: Command): Promise<void> {
  let version: SemanticVersion | undefined;
  if (options.version !== undefined) {
    const parsed = tryParseVersion(options.version);
    if (!parsed.success) {
      throw parsed.error;
    }
    version = parsed.value;
  }

  const ctx = await contextFor(command);
  if (!name && version) {
    ctx.output.error('--version needs a package name');
    process.exitCode = 1;
    return;
  }

  const outcome = await withInterrupt((signal) =>
    name
      ? ctx.orchestrator.update(name, { version, includePrerelease: options.prerelease, signal })
      : ctx.orchestrator.updateAll({ includePrerelease: options.prerelease, signal })
  );
  if (!reportInstallOutcome(ctx.output, outcome).success) {
    process.exitCode = 1;
  }
}

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .alias('up')
    .description('Update one package, or every installed package, to the newest release')
    .argument('[package]', 'package id; every installed package when omitted')
    .option('--version <version>', 'move to this exact version (downgrades allowed)')
    .option('--prerelease', 'consider pre-release versions')
    .action(
      withErrorHandling(async (name: string | undefined, options: UpdateCommandOptions, command: Command) => {
        await updateCommand(name, options, command);
      })
    );
}
