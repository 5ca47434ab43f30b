import { Command } from 'commander';
import { reportInstallOutcome } from '../core/install/install-reporting.js';
import { createIdentifier, parsePackageReference, type PackageIdentifier } from '../core/version/package-identifier.js';
import { withErrorHandling, type ParseError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';
import { contextFor, withInterrupt } from './shared.js';

interface InstallCommandOptions {
  force?: boolean;
  allowDowngrade?: boolean;
}

/**
 * `install Foo 1.2.0`, `install Foo "[1.0,2.0)"` and `install Foo@1.2.0` are
 * all accepted.
 */
export function parseInstallTarget(packageArg: string, specArg?: string): Result<PackageIdentifier, ParseError> {
  return specArg === undefined ? parsePackageReference(packageArg) : createIdentifier(packageArg, specArg, true);
}

async function installCommand(
  packageArg: string,
  specArg: string | undefined,
  options: InstallCommandOptions,
  command: Command
): Promise<void> {
  const parsed = parseInstallTarget(packageArg, specArg);
  if (!parsed.success) {
    throw parsed.error;
  }

  const ctx = await contextFor(command);
  const outcome = await withInterrupt((signal) =>
    ctx.orchestrator.install(parsed.value, {
      forceUpgrade: options.force,
      allowDowngrade: options.allowDowngrade,
      signal
    })
  );

  if (!reportInstallOutcome(ctx.output, outcome).success) {
    process.exitCode = 1;
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a package and its dependencies')
    .argument('<package>', 'package id, optionally as <id>@<version-or-range>')
    .argument('[spec]', 'version or range, e.g. 1.2.0 or [1.0,2.0)')
    .option('-f, --force', 'resolve again even when an installed version satisfies the request')
    .option('--allow-downgrade', 'replace a newer installed version with the resolved one')
    .action(
      withErrorHandling(async (packageArg: string, specArg: string | undefined, options: InstallCommandOptions, command: Command) => {
        await installCommand(packageArg, specArg, options, command);
      })
    );
}
