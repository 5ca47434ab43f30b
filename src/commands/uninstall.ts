import { Command } from 'commander';
import { reportUninstallOutcome } from '../core/install/install-reporting.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor, withInterrupt } from './shared.js';

interface UninstallCommandOptions {
  keepDependencies?: boolean;
  all?: boolean;
}

async function uninstallCommand(
  name: string | undefined,
  options: UninstallCommandOptions,
  command: Command
): Promise<void> {
  const ctx = await contextFor(command);

  if (options.all) {
    const outcome = await withInterrupt((signal) => ctx.orchestrator.uninstallAll({ signal }));
    if (!reportUninstallOutcome(ctx.output, outcome).success) {
      process.exitCode = 1;
    }
    return;
  }

  if (!name) {
    ctx.output.error('Package name is required (or pass --all)');
    process.exitCode = 1;
    return;
  }

  const outcome = await withInterrupt((signal) =>
    ctx.orchestrator.uninstall(name, { removeDependencies: !options.keepDependencies, signal })
  );
  if (!reportUninstallOutcome(ctx.output, outcome).success) {
    process.exitCode = 1;
  }
}

export function setupUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .alias('un')
    .description('Remove an installed package and the dependencies nothing else needs')
    .argument('[package]', 'package id')
    .option('--keep-dependencies', 'leave its dependencies installed')
    .option('--all', 'remove every installed package')
    .action(
      withErrorHandling(async (name: string | undefined, options: UninstallCommandOptions, command: Command) => {
        await uninstallCommand(name, options, command);
      })
    );
}
