import { Command } from 'commander';
import { reportInstallOutcome, reportReconcile } from '../core/install/install-reporting.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor, withInterrupt } from './shared.js';

async function restoreCommand(command: Command): Promise<void> {
  const ctx = await contextFor(command);
  const result = await withInterrupt((signal) => ctx.orchestrator.restore({ signal }));

  const installed = reportInstallOutcome(ctx.output, result.outcome);
  const reconciled = reportReconcile(ctx.output, result.reconcile);
  if (!installed.success || !reconciled.success) {
    process.exitCode = 1;
  }
}

export function setupRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Install every package the manifest lists but the install folder lacks')
    .action(
      withErrorHandling(async (_options: Record<string, unknown>, command: Command) => {
        await restoreCommand(command);
      })
    );
}
