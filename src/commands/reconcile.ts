import { Command } from 'commander';
import { reportReconcile } from '../core/install/install-reporting.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFor } from './shared.js';

export function setupReconcileCommand(program: Command): void {
  program
    .command('reconcile')
    .description('Remove installs the manifest does not list and report missing ones')
    .action(
      withErrorHandling(async (_options: Record<string, unknown>, command: Command) => {
        const ctx = await contextFor(command);
        const report = await ctx.orchestrator.reconcile();
        if (!reportReconcile(ctx.output, report).success) {
          process.exitCode = 1;
        }
      })
    );
}
