import type { CommandResult } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import { formatIdentifier, type PackageIdentifier } from '../version/package-identifier.js';
import type { InstallOutcome, ReconcileReport, UninstallOutcome } from './types.js';

function joinIdentifiers(identifiers: readonly PackageIdentifier[]): string {
  return identifiers.map(formatIdentifier).join(', ');
}

/**
 * Render an install outcome. Anything short of installed or already satisfied
 * comes back as an unsuccessful result.
 */
export function reportInstallOutcome(output: OutputPort, outcome: InstallOutcome): CommandResult<InstallOutcome> {
  switch (outcome.state) {
    case 'already-satisfied':
      output.success(
        outcome.satisfied.length > 0
          ? `Already installed: ${joinIdentifiers(outcome.satisfied)}`
          : 'Nothing to install'
      );
      return { success: true, data: outcome };

    case 'installed':
      output.success(`Installed ${outcome.installed.length} package(s): ${joinIdentifiers(outcome.installed)}`);
      return { success: true, data: outcome };

    case 'unresolvable':
      output.error(outcome.error.message);
      return { success: false, error: outcome.error.message, data: outcome };

    case 'partially-failed': {
      const committed = outcome.committed.length > 0 ? ` Committed before the failure: ${joinIdentifiers(outcome.committed)}.` : '';
      output.error(`${outcome.error.message}.${committed} Run 'nuforge reconcile' to check the install folder.`);
      return { success: false, error: outcome.error.message, data: outcome };
    }

    case 'cancelled':
      output.warn(`Cancelled after ${outcome.committed.length} package(s)`);
      return { success: false, error: 'Cancelled', data: outcome };

    case 'failed':
      output.error(outcome.error.message);
      return { success: false, error: outcome.error.message, data: outcome };
  }
}

export function reportUninstallOutcome(output: OutputPort, outcome: UninstallOutcome): CommandResult<UninstallOutcome> {
  switch (outcome.state) {
    case 'not-installed':
      output.warn(`${outcome.name} is not installed`);
      return { success: true, data: outcome };

    case 'removed':
      output.success(
        outcome.removed.length > 0 ? `Removed ${joinIdentifiers(outcome.removed)}` : 'Nothing to remove'
      );
      return { success: true, data: outcome };

    case 'failed':
      output.error(outcome.error.message);
      return { success: false, error: outcome.error.message, data: outcome };

    case 'cancelled':
      output.warn(`Cancelled after removing ${outcome.removed.length} package(s)`);
      return { success: false, error: 'Cancelled', data: outcome };
  }
}

export function reportReconcile(output: OutputPort, report: ReconcileReport): CommandResult<ReconcileReport> {
  if (report.error) {
    output.error(`${report.error.message}. Nothing was removed.`);
    return { success: false, error: report.error.message, data: report };
  }

  const warnings = report.inconsistencies.map((warning) => warning.message);
  if (report.orphans.length === 0 && warnings.length === 0) {
    output.success('Manifest and install folder agree');
    return { success: true, data: report };
  }

  const kept = report.orphans.length - report.removed.length;
  if (report.removed.length > 0) {
    output.info(`Removed ${report.removed.length} orphaned install(s): ${joinIdentifiers(report.removed)}`);
  }
  if (kept > 0) {
    output.error(`${kept} orphaned install(s) could not be removed`);
  }
  if (warnings.length > 0) {
    output.note(warnings.join('\n'), 'Missing on disk (run nuforge restore)');
  }
  return { success: kept === 0, data: report, warnings };
}
