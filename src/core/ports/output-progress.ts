import type { OutputPort } from './output.js';
import type { ProgressEvent, ProgressLogLevel, ProgressPort } from './progress.js';

export interface OutputProgressOptions {
  /** Also render per-package resolution events. */
  verbose?: boolean;
}

/**
 * One line of text for an event, or undefined when the event is not shown at
 * the given verbosity.
 */
export function describeProgressEvent(
  event: ProgressEvent,
  verbose = false
): { level: 'step' | 'info' | 'success' | 'warn' | 'error'; text: string } | undefined {
  switch (event.type) {
    case 'resolve:start':
      return verbose ? { level: 'step', text: `Resolving ${event.package} ${event.spec}`.trimEnd() } : undefined;
    case 'resolve:resolved':
      return verbose ? { level: 'info', text: `${event.package} -> ${event.version} (${event.source})` } : undefined;
    case 'resolve:satisfied':
      return verbose ? { level: 'info', text: `${event.package} ${event.installed} is already installed` } : undefined;
    case 'resolve:fallback':
      return {
        level: 'warn',
        text: `${event.package}: nothing matches '${event.requested}' in ${event.source}; using ${event.substituted}`
      };
    case 'resolve:failed':
      return { level: 'error', text: event.detail };
    case 'install:start':
      return { level: 'step', text: `Installing ${event.packages.length} package(s)` };
    case 'install:step':
      if (event.status === 'installed') return { level: 'success', text: `Installed ${event.package}` };
      if (event.status === 'failed') return { level: 'error', text: `Failed ${event.package}: ${event.detail ?? 'unknown error'}` };
      return verbose ? { level: 'step', text: `Installing ${event.package}` } : undefined;
    case 'install:complete':
      return verbose
        ? {
            level: 'info',
            text: `${event.summary.installed} installed, ${event.summary.failed} failed, ${event.summary.skipped} skipped`
          }
        : undefined;
    case 'uninstall:start':
      return verbose ? { level: 'step', text: `Removing ${event.packages.join(', ')}` } : undefined;
    case 'uninstall:step':
      if (event.status === 'removed') return { level: 'success', text: `Removed ${event.package}` };
      if (event.status === 'failed') return { level: 'error', text: `Failed to remove ${event.package}: ${event.detail ?? 'unknown error'}` };
      return undefined;
    case 'uninstall:complete':
      return undefined;
    case 'reconcile:orphan':
      return event.removed
        ? { level: 'warn', text: `Removed ${event.package}: not listed in the manifest` }
        : { level: 'error', text: `Could not remove orphaned install ${event.package}` };
    case 'manifest:inconsistent':
      return { level: 'warn', text: event.detail };
    case 'search:start':
      return verbose ? { level: 'step', text: `Searching for '${event.query}'` } : undefined;
    case 'search:complete':
      return verbose ? { level: 'info', text: `${event.resultCount} result(s)` } : undefined;
  }
}

/**
 * Render progress events through an OutputPort.
 */
export function createOutputProgress(output: OutputPort, options: OutputProgressOptions = {}): ProgressPort {
  return {
    emit(event: ProgressEvent): void {
      const line = describeProgressEvent(event, options.verbose);
      if (line) {
        output[line.level](line.text);
      }
    },
    log(level: ProgressLogLevel, message: string): void {
      if (level === 'debug') {
        if (options.verbose) output.message(message);
        return;
      }
      output[level](message);
    }
  };
}
