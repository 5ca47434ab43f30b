/**
 * Progress Port Interface
 *
 * Contract for streaming structured progress events from the resolver and
 * orchestrator to whatever front end is attached. Core logic emits typed
 * events; a CLI or log collector renders them. Nothing in the core requires
 * a particular adapter to be present (`silentProgress` is the default).
 */

// ============================================================================
// Progress Event Types
// ============================================================================

/** Resolution progress events. */
export type ResolveProgressEvent =
  | { type: 'resolve:start'; package: string; spec: string }
  | { type: 'resolve:resolved'; package: string; version: string; source: string }
  | { type: 'resolve:fallback'; package: string; requested: string; substituted: string; source: string }
  | { type: 'resolve:satisfied'; package: string; installed: string }
  | { type: 'resolve:failed'; package: string; detail: string };

/** Install pipeline progress events. */
export type InstallProgressEvent =
  | { type: 'install:start'; packages: string[] }
  | { type: 'install:step'; package: string; status: 'installing' | 'installed' | 'failed'; detail?: string }
  | { type: 'install:complete'; summary: { installed: number; failed: number; skipped: number } };

/** Uninstall pipeline progress events. */
export type UninstallProgressEvent =
  | { type: 'uninstall:start'; packages: string[] }
  | { type: 'uninstall:step'; package: string; status: 'removing' | 'removed' | 'failed'; detail?: string }
  | { type: 'uninstall:complete'; summary: { removed: number; failed: number } };

/** Manifest reconciliation events. */
export type ReconcileProgressEvent =
  | { type: 'reconcile:orphan'; package: string; removed: boolean }
  | { type: 'manifest:inconsistent'; package: string; detail: string };

/** Search progress events. */
export type SearchProgressEvent =
  | { type: 'search:start'; query: string }
  | { type: 'search:complete'; resultCount: number };

export type ProgressEvent =
  | ResolveProgressEvent
  | InstallProgressEvent
  | UninstallProgressEvent
  | ReconcileProgressEvent
  | SearchProgressEvent;

export type ProgressLogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================================
// ProgressPort Interface
// ============================================================================

export interface ProgressPort {
  emit(event: ProgressEvent): void;
  log(level: ProgressLogLevel, message: string): void;
}

/**
 * Silent progress adapter. Discards all events.
 */
export const silentProgress: ProgressPort = {
  emit(_event: ProgressEvent): void {
    // No-op
  },
  log(_level: ProgressLogLevel, _message: string): void {
    // No-op
  }
};

/**
 * Records every event in order; used by tests and by callers that render a
 * report after the run.
 */
export function createRecordingProgress(): ProgressPort & { events: ProgressEvent[]; messages: string[] } {
  const events: ProgressEvent[] = [];
  const messages: string[] = [];
  return {
    events,
    messages,
    emit(event: ProgressEvent): void {
      events.push(event);
    },
    log(level: ProgressLogLevel, message: string): void {
      messages.push(`${level}: ${message}`);
    }
  };
}
