/**
 * Output Port Interface
 *
 * Contract for user-facing output. Commands write through this port instead
 * of calling console or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, interactive): @clack/prompts log calls
 *   - consoleOutput (CI, piped output): plain console.log
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  step(message: string): void;
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  /** A block of text with an optional title. */
  note(content: string, title?: string): void;
  spinner(): UnifiedSpinner;
}
