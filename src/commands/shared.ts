import { resolve } from 'path';
import type { Command } from 'commander';
import { createCliContext, type CliContext } from '../cli/context.js';
import { ParseError } from '../utils/errors.js';

export interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    cwd: typeof opts.cwd === 'string' ? resolve(process.cwd(), opts.cwd) : undefined,
    verbose: opts.verbose === true
  };
}

export function contextFor(command: Command): Promise<CliContext> {
  return createCliContext(readGlobalOptions(command));
}

/**
 * Run an operation with an AbortSignal that fires on Ctrl+C. The orchestrator
 * stops between steps and reports the cancelled state.
 */
export async function withInterrupt<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function parseCount(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ParseError(value, `${flag} expects a non-negative integer`);
  }
  return parsed;
}
