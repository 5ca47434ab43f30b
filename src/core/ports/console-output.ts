/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log implementation of OutputPort, safe for pipelines and
 * headless sessions.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.log(`✗ ${message}`);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${title}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },

  spinner(): UnifiedSpinner {
    return {
      start(message: string) {
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        if (finalMessage) {
          console.log(finalMessage);
        }
      },
      message(_text: string) {
        // Intermediate updates are dropped in plain mode
      }
    };
  }
};
