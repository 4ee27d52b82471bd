/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 * Used as the default fallback when no interactive UI is available.
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
        // Intermediate spinner updates are dropped in plain mode
      },
    };
  },
};

/**
 * OutputPort that records messages instead of printing them.
 */
export interface RecordingOutput extends OutputPort {
  readonly lines: Array<{ level: 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'note'; text: string }>;
}

export function createRecordingOutput(): RecordingOutput {
  const lines: RecordingOutput['lines'] = [];
  return {
    lines,
    info: (text) => { lines.push({ level: 'info', text }); },
    step: (text) => { lines.push({ level: 'step', text }); },
    message: (text) => { lines.push({ level: 'message', text }); },
    success: (text) => { lines.push({ level: 'success', text }); },
    error: (text) => { lines.push({ level: 'error', text }); },
    warn: (text) => { lines.push({ level: 'warn', text }); },
    note: (content, title) => { lines.push({ level: 'note', text: title ? `${title}\n${content}` : content }); },
    spinner: () => ({
      start: (text) => { lines.push({ level: 'step', text }); },
      stop: (text) => { if (text) lines.push({ level: 'step', text }); },
      message: () => {},
    }),
  };
}
