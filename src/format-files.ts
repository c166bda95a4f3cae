/**
 * File runner
 * Formats journals on disk (or standard input) for the CLI.
 */

import { readFileSync, writeFileSync } from 'fs';
import { beautify } from './beautifier.js';
import type { OutputStream } from './formatter/sink.js';
import { describeError } from './utils/errors.js';

/** Pseudo file name for standard input. */
export const STDIN = '-';

export interface FormatFilesOptions {
  /** Rewrite each file instead of streaming it */
  inplace?: boolean;
  /** Destination when streaming (default: process.stdout) */
  stdout?: OutputStream;
  /** Reads a file (or STDIN); injectable for tests */
  readFile?: (file: string) => Uint8Array;
}

export type FileStatus = 'formatted' | 'unchanged' | 'printed' | 'failed';

export interface FileResult {
  file: string;
  status: FileStatus;
  /** Single-line diagnostic when status is 'failed' */
  error?: string;
}

export interface FormatFilesOutput {
  success: boolean;
  results: FileResult[];
  errors: string[];
}

/**
 * Format every file in order. A failing file does not stop the others.
 * With no files, standard input is formatted to `stdout`.
 */
export function formatFiles(files: string[], options: FormatFilesOptions = {}): FormatFilesOutput {
  const {
    inplace = false,
    stdout = process.stdout,
    readFile = defaultReadFile,
  } = options;

  const output: FormatFilesOutput = {
    success: true,
    results: [],
    errors: [],
  };

  const targets = files.length > 0 ? files : [STDIN];

  if (inplace && targets.includes(STDIN)) {
    output.success = false;
    output.errors.push('--inplace needs file arguments; standard input cannot be rewritten');
    return output;
  }

  for (const file of targets) {
    try {
      const source = readFile(file);
      if (inplace) {
        const formatted = beautify(source, { inplace: true });
        const original = new TextDecoder().decode(source);
        if (formatted === original) {
          output.results.push({ file, status: 'unchanged' });
        } else {
          writeFileSync(file, formatted, 'utf-8');
          output.results.push({ file, status: 'formatted' });
        }
      } else {
        beautify(source, { inplace: false, output: stdout });
        output.results.push({ file, status: 'printed' });
      }
    } catch (error) {
      const message = describeError(error);
      output.success = false;
      output.errors.push(`${file}: ${message}`);
      output.results.push({ file, status: 'failed', error: message });
    }
  }

  return output;
}

function defaultReadFile(file: string): Uint8Array {
  return readFileSync(file === STDIN ? 0 : file);
}
