/**
 * Result sink contract shared by every output format.
 *
 * The sampling engine drives a sink through three calls and never learns
 * which format it is writing:
 *
 * 1. open()  - once, before any result (header row where the format has one)
 * 2. emit()  - once per successful draw; may throw on a write failure
 * 3. close() - once, after sampling (render buffered output, flush)
 */

import fs from 'fs';
import type { ThemeCategory } from '../types/show.types';
import { isNodeError } from '../utils/error-handler';

/**
 * Destination for rendered text. stdout in the CLI, a buffer in tests.
 */
export interface OutputWriter {
  write(chunk: string): void;
}

export interface ResultSink {
  open(): void;
  emit(song: string, showTitle: string, category: ThemeCategory): void;
  close(): void;
}

/**
 * Column headers for formats that print one.
 */
export const RESULT_HEADERS = ['Song', 'Show', 'Type'] as const;

/**
 * Writes synchronously to a file descriptor, stdout by default.
 *
 * `process.stdout.write` reports EPIPE and friends later as an 'error'
 * event; writing through the descriptor surfaces them as exceptions from
 * write(), which the engine records as a failed iteration.
 */
export class StdoutWriter implements OutputWriter {
  constructor(private readonly fd: number = process.stdout.fd) {}

  write(chunk: string): void {
    const data = Buffer.from(chunk, 'utf-8');
    let offset = 0;
    while (offset < data.length) {
      try {
        offset += fs.writeSync(this.fd, data, offset, data.length - offset);
      } catch (error) {
        // Non-blocking pipe is full; retry until the reader catches up
        if (isNodeError(error) && error.code === 'EAGAIN') continue;
        throw error;
      }
    }
  }
}

/**
 * Collects everything written; used by tests and for capturing output.
 */
export class BufferWriter implements OutputWriter {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    const text = this.toString();
    if (text.length === 0) return [];
    return text.replace(/\n$/, '').split('\n');
  }
}
