import type { ThemeCategory } from '../types/show.types';
import { RESULT_HEADERS, type OutputWriter, type ResultSink } from './result-sink';

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quotes a field per RFC 4180 when it contains a separator, quote or line
 * break. Embedded quotes are doubled.
 */
export function escapeCsvField(field: string): string {
  if (!NEEDS_QUOTING.test(field)) return field;
  return `"${field.replace(/"/g, '""')}"`;
}

export function formatCsvRecord(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + '\n';
}

/**
 * CSV output. The header is written on open and each record as soon as it
 * is emitted, in header order (song, show, type).
 */
export class CsvSink implements ResultSink {
  constructor(private readonly writer: OutputWriter) {}

  open(): void {
    this.writer.write(formatCsvRecord(RESULT_HEADERS));
  }

  emit(song: string, showTitle: string, category: ThemeCategory): void {
    this.writer.write(formatCsvRecord([song, showTitle, category]));
  }

  close(): void {}
}
