import { OutputMode } from '../types/config.types';
import { CsvSink } from './csv.sink';
import { ReadableSink } from './readable.sink';
import type { OutputWriter, ResultSink } from './result-sink';
import { DEFAULT_TABLE_WIDTH, TableSink } from './table.sink';

export * from './result-sink';
export { CsvSink, escapeCsvField, formatCsvRecord } from './csv.sink';
export { ReadableSink } from './readable.sink';
export { TableSink, renderTable, wrapCell, DEFAULT_TABLE_WIDTH } from './table.sink';

export interface SinkOptions {
  /** Explicit maximum column width for table output */
  tableWidth?: number;
  /** Terminal width, when stdout is a terminal */
  terminalColumns?: number;
}

/**
 * Table column width: explicit override, else the terminal width, else 60.
 */
export function resolveTableWidth(options: SinkOptions): number {
  if (options.tableWidth !== undefined) return options.tableWidth;
  if (options.terminalColumns !== undefined && options.terminalColumns > 0) {
    return options.terminalColumns;
  }
  return DEFAULT_TABLE_WIDTH;
}

export function createResultSink(
  mode: OutputMode,
  writer: OutputWriter,
  options: SinkOptions = {}
): ResultSink {
  switch (mode) {
    case OutputMode.TABLE:
      return new TableSink(writer, {
        maxColumnWidth: resolveTableWidth(options),
      });
    case OutputMode.CSV:
      return new CsvSink(writer);
    case OutputMode.READABLE:
      return new ReadableSink(writer);
  }
}
