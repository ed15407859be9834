import type { ThemeCategory } from '../types/show.types';
import { RESULT_HEADERS, type OutputWriter, type ResultSink } from './result-sink';

export const DEFAULT_TABLE_WIDTH = 60;

/**
 * Rounded box-drawing characters.
 */
const BORDER = {
  top: { left: '╭', join: '┬', right: '╮' },
  middle: { left: '├', join: '┼', right: '┤' },
  bottom: { left: '╰', join: '┴', right: '╯' },
  horizontal: '─',
  vertical: '│',
} as const;

export interface TableOptions {
  /** Widest a column may grow before its cells wrap */
  maxColumnWidth: number;
}

/**
 * Splits a cell into lines no wider than `maxWidth` characters. Explicit
 * line breaks in the cell are kept.
 */
export function wrapCell(cell: string, maxWidth: number): string[] {
  const lines: string[] = [];
  for (const segment of cell.split(/\r?\n/)) {
    const chars = Array.from(segment);
    if (chars.length === 0) {
      lines.push('');
      continue;
    }
    for (let i = 0; i < chars.length; i += maxWidth) {
      lines.push(chars.slice(i, i + maxWidth).join(''));
    }
  }
  return lines;
}

function visibleLength(text: string): number {
  return Array.from(text).length;
}

function rule(
  widths: readonly number[],
  edge: { left: string; join: string; right: string }
): string {
  const segments = widths.map(width => BORDER.horizontal.repeat(width + 2));
  return edge.left + segments.join(edge.join) + edge.right;
}

/**
 * Renders rows as a bordered table with a rule between every row. Returns an
 * empty string when there are no rows.
 */
export function renderTable(
  rows: readonly (readonly string[])[],
  maxColumnWidth: number
): string {
  if (rows.length === 0) return '';

  const columnCount = Math.max(...rows.map(row => row.length));
  const wrapped = rows.map(row =>
    Array.from({ length: columnCount }, (_, c) =>
      wrapCell(c < row.length ? row[c] : '', maxColumnWidth)
    )
  );

  const widths = Array.from({ length: columnCount }, (_, c) =>
    Math.max(
      ...wrapped.map(cells => Math.max(...cells[c].map(visibleLength)))
    )
  );

  const out: string[] = [rule(widths, BORDER.top)];
  wrapped.forEach((cells, rowIndex) => {
    if (rowIndex > 0) out.push(rule(widths, BORDER.middle));
    const height = Math.max(...cells.map(lines => lines.length));
    for (let line = 0; line < height; line++) {
      const rendered = cells.map((lines, c) => {
        const text = line < lines.length ? lines[line] : '';
        return ` ${text}${' '.repeat(widths[c] - visibleLength(text))} `;
      });
      out.push(
        BORDER.vertical + rendered.join(BORDER.vertical) + BORDER.vertical
      );
    }
  });
  out.push(rule(widths, BORDER.bottom));

  return out.join('\n') + '\n';
}

/**
 * Buffers rows and writes the whole table on close.
 */
export class TableSink implements ResultSink {
  private readonly rows: string[][] = [];
  private readonly maxColumnWidth: number;

  constructor(
    private readonly writer: OutputWriter,
    options: TableOptions
  ) {
    if (!Number.isInteger(options.maxColumnWidth) || options.maxColumnWidth < 1) {
      throw new RangeError(
        `maxColumnWidth must be a positive integer, got ${options.maxColumnWidth}`
      );
    }
    this.maxColumnWidth = options.maxColumnWidth;
  }

  open(): void {
    this.rows.push([...RESULT_HEADERS]);
  }

  emit(song: string, showTitle: string, category: ThemeCategory): void {
    this.rows.push([song, showTitle, category]);
  }

  close(): void {
    const table = renderTable(this.rows, this.maxColumnWidth);
    if (table.length > 0) {
      this.writer.write(table);
    }
  }
}
