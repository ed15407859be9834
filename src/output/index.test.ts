import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  closeSync,
  mkdtempSync,
  openSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  BufferWriter,
  createResultSink,
  CsvSink,
  escapeCsvField,
  formatCsvRecord,
  ReadableSink,
  resolveTableWidth,
  StdoutWriter,
  TableSink,
} from './index';
import { OutputMode } from '../types/config.types';
import { ThemeCategory } from '../types/show.types';

describe('Result sinks', () => {
  describe('ReadableSink', () => {
    it('should write one line per result with no header', () => {
      const writer = new BufferWriter();
      const sink = new ReadableSink(writer);

      sink.open();
      sink.emit('Blue Bird', 'Naruto Shippuden', ThemeCategory.OPENING);
      sink.emit('Wind', 'Naruto', ThemeCategory.ENDING);
      sink.close();

      expect(writer.toString()).toBe(
        'Blue Bird [OP] from Naruto Shippuden\nWind [ED] from Naruto\n'
      );
    });
  });

  describe('CSV', () => {
    it('should quote only fields that need it', () => {
      expect(escapeCsvField('plain')).toBe('plain');
      expect(escapeCsvField('a, b')).toBe('"a, b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });

    it('should join fields into a record', () => {
      expect(formatCsvRecord(['x', 'y,z', 'ST'])).toBe('x,"y,z",ST\n');
    });

    it('should write the header on open and records in header order', () => {
      const writer = new BufferWriter();
      const sink = new CsvSink(writer);

      sink.open();
      sink.emit('Unravel', 'Tokyo Ghoul', ThemeCategory.OPENING);
      sink.emit('Insert, Song', 'Show', ThemeCategory.OTHER);
      sink.close();

      expect(writer.lines()).toEqual([
        'Song,Show,Type',
        'Unravel,Tokyo Ghoul,OP',
        '"Insert, Song",Show,ST',
      ]);
    });
  });

  describe('resolveTableWidth', () => {
    it('should prefer the explicit width', () => {
      expect(resolveTableWidth({ tableWidth: 30, terminalColumns: 120 })).toBe(
        30
      );
    });

    it('should fall back to the terminal width, then 60', () => {
      expect(resolveTableWidth({ terminalColumns: 120 })).toBe(120);
      expect(resolveTableWidth({ terminalColumns: 0 })).toBe(60);
      expect(resolveTableWidth({})).toBe(60);
    });
  });

  describe('createResultSink', () => {
    it('should build the sink for each mode', () => {
      const writer = new BufferWriter();

      expect(createResultSink(OutputMode.READABLE, writer)).toBeInstanceOf(
        ReadableSink
      );
      expect(createResultSink(OutputMode.CSV, writer)).toBeInstanceOf(CsvSink);
      expect(createResultSink(OutputMode.TABLE, writer)).toBeInstanceOf(
        TableSink
      );
    });

    it('should pass the resolved width to the table sink', () => {
      const writer = new BufferWriter();
      const sink = createResultSink(OutputMode.TABLE, writer, {
        tableWidth: 3,
      });

      sink.open();
      sink.emit('abcd', 'x', ThemeCategory.OPENING);
      sink.close();

      expect(writer.lines()).toEqual([
        '╭─────┬─────┬─────╮',
        '│ Son │ Sho │ Typ │',
        '│ g   │ w   │ e   │',
        '├─────┼─────┼─────┤',
        '│ abc │ x   │ OP  │',
        '│ d   │     │     │',
        '╰─────┴─────┴─────╯',
      ]);
    });
  });

  describe('StdoutWriter', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'show-themes-writer-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should write every chunk to its descriptor', () => {
      const path = join(dir, 'out.txt');
      const fd = openSync(path, 'w');
      try {
        const writer = new StdoutWriter(fd);
        writer.write('残酷な天使 [OP] from Eva\n');
        writer.write('Fly [ED] from Eva\n');
      } finally {
        closeSync(fd);
      }

      expect(readFileSync(path, 'utf-8')).toBe(
        '残酷な天使 [OP] from Eva\nFly [ED] from Eva\n'
      );
    });

    it('should throw from write() when the descriptor rejects the write', () => {
      const path = join(dir, 'read-only.txt');
      writeFileSync(path, '');
      const fd = openSync(path, 'r');
      try {
        const writer = new StdoutWriter(fd);

        let thrown: unknown;
        try {
          writer.write('lost\n');
        } catch (error) {
          thrown = error;
        }

        expect(thrown).toBeInstanceOf(Error);
        expect(thrown).toHaveProperty('code', 'EBADF');
      } finally {
        closeSync(fd);
      }
    });
  });
});
