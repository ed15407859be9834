import type { ThemeCategory } from '../types/show.types';
import type { OutputWriter, ResultSink } from './result-sink';

/**
 * One line per result: `<theme> [<category>] from <show title>`.
 * No header, nothing buffered.
 */
export class ReadableSink implements ResultSink {
  constructor(private readonly writer: OutputWriter) {}

  open(): void {}

  emit(song: string, showTitle: string, category: ThemeCategory): void {
    this.writer.write(`${song} [${category}] from ${showTitle}\n`);
  }

  close(): void {}
}
