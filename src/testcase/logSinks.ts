/**
 * @fileoverview Log sink implementations.
 *
 * @module testcase/logSinks
 */

import type { ILogSink } from '../interfaces/ILogSink';

/**
 * Base class providing `write` on top of `writeLine`.
 */
abstract class LineLogSink implements ILogSink {
  abstract writeLine(line: string): void;

  write(text: string): void {
    text.split('\n').forEach((line) => this.writeLine(line));
  }
}

/**
 * Prefix every line of `text` with `width` spaces.
 */
export function indentText(text: string, width = 2): string {
  const pad = ' '.repeat(width);
  return text.split('\n').map((line) => pad + line).join('\n');
}

/**
 * Sink writing to a stream such as stdout.
 */
export class StreamLogSink extends LineLogSink {
  constructor(private readonly stream: { write(chunk: string): unknown }) {
    super();
  }

  writeLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Sink accumulating text in memory; used for the per-test-case transcript.
 */
export class TranscriptLogSink extends LineLogSink {
  private readonly lines: string[] = [];

  /**
   * @param initial - Transcript already persisted for the test case; new
   *   lines are appended after it.
   */
  constructor(private readonly initial = '') {
    super();
  }

  writeLine(line: string): void {
    this.lines.push(line);
  }

  /**
   * Full transcript: the initial text followed by every line written since.
   */
  text(): string {
    if (this.lines.length === 0) {
      return this.initial;
    }
    const appended = this.lines.map((line) => `${line}\n`).join('');
    return this.initial + appended;
  }
}
