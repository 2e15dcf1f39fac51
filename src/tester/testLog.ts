/**
 * @fileoverview Structured transcript writing for checkers.
 *
 * Wraps the test case's transcript sink with indentation, line wrapping and
 * result lines whose `[Ok]` / `[FAILED]` flags line up in one column.
 *
 * @module tester/testLog
 */

import type { ILogSink } from '../interfaces/ILogSink';

/** Spaces per indentation level. */
export const INDENT_WIDTH = 2;

/** Column at which wrapped lines are broken. */
export const LINE_WIDTH = 80;

/** Column at which result flags start. */
export const RESULT_COLUMN = 72;

/**
 * Indenting writer over an {@link ILogSink}.
 *
 * @example
 * ```typescript
 * const testLog = new TestLog(context.logSink);
 * testLog.blockOpen('Comparing energies');
 * testLog.success('total energy');
 * testLog.blockClose();
 * ```
 */
export class TestLog {
  private level = 0;

  constructor(private readonly sink: ILogSink) {}

  /** Current indentation in spaces. */
  get indentWidth(): number {
    return this.level * INDENT_WIDTH;
  }

  /**
   * Write one line at the current indentation.
   *
   * @param wrap - Break the line so that it fits {@link LINE_WIDTH} columns
   */
  writeLine(line: string, wrap = false): void {
    const pad = ' '.repeat(this.indentWidth);
    const lines = wrap ? this.breakLine(line, LINE_WIDTH) : [line];
    lines.forEach((piece) => this.sink.writeLine(pad + piece));
  }

  /** Write each `\n` separated line of `text`. */
  write(text: string, wrap = false): void {
    text.split('\n').forEach((line) => this.writeLine(line, wrap));
  }

  /** Write `line` if given, then indent. */
  blockOpen(line?: string): void {
    if (line) {
      this.writeLine(line, true);
    }
    this.indent();
  }

  /** Dedent, then write `line` if given. */
  blockClose(line?: string): void {
    this.dedent();
    if (line) {
      this.writeLine(line, true);
    }
  }

  indent(): void {
    this.level += 1;
  }

  dedent(): void {
    this.level = Math.max(0, this.level - 1);
  }

  success(message: string): void {
    this.result(message, '[Ok]');
  }

  failure(message: string): void {
    this.result(message, '[FAILED]');
  }

  private result(message: string, flag: string): void {
    const lines = this.breakLine(message, RESULT_COLUMN);
    const last = lines.pop() ?? '';
    const padding = ' '.repeat(Math.max(0, RESULT_COLUMN - last.length - this.indentWidth));
    [...lines, last + padding + flag].forEach((line) => this.writeLine(line));
  }

  private breakLine(line: string, width: number): string[] {
    const size = Math.max(1, width - this.indentWidth);
    const pieces: string[] = [];
    for (let start = 0; start < line.length; start += size) {
      pieces.push(line.slice(start, start + size));
    }
    return pieces.length > 0 ? pieces : [''];
  }
}
