/**
 * @fileoverview Interface for user-facing text output.
 *
 * Two sinks exist during a run: the process-lifetime summary sink (progress
 * lines and the report) and one transcript sink per test case, whose text is
 * persisted with the test case's status record.
 *
 * @module interfaces/ILogSink
 */

/**
 * Line-oriented text sink.
 */
export interface ILogSink {
  /**
   * Write a single line. A trailing newline is added by the sink.
   *
   * @param line - Line content without the newline
   */
  writeLine(line: string): void;

  /**
   * Write a block of text, one line per `\n` separated piece.
   */
  write(text: string): void;
}
