/**
 * @fileoverview Tester module exports.
 *
 * @module tester
 */

export { ModuleTesterLoader } from './moduleTesterLoader';
export type { ModuleImporter } from './moduleTesterLoader';
export { SimpleTestcase } from './simpleTestcase';
export { SimplePreparator, INPUT_DIR } from './simplePreparator';
export { SimpleCalculator, FINISH_MARKER, STDIN_FILE, STDOUT_FILE, STDERR_FILE } from './simpleCalculator';
export { SimpleChecker } from './simpleChecker';
export { TestLog, INDENT_WIDTH, LINE_WIDTH, RESULT_COLUMN } from './testLog';
export type { Calculator, Checker, Preparator } from './types';
