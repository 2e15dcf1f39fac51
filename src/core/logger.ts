/**
 * @fileoverview Centralized diagnostic logging with per-component debug control.
 *
 * All diagnostics go to stderr so that stdout stays reserved for progress
 * lines and the report. Debug logging can be enabled per component from the
 * configuration (`logging.debug`) or for every component with `--verbose`.
 *
 * Components:
 * - cli: argument handling and exit codes
 * - orchestrator: test-case loop, report and cleanup driving
 * - phase-runner: gating and phase classification
 * - status-store: status file reads and writes
 * - patterns: pattern file and glob expansion
 * - report: report aggregation
 * - tester: tester resolution and building-block testers
 * - interrupts: SIGINT handling
 * - config: configuration loading
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('status-store');
 * log.debug('Loaded status', { path });
 * log.warn('Could not save status', error);
 * ```
 *
 * @module core/logger
 */

import type { ILogger } from '../interfaces/ILogger';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Components that can have logging enabled
 */
export type LogComponent =
  | 'cli'
  | 'orchestrator'
  | 'phase-runner'
  | 'status-store'
  | 'patterns'
  | 'report'
  | 'tester'
  | 'interrupts'
  | 'config';

/** Every log component. */
export const LOG_COMPONENTS: readonly LogComponent[] = [
  'cli', 'orchestrator', 'phase-runner', 'status-store', 'patterns', 'report', 'tester', 'interrupts', 'config',
];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Options accepted by {@link Logger.initialize}.
 */
export interface LoggerOptions {
  /** Components with debug output enabled, or `'all'` */
  debug?: readonly string[] | 'all';
  /** Minimum level for non-debug output (default `info`) */
  level?: LogLevel;
  /** Line writer (default: stderr) */
  writeLine?: (line: string) => void;
}

function isLogComponent(value: string): value is LogComponent {
  return LOG_COMPONENTS.some((component) => component === value);
}

/**
 * Centralized logger with per-component debug control.
 */
export class Logger {
  private static instance: Logger | undefined;
  private readonly debugComponents = new Set<LogComponent>();
  private readonly level: LogLevel;
  private readonly writeLine: (line: string) => void;

  private constructor(options: LoggerOptions) {
    this.level = options.level ?? 'info';
    this.writeLine = options.writeLine ?? ((line) => { process.stderr.write(`${line}\n`); });
    const debug = options.debug ?? [];
    if (debug === 'all') {
      LOG_COMPONENTS.forEach((component) => this.debugComponents.add(component));
    } else {
      debug.filter(isLogComponent).forEach((component) => this.debugComponents.add(component));
    }
  }

  /**
   * Initialize the logger. Replaces any earlier instance so the CLI can
   * re-initialize once configuration has been read.
   */
  static initialize(options: LoggerOptions = {}): Logger {
    Logger.instance = new Logger(options);
    return Logger.instance;
  }

  /**
   * Drop the singleton; component loggers fall back to the console.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Get the singleton logger instance, if initialized.
   */
  static getInstance(): Logger | undefined {
    return Logger.instance;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   * @returns A ComponentLogger bound to the specified component
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.debugComponents.has(component);
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  /**
   * Write a log entry.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (level === 'debug') {
      if (!this.isDebugEnabled(component)) {
        return;
      }
    } else if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    this.writeLine(this.formatMessage(level, component, message) + formatData(data));
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

/**
 * Format additional data for logging.
 */
export function formatData(data?: unknown): string {
  if (data === undefined) {return '';}
  if (data instanceof Error) {
    return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
  }
  try {
    return '\n  ' + JSON.stringify(data, null, 2).split('\n').join('\n  ');
  } catch {
    return `\n  [Unserializable data: ${typeof data}]`;
  }
}

/**
 * Component-scoped logger for convenience.
 *
 * Provides log methods pre-bound to a specific component. Before
 * {@link Logger.initialize} has run, warnings and errors go straight to
 * the console and everything else is dropped.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.getInstance()?.debug(this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    Logger.getInstance()?.info(this.component, message, data);
  }

  warn(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.warn(this.component, message, data);
    } else {
      console.warn(`[valrun:${this.component}] ${message}${formatData(data)}`);
    }
  }

  error(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.error(this.component, message, data);
    } else {
      console.error(`[valrun:${this.component}] ${message}${formatData(data)}`);
    }
  }

  isDebugEnabled(): boolean {
    return Logger.getInstance()?.isDebugEnabled(this.component) ?? false;
  }
}
