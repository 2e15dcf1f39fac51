/**
 * @fileoverview Run Configuration Manager
 *
 * Wraps configuration access behind {@link IConfigProvider} with typed
 * accessors for everything the engine reads.
 *
 * @module testcase/configManager
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';

/** Default interrupt grace window in milliseconds. */
export const DEFAULT_INTERRUPT_GRACE_MS = 1000;

/** Default name of the per-test-case status file. */
export const DEFAULT_STATUS_FILE_NAME = '.valrun-status.json';

/** Default name of the tester module inside a test directory. */
export const DEFAULT_TESTER_MODULE = 'tester.js';

/**
 * Provides run configuration with type-safe accessors.
 *
 * Falls back to defaults when no config provider is available.
 */
export class RunConfigManager {
  private readonly provider?: IConfigProvider;

  constructor(provider?: IConfigProvider) {
    this.provider = provider;
  }

  private get<T extends string | number | boolean | string[]>(section: string, key: string, defaultValue: T): T {
    if (!this.provider) {
      return defaultValue;
    }
    return this.provider.getConfig(section, key, defaultValue);
  }

  /**
   * Pause after an interrupted phase during which a second interrupt aborts
   * the whole run.
   */
  get interruptGraceMs(): number {
    return Math.max(0, this.get<number>('interrupt', 'graceMs', DEFAULT_INTERRUPT_GRACE_MS));
  }

  /**
   * File name of the status record inside each work directory.
   */
  get statusFileName(): string {
    return this.get<string>('status', 'fileName', DEFAULT_STATUS_FILE_NAME);
  }

  /**
   * File name of the tester module inside each test directory.
   */
  get testerModule(): string {
    return this.get<string>('tester', 'module', DEFAULT_TESTER_MODULE);
  }

  /**
   * Components with debug logging enabled.
   */
  get debugComponents(): string[] {
    return this.get<string[]>('logging', 'debug', []);
  }
}
