/**
 * @fileoverview JSON file + environment backed configuration provider.
 *
 * Configuration is an optional JSON file of sections:
 *
 * ```json
 * {
 *   "interrupt": { "graceMs": 500 },
 *   "logging": { "debug": ["phase-runner"] }
 * }
 * ```
 *
 * Every entry can be overridden by an environment variable named
 * `VALRUN_<SECTION>_<KEY>` (upper-cased, non-alphanumerics as `_`), e.g.
 * `VALRUN_INTERRUPT_GRACEMS=500`.
 *
 * @module core/configProvider
 */

import Ajv from 'ajv';
import type { ConfigValue, IConfigProvider } from '../interfaces/IConfigProvider';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { errorMessage, UsageError } from './errors';
import { Logger } from './logger';

const log = Logger.for('config');

type ConfigSections = Record<string, Record<string, unknown>>;

const ajv = new Ajv({ allErrors: true, strict: true });

const validateSections = ajv.compile<ConfigSections>({
  type: 'object',
  additionalProperties: { type: 'object' },
});

/**
 * Check that `value` has the same shape as `sample`.
 */
function matchesType<T extends ConfigValue>(value: unknown, sample: T): value is T {
  if (Array.isArray(sample)) {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
  }
  return typeof value === typeof sample;
}

/**
 * Convert an environment string to the type of `sample`.
 */
function parseEnvValue(raw: string, sample: ConfigValue): unknown {
  if (Array.isArray(sample)) {
    return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }
  switch (typeof sample) {
    case 'number': {
      const parsed = Number(raw);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean':
      return raw === 'true' || raw === '1';
    default:
      return raw;
  }
}

/**
 * Build the environment variable name for a configuration entry.
 */
export function envKeyFor(section: string, key: string): string {
  return `VALRUN_${section}_${key}`.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/**
 * Configuration provider reading a JSON file with environment overrides.
 */
export class JsonConfigProvider implements IConfigProvider {
  private readonly sections: ConfigSections;
  private readonly env: NodeJS.ProcessEnv;

  /**
   * @param options.filePath - Optional JSON configuration file. A file that
   *   is named but unreadable or malformed is a usage error.
   * @param options.env - Environment for overrides (default `process.env`).
   */
  constructor(fileSystem: IFileSystem, options: { filePath?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.env = options.env ?? process.env;
    this.sections = options.filePath ? JsonConfigProvider.readFile(fileSystem, options.filePath) : {};
  }

  private static readFile(fileSystem: IFileSystem, filePath: string): ConfigSections {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fileSystem.readFileSync(filePath));
    } catch (error) {
      throw new UsageError(`Cannot read configuration file '${filePath}': ${errorMessage(error)}`);
    }
    if (!validateSections(parsed)) {
      throw new UsageError(`Configuration file '${filePath}' must map section names to objects`);
    }
    log.debug(`Loaded configuration from ${filePath}`, { sections: Object.keys(parsed) });
    return parsed;
  }

  getConfig<T extends ConfigValue>(section: string, key: string, defaultValue: T): T {
    const envRaw = this.env[envKeyFor(section, key)];
    if (envRaw !== undefined) {
      const fromEnv = parseEnvValue(envRaw, defaultValue);
      if (matchesType(fromEnv, defaultValue)) {
        return fromEnv;
      }
      log.warn(`Ignoring invalid value for ${envKeyFor(section, key)}: '${envRaw}'`);
    }

    const fromFile = this.sections[section]?.[key];
    if (fromFile === undefined) {
      return defaultValue;
    }
    if (matchesType(fromFile, defaultValue)) {
      return fromFile;
    }
    log.warn(`Ignoring configuration ${section}.${key}: expected ${Array.isArray(defaultValue) ? 'string[]' : typeof defaultValue}`);
    return defaultValue;
  }
}
