/**
 * @fileoverview Interface for configuration access abstraction.
 * 
 * Abstracts where configuration comes from (JSON file, environment) to enable
 * dependency injection and unit testing.
 * 
 * @module interfaces/IConfigProvider
 */

/**
 * Interface for reading run configuration.
 * 
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly config: IConfigProvider) {}
 *   
 *   getGraceMs(): number {
 *     return this.config.getConfig('interrupt', 'graceMs', 1000);
 *   }
 * }
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   * 
   * The returned value has the same runtime type as `defaultValue`; values of
   * any other type are ignored in favour of the default.
   * 
   * @param section - Configuration section
   * @param key - Configuration key within the section
   * @param defaultValue - Default value if configuration is not set
   */
  getConfig<T extends ConfigValue>(section: string, key: string, defaultValue: T): T;
}

/** Value types a configuration entry may hold. */
export type ConfigValue = string | number | boolean | string[];
