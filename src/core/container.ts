/**
 * @fileoverview Dependency injection container for service registration and resolution.
 * 
 * Provides a typed, token-based dependency injection container with lazily
 * created singletons.
 * 
 * @module core/container
 */

/**
 * Service token. The type parameter ties the token to the service type so
 * `resolve` needs no explicit generic argument.
 */
export interface Token<T> {
  readonly key: symbol;
  /** Phantom marker carrying the service type; never set. */
  readonly __service?: T;
}

/**
 * Create a service token.
 */
export function createToken<T>(description: string): Token<T> {
  return { key: Symbol(description) };
}

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  instance?: T;
}

/**
 * Dependency injection container with token-based type safety.
 */
export class ServiceContainer {
  // Registrations are stored type-erased; tokens restore the type on resolve().
  private readonly services = new Map<symbol, ServiceRegistration<any>>();

  /**
   * Register a singleton service factory. Creates only one instance, cached after first resolve().
   */
  registerSingleton<T>(token: Token<T>, factory: ServiceFactory<T>): void {
    this.services.set(token.key, { factory });
  }

  /**
   * Resolve a service instance, creating it on first call.
   *
   * @throws {Error} If nothing is registered for `token`.
   */
  resolve<T>(token: Token<T>): T {
    const registration: ServiceRegistration<T> | undefined = this.services.get(token.key);
    if (!registration) {
      throw new Error(`Service not registered: ${token.key.toString()}`);
    }
    if (registration.instance === undefined) {
      registration.instance = registration.factory(this);
    }
    return registration.instance;
  }
}
