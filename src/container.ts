/**
 * Dependency container
 * Typed by a services map so lookups need no casts
 */
export class Container<TServices extends object> {
  private instances: { [K in keyof TServices]?: { value: TServices[K] } } = {};
  private factories: { [K in keyof TServices]?: () => TServices[K] } = {};

  /**
   * Register a singleton instance
   */
  registerInstance<K extends keyof TServices>(key: K, instance: TServices[K]): void {
    this.instances[key] = { value: instance };
  }

  /**
   * Register a factory; its product is cached on first resolve
   */
  registerFactory<K extends keyof TServices>(key: K, factory: () => TServices[K]): void {
    this.factories[key] = factory;
  }

  resolve<K extends keyof TServices>(key: K): TServices[K] {
    const registered = this.instances[key];
    if (registered) {
      return registered.value;
    }

    const factory = this.factories[key];
    if (factory) {
      const created = factory();
      this.instances[key] = { value: created };
      return created;
    }

    throw new Error(`Dependency '${String(key)}' not registered`);
  }

  has(key: keyof TServices): boolean {
    return this.instances[key] !== undefined || this.factories[key] !== undefined;
  }

  /**
   * Clear all registrations (useful for testing)
   */
  clear(): void {
    this.instances = {};
    this.factories = {};
  }
}
