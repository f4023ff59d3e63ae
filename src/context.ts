/**
 * Context - Shared mutable state container for task execution
 */

/**
 * Typed key-value store a task fills while it works; its contents become
 * the payload of the task's report.
 */
export class Context<T extends object = Record<string, unknown>> {
  private readonly store: Partial<T>;

  constructor(initial?: Partial<T>) {
    this.store = initial ? { ...initial } : {};
  }

  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.store[key];
  }

  set<K extends keyof T>(key: K, value: T[K]): this {
    this.store[key] = value;
    return this;
  }

  has(key: keyof T): boolean {
    return this.store[key] !== undefined;
  }

  delete(key: keyof T): boolean {
    const present = this.has(key);
    delete this.store[key];
    return present;
  }

  keys(): string[] {
    return Object.keys(this.store);
  }

  get size(): number {
    return this.keys().length;
  }

  /**
   * Merge another object into context; `undefined` values are ignored
   */
  merge(data: Partial<T>): this {
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        Reflect.set(this.store, key, value);
      }
    }
    return this;
  }

  entries(): [string, unknown][] {
    return Object.entries(this.store);
  }

  /**
   * Convert context to a plain object
   */
  toObject(): Partial<T> {
    return { ...this.store };
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.entries());
  }

  clone(): Context<T> {
    return new Context<T>(this.toObject());
  }

  [Symbol.toStringTag] = 'Context';
}

/**
 * Create a new context instance
 */
export function createContext<T extends object = Record<string, unknown>>(
  initial?: Partial<T>
): Context<T> {
  return new Context<T>(initial);
}
