type Factory<T> = () => T;

/** Lazy singleton registry keyed by the names in `Registry`. */
export class Container<Registry extends object> {
  private readonly registry = new Map<keyof Registry, Factory<unknown>>();

  private readonly singletons = new Map<keyof Registry, unknown>();

  register<K extends keyof Registry>(token: K, factory: Factory<Registry[K]>) {
    if (this.registry.has(token)) {
      throw new Error(`Token ${String(token)} already registered`);
    }
    this.registry.set(token, factory);
  }

  resolve<K extends keyof Registry>(token: K): Registry[K] {
    if (this.singletons.has(token)) {
      return this.singletons.get(token) as Registry[K];
    }
    const factory = this.registry.get(token);
    if (!factory) {
      throw new Error(`Token ${String(token)} not registered`);
    }
    const instance = factory();
    this.singletons.set(token, instance);
    return instance as Registry[K];
  }
}
