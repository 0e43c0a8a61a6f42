export type Token<T> = string | symbol;

type Factory<T> = (container: Container) => T;

interface Provider<T> {
  factory: Factory<T>;
  singleton: boolean;
}

/**
 * Startup-time service container. Handles are registered while the process boots,
 * then `freeze()` turns the container read-only so request handlers can share them.
 */
export class Container {
  private readonly providers = new Map<Token<unknown>, Provider<unknown>>();
  private readonly singletons = new Map<Token<unknown>, unknown>();
  private frozen = false;

  register<T>(token: Token<T>, factory: Factory<T>, options?: { singleton?: boolean }): void {
    this.assertWritable(token);

    this.providers.set(token, {
      factory,
      singleton: options?.singleton ?? false
    });
  }

  registerValue<T>(token: Token<T>, value: T): void {
    this.assertWritable(token);

    this.providers.set(token, {
      factory: () => value,
      singleton: true
    });
    this.singletons.set(token, value);
  }

  resolve<T>(token: Token<T>): T {
    const provider = this.providers.get(token);
    if (!provider) {
      throw new Error(`No provider registered for token: ${String(token)}`);
    }

    if (provider.singleton) {
      if (this.singletons.has(token)) {
        return this.singletons.get(token) as T;
      }

      const instance = provider.factory(this) as T;
      this.singletons.set(token, instance);
      return instance;
    }

    return provider.factory(this) as T;
  }

  has(token: Token<unknown>): boolean {
    return this.providers.has(token);
  }

  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private assertWritable(token: Token<unknown>): void {
    if (typeof token !== 'string' && typeof token !== 'symbol') {
      throw new Error('Token must be a string or symbol');
    }

    if (this.frozen) {
      throw new Error(`Container is frozen. Cannot register ${String(token)} after startup.`);
    }
  }
}
