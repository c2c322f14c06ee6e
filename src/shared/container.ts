type FactoryFunction<T> = () => T;

interface Binding<T> {
  factory: FactoryFunction<T>;
  singleton: boolean;
  instance?: T;
}

type Bindings<R> = { [K in keyof R]?: Binding<R[K]> };

/**
 * Typed service container. `R` maps every token to the type it resolves to,
 * so `get` needs no casts and an unknown token is a compile error.
 */
export class DIContainer<R extends object> {
  private bindings: Bindings<R> = {};

  bind<K extends keyof R>(token: K, factory: FactoryFunction<R[K]>, singleton: boolean = true): void {
    this.bindings[token] = { factory, singleton };
  }

  get<K extends keyof R>(token: K): R[K] {
    const binding = this.bindings[token];

    if (!binding) {
      throw new Error(`No binding found for token: ${String(token)}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance;
  }

  has(token: keyof R): boolean {
    return this.bindings[token] !== undefined;
  }

  unbind(token: keyof R): void {
    delete this.bindings[token];
  }

  clear(): void {
    this.bindings = {};
  }
}
