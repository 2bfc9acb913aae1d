import type { ConfigStore } from '@confstore/core';
import { UsageError } from '@confstore/core';
import { createConfigStoreFactory } from '@confstore/core/factory';
import type { ConfigStoreFactory, ConfigStoreFactoryDeps, FactoryOptions } from '@confstore/core/factory';

/**
 * Scope written on the command line as `app/ns1/ns2`.
 */
export function parseScope(scope: string): { app: string; namespaces: string[] } {
  const [app, ...namespaces] = scope.split('/');
  if (!app || namespaces.some((namespace) => namespace === '')) {
    throw new UsageError(`invalid scope "${scope}": expected app[/namespace...]`);
  }
  return { app, namespaces };
}

/**
 * Dependency Injection Service for the confstore CLI
 *
 * Holds the store factory built from the global store flags. Commands
 * only ever ask it for a store.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private options: FactoryOptions | null = null;
  private deps: ConfigStoreFactoryDeps = {};
  private factory: ConfigStoreFactory | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Sets the backend used by later store requests. Options are validated
   * here, before any command runs.
   */
  configure(options: FactoryOptions, deps: ConfigStoreFactoryDeps = {}): void {
    this.factory = createConfigStoreFactory(options, deps);
    this.options = options;
    this.deps = deps;
  }

  isConfigured(): boolean {
    return this.options !== null;
  }

  private getFactory(): ConfigStoreFactory {
    if (!this.factory) {
      if (!this.options) {
        throw new Error('No config store configured. Pass --config-store or set CONFSTORE_CONFIG_STORE.');
      }
      this.factory = createConfigStoreFactory(this.options, this.deps);
    }
    return this.factory;
  }

  /**
   * Opens the store of a scope written as `app/ns1/ns2`.
   */
  async openStore(scope: string): Promise<ConfigStore> {
    const { app, namespaces } = parseScope(scope);
    return this.getFactory().open(app, ...namespaces);
  }

  /**
   * Releases database handles. The service can be used again afterwards.
   */
  async close(): Promise<void> {
    const factory = this.factory;
    this.factory = null;
    await factory?.close();
  }
}
