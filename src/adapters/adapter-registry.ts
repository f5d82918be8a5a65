/**
 * Registry of syntax adapters keyed by dialect and file extension.
 * Adapters are created lazily on first use.
 */
import type { SyntaxAdapter } from './types.js';

export type AdapterFactory = () => SyntaxAdapter;

interface AdapterRegistration {
  factory: AdapterFactory;
  instance?: SyntaxAdapter;
}

export class AdapterRegistry {
  private registrations = new Map<string, AdapterRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register an adapter for a dialect.
   *
   * @param dialect Dialect id (e.g. 'c-family', 'csharp')
   * @param extensions File extensions the adapter handles, with the dot
   */
  register(dialect: string, factory: AdapterFactory, extensions: string[]): void {
    this.registrations.set(dialect, { factory });

    for (const ext of extensions) {
      this.extensionMap.set(ext.toLowerCase(), dialect);
    }
  }

  getByDialect(dialect: string): SyntaxAdapter | null {
    const registration = this.registrations.get(dialect);
    if (!registration) return null;

    if (!registration.instance) {
      registration.instance = registration.factory();
    }
    return registration.instance;
  }

  dialectForExtension(extension: string): string | null {
    return this.extensionMap.get(extension.toLowerCase()) ?? null;
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys()).sort();
  }

  getRegisteredDialects(): string[] {
    return Array.from(this.registrations.keys()).sort();
  }

  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }
}
