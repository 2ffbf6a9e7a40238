/**
 * Registry mapping file extensions to fact extractors.
 */

import type { Language } from '../core/facts/types.js';
import type { IFactExtractor } from './interface.types.js';

export type { IFactExtractor } from './interface.types.js';

/**
 * Factory function for creating extractors.
 * Used for lazy instantiation.
 */
export type ExtractorFactory = () => IFactExtractor;

interface ExtractorRegistration {
  factory: ExtractorFactory;
  extensions: string[];
  instance?: IFactExtractor;
}

/**
 * Registry for fact extractors.
 * Singleton pattern - one registry for the application.
 */
class ExtractorRegistry {
  private registrations = new Map<Language, ExtractorRegistration>();
  private extensionMap = new Map<string, Language>();

  /**
   * Register an extractor for a language and its file extensions.
   */
  register(language: Language, factory: ExtractorFactory, extensions: string[]): void {
    this.registrations.set(language, { factory, extensions });
    for (const ext of extensions) {
      this.extensionMap.set(ext.toLowerCase(), language);
    }
  }

  /**
   * Get the extractor for a file extension, or null if none is registered.
   */
  getForExtension(extension: string): IFactExtractor | null {
    const language = this.extensionMap.get(extension.toLowerCase());
    return language ? this.getByLanguage(language) : null;
  }

  /**
   * Get an extractor by language.
   * Creates the instance lazily if not already created.
   */
  getByLanguage(language: Language): IFactExtractor | null {
    const registration = this.registrations.get(language);
    if (!registration) {
      return null;
    }
    if (!registration.instance) {
      registration.instance = registration.factory();
    }
    return registration.instance;
  }

  isSupported(extension: string): boolean {
    return this.extensionMap.has(extension.toLowerCase());
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Dispose all extractor instances.
   */
  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.disposeAll();
    this.registrations.clear();
    this.extensionMap.clear();
  }
}

/**
 * Global extractor registry instance.
 */
export const extractorRegistry = new ExtractorRegistry();
