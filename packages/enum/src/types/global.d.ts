/**
 * Global type declarations for enumkit runtime state.
 */
import type { CatalogedEnumeration } from './types.js';

/**
 * Enumerations of one catalog namespace, keyed by enumeration name.
 */
export type CatalogBag = Map<string, CatalogedEnumeration>;

/**
 * Process-wide catalog storage. The default bag serves production code;
 * named namespaces isolate tests or independently loaded plugins.
 */
export interface CatalogStore {
  defaultBag: CatalogBag;
  namespaces: Map<string, CatalogBag>;
}

declare global {
  /**
   * Enumeration catalog shared by every copy of this module loaded in the
   * process (for instance when a bundle includes it twice).
   */
  var __ENUMKIT_CATALOG__: CatalogStore | undefined;
}

export {};
