import { parseEntryId } from './entry-parser.js';
import type { BootCatalog, BootEntry } from './types.js';

/**
 * Resolve a `<DEST>` specifier.
 *
 * Numeric queries match ids only, anything else is a case-sensitive name prefix.
 * There is no fallback from one to the other.
 */
export function lookupEntry(catalog: BootCatalog, query: string): BootEntry | undefined {
  const id = parseEntryId(query);

  if (id !== undefined) {
    return catalog.entries.find((entry) => entry.id === id);
  }

  return catalog.entries.find((entry) => entry.name.startsWith(query));
}
