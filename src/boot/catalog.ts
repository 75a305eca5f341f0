import type { BootCatalog, BootEntry } from './types.js';

/**
 * Row label for the selection list: `nxt: ` wins over `cur: `, otherwise five spaces.
 */
export function getEntryLabel(catalog: BootCatalog, entry: BootEntry): string {
  if (catalog.next === entry.id) {
    return `nxt: ${entry.name}`;
  }
  if (catalog.current === entry.id) {
    return `cur: ${entry.name}`;
  }
  return `     ${entry.name}`;
}

export function getEntryLabels(catalog: BootCatalog): string[] {
  return catalog.entries.map((entry) => getEntryLabel(catalog, entry));
}

/**
 * Lines printed by `--list`
 */
export function formatEntryList(catalog: BootCatalog): string[] {
  return catalog.entries.map((entry) => `${entry.id} \t ${entry.name}`);
}

/**
 * Full `--list` output, written to stdout as-is so long names are never wrapped
 */
export function formatEntryListOutput(catalog: BootCatalog): string {
  const lines = formatEntryList(catalog);
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function findEntry(catalog: BootCatalog, id: number): BootEntry | undefined {
  return catalog.entries.find((entry) => entry.id === id);
}
