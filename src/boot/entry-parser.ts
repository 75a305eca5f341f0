/**
 * Entry Parser
 *
 * Turns the free-form output of `efibootmgr` into a BootCatalog.
 * Two independent passes run over the same text: one for the `Key: value`
 * annotations and one for the `Boot0001* name\t...` entry lines.
 */
import type { BootCatalog, BootEntry } from './types.js';

const ANNOTATION_PATTERN = /^([a-zA-Z]+):\s+(.*)$/gm;
const ENTRY_PATTERN = /^[a-zA-Z]*([0-9]+)\*\s+(.*?)\t.*$/gm;

export const MAX_ENTRY_ID = 0xffff;

/**
 * Parse a decimal unsigned 16-bit integer. Returns undefined for anything else.
 */
export function parseEntryId(value: string): number | undefined {
  const match = value.replace(/\r$/, '').match(/^\+?([0-9]+)$/);
  if (!match) {
    return undefined;
  }

  const id = Number.parseInt(match[1], 10);
  return id <= MAX_ENTRY_ID ? id : undefined;
}

/**
 * Parse raw listing text. Never throws: unrecognised content is ignored.
 */
export function parseBootCatalog(raw: string): BootCatalog {
  let current: number | undefined;
  let next: number | undefined;

  for (const [, key, value] of raw.matchAll(ANNOTATION_PATTERN)) {
    // An unparseable value falls back to entry 1. Likely a latent bug upstream, kept for compatibility.
    if (key === 'BootCurrent') {
      current = parseEntryId(value) ?? 1;
    } else if (key === 'BootNext') {
      next = parseEntryId(value) ?? 1;
    }
  }

  const entries: BootEntry[] = [];
  for (const [, digits, name] of raw.matchAll(ENTRY_PATTERN)) {
    const id = parseEntryId(digits);
    if (id === undefined) {
      continue;
    }
    entries.push({ id, name });
  }

  return { entries, current, next };
}
