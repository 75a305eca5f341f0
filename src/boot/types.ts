/**
 * Boot Catalog Types
 *
 * Structured view of the firmware boot entries reported by the listing command.
 */

/**
 * A single UEFI boot entry (`Boot0007* ubuntu ...`)
 */
export interface BootEntry {
  /** Unsigned 16-bit entry number */
  id: number;
  name: string;
}

/**
 * Entries in listing order plus the `BootCurrent` / `BootNext` annotations.
 *
 * `current` and `next` may reference ids that have no entry.
 */
export interface BootCatalog {
  readonly entries: readonly BootEntry[];
  readonly current?: number;
  readonly next?: number;
}

export type ActionKind = 'reboot-to' | 'set-next';

/**
 * What the user picked, referencing the entry by id
 */
export type ChosenAction = { kind: 'none' } | { kind: ActionKind; entryId: number };

export const noAction: ChosenAction = { kind: 'none' };
