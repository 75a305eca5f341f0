/**
 * Custom error types for the reboot flow.
 */

/**
 * Thrown when the listing command cannot be started or exits with a non-zero status.
 */
export class BootListingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BootListingError';
  }
}

/**
 * Thrown when a `<DEST>` specifier or an action's entry id matches no boot entry.
 */
export class EntryNotFoundError extends Error {
  constructor(public readonly specifier: string) {
    super(`Could not find UEFI boot entry from specifier "${specifier}"`);
    this.name = 'EntryNotFoundError';
  }
}
