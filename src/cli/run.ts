/**
 * Run Modes
 *
 * Decides what an invocation does from its flags and carries out the
 * flag-driven actions (`--next`, `--reboot-to`).
 */
import { lookupEntry } from '../boot/entry-matcher.js';
import type { ActionKind, BootCatalog } from '../boot/types.js';
import type { ActionDispatcher } from '../shared/action-dispatcher.js';
import { ConfigValidationError } from '../shared/config.js';
import type { DispatchOutcome } from '../shared/dispatch-events.js';
import { EntryNotFoundError } from '../shared/errors.js';

export interface RunFlags {
  list?: boolean;
  next?: string;
  rebootTo?: string;
}

export type RunMode =
  | { kind: 'list' }
  | { kind: 'direct'; action: ActionKind; dest: string }
  | { kind: 'interactive' };

/**
 * `--list` wins over `--reboot-to`, which wins over `--next`
 */
export function resolveRunMode(flags: RunFlags): RunMode {
  if (flags.list) {
    return { kind: 'list' };
  }
  if (flags.rebootTo !== undefined) {
    return { kind: 'direct', action: 'reboot-to', dest: flags.rebootTo };
  }
  if (flags.next !== undefined) {
    return { kind: 'direct', action: 'set-next', dest: flags.next };
  }
  return { kind: 'interactive' };
}

export type DirectRunResult = { exitCode: 0; outcome: DispatchOutcome } | { exitCode: 1; error: EntryNotFoundError };

/**
 * Resolve `<DEST>` and dispatch. Unresolved specifiers exit 1 without running anything;
 * once dispatched the exit code is 0 whatever the commands reported.
 */
export async function runDirectAction(
  catalog: BootCatalog,
  action: ActionKind,
  dest: string,
  dispatcher: ActionDispatcher,
): Promise<DirectRunResult> {
  const entry = lookupEntry(catalog, dest);
  if (!entry) {
    return { exitCode: 1, error: new EntryNotFoundError(dest) };
  }

  const outcome = await dispatcher.dispatch({ kind: action, entryId: entry.id }, catalog);
  return { exitCode: 0, outcome };
}

export interface FailureReport {
  message: string;
  /** Config key the failure points at, when known */
  field?: string;
}

/**
 * What the error block shows for a failure that stops the session
 */
export function describeFailure(error: unknown): FailureReport {
  if (error instanceof ConfigValidationError) {
    return { message: error.message, field: error.field };
  }

  return { message: error instanceof Error ? error.message : String(error) };
}
