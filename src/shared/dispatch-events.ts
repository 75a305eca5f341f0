/**
 * Dispatch Event Types
 *
 * Events emitted while applying a chosen action.
 * Used by the UI layer to render progress and failures.
 */
import type { ActionKind, BootEntry } from '../boot/types.js';

/**
 * Event emitted before the set-next command runs
 */
export interface SetNextStartEvent {
  type: 'set-next-start';
  entry: BootEntry;
  /** Zero-padded id passed to the command */
  bootNum: string;
}

export interface SetNextCompleteEvent {
  type: 'set-next-complete';
  entry: BootEntry;
}

/**
 * Event emitted when the set-next command could not be started or exited non-zero
 */
export interface SetNextFailedEvent {
  type: 'set-next-failed';
  entry: BootEntry;
  reason: 'launch' | 'exit';
  exitCode?: number;
  message: string;
}

export interface RebootStartEvent {
  type: 'reboot-start';
  entry: BootEntry;
}

/**
 * Event emitted when BootNext was set but the reboot command failed
 */
export interface RebootFailedEvent {
  type: 'reboot-failed';
  entry: BootEntry;
  reason: 'launch' | 'exit';
  exitCode?: number;
  message: string;
}

export type DispatchEvent =
  | SetNextStartEvent
  | SetNextCompleteEvent
  | SetNextFailedEvent
  | RebootStartEvent
  | RebootFailedEvent;

/**
 * Final result of a dispatch
 */
export type DispatchOutcome =
  | { status: 'idle' }
  | { status: 'done'; kind: ActionKind; entry: BootEntry }
  | { status: 'failed'; kind: ActionKind; message: string };
