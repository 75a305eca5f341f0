/**
 * Selection State Machine
 *
 * Pure transitions for the interactive boot entry list. The Ink component
 * feeds decoded keypresses through `reduceSelection` and reacts once the
 * status leaves `running`.
 */
import { type ActionKind, type BootCatalog, type ChosenAction, noAction } from '../boot/types.js';
import type { Keypress } from './keypress.js';

export type SelectionStatus = 'running' | 'quit' | 'acted';

export interface SelectionState {
  selectedIndex: number;
  action: ChosenAction;
  status: SelectionStatus;
}

export const initialSelectionState: SelectionState = {
  selectedIndex: 0,
  action: noAction,
  status: 'running',
};

function lastIndex(entryCount: number): number {
  return Math.max(entryCount - 1, 0);
}

function choose(state: SelectionState, catalog: BootCatalog, kind: ActionKind): SelectionState {
  const entry = catalog.entries[state.selectedIndex];

  // Acting on an empty list still ends the session, with no action
  return {
    ...state,
    action: entry ? { kind, entryId: entry.id } : state.action,
    status: 'acted',
  };
}

export function reduceSelection(state: SelectionState, key: Keypress, catalog: BootCatalog): SelectionState {
  if (state.status !== 'running') {
    return state;
  }

  const entryCount = catalog.entries.length;

  if (key.type === 'char') {
    switch (key.char) {
      case 'q':
        return { ...state, status: 'quit' };
      case 'n':
        return choose(state, catalog, 'set-next');
      default:
        return state;
    }
  }

  if (key.type !== 'named') {
    return state;
  }

  switch (key.name) {
    case 'escape':
    case 'ctrl-c':
      return { ...state, status: 'quit' };
    case 'down':
      return {
        ...state,
        selectedIndex: state.selectedIndex >= lastIndex(entryCount) ? 0 : state.selectedIndex + 1,
      };
    case 'up':
      return {
        ...state,
        selectedIndex: state.selectedIndex <= 0 ? lastIndex(entryCount) : state.selectedIndex - 1,
      };
    case 'home':
      return { ...state, selectedIndex: 0 };
    case 'end':
      return { ...state, selectedIndex: lastIndex(entryCount) };
    case 'enter':
      return choose(state, catalog, 'reboot-to');
  }
}
