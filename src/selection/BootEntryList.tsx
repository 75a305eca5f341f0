import { Box, Text } from 'ink';
import React, { useCallback, useEffect, useRef, useState } from 'react';

import { getEntryLabels } from '../boot/catalog.js';
import type { BootCatalog, ChosenAction } from '../boot/types.js';
import type { Keypress } from './keypress.js';
import { initialSelectionState, reduceSelection } from './selection-state.js';
import { useAlternateScreen, useKeypress } from './use-terminal-session.js';

interface BootEntryListProps {
  catalog: BootCatalog;
  /** Called once, when the user quits (`none`) or picks an action */
  onComplete: (action: ChosenAction) => void;
}

/**
 * Interactive boot entry list
 */
export function BootEntryList({ catalog, onComplete }: BootEntryListProps) {
  const [state, setState] = useState(initialSelectionState);
  const completed = useRef(false);

  const handleKeypress = useCallback(
    (key: Keypress) => {
      setState((prev) => reduceSelection(prev, key, catalog));
    },
    [catalog],
  );

  // Both are released as soon as the session ends, before the parent unmounts the list
  const isRunning = state.status === 'running';
  useAlternateScreen({ isActive: isRunning });
  useKeypress(handleKeypress, { isActive: isRunning });

  useEffect(() => {
    if (state.status === 'running' || completed.current) {
      return;
    }
    completed.current = true;
    onComplete(state.action);
  }, [state, onComplete]);

  const labels = getEntryLabels(catalog);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Box justifyContent="center">
        <Text bold color="gray">
          {' Boot entries '}
        </Text>
      </Box>

      {labels.length === 0 && <Text dimColor>No boot entries found</Text>}

      {labels.map((label, index) => (
        <Text key={index} color="gray" inverse={index === state.selectedIndex}>
          {label}
        </Text>
      ))}

      <Box justifyContent="center" marginTop={1}>
        <KeyHint keys="Up/Down" action="Select" />
        <KeyHint keys="Enter" action="Reboot" />
        <KeyHint keys="n" action="Set next" />
        <KeyHint keys="Esc/q" action="Quit" />
      </Box>
    </Box>
  );
}

function KeyHint({ keys, action }: { keys: string; action: string }) {
  return (
    <Text>
      {' '}
      <Text backgroundColor="gray" color="black" bold>
        {keys}
      </Text>{' '}
      {action}
    </Text>
  );
}
