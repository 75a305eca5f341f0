/**
 * Terminal Session Hooks
 *
 * Scoped acquisition of the alternate screen and raw-mode keyboard input.
 * Both are released in effect cleanups, so unmounting the list restores the
 * terminal whether the user chose an entry, quit, or rendering threw.
 */
import { useStdin, useStdout } from 'ink';
import { useEffect } from 'react';

import { type Keypress, decodeKeypresses } from './keypress.js';

const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\x1b[?1049l';

/**
 * Switch to the alternate screen while mounted and active. No-op when stdout is not a terminal.
 */
export function useAlternateScreen({ isActive = true }: { isActive?: boolean } = {}): void {
  const { stdout } = useStdout();

  useEffect(() => {
    if (!isActive || !stdout.isTTY) {
      return;
    }

    stdout.write(ENTER_ALTERNATE_SCREEN);
    return () => {
      stdout.write(LEAVE_ALTERNATE_SCREEN);
    };
  }, [isActive, stdout]);
}

/**
 * Like Ink's `useInput`, but hands over decoded keypresses including Home/End.
 */
export function useKeypress(handler: (key: Keypress) => void, { isActive = true }: { isActive?: boolean } = {}): void {
  const { setRawMode, internal_eventEmitter: eventEmitter } = useStdin();

  useEffect(() => {
    if (!isActive) {
      return;
    }

    setRawMode(true);
    return () => {
      setRawMode(false);
    };
  }, [isActive, setRawMode]);

  useEffect(() => {
    if (!isActive) {
      return;
    }

    const handleData = (data: string) => {
      for (const key of decodeKeypresses(data)) {
        handler(key);
      }
    };

    eventEmitter.on('input', handleData);
    return () => {
      eventEmitter.removeListener('input', handleData);
    };
  }, [isActive, handler, eventEmitter]);
}
