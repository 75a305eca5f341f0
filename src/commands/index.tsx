import { Box, Text, useStderr, useStdin, useStdout } from 'ink';
import Spinner from 'ink-spinner';
import { option } from 'pastel';
import React, { useCallback, useEffect, useRef, useState } from 'react';
import { z } from 'zod';

import { formatEntryListOutput } from '../boot/catalog.js';
import type { BootCatalog, ChosenAction } from '../boot/types.js';
import { loadConfigFile } from '../cli/config.js';
import { describeFailure, resolveRunMode, runDirectAction } from '../cli/run.js';
import { BootEntryList } from '../selection/BootEntryList.js';
import { ActionDispatcher } from '../shared/action-dispatcher.js';
import { loadBootCatalog } from '../shared/boot-tool.js';
import { ProcessCommandRunner } from '../shared/command-runner.js';
import type { DispatchEvent, DispatchOutcome } from '../shared/dispatch-events.js';

export const options = z.object({
  list: z
    .boolean()
    .default(false)
    .describe(option({ description: 'Output a list of boot entries and their IDs', alias: 'l' })),
  next: z
    .string()
    .optional()
    .describe(
      option({ description: 'Set the entry specified by <DEST> as the next (one-time) boot target', alias: 'n' }),
    ),
  rebootTo: z
    .string()
    .optional()
    .describe(option({ description: 'Reboot directly to the entry specified by <DEST>', alias: 'r' })),
  config: z
    .string()
    .optional()
    .describe(option({ description: 'Path to reboot-to.yaml config file', alias: 'c' })),
});

type Props = {
  options: z.infer<typeof options>;
};

/**
 * Current session state for UI rendering
 */
interface SessionState {
  phase: 'loading' | 'list' | 'selecting' | 'dispatching' | 'complete' | 'error';
  catalog?: BootCatalog;
  dispatcher?: ActionDispatcher;
  events: DispatchEvent[];
  outcome?: DispatchOutcome;
  errorMessage?: string;
  errorField?: string;
}

type SetSessionState = React.Dispatch<React.SetStateAction<SessionState>>;

const runner = new ProcessCommandRunner();

function exitWith(code: number): void {
  setTimeout(() => {
    process.exit(code);
  }, 1);
}

export default function Index({ options: opts }: Props) {
  const { isRawModeSupported } = useStdin();
  const { write: writeStderr } = useStderr();
  const { write: writeStdout } = useStdout();
  const [state, setState] = useState<SessionState>({ phase: 'loading', events: [] });
  const started = useRef(false);

  const handleEvent = useCallback((event: DispatchEvent) => {
    setState((prev) => ({ ...prev, events: [...prev.events, event] }));
  }, []);

  useEffect(() => {
    // The listing and any dispatch must run once per invocation
    if (started.current) {
      return;
    }
    started.current = true;
    void startSession(opts, {
      interactive: isRawModeSupported,
      onEvent: handleEvent,
      setState,
      writeStdout,
      writeStderr,
    });
  }, [opts, isRawModeSupported, handleEvent, writeStdout, writeStderr]);

  const { catalog, dispatcher } = state;

  const handleSelection = useCallback(
    (action: ChosenAction) => {
      if (!catalog || !dispatcher) {
        return;
      }
      void applySelection(action, catalog, dispatcher, setState);
    },
    [catalog, dispatcher],
  );

  return (
    <Box flexDirection="column">
      {state.phase === 'loading' && (
        <Text color="yellow">
          <Spinner type="dots" /> Reading boot entries...
        </Text>
      )}

      {state.phase === 'selecting' && catalog && <BootEntryList catalog={catalog} onComplete={handleSelection} />}

      {state.events.length > 0 && <DispatchLog events={state.events} />}

      {state.phase === 'dispatching' && state.events.length === 0 && (
        <Text color="yellow">
          <Spinner type="dots" /> Applying selection...
        </Text>
      )}

      {state.outcome?.status === 'failed' && state.events.length === 0 && (
        <Text color="red">x {state.outcome.message}</Text>
      )}

      {state.phase === 'error' && (
        <Box flexDirection="column">
          <Text color="red" bold>
            Error
          </Text>
          <Text color="red">{state.errorMessage}</Text>
          {state.errorField && <Text dimColor>Config key: {state.errorField}</Text>}
        </Box>
      )}
    </Box>
  );
}

/**
 * Renders the progress of set-next / reboot
 */
function DispatchLog({ events }: { events: DispatchEvent[] }) {
  return (
    <Box flexDirection="column">
      {events.map((event, index) => (
        <DispatchEventLine key={index} event={event} />
      ))}
    </Box>
  );
}

function DispatchEventLine({ event }: { event: DispatchEvent }) {
  switch (event.type) {
    case 'set-next-start':
      return (
        <Text dimColor>
          - Setting BootNext to {event.bootNum} ({event.entry.name})
        </Text>
      );
    case 'set-next-complete':
      return <Text color="green">+ {event.entry.name} will be used for the next boot</Text>;
    case 'reboot-start':
      return <Text color="yellow">- Rebooting into {event.entry.name}...</Text>;
    case 'set-next-failed':
    case 'reboot-failed':
      return <Text color="red">x {event.message}</Text>;
  }
}

async function startSession(
  opts: z.infer<typeof options>,
  ctx: {
    interactive: boolean;
    onEvent: (event: DispatchEvent) => void;
    setState: SetSessionState;
    writeStdout: (data: string) => void;
    writeStderr: (data: string) => void;
  },
): Promise<void> {
  const { setState } = ctx;

  try {
    const config = await loadConfigFile(opts.config);
    const catalog = await loadBootCatalog(runner, config.commands);
    const dispatcher = new ActionDispatcher({ runner, config: config.commands, onEvent: ctx.onEvent });

    const mode = resolveRunMode(opts);

    if (mode.kind === 'list') {
      // Bypasses Ink rendering, which would wrap long names at the terminal width
      ctx.writeStdout(formatEntryListOutput(catalog));
      setState((prev) => ({ ...prev, phase: 'list', catalog }));
      exitWith(0);
      return;
    }

    if (mode.kind === 'direct') {
      setState((prev) => ({ ...prev, phase: 'dispatching', catalog }));

      const result = await runDirectAction(catalog, mode.action, mode.dest, dispatcher);
      if (result.exitCode === 1) {
        ctx.writeStderr(`${result.error.message}\n`);
        setState((prev) => ({ ...prev, phase: 'complete' }));
        exitWith(1);
        return;
      }

      setState((prev) => ({ ...prev, phase: 'complete', outcome: result.outcome }));
      exitWith(0);
      return;
    }

    if (!ctx.interactive) {
      setState((prev) => ({
        ...prev,
        phase: 'error',
        errorMessage: 'Interactive selection needs a terminal. Use --list, --next or --reboot-to instead.',
      }));
      exitWith(1);
      return;
    }

    setState((prev) => ({ ...prev, phase: 'selecting', catalog, dispatcher }));
  } catch (error) {
    const { message, field } = describeFailure(error);
    setState((prev) => ({ ...prev, phase: 'error', errorMessage: message, errorField: field }));
    exitWith(1);
  }
}

/**
 * Runs after the list has unmounted, so output lands on the normal screen
 */
async function applySelection(
  action: ChosenAction,
  catalog: BootCatalog,
  dispatcher: ActionDispatcher,
  setState: SetSessionState,
): Promise<void> {
  setState((prev) => ({ ...prev, phase: 'dispatching' }));

  try {
    const outcome = await dispatcher.dispatch(action, catalog);
    setState((prev) => ({ ...prev, phase: 'complete', outcome }));
  } catch (error) {
    const { message } = describeFailure(error);
    setState((prev) => ({ ...prev, phase: 'error', errorMessage: message }));
  }

  // The interactive session always exits 0, whatever was chosen
  exitWith(0);
}
