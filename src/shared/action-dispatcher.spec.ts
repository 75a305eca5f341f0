import { describe, expect, it } from 'vitest';

import type { BootCatalog } from '../boot/types.js';
import { ActionDispatcher } from './action-dispatcher.js';
import type { DispatchEvent } from './dispatch-events.js';
import { createFakeRunner, defaultTestBootToolConfig, exited, launchError } from './test-utils.js';

const catalog: BootCatalog = {
  entries: [
    { id: 0, name: 'Linux' },
    { id: 7, name: 'Windows Boot Manager' },
  ],
  current: 0,
};

const REBOOT_FAILED_MESSAGE =
  'Unable to reboot using shutdown command. BootNext has been set, ' +
  'either reboot manually or clear it with "efibootmgr --delete-bootnext"';

function createDispatcher(results: Parameters<typeof createFakeRunner>[0]) {
  const { runner, run } = createFakeRunner(results);
  const events: DispatchEvent[] = [];
  const dispatcher = new ActionDispatcher({
    runner,
    config: defaultTestBootToolConfig,
    onEvent: (event) => events.push(event),
  });
  return { dispatcher, run, events };
}

describe('ActionDispatcher', () => {
  describe('none', () => {
    it('runs nothing', async () => {
      const { dispatcher, run, events } = createDispatcher({ efibootmgr: exited(0), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'none' }, catalog);

      expect(outcome).toEqual({ status: 'idle' });
      expect(run).not.toHaveBeenCalled();
      expect(events).toEqual([]);
    });
  });

  describe('set-next', () => {
    it('passes the zero-padded id to efibootmgr', async () => {
      const { dispatcher, run, events } = createDispatcher({ efibootmgr: exited(0), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'set-next', entryId: 7 }, catalog);

      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith('efibootmgr', ['--bootnext', '0007']);
      expect(outcome).toEqual({ status: 'done', kind: 'set-next', entry: { id: 7, name: 'Windows Boot Manager' } });
      expect(events.map((e) => e.type)).toEqual(['set-next-start', 'set-next-complete']);
    });

    it('aborts when efibootmgr cannot be launched', async () => {
      const { dispatcher, events } = createDispatcher({ efibootmgr: launchError(), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'set-next', entryId: 0 }, catalog);

      expect(outcome).toEqual({
        status: 'failed',
        kind: 'set-next',
        message: 'Could not set boot target using efibootmgr, aborting...',
      });
      expect(events[1]).toMatchObject({ type: 'set-next-failed', reason: 'launch' });
    });

    it('reports the exit code of a failing efibootmgr', async () => {
      const { dispatcher, events } = createDispatcher({ efibootmgr: exited(5), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'set-next', entryId: 0 }, catalog);

      expect(outcome).toEqual({
        status: 'failed',
        kind: 'set-next',
        message: 'efibootmgr exited with non-zero status: 5',
      });
      expect(events[1]).toMatchObject({ type: 'set-next-failed', reason: 'exit', exitCode: 5 });
    });

    it('fails without running anything for an unknown entry id', async () => {
      const { dispatcher, run } = createDispatcher({ efibootmgr: exited(0), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'set-next', entryId: 42 }, catalog);

      expect(outcome).toEqual({
        status: 'failed',
        kind: 'set-next',
        message: 'Could not find UEFI boot entry from specifier "42"',
      });
      expect(run).not.toHaveBeenCalled();
    });
  });

  describe('reboot-to', () => {
    it('sets BootNext and then reboots', async () => {
      const { dispatcher, run, events } = createDispatcher({ efibootmgr: exited(0), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'reboot-to', entryId: 7 }, catalog);

      expect(run.mock.calls).toEqual([
        ['efibootmgr', ['--bootnext', '0007']],
        ['shutdown', ['-r', 'now']],
      ]);
      expect(outcome).toEqual({ status: 'done', kind: 'reboot-to', entry: { id: 7, name: 'Windows Boot Manager' } });
      expect(events.map((e) => e.type)).toEqual(['set-next-start', 'set-next-complete', 'reboot-start']);
    });

    it('does not reboot when efibootmgr exits non-zero', async () => {
      const { dispatcher, run } = createDispatcher({ efibootmgr: exited(1), shutdown: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'reboot-to', entryId: 7 }, catalog);

      expect(run).toHaveBeenCalledTimes(1);
      expect(run).not.toHaveBeenCalledWith('shutdown', expect.anything());
      expect(outcome).toMatchObject({ status: 'failed', kind: 'reboot-to' });
    });

    it('does not reboot when efibootmgr cannot be launched', async () => {
      const { dispatcher, run } = createDispatcher({ efibootmgr: launchError(), shutdown: exited(0) });

      await dispatcher.dispatch({ kind: 'reboot-to', entryId: 0 }, catalog);

      expect(run).toHaveBeenCalledTimes(1);
    });

    it('explains the partial state when shutdown exits non-zero', async () => {
      const { dispatcher, events } = createDispatcher({ efibootmgr: exited(0), shutdown: exited(1) });

      const outcome = await dispatcher.dispatch({ kind: 'reboot-to', entryId: 0 }, catalog);

      expect(outcome).toEqual({ status: 'failed', kind: 'reboot-to', message: REBOOT_FAILED_MESSAGE });
      expect(events.at(-1)).toEqual({
        type: 'reboot-failed',
        entry: { id: 0, name: 'Linux' },
        reason: 'exit',
        exitCode: 1,
        message: REBOOT_FAILED_MESSAGE,
      });
    });

    it('explains the partial state when shutdown cannot be launched', async () => {
      const { dispatcher, run, events } = createDispatcher({ efibootmgr: exited(0) });

      const outcome = await dispatcher.dispatch({ kind: 'reboot-to', entryId: 0 }, catalog);

      expect(run).toHaveBeenCalledTimes(2);
      expect(outcome).toEqual({ status: 'failed', kind: 'reboot-to', message: REBOOT_FAILED_MESSAGE });
      expect(events.at(-1)).toMatchObject({ type: 'reboot-failed', reason: 'launch' });
    });
  });

  it('works without an event listener', async () => {
    const { runner } = createFakeRunner({ efibootmgr: exited(0) });
    const dispatcher = new ActionDispatcher({ runner, config: defaultTestBootToolConfig });

    await expect(dispatcher.dispatch({ kind: 'set-next', entryId: 0 }, catalog)).resolves.toMatchObject({
      status: 'done',
    });
  });
});
