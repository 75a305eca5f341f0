/**
 * Action Dispatcher
 *
 * Applies a ChosenAction through the command runner. Every command runs at
 * most once; a failed set-next step stops the reboot from being attempted.
 */
import { findEntry } from '../boot/catalog.js';
import type { BootCatalog, BootEntry, ChosenAction } from '../boot/types.js';
import { commandName, formatEntryId, setNextArgs } from './boot-tool.js';
import type { CommandRunner } from './command-runner.js';
import type { BootToolConfig } from './config.js';
import type { DispatchEvent, DispatchOutcome } from './dispatch-events.js';
import { EntryNotFoundError } from './errors.js';

export interface DispatchDeps {
  runner: CommandRunner;
  config: BootToolConfig;
  onEvent?: (event: DispatchEvent) => void;
}

export class ActionDispatcher {
  #runner: CommandRunner;
  #config: BootToolConfig;
  #onEvent: (event: DispatchEvent) => void;

  constructor({ runner, config, onEvent }: DispatchDeps) {
    this.#runner = runner;
    this.#config = config;
    this.#onEvent = onEvent ?? (() => {});
  }

  async dispatch(action: ChosenAction, catalog: BootCatalog): Promise<DispatchOutcome> {
    if (action.kind === 'none') {
      return { status: 'idle' };
    }

    const entry = findEntry(catalog, action.entryId);
    if (!entry) {
      return { status: 'failed', kind: action.kind, message: new EntryNotFoundError(String(action.entryId)).message };
    }

    const setNextError = await this.#setNext(entry);
    if (setNextError) {
      return { status: 'failed', kind: action.kind, message: setNextError };
    }

    if (action.kind === 'set-next') {
      return { status: 'done', kind: 'set-next', entry };
    }

    const rebootError = await this.#reboot(entry);
    if (rebootError) {
      return { status: 'failed', kind: 'reboot-to', message: rebootError };
    }

    return { status: 'done', kind: 'reboot-to', entry };
  }

  /**
   * Returns the failure message, or undefined once BootNext is set
   */
  async #setNext(entry: BootEntry): Promise<string | undefined> {
    const tool = commandName(this.#config.setNext);
    this.#onEvent({ type: 'set-next-start', entry, bootNum: formatEntryId(entry.id) });

    const result = await this.#runner.run(this.#config.setNext.command, setNextArgs(this.#config, entry.id));

    if (result.kind === 'launch-error') {
      const message = `Could not set boot target using ${tool}, aborting...`;
      this.#onEvent({ type: 'set-next-failed', entry, reason: 'launch', message });
      return message;
    }

    if (result.exitCode !== 0) {
      const message = `${tool} exited with non-zero status: ${result.exitCode}`;
      this.#onEvent({ type: 'set-next-failed', entry, reason: 'exit', exitCode: result.exitCode, message });
      return message;
    }

    this.#onEvent({ type: 'set-next-complete', entry });
    return undefined;
  }

  async #reboot(entry: BootEntry): Promise<string | undefined> {
    this.#onEvent({ type: 'reboot-start', entry });

    const { command, args } = this.#config.reboot;
    const result = await this.#runner.run(command, args);

    if (result.kind === 'exited' && result.exitCode === 0) {
      return undefined;
    }

    const message =
      `Unable to reboot using ${commandName(this.#config.reboot)} command. BootNext has been set, ` +
      `either reboot manually or clear it with "${commandName(this.#config.setNext)} --delete-bootnext"`;

    this.#onEvent({
      type: 'reboot-failed',
      entry,
      reason: result.kind === 'launch-error' ? 'launch' : 'exit',
      exitCode: result.kind === 'exited' ? result.exitCode : undefined,
      message,
    });
    return message;
  }
}
