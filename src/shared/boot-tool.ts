/**
 * Boot Tool
 *
 * Argument building and catalog loading on top of the configured
 * `efibootmgr` / `shutdown` commands.
 */
import path from 'path';

import { parseBootCatalog } from '../boot/entry-parser.js';
import type { BootCatalog } from '../boot/types.js';
import type { CommandRunner } from './command-runner.js';
import type { BootToolConfig, CommandConfig } from './config.js';
import { BootListingError } from './errors.js';

/**
 * Four-digit zero-padded decimal, the form `--bootnext` expects
 */
export function formatEntryId(id: number): string {
  return String(id).padStart(4, '0');
}

export function setNextArgs(config: BootToolConfig, id: number): string[] {
  return [...config.setNext.args, formatEntryId(id)];
}

/**
 * Short command name for user-facing messages (`/usr/sbin/efibootmgr` → `efibootmgr`)
 */
export function commandName(command: CommandConfig): string {
  return path.basename(command.command);
}

/**
 * Run the listing command and parse its output
 */
export async function loadBootCatalog(runner: CommandRunner, config: BootToolConfig): Promise<BootCatalog> {
  const { command, args } = config.list;
  const result = await runner.run(command, args);

  if (result.kind === 'launch-error') {
    throw new BootListingError(`Could not run ${commandName(config.list)}: ${result.message}`);
  }

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new BootListingError(
      `${commandName(config.list)} exited with non-zero status: ${result.exitCode}${detail ? `\n${detail}` : ''}`,
    );
  }

  return parseBootCatalog(result.stdout);
}
