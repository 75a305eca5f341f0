/**
 * Test Utilities
 *
 * Shared listing fixtures and fakes for unit tests.
 */
import { vi } from 'vitest';

import type { BootToolConfig } from './config.js';
import type { CommandResult, CommandRunner } from './command-runner.js';

/**
 * Listing in the shape printed by `efibootmgr` without arguments
 */
export const sampleListing = [
  'BootCurrent: 0000',
  'BootNext: 0002',
  'Timeout: 1 seconds',
  'BootOrder: 0000,0001,0002',
  'Boot0000* Linux\tHD(1,GPT,aaaa-bbbb,0x800,0x100000)/File(\\EFI\\linux\\grubx64.efi)',
  'Boot0001* Windows Boot Manager\tHD(2,GPT,cccc-dddd,0x100800,0x32000)/File(\\EFI\\Microsoft\\Boot\\bootmgfw.efi)',
  'Boot0002* Linux\tHD(3,GPT,eeee-ffff,0x132800,0x100000)/File(\\EFI\\linux\\shimx64.efi)',
  '',
].join('\n');

/**
 * Default boot tool commands used across tests
 */
export const defaultTestBootToolConfig: BootToolConfig = {
  list: { command: 'efibootmgr', args: [] },
  setNext: { command: 'efibootmgr', args: ['--bootnext'] },
  reboot: { command: 'shutdown', args: ['-r', 'now'] },
};

export function exited(exitCode: number, stdout: string = ''): CommandResult {
  return { kind: 'exited', exitCode, stdout, stderr: '' };
}

export function launchError(message: string = 'spawn efibootmgr ENOENT'): CommandResult {
  return { kind: 'launch-error', message };
}

/**
 * Create a fake command runner answering each command name with a fixed result
 *
 * @example
 * const runner = createFakeRunner({ efibootmgr: exited(0), shutdown: exited(1) });
 */
export function createFakeRunner(results: Record<string, CommandResult>) {
  const run = vi.fn(async (command: string, _args: readonly string[]): Promise<CommandResult> => {
    return results[command] ?? launchError(`spawn ${command} ENOENT`);
  });
  const runner: CommandRunner = { run };
  return { runner, run };
}
