/**
 * Command Runner
 *
 * The single boundary to external processes (`efibootmgr`, `shutdown`).
 * Callers get either an exit status or a launch error, never a rejection.
 */
import { execFile } from 'child_process';

export type CommandResult =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'launch-error'; message: string };

export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR']);

/**
 * Runs commands with `execFile`, capturing their output
 */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve) => {
      execFile(command, [...args], { maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ kind: 'exited', exitCode: 0, stdout, stderr });
          return;
        }

        // Node reports spawn failures as a string errno code, exit statuses as a number
        if (typeof error.code === 'string' && LAUNCH_ERROR_CODES.has(error.code)) {
          resolve({ kind: 'launch-error', message: error.message });
          return;
        }

        resolve({
          kind: 'exited',
          exitCode: typeof error.code === 'number' ? error.code : -1,
          stdout,
          stderr,
        });
      });
    });
  }
}
