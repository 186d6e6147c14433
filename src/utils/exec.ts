import { execFile } from 'child_process';
import { CommandFailure } from '../types';

export interface RunOptions {
  timeout?: number;
  maxBuffer?: number;
}

/**
 * Runs `file` with `args` without a host shell and resolves its stdout. The event loop
 * stays free while the process runs.
 */
export function runCommand(file: string, args: string[], options: RunOptions = {}): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        encoding: 'buffer',
        timeout: options.timeout,
        maxBuffer: options.maxBuffer,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error) {
          const status = typeof error.code === 'number' ? error.code : null;
          reject(new CommandFailure(error.message, status, stdout, stderr));
          return;
        }
        resolve(stdout);
      }
    );
  });
}
