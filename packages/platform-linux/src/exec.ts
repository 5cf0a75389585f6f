import { execFile } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { signal?: AbortSignal; timeoutMs?: number }
) => Promise<CommandResult>;

export class CommandError extends Error {
  readonly exitCode: number | string | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | string | null, stderr: string, cause: unknown) {
    super(message, { cause });
    this.name = 'CommandError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        signal: options.signal,
        timeout: options.timeoutMs ?? 0,
        maxBuffer: 16 * 1024 * 1024,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        if (error.name === 'AbortError') {
          reject(error);
          return;
        }
        const code = error.code ?? null;
        const details = stderr.trim() || error.message;
        reject(
          new CommandError(
            `${command} exited with ${code ?? 'error'}: ${details}`,
            code,
            stderr,
            error
          )
        );
      }
    );
  });

/** Whether `name` resolves on PATH. */
export const commandExists = async (name: string, run: CommandRunner = runCommand) => {
  try {
    await run('which', [name]);
    return true;
  } catch {
    return false;
  }
};

/** Whether a process with exactly this name is running. */
export const processRunning = async (name: string, run: CommandRunner = runCommand) => {
  try {
    await run('pgrep', ['-x', name]);
    return true;
  } catch {
    return false;
  }
};
