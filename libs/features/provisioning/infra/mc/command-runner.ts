import { spawn } from 'node:child_process';

export type CommandResult = Readonly<{
  exitCode: number;
  stdout: string;
  stderr: string;
}>;

export type CommandOptions = Readonly<{
  env?: Readonly<Record<string, string>>;
  timeoutMs?: number;
}>;

export interface CommandRunner {
  run(
    command: string,
    args: ReadonlyArray<string>,
    options?: CommandOptions,
  ): Promise<CommandResult>;
}

const MAX_CAPTURED_CHARS = 16_000;

function append(buffer: string, chunk: unknown): string {
  if (buffer.length >= MAX_CAPTURED_CHARS) return buffer;
  return (buffer + String(chunk)).slice(0, MAX_CAPTURED_CHARS);
}

/**
 * Runs a binary without a shell and captures its output. A non-zero exit is a result, not an
 * error; only a failure to start (or a timeout) rejects.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(
    command: string,
    args: ReadonlyArray<string>,
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (chunk: unknown) => {
        stdout = append(stdout, chunk);
      });
      child.stderr.on('data', (chunk: unknown) => {
        stderr = append(stderr, chunk);
      });

      const timer =
        options.timeoutMs !== undefined
          ? setTimeout(() => {
              child.kill('SIGKILL');
              const label = `${command} ${args[0] ?? ''}`;
              reject(new Error(`${label} timed out after ${options.timeoutMs}ms`));
            }, options.timeoutMs)
          : undefined;

      child.on('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });
      child.on('close', (code, signal) => {
        clearTimeout(timer);
        if (signal) {
          reject(new Error(`${command} ${args[0] ?? ''} exited with signal ${signal}`));
          return;
        }
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}
