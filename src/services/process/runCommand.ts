import { spawn } from 'node:child_process';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], options?: RunCommandOptions) => Promise<CommandResult>;

export class CommandError extends Error {
  public constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly timedOut = false
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

const describeFailure = (command: string, code: number | null, stderr: string): string => {
  const detail = stderr.trim();
  return `Command failed (${code ?? 'signal'}): ${command}${detail ? `\n${detail}` : ''}`;
};

/** Runs a short-lived command to completion. Non-zero exits and timeouts reject with `CommandError`. */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, env: options.env, stdio: 'pipe' });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const settle = (error?: Error): void => {
      if (settled) {
        return;
      }

      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }

      if (error) {
        reject(error);
        return;
      }

      resolve({ stdout, stderr });
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        settle(new CommandError(`Command timed out after ${timeoutMs}ms: ${command}`, command, null, stderr, true));
      }, timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      settle(error);
    });

    child.on('close', (code) => {
      settle(code === 0 ? undefined : new CommandError(describeFailure(command, code, stderr), command, code, stderr));
    });

    // A command that exits before reading its input closes the pipe; the exit code decides the outcome.
    child.stdin.on('error', () => {
      child.stdin.destroy();
    });

    if (options.stdin !== undefined) {
      child.stdin.end(options.stdin);
    } else {
      child.stdin.end();
    }
  });
