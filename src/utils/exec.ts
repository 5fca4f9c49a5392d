import { spawn, ChildProcess } from 'node:child_process';

export interface CommandOptions {
  timeoutMs: number;
  killGraceMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  // Raw stdout; binary-safe (screencap output is PNG)
  stdout: Buffer;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  // Set when the process could not be started at all
  spawnError?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions,
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const killGraceMs = options.killGraceMs ?? 2000;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child: ChildProcess = spawn(command, args, {
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    const timeoutHandle = setTimeout(() => {
      if (settled) return;
      timedOut = true;
      killProcessGroup(child, killGraceMs);
    }, options.timeoutMs);

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({
        stdout: Buffer.concat(stdoutChunks),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        exitCode: code,
        timedOut,
      });
    });

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({
        stdout: Buffer.concat(stdoutChunks),
        stderr: err.message,
        exitCode: null,
        timedOut: false,
        spawnError: err.message,
      });
    });
  });
}

function killProcessGroup(child: ChildProcess, graceMs: number): void {
  const pid = child.pid;
  if (!pid) return;

  // Negative pid targets the whole group (POSIX); plain kill is the fallback
  try {
    process.kill(-pid, 'SIGTERM');
  } catch {
    try {
      child.kill('SIGTERM');
    } catch {
      return;
    }
  }

  const graceTimeout = setTimeout(() => {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      try {
        child.kill('SIGKILL');
      } catch {
        // Already dead
      }
    }
  }, graceMs);

  child.on('close', () => clearTimeout(graceTimeout));
}
