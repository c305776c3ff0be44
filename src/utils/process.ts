/**
 * Child process helpers
 * Argument arrays only; nothing here goes through a shell
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';

// Exit status reported when a command is killed by its timeout (matches coreutils `timeout`)
export const TIMEOUT_EXIT_CODE = 124;

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  maxBuffer?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

function spawnErrorMessage(cmd: string, error: NodeJS.ErrnoException): string {
  if (error.code === 'ENOENT') {
    return `not found: ${cmd}`;
  }
  if (error.code === 'EACCES') {
    return `not executable: ${cmd}`;
  }
  return error.message || String(error);
}

// Process groups of commands still running, so a signal handler can take them down
const activeGroups = new Set<number>();

/**
 * SIGKILL a whole process group, falling back to the single pid when the
 * group is already gone
 */
export function killProcessGroup(pid: number): void {
  try {
    process.kill(-pid, 'SIGKILL');
    return;
  } catch (error) {
    if (!isNoSuchProcess(error)) throw error;
  }
  try {
    process.kill(pid, 'SIGKILL');
  } catch (error) {
    if (!isNoSuchProcess(error)) throw error;
  }
}

/**
 * Kill every command started by runCommand that has not exited yet
 */
export function killActiveCommands(): void {
  for (const pid of activeGroups) {
    killProcessGroup(pid);
  }
  activeGroups.clear();
}

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/**
 * Run a command to completion and capture its output.
 * Resolves for any exit status; rejects only when the process cannot be started.
 *
 * Each command leads its own process group. On timeout the whole group is
 * killed and the result settles as soon as the command exits, even if a
 * descendant that escaped the group still holds the output pipes.
 */
export function runCommand(
  cmd: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  const maxBuffer = options.maxBuffer ?? DEFAULT_MAX_BUFFER;

  return new Promise((resolve, reject) => {
    const start = performance.now();
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let stdoutLength = 0;
    let stderrLength = 0;
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
    const pid = child.pid;
    if (pid !== undefined) {
      activeGroups.add(pid);
    }

    const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (pid !== undefined) {
        activeGroups.delete(pid);
      }

      let exitCode = code ?? 1;
      if (timedOut) {
        exitCode = TIMEOUT_EXIT_CODE;
      } else if (code === null && signal) {
        exitCode = 128 + signalNumber(signal);
      }

      resolve({
        exitCode,
        stdout: Buffer.concat(stdoutChunks),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        durationMs: performance.now() - start,
        timedOut,
      });
    };

    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        if (pid !== undefined) {
          killProcessGroup(pid);
        } else {
          child.kill('SIGKILL');
        }
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      // Keep the head of oversized output rather than growing without bound
      if (stdoutLength < maxBuffer) {
        stdoutChunks.push(chunk);
        stdoutLength += chunk.length;
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      if (stderrLength < maxBuffer) {
        stderrChunks.push(chunk);
        stderrLength += chunk.length;
      }
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (pid !== undefined) {
        activeGroups.delete(pid);
      }
      reject(new Error(spawnErrorMessage(cmd, error)));
    });

    child.on('exit', (code, signal) => {
      if (!timedOut) return;
      // Orphans outside the group may keep the pipes open; stop reading them
      child.stdout.destroy();
      child.stderr.destroy();
      finish(code, signal);
    });

    child.on('close', finish);
  });
}

function signalNumber(signal: NodeJS.Signals): number {
  const table: Partial<Record<NodeJS.Signals, number>> = {
    SIGHUP: 1,
    SIGINT: 2,
    SIGQUIT: 3,
    SIGABRT: 6,
    SIGKILL: 9,
    SIGSEGV: 11,
    SIGPIPE: 13,
    SIGTERM: 15,
  };
  return table[signal] ?? 0;
}

/**
 * Locate an executable on PATH without spawning a shell
 */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (name.includes(path.sep)) {
    return isExecutableFile(name) ? name : null;
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(d => d.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function isExecutableFile(filePath: string): boolean {
  try {
    const stats = fs.statSync(filePath);
    if (!stats.isFile()) return false;
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * First non-empty line a command prints for its version flag, or null
 */
export async function commandVersion(cmd: string, args: string[] = ['--version']): Promise<string | null> {
  try {
    const result = await runCommand(cmd, args, { timeoutMs: 10_000 });
    if (result.exitCode !== 0) return null;
    const text = `${result.stdout.toString('utf-8')}\n${result.stderr}`;
    const line = text.split('\n').map(l => l.trim()).find(l => l.length > 0);
    return line ?? null;
  } catch {
    return null;
  }
}
