/**
 * Process Runner
 *
 * Spawns one external program without a shell, collects its output and
 * kills it once the time limit passes.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { describeError } from '../types/errors.js';
import { loggers } from '../utils/logger.js';

const logger = loggers.converter;

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Rejects only when the program cannot be started (the spawn error, with
 * its errno code). Nonzero exits and timeouts resolve.
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: RunOptions,
) => Promise<ProcessResult>;

const isWindows = process.platform === 'win32';

/**
 * Kill the program and everything it started. Wrappers such as the
 * `soffice` launcher fork children that inherit the output pipes.
 */
function killTree(child: ChildProcess): void {
  if (!isWindows && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      logger.debug('Process group kill failed, killing the child only', { pid: child.pid, error: describeError(error) });
    }
  }
  child.kill('SIGKILL');
}

export const spawnProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
      // own process group, so the timeout can take down the whole tree
      detached: !isWindows,
      cwd: options.cwd,
      env: options.env,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    // Settles here rather than on 'close': orphaned grandchildren can hold
    // the pipes open long after the kill.
    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      killTree(child);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ exitCode: null, signal: 'SIGKILL', stdout, stderr, timedOut: true });
    }, options.timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(err);
    });

    child.on('close', (code, signal) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, signal, stdout, stderr, timedOut: false });
    });
  });
