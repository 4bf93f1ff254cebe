import { spawn } from 'node:child_process';
import type { Writable } from 'node:stream';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('process-runner');

/** Keep the tail of stderr only; scanners can be chatty. */
const STDERR_LIMIT = 4096;
/** Grace period between SIGTERM and SIGKILL. */
const KILL_GRACE_MS = 5000;

export class ProcessLaunchError extends Error {
  constructor(
    public readonly command: string,
    cause: unknown,
  ) {
    super(`Failed to launch "${command}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ProcessLaunchError';
  }
}

export type Termination = 'timeout' | 'aborted';

export interface ProcessResult {
  /** null when the process was ended by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the runner itself killed the process */
  terminatedBy: Termination | null;
  stderr: string;
  durationMs: number;
}

export interface RunProcessOptions {
  /** Full environment of the child; the parent's is inherited when omitted */
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Receives the child's stdout as it is produced */
  stdout?: Writable;
  signal?: AbortSignal;
}

/**
 * Run a command to completion. Resolves with the exit status whatever it is;
 * rejects only with ProcessLaunchError when the command could not be started.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {},
): Promise<ProcessResult> {
  const startedAt = Date.now();

  return new Promise<ProcessResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new ProcessLaunchError(command, new Error('aborted before start')));
      return;
    }

    const child = spawn(command, [...args], {
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let settled = false;
    let spawned = false;
    let terminatedBy: Termination | null = null;
    let stderr = '';
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (reason: Termination) => {
      if (terminatedBy) return;
      terminatedBy = reason;
      log.warn({ command, pid: child.pid, reason }, 'Terminating child process');
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    };
    const onAbort = () => terminate('aborted');

    const cleanup = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    // Concurrent runs share one destination; no pipe() listeners on it
    const out = options.stdout;
    if (out) {
      child.stdout?.on('data', (chunk: Buffer) => out.write(chunk));
    } else {
      child.stdout?.resume();
    }
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_LIMIT);
    });

    child.once('spawn', () => {
      spawned = true;
      if (options.timeoutMs) {
        timer = setTimeout(() => terminate('timeout'), options.timeoutMs);
      }
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });

    child.once('error', (err) => {
      if (settled) return;
      if (!spawned) {
        cleanup();
        reject(new ProcessLaunchError(command, err));
        return;
      }
      log.warn({ command, err }, 'Child process error');
    });

    child.once('close', (code, signal) => {
      if (settled) return;
      cleanup();
      resolve({
        exitCode: code,
        signal,
        terminatedBy,
        stderr: stderr.trim(),
        durationMs: Date.now() - startedAt,
      });
    });
  });
}
