/**
 * Subprocess Runner
 *
 * Spawns a program, waits for it to exit and reports the outcome as a value.
 * Output is not captured: stdio is handed to the child as given.
 *
 * The child stays in the caller's process group, so a terminal Ctrl-C reaches
 * it directly. Signals sent to this process alone (`kill <pid>`) are passed on
 * while the child runs.
 */

import { spawn, type ChildProcess, type StdioOptions } from 'child_process';
import { config } from '../config.js';
import type { ScriptResult } from '../types.js';
import { toErrorMessage } from '../utils/errors.js';

export type ForwardedSignal = 'SIGHUP' | 'SIGINT' | 'SIGTERM';

export const FORWARDED_SIGNALS: readonly ForwardedSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

const SIGNAL_NUMBERS: Record<ForwardedSignal, number> = { SIGHUP: 1, SIGINT: 2, SIGTERM: 15 };

export interface RunProcessOptions {
  stdio?: StdioOptions;
  /** Milliseconds before the child is stopped. 0 disables the timer. */
  timeout?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Signals passed on to the child while it runs. Default: FORWARDED_SIGNALS */
  forwardSignals?: readonly ForwardedSignal[];
}

/**
 * Send `signal` to the child, then SIGKILL if it is still running after the grace period
 */
function stopChild(proc: ChildProcess, signal: NodeJS.Signals): void {
  if (proc.exitCode !== null || proc.signalCode !== null) return;
  if (!proc.kill(signal)) return;

  const escalation = setTimeout(() => {
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill('SIGKILL');
    }
  }, config.killGracePeriodMs);
  escalation.unref();
}

/**
 * Conventional shell status for death by signal: 128 + signal number
 */
export function signalExitCode(signal: ForwardedSignal): number {
  return 128 + SIGNAL_NUMBERS[signal];
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}

/**
 * Run a command to completion.
 * Never rejects: spawn failures, timeouts, interrupts and non-zero exits come back in the result.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions = {}): Promise<ScriptResult> {
  const { stdio = 'inherit', timeout = 0, cwd, env = process.env, forwardSignals = FORWARDED_SIGNALS } = options;

  return new Promise((resolve) => {
    let timedOut = false;
    let interruptedBy: ForwardedSignal | null = null;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const proc = spawn(command, args, { stdio, cwd, env });

    const handlers = forwardSignals.map((signal) => {
      const handler = (): void => {
        interruptedBy ??= signal;
        stopChild(proc, signal);
      };
      process.on(signal, handler);
      return { signal, handler };
    });

    const finish = (result: ScriptResult): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      for (const { signal, handler } of handlers) {
        process.off(signal, handler);
      }
      resolve(result);
    };

    if (timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        stopChild(proc, 'SIGTERM');
      }, timeout);
    }

    proc.on('error', (err) => {
      finish({
        ok: false,
        exitCode: -1,
        errorType: 'spawn_error',
        errorMessage: `Failed to start '${command}': ${toErrorMessage(err)}`,
      });
    });

    proc.on('close', (code, signal) => {
      if (interruptedBy) {
        finish({
          ok: false,
          exitCode: signalExitCode(interruptedBy),
          errorType: 'interrupted',
          errorMessage: `Interrupted by ${interruptedBy}`,
        });
        return;
      }

      if (timedOut) {
        finish({
          ok: false,
          exitCode: code ?? -1,
          errorType: 'timeout',
          errorMessage: `Command timed out after ${timeout}ms`,
        });
        return;
      }

      if (code === 0) {
        finish({ ok: true, exitCode: 0, errorType: 'none', errorMessage: '' });
        return;
      }

      finish({
        ok: false,
        exitCode: code ?? -1,
        errorType: 'exit_error',
        errorMessage: signal ? `Terminated by ${signal}` : `Exit code ${code}`,
      });
    });
  });
}

/**
 * Exit status a caller should propagate for a failed step
 */
export function toExitStatus(result: ScriptResult): number {
  return result.exitCode > 0 ? result.exitCode : 1;
}
