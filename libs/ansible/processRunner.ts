import { spawn } from 'child_process';
import os from 'os';
import { logger } from '../logging/logger.js';
import { ExecutionError } from './errors.js';
import type { CommandSpec, ExecutionResult } from './types.js';

export interface RunOptions {
    timeoutSeconds: number;
    /** Extra environment for the child, merged over process.env */
    env?: NodeJS.ProcessEnv;
    /** Delay between SIGTERM and SIGKILL once the timeout fires */
    killGraceMs?: number;
}

export type CommandRunner = (spec: CommandSpec, options: RunOptions) => Promise<ExecutionResult>;

const DEFAULT_KILL_GRACE_MS = 5000;

// Longest delay setTimeout honours; larger values fire after 1 ms
export const MAX_TIMER_MS = 2 ** 31 - 1;

// Plain console output keeps the recap parseable
const NO_COLOR_ENV: NodeJS.ProcessEnv = {
    ANSIBLE_NOCOLOR: '1',
    ANSIBLE_FORCE_COLOR: '0'
};

/**
 * Runs the command once, without a shell, and captures its output as text.
 *
 * Resolves for every process that ran to completion, whatever its exit
 * code. Rejects with ExecutionError when the binary is missing or not
 * executable, or when the timeout elapses; in the latter case the child
 * is killed and reaped first.
 */
export const runCommand: CommandRunner = (spec, options) => {
    const timeoutMs = Math.min(MAX_TIMER_MS, Math.max(0, options.timeoutSeconds * 1000));
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    return new Promise<ExecutionResult>((resolve, reject) => {
        const child = spawn(spec.binary, [...spec.args], {
            env: { ...process.env, ...NO_COLOR_ENV, ...options.env },
            stdio: ['ignore', 'pipe', 'pipe'],
            shell: false
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let settled = false;
        let timedOut = false;
        let exited = false;
        let killTimer: NodeJS.Timeout | undefined;

        const collected = () => ({
            stdout: Buffer.concat(stdout).toString('utf-8'),
            stderr: Buffer.concat(stderr).toString('utf-8')
        });

        const settle = (action: () => void) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            if (killTimer) clearTimeout(killTimer);
            action();
        };

        const rejectTimeout = () => {
            settle(() => {
                child.stdout.destroy();
                child.stderr.destroy();
                reject(new ExecutionError(
                    'TIMEOUT',
                    `${spec.binary} exceeded timeout of ${options.timeoutSeconds}s`,
                    collected()
                ));
            });
        };

        const timer = setTimeout(() => {
            timedOut = true;
            logger.warn({ event: 'PROCESS_TIMEOUT', binary: spec.binary, pid: child.pid, timeoutMs }, 'Process timed out, terminating');

            // Already exited, but something it spawned still holds the pipes
            if (exited) {
                rejectTimeout();
                return;
            }

            child.kill('SIGTERM');
            killTimer = setTimeout(() => child.kill('SIGKILL'), killGraceMs);
        }, timeoutMs);

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (err: Error) => {
            settle(() => {
                const code = 'code' in err ? err.code : undefined;
                if (code === 'ENOENT' || code === 'EACCES') {
                    reject(new ExecutionError(
                        'BINARY_MISSING',
                        code === 'ENOENT'
                            ? `${spec.binary} not found on PATH`
                            : `${spec.binary} is not executable`,
                        collected(),
                        { cause: err }
                    ));
                    return;
                }
                reject(err);
            });
        });

        // A killed child may leave grandchildren holding the pipes open,
        // so the timeout path settles on exit rather than close.
        child.on('exit', () => {
            exited = true;
            if (timedOut) {
                rejectTimeout();
            }
        });

        child.on('close', (code, signal) => {
            settle(() => {
                resolve({
                    exitCode: code ?? signalExitCode(signal),
                    ...collected()
                });
            });
        });
    });
};

function signalExitCode(signal: NodeJS.Signals | null): number {
    return signal ? -os.constants.signals[signal] : -1;
}
