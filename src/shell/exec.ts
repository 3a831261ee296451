/**
 * SHELL: Child process runner
 * Every call carries an explicit timeout; nothing inherits the CLI's own defaults.
 */

import { execFile, spawn } from 'node:child_process';

export interface CommandOptions {
    cwd?: string;
    /** Merged over the current process environment for this call only. */
    env?: Record<string, string>;
    timeoutMs: number;
    /** Stream output to the terminal instead of capturing it (long-running bring-up calls). */
    inherit?: boolean;
}

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

export class CommandError extends Error {
    constructor(
        public command: string,
        public exitCode: number | null,
        public stderr: string,
        public timedOut: boolean
    ) {
        super(
            timedOut
                ? `${command} timed out`
                : `${command} failed${exitCode !== null ? ` (exit ${exitCode})` : ''}${stderr ? `: ${stderr.trim()}` : ''}`
        );
        this.name = 'CommandError';
    }
}

const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

function mergeEnv(env?: Record<string, string>): NodeJS.ProcessEnv {
    return env ? { ...process.env, ...env } : process.env;
}

function runInherited(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    const display = [command, ...args].join(' ');
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            env: mergeEnv(options.env),
            timeout: options.timeoutMs,
            stdio: 'inherit',
        });
        child.on('error', (err) => reject(new CommandError(display, null, err.message, false)));
        child.on('close', (code, signal) => {
            if (code === 0) {
                resolve({ stdout: '', stderr: '' });
                return;
            }
            reject(new CommandError(display, code, '', signal === 'SIGTERM'));
        });
    });
}

export const runCommand: CommandRunner = (command, args, options) => {
    if (options.inherit) {
        return runInherited(command, args, options);
    }

    const display = [command, ...args].join(' ');
    return new Promise((resolve, reject) => {
        execFile(
            command,
            args,
            {
                cwd: options.cwd,
                env: mergeEnv(options.env),
                timeout: options.timeoutMs,
                maxBuffer: MAX_BUFFER_BYTES,
                encoding: 'utf-8',
            },
            (error, stdout, stderr) => {
                if (error) {
                    const timedOut = error.killed === true && error.signal === 'SIGTERM';
                    const exitCode = typeof error.code === 'number' ? error.code : null;
                    reject(new CommandError(display, exitCode, stderr || error.message, timedOut));
                    return;
                }
                resolve({ stdout, stderr });
            }
        );
    });
};
