/**
 * SHELL: Run lock
 * Single writer per output root. proper-lockfile keeps the lock fresh (update every 5s)
 * and treats a lock older than 30s as stale, so a killed run does not block the next one.
 */

import lockfile from 'proper-lockfile';
import fs from 'fs-extra';
import path from 'path';
import { LockError } from '../core/errors';

export const LOCK_FILE_NAME = '.bootstrap.lock';

const DEFAULT_LOCK_BASE_MS = 50;
const DEFAULT_LOCK_MAX_DELAY_MS = 2000;
/** Unrecoverable errors: fail fast instead of retrying. */
const FATAL_LOCK_CODES = ['EACCES', 'EPERM', 'EROFS', 'ENOTDIR', 'ENAMETOOLONG'];

export type ReleaseFn = () => Promise<void>;

function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export class RunLock {
    constructor(private outputDir: string) {}

    get lockPath(): string {
        return path.join(this.outputDir, LOCK_FILE_NAME);
    }

    /**
     * Acquire with retries until `timeoutMs` runs out. Caller releases in a finally block.
     * @throws LockError when another run holds the output root
     */
    async acquire(timeoutMs = 0): Promise<ReleaseFn> {
        await fs.ensureDir(this.outputDir);
        const start = Date.now();

        for (let i = 0; ; i++) {
            try {
                return await lockfile.lock(this.outputDir, {
                    lockfilePath: this.lockPath,
                    stale: 30 * 1000,
                    update: 5 * 1000,
                    retries: { retries: 0 },
                });
            } catch (err) {
                const code = errorCode(err);
                if (code && FATAL_LOCK_CODES.includes(code)) {
                    throw new LockError(`Cannot lock ${this.outputDir}: ${code}`);
                }
                const remaining = timeoutMs - (Date.now() - start);
                if (remaining <= 0) {
                    throw new LockError(`Another bootstrap run holds ${this.outputDir}`);
                }
                const delay = Math.min(
                    remaining,
                    DEFAULT_LOCK_BASE_MS * Math.pow(2, i) + Math.random() * DEFAULT_LOCK_BASE_MS,
                    DEFAULT_LOCK_MAX_DELAY_MS
                );
                await new Promise((r) => setTimeout(r, delay));
            }
        }
    }

    async isLocked(): Promise<boolean> {
        if (!await fs.pathExists(this.outputDir)) return false;
        return lockfile.check(this.outputDir, { lockfilePath: this.lockPath, stale: 30 * 1000 });
    }
}

/** Runs `fn` while holding the lock; released on every exit path. */
export async function withRunLock<T>(outputDir: string, fn: () => Promise<T>, timeoutMs = 0): Promise<T> {
    const release = await new RunLock(outputDir).acquire(timeoutMs);
    try {
        return await fn();
    } finally {
        await release();
    }
}
