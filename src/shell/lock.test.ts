/**
 * SHELL: Run lock tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { LOCK_FILE_NAME, RunLock, withRunLock } from './lock';
import { LockError } from '../core/errors';

async function tempDir(label: string): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), `bootstrap-lock-${label}-`));
}

describe('RunLock', () => {
    it('acquires and releases, creating the output root when missing', async () => {
        const tmpDir = await tempDir('basic');
        const outputDir = path.join(tmpDir, 'out');
        const lock = new RunLock(outputDir);

        const release = await lock.acquire(1000);
        assert.strictEqual(await fs.pathExists(path.join(outputDir, LOCK_FILE_NAME)), true);
        assert.strictEqual(await lock.isLocked(), true);

        await release();
        assert.strictEqual(await lock.isLocked(), false);

        const release2 = await lock.acquire(1000);
        await release2();

        await fs.remove(tmpDir);
    });

    it('refuses a second writer on the same output root', async () => {
        const tmpDir = await tempDir('busy');
        const first = new RunLock(tmpDir);
        const second = new RunLock(tmpDir);

        const release = await first.acquire();
        try {
            await assert.rejects(() => second.acquire(100), (err: unknown) => {
                assert.ok(err instanceof LockError);
                assert.strictEqual(err.message, `Another bootstrap run holds ${tmpDir}`);
                return true;
            });
        } finally {
            await release();
        }

        await fs.remove(tmpDir);
    });

    it('withRunLock releases after a failure', async () => {
        const tmpDir = await tempDir('scoped');

        await assert.rejects(
            () => withRunLock(tmpDir, async () => { throw new Error('stage failed'); }),
            /stage failed/
        );
        assert.strictEqual(await new RunLock(tmpDir).isLocked(), false);

        const value = await withRunLock(tmpDir, async () => 42);
        assert.strictEqual(value, 42);

        await fs.remove(tmpDir);
    });
});
