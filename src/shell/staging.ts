/**
 * SHELL: Private staging area
 * One temporary directory per run. Removed on dispose, and by a cleanup handler on
 * process exit, SIGINT and SIGTERM. Partial writes outside the staging area are not rolled back.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class StagingArea {
    private disposed = false;
    private readonly onExit = () => this.removeSync();
    private readonly onSignal = (signal: NodeJS.Signals) => {
        this.removeSync();
        this.detach();
        process.exit(signal === 'SIGINT' ? 130 : 143);
    };

    private constructor(public readonly root: string, private attached: boolean) {}

    static async create(options: { prefix?: string; parentDir?: string; registerHandlers?: boolean } = {}): Promise<StagingArea> {
        const parent = options.parentDir ?? os.tmpdir();
        await fs.ensureDir(parent);
        const root = await fs.mkdtemp(path.join(parent, options.prefix ?? 'testnet-bootstrap-'));
        const area = new StagingArea(root, options.registerHandlers ?? true);
        if (area.attached) area.attach();
        return area;
    }

    /** Fresh, empty subdirectory for one download. */
    async dir(name: string): Promise<string> {
        if (this.disposed) {
            throw new Error('Staging area already disposed');
        }
        const safe = name.replace(/[^a-zA-Z0-9._-]/g, '_');
        const dir = path.join(this.root, safe);
        await fs.emptyDir(dir);
        return dir;
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;
        this.disposed = true;
        this.detach();
        await fs.remove(this.root);
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    private attach(): void {
        process.once('exit', this.onExit);
        for (const signal of SIGNALS) process.once(signal, this.onSignal);
    }

    private detach(): void {
        if (!this.attached) return;
        this.attached = false;
        process.removeListener('exit', this.onExit);
        for (const signal of SIGNALS) process.removeListener(signal, this.onSignal);
    }

    private removeSync(): void {
        this.disposed = true;
        fs.removeSync(this.root);
    }
}
