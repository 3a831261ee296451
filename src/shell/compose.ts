/**
 * SHELL: Container activation
 */

import { CommandRunner, runCommand } from './exec';

export interface ComposeUpOptions {
    envFile?: string;
    env: Record<string, string>;
}

export interface ComposeClient {
    down(options: { volumes: boolean }): Promise<void>;
    up(options: ComposeUpOptions): Promise<void>;
}

export class DockerCompose implements ComposeClient {
    constructor(
        private projectDir: string,
        private timeoutMs: number,
        private run: CommandRunner = runCommand
    ) {}

    async down(options: { volumes: boolean }): Promise<void> {
        const args = ['compose', 'down'];
        if (options.volumes) args.push('-v');
        await this.run('docker', args, { cwd: this.projectDir, timeoutMs: this.timeoutMs });
    }

    async up(options: ComposeUpOptions): Promise<void> {
        const args = ['compose'];
        if (options.envFile) args.push('--env-file', options.envFile);
        args.push('up', '-d');
        await this.run('docker', args, {
            cwd: this.projectDir,
            env: options.env,
            timeoutMs: this.timeoutMs,
            inherit: true,
        });
    }
}
