/**
 * SHELL: Cluster control
 * The enclave is driven through the kurtosis CLI. Structured output is used where
 * the CLI has it (service inspect -o json); the artifact listing has no structured
 * form and is parsed from the inspect table.
 */

import { z } from 'zod';
import { ArtifactInfo, parseArtifactTable } from '../core/artifacts';
import { CommandError, CommandRunner, runCommand } from './exec';

export interface ServiceDescriptor {
    name: string;
    uuid?: string;
    status?: string;
    /** Entrypoint followed by command arguments, as the service was launched. */
    launchArgs: string[];
}

export interface ClusterClient {
    removeEnclave(enclave: string): Promise<void>;
    runPackage(enclave: string, packageId: string, argsFile: string): Promise<void>;
    listArtifacts(enclave: string): Promise<ArtifactInfo[]>;
    downloadArtifact(enclave: string, artifact: string, destDir: string): Promise<void>;
    /** Externally reachable endpoint for a port label, e.g. http://127.0.0.1:32771. */
    getServiceEndpoint(enclave: string, service: string, portId: string): Promise<string>;
    /** Null when the service does not exist in the enclave. */
    inspectService(enclave: string, service: string): Promise<ServiceDescriptor | null>;
    clean(): Promise<void>;
}

const ServiceInspectSchema = z.object({
    name: z.string().optional(),
    uuid: z.string().optional(),
    status: z.string().optional(),
    entrypoint: z.array(z.string()).nullish(),
    cmd: z.array(z.string()).nullish(),
}).passthrough();

export function parseServiceInspect(service: string, json: string): ServiceDescriptor {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        throw new Error(`Unreadable service descriptor for ${service}: ${e instanceof Error ? e.message : e}`);
    }
    const parsed = ServiceInspectSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Unexpected service descriptor for ${service}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const d = parsed.data;
    return {
        name: d.name ?? service,
        uuid: d.uuid,
        status: d.status,
        launchArgs: [...(d.entrypoint ?? []), ...(d.cmd ?? [])],
    };
}

export interface KurtosisTimeouts {
    commandMs: number;
    clusterRunMs: number;
}

export class KurtosisCli implements ClusterClient {
    constructor(
        private timeouts: KurtosisTimeouts,
        private run: CommandRunner = runCommand,
        private binary: string = 'kurtosis'
    ) {}

    private async exec(args: string[], timeoutMs = this.timeouts.commandMs): Promise<string> {
        const { stdout } = await this.run(this.binary, args, { timeoutMs });
        return stdout;
    }

    async removeEnclave(enclave: string): Promise<void> {
        await this.exec(['enclave', 'rm', enclave, '--force']);
    }

    async runPackage(enclave: string, packageId: string, argsFile: string): Promise<void> {
        await this.run(
            this.binary,
            ['run', packageId, '--enclave', enclave, '--args-file', argsFile],
            { timeoutMs: this.timeouts.clusterRunMs, inherit: true }
        );
    }

    async listArtifacts(enclave: string): Promise<ArtifactInfo[]> {
        return parseArtifactTable(await this.exec(['enclave', 'inspect', enclave]));
    }

    async downloadArtifact(enclave: string, artifact: string, destDir: string): Promise<void> {
        await this.exec(['files', 'download', enclave, artifact, destDir]);
    }

    async getServiceEndpoint(enclave: string, service: string, portId: string): Promise<string> {
        const out = (await this.exec(['port', 'print', enclave, service, portId])).trim();
        if (!out) {
            throw new Error(`Empty endpoint for ${service}/${portId}`);
        }
        return out.split(/\r?\n/).pop() ?? out;
    }

    async inspectService(enclave: string, service: string): Promise<ServiceDescriptor | null> {
        let out: string;
        try {
            out = await this.exec(['service', 'inspect', enclave, service, '--output', 'json']);
        } catch (err) {
            // A non-zero exit means the enclave has no such service; spawn failures and timeouts propagate
            if (err instanceof CommandError && !err.timedOut && err.exitCode !== null) return null;
            throw err;
        }
        return parseServiceInspect(service, out);
    }

    async clean(): Promise<void> {
        await this.exec(['clean', '-a']);
    }
}
