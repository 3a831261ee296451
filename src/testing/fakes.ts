/**
 * In-process stand-ins for the enclave, the compose runtime and HTTP.
 */

import fs from 'fs-extra';
import path from 'path';
import { Readable } from 'node:stream';
import * as tar from 'tar';
import { ArtifactInfo } from '../core/artifacts';
import { ComposeClient, ComposeUpOptions } from '../shell/compose';
import { CommandOptions, CommandResult, CommandRunner } from '../shell/exec';
import { HttpClient } from '../shell/http';
import { ClusterClient, ServiceDescriptor } from '../shell/kurtosis';

/** Relative path -> file content. */
export type FileTree = Record<string, string>;

export async function writeTree(dir: string, files: FileTree): Promise<void> {
    for (const [relative, content] of Object.entries(files)) {
        const target = path.join(dir, relative);
        await fs.ensureDir(path.dirname(target));
        await fs.writeFile(target, content, 'utf-8');
    }
}

/** Writes `files` under a scratch dir and packs them into `tarPath`. */
export async function packTree(tarPath: string, files: FileTree): Promise<void> {
    const srcDir = `${tarPath}.src`;
    await fs.emptyDir(srcDir);
    await writeTree(srcDir, files);
    await tar.c({ cwd: srcDir, file: tarPath }, Object.keys(files));
    await fs.remove(srcDir);
}

export class FakeCluster implements ClusterClient {
    readonly calls: string[] = [];
    artifacts: ArtifactInfo[] = [];
    /** Artifact name -> files it unpacks to. */
    artifactFiles = new Map<string, FileTree>();
    /** `${service}/${portId}` -> endpoint as `port print` returns it. */
    endpoints = new Map<string, string>();
    services = new Map<string, ServiceDescriptor>();
    /** Artifact name -> number of downloads that fail before one succeeds. */
    flakyDownloads = new Map<string, number>();

    async removeEnclave(enclave: string): Promise<void> {
        this.calls.push(`enclave rm ${enclave}`);
    }

    async runPackage(enclave: string, packageId: string, argsFile: string): Promise<void> {
        this.calls.push(`run ${packageId} ${enclave} ${argsFile}`);
    }

    async listArtifacts(enclave: string): Promise<ArtifactInfo[]> {
        this.calls.push(`enclave inspect ${enclave}`);
        return this.artifacts;
    }

    async downloadArtifact(enclave: string, artifact: string, destDir: string): Promise<void> {
        this.calls.push(`files download ${artifact}`);
        const failures = this.flakyDownloads.get(artifact) ?? 0;
        if (failures > 0) {
            this.flakyDownloads.set(artifact, failures - 1);
            await writeTree(destDir, { 'partial.tmp': 'half' });
            throw new Error(`connection reset while downloading ${artifact}`);
        }
        const files = this.artifactFiles.get(artifact);
        if (!files) {
            throw new Error(`No files artifact ${artifact} in enclave ${enclave}`);
        }
        await writeTree(destDir, files);
    }

    async getServiceEndpoint(_enclave: string, service: string, portId: string): Promise<string> {
        this.calls.push(`port print ${service} ${portId}`);
        const endpoint = this.endpoints.get(`${service}/${portId}`);
        if (!endpoint) {
            throw new Error(`Service ${service} has no port ${portId}`);
        }
        return endpoint;
    }

    async inspectService(_enclave: string, service: string): Promise<ServiceDescriptor | null> {
        this.calls.push(`service inspect ${service}`);
        return this.services.get(service) ?? null;
    }

    async clean(): Promise<void> {
        this.calls.push('clean');
    }
}

export class FakeCompose implements ComposeClient {
    readonly calls: string[] = [];
    lastUp: ComposeUpOptions | null = null;
    downError: Error | null = null;

    async down(options: { volumes: boolean }): Promise<void> {
        this.calls.push(options.volumes ? 'down -v' : 'down');
        if (this.downError) throw this.downError;
    }

    async up(options: ComposeUpOptions): Promise<void> {
        this.calls.push('up');
        this.lastUp = options;
    }
}

export class FakeHttp implements HttpClient {
    readonly requests: string[] = [];
    /** Base URL -> peer id. */
    peerIds = new Map<string, string>();
    /** URL -> tar file served for it. */
    bundles = new Map<string, string>();

    async fetchPeerId(baseUrl: string, identityPath: string): Promise<string> {
        this.requests.push(`${baseUrl}${identityPath}`);
        const peerId = this.peerIds.get(baseUrl);
        if (!peerId) {
            throw new Error('Request failed with status code 404');
        }
        return peerId;
    }

    async openStream(url: string): Promise<Readable> {
        this.requests.push(url);
        const file = this.bundles.get(url);
        if (!file) {
            throw new Error('Request failed with status code 404');
        }
        return fs.createReadStream(file);
    }
}

export interface RecordedCommand {
    command: string;
    args: string[];
    options: CommandOptions;
}

export function recordingRunner(result: CommandResult = { stdout: '', stderr: '' }): {
    run: CommandRunner;
    commands: RecordedCommand[];
} {
    const commands: RecordedCommand[] = [];
    const run: CommandRunner = async (command, args, options) => {
        commands.push({ command, args, options });
        return result;
    };
    return { run, commands };
}
