/**
 * SHELL: Validator key consolidation
 * Downloads every key bundle in the enclave and merges keys/ and secrets/ into
 * two flat output directories. The output directories are reset first, so a run
 * never mixes material from two enclaves.
 */

import fs from 'fs-extra';
import path from 'path';
import { KEY_ARTIFACT_PATTERN, selectKeyArtifacts } from '../core/artifacts';
import { ArtifactNotFoundError } from '../core/errors';
import { ClusterClient } from './kurtosis';
import { StagingArea } from './staging';
import { TransferOptions, downloadArtifact } from './transfer';

export const KEYS_DIR_NAME = 'validator_keys';
export const SECRETS_DIR_NAME = 'validator_secrets';

export interface KeyConsolidationOptions extends TransferOptions {
    enclave: string;
    outputDir: string;
    staging: StagingArea;
    /** How many key names to list for the operator. */
    keyListLimit: number;
}

export interface KeyConsolidationSummary {
    artifacts: string[];
    keys: number;
    secrets: number;
    /** First `keyListLimit` consolidated key names, sorted. */
    keyNames: string[];
    keysDir: string;
    secretsDir: string;
}

async function listEntries(dir: string): Promise<string[]> {
    if (!await fs.pathExists(dir)) return [];
    return (await fs.readdir(dir)).sort();
}

/** Copies the contents of `src` (if it is a directory) into `dest`. Returns the number of entries copied. */
async function mergeInto(src: string, dest: string): Promise<number> {
    if (!await fs.pathExists(src)) return 0;
    if (!(await fs.stat(src)).isDirectory()) return 0;
    const entries = await fs.readdir(src);
    for (const entry of entries) {
        await fs.copy(path.join(src, entry), path.join(dest, entry), { overwrite: true });
    }
    return entries.length;
}

export async function consolidateKeys(
    cluster: ClusterClient,
    options: KeyConsolidationOptions
): Promise<KeyConsolidationSummary> {
    const { logger } = options;
    const keysDir = path.join(options.outputDir, KEYS_DIR_NAME);
    const secretsDir = path.join(options.outputDir, SECRETS_DIR_NAME);

    await fs.remove(keysDir);
    await fs.remove(secretsDir);
    await fs.ensureDir(keysDir);
    await fs.ensureDir(secretsDir);

    logger.info(`  Discovering validator key artifacts in enclave '${options.enclave}'...`);
    const artifacts = selectKeyArtifacts(await cluster.listArtifacts(options.enclave));
    if (artifacts.length === 0) {
        throw new ArtifactNotFoundError(options.enclave, KEY_ARTIFACT_PATTERN);
    }
    logger.info(`  Found ${artifacts.length} validator key artifact(s)`);

    for (let i = 0; i < artifacts.length; i++) {
        const artifact = artifacts[i];
        logger.info(`  [${i + 1}/${artifacts.length}] Processing: ${artifact.name}`);

        const downloadDir = await options.staging.dir(`keys-${artifact.name}`);
        await downloadArtifact(cluster, options.enclave, artifact.name, downloadDir, options);

        const keys = await mergeInto(path.join(downloadDir, 'keys'), keysDir);
        if (keys > 0) logger.info(`    - Copied ${keys} keys`);
        const secrets = await mergeInto(path.join(downloadDir, 'secrets'), secretsDir);
        if (secrets > 0) logger.info(`    - Copied ${secrets} secrets`);
    }

    const keyEntries = await listEntries(keysDir);
    const secretEntries = await listEntries(secretsDir);

    return {
        artifacts: artifacts.map(a => a.name),
        keys: keyEntries.length,
        secrets: secretEntries.length,
        keyNames: keyEntries.slice(0, options.keyListLimit),
        keysDir,
        secretsDir,
    };
}

export function describeKeySummary(summary: KeyConsolidationSummary): string[] {
    const lines = [
        `Total keys:    ${summary.keys} -> ${summary.keysDir}/`,
        `Total secrets: ${summary.secrets} -> ${summary.secretsDir}/`,
    ];
    if (summary.keyNames.length > 0) {
        lines.push('Validator public keys:');
        lines.push(...summary.keyNames.map(n => `  ${n}`));
        const rest = summary.keys - summary.keyNames.length;
        if (rest > 0) lines.push(`  ... and ${rest} more`);
    }
    return lines;
}
