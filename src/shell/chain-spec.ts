/**
 * SHELL: Chain parameter patch
 * Downloads the genesis bundle, reads the manifest and rewrites the chain line of the target config.
 */

import fs from 'fs-extra';
import path from 'path';
import { ChainParameters, formatChainLine, parseGenesisManifest, patchChainLine } from '../core/chain-spec';
import { PreconditionMissingError } from '../core/errors';
import { ClusterClient } from './kurtosis';
import { StagingArea } from './staging';
import { TransferOptions, downloadArtifact } from './transfer';
import { writeWithBackup } from './documents';

export interface ChainPatchOptions extends TransferOptions {
    enclave: string;
    genesisArtifact: string;
    manifestFile: string;
    targetConfig: string;
    staging: StagingArea;
}

export interface ChainPatchResult {
    parameters: ChainParameters;
    line: string;
    path: string;
    backupPath: string;
}

export async function readChainParameters(
    cluster: ClusterClient,
    options: Omit<ChainPatchOptions, 'targetConfig'>
): Promise<ChainParameters> {
    const genesisDir = await options.staging.dir(options.genesisArtifact);
    await downloadArtifact(cluster, options.enclave, options.genesisArtifact, genesisDir, options);

    const manifestPath = path.join(genesisDir, options.manifestFile);
    if (!await fs.pathExists(manifestPath)) {
        throw new PreconditionMissingError(
            `Artifact ${options.genesisArtifact} has no ${options.manifestFile}`
        );
    }
    return parseGenesisManifest(await fs.readFile(manifestPath, 'utf-8'));
}

/** Pure part of the patch, split out so it can run against an already-downloaded manifest. */
export async function applyChainParameters(targetConfig: string, parameters: ChainParameters): Promise<ChainPatchResult> {
    if (!await fs.pathExists(targetConfig)) {
        throw new PreconditionMissingError(`Config document not found: ${targetConfig}`);
    }
    const original = await fs.readFile(targetConfig, 'utf-8');
    const line = formatChainLine(parameters);
    const patched = patchChainLine(original, line, targetConfig);
    const backupPath = await writeWithBackup(targetConfig, original, patched);
    return { parameters, line, path: targetConfig, backupPath };
}

export async function patchChainSpec(cluster: ClusterClient, options: ChainPatchOptions): Promise<ChainPatchResult> {
    const parameters = await readChainParameters(cluster, options);
    return applyChainParameters(options.targetConfig, parameters);
}
