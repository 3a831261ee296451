/**
 * SHELL: Bulk network data fetch
 * Pulls the genesis bundle from the enclave's file server and the JWT secret
 * artifact into the data root, then reads the published bootnodes.
 */

import fs from 'fs-extra';
import path from 'path';
import { pipeline } from 'stream/promises';
import * as tar from 'tar';
import { Bootnodes, firstLineWithPrefix } from '../core/activation';
import { toHttpUrl } from '../core/endpoints';
import { PreconditionMissingError, errorMessage } from '../core/errors';
import { BootstrapLogger } from '../core/logger';
import { HttpClient } from './http';
import { ClusterClient } from './kurtosis';
import { StagingArea } from './staging';
import { TransferOptions, downloadArtifact, transfer } from './transfer';

export const GENESIS_DIR_NAME = 'genesis';
export const JWT_DIR_NAME = 'jwt';
export const EL_BOOTNODE_FILE = 'bootnode.txt';
export const CL_BOOTNODE_FILE = 'bootstrap_nodes.txt';

export interface NetworkDataOptions extends TransferOptions {
    enclave: string;
    dataDir: string;
    fileServer: {
        service: string;
        portId: string;
        bundlePath: string;
    };
    jwtArtifact: string;
    staging: StagingArea;
}

export interface NetworkDataResult {
    genesisDir: string;
    jwtDir: string;
    bundleUrl: string;
    bootnodes: Bootnodes;
}

async function resolveBundleUrl(cluster: ClusterClient, options: NetworkDataOptions): Promise<string> {
    const { service, portId, bundlePath } = options.fileServer;
    try {
        const endpoint = await cluster.getServiceEndpoint(options.enclave, service, portId);
        return `${toHttpUrl(endpoint)}${bundlePath}`;
    } catch (err) {
        throw new PreconditionMissingError(
            `Could not resolve the ${service} file server endpoint: ${errorMessage(err)}`,
            `Enable the ${service} additional service in the network params file and rerun`
        );
    }
}

async function readBootnode(file: string, prefix: string, logger: BootstrapLogger): Promise<string> {
    if (!await fs.pathExists(file)) {
        logger.warn(`  ${path.basename(file)} not found in genesis data`);
        return '';
    }
    const value = firstLineWithPrefix(await fs.readFile(file, 'utf-8'), prefix);
    if (!value) {
        logger.warn(`  No ${prefix} record in ${path.basename(file)}`);
    }
    return value;
}

export async function readBootnodes(genesisDir: string, logger: BootstrapLogger): Promise<Bootnodes> {
    return {
        el: await readBootnode(path.join(genesisDir, EL_BOOTNODE_FILE), 'enode://', logger),
        cl: await readBootnode(path.join(genesisDir, CL_BOOTNODE_FILE), 'enr:', logger),
    };
}

export async function fetchNetworkData(
    cluster: ClusterClient,
    http: HttpClient,
    options: NetworkDataOptions
): Promise<NetworkDataResult> {
    const { logger } = options;
    const genesisDir = path.join(options.dataDir, GENESIS_DIR_NAME);
    const jwtDir = path.join(options.dataDir, JWT_DIR_NAME);

    await fs.emptyDir(options.dataDir);
    await fs.ensureDir(genesisDir);
    await fs.ensureDir(jwtDir);

    const bundleUrl = await resolveBundleUrl(cluster, options);
    const downloadDir = await options.staging.dir('network-config');
    const archive = path.join(downloadDir, path.basename(options.fileServer.bundlePath) || 'bundle.tar');
    logger.info(`  Fetching ${bundleUrl}`);
    await transfer(`fetch ${bundleUrl}`, genesisDir, async () => {
        const body = await http.openStream(bundleUrl);
        await pipeline(body, fs.createWriteStream(archive));
        await tar.x({ file: archive, cwd: genesisDir });
    }, options);

    logger.info(`  Downloading ${options.jwtArtifact}`);
    await downloadArtifact(cluster, options.enclave, options.jwtArtifact, jwtDir, options);

    const bootnodes = await readBootnodes(genesisDir, logger);
    return { genesisDir, jwtDir, bundleUrl, bootnodes };
}
