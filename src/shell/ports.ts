/**
 * SHELL: Dynamic parameter extraction
 * Looks up the live port of every bound service and rewrites the bound fields.
 */

import fs from 'fs-extra';
import { EndpointOutcome, mergeEndpoints, parsePortFromEndpoint } from '../core/endpoints';
import { EndpointTarget } from '../core/config';
import { PreconditionMissingError, errorMessage } from '../core/errors';
import { BootstrapLogger } from '../core/logger';
import { ClusterClient } from './kurtosis';
import { writeWithBackup } from './documents';

export interface PortExtractionResult {
    path: string;
    backupPath: string;
    outcomes: EndpointOutcome[];
    changed: boolean;
}

async function observePorts(
    cluster: ClusterClient,
    enclave: string,
    target: EndpointTarget,
    logger: BootstrapLogger
): Promise<Map<string, number>> {
    const ports = new Map<string, number>();
    for (const binding of target.bindings) {
        try {
            const endpoint = await cluster.getServiceEndpoint(enclave, binding.service, binding.portId);
            const port = parsePortFromEndpoint(endpoint);
            if (port === null) {
                logger.warn(`  Unexpected endpoint for ${binding.service}/${binding.portId}: ${endpoint}`);
                continue;
            }
            ports.set(binding.key, port);
        } catch (err) {
            logger.warn(`  No live assignment for ${binding.key} (${binding.service}/${binding.portId}): ${errorMessage(err)}`);
        }
    }
    return ports;
}

export async function extractPorts(
    cluster: ClusterClient,
    enclave: string,
    target: EndpointTarget,
    logger: BootstrapLogger
): Promise<PortExtractionResult> {
    if (!await fs.pathExists(target.path)) {
        throw new PreconditionMissingError(`Config document not found: ${target.path}`);
    }

    const ports = await observePorts(cluster, enclave, target, logger);
    const original = await fs.readFile(target.path, 'utf-8');
    const { text, outcomes } = mergeEndpoints(original, target.bindings, ports);

    for (const outcome of outcomes) {
        switch (outcome.status) {
            case 'updated':
                logger.info(`  ${outcome.key.padEnd(24)} = ${outcome.value} (was ${outcome.previous})`);
                break;
            case 'unchanged':
                logger.info(`  ${outcome.key.padEnd(24)} = ${outcome.value}`);
                break;
            case 'absent':
                logger.warn(`  ${outcome.key} not found in ${target.path}; left as is`);
                break;
            case 'no-assignment':
                break;
        }
    }

    const backupPath = await writeWithBackup(target.path, original, text);
    return { path: target.path, backupPath, outcomes, changed: text !== original };
}
