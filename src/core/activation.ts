/**
 * CORE: Activation hand-off
 * Typed configuration for the config generation and service activation stages,
 * built from stage outputs instead of process-wide environment state.
 */

import { ResolutionIncompleteError } from './errors';
import { PeerIdentity } from './multiaddr';

export interface Bootnodes {
    /** First enode:// record, empty when none was published. */
    el: string;
    /** First enr: record, empty when none was published. */
    cl: string;
}

export interface ActivationConfig {
    enclaveName: string;
    /** Container network the compose services join. */
    networkName: string;
    libp2pAddr: string;
    trustedPeer: string;
    bootnodesEl: string;
    bootnodesCl: string;
    feeRecipient: string;
    outputDir: string;
    dataDir: string;
}

export interface ActivationInputs {
    enclaveName: string;
    feeRecipient: string;
    outputDir: string;
    dataDir: string;
    peer: PeerIdentity;
    bootnodes: Bootnodes;
}

export function firstLineWithPrefix(text: string, prefix: string): string {
    for (const line of text.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (trimmed.startsWith(prefix)) return trimmed;
    }
    return '';
}

export function enclaveNetworkName(enclaveName: string): string {
    return `kt-${enclaveName}`;
}

/** @throws ResolutionIncompleteError when the multiaddress or peer id is empty */
export function assertPeerResolved(peer: PeerIdentity): void {
    const missing: string[] = [];
    if (!peer.multiaddr) missing.push('LIBP2P_ADDR');
    if (!peer.peerId) missing.push('TRUSTED_PEER');
    if (missing.length > 0) {
        throw new ResolutionIncompleteError(missing, {
            LIBP2P_ADDR: peer.multiaddr,
            TRUSTED_PEER: peer.peerId,
        });
    }
}

export function buildActivationConfig(inputs: ActivationInputs): ActivationConfig {
    assertPeerResolved(inputs.peer);
    return {
        enclaveName: inputs.enclaveName,
        networkName: enclaveNetworkName(inputs.enclaveName),
        libp2pAddr: inputs.peer.multiaddr,
        trustedPeer: inputs.peer.peerId,
        bootnodesEl: inputs.bootnodes.el,
        bootnodesCl: inputs.bootnodes.cl,
        feeRecipient: inputs.feeRecipient,
        outputDir: inputs.outputDir,
        dataDir: inputs.dataDir,
    };
}

/** Variable names the compose file and the config generator read. */
export function toEnvironment(config: ActivationConfig): Record<string, string> {
    return {
        ENCLAVE_NAME: config.enclaveName,
        KURTOSIS_NETWORK: config.networkName,
        LIBP2P_ADDR: config.libp2pAddr,
        TRUSTED_PEER: config.trustedPeer,
        BOOTNODES_EL: config.bootnodesEl,
        BOOTNODES_CL: config.bootnodesCl,
        FEE_RECIPIENT: config.feeRecipient,
        OUTPUT_DIR: config.outputDir,
        DATA_DIR: config.dataDir,
    };
}
