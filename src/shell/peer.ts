/**
 * SHELL: Peer identity resolution
 * Turns a service name into a dialable libp2p multiaddress.
 */

import { toHttpUrl } from '../core/endpoints';
import { errorMessage } from '../core/errors';
import { BootstrapLogger } from '../core/logger';
import { PeerIdentity, buildMultiaddr, emptyPeerIdentity, findEnrAddress } from '../core/multiaddr';
import { HttpClient } from './http';
import { ClusterClient } from './kurtosis';

export interface PeerLookup {
    service: string;
    portId: string;
    identityPath: string;
    p2pPort: number;
}

export async function resolvePeerIdentity(
    cluster: ClusterClient,
    http: HttpClient,
    enclave: string,
    lookup: PeerLookup,
    logger: BootstrapLogger
): Promise<PeerIdentity> {
    const identity = emptyPeerIdentity(lookup.service);

    const descriptor = await cluster.inspectService(enclave, lookup.service);
    if (!descriptor) {
        logger.warn(`  Service ${lookup.service} not found in enclave '${enclave}'`);
        return identity;
    }

    try {
        identity.httpUrl = toHttpUrl(await cluster.getServiceEndpoint(enclave, lookup.service, lookup.portId));
    } catch (err) {
        logger.warn(`  Could not resolve ${lookup.service}/${lookup.portId}: ${errorMessage(err)}`);
    }

    if (identity.httpUrl) {
        try {
            identity.peerId = await http.fetchPeerId(identity.httpUrl, lookup.identityPath);
        } catch (err) {
            logger.warn(`  Identity query failed for ${lookup.service}: ${errorMessage(err)}`);
        }
    }

    identity.internalIp = findEnrAddress(descriptor.launchArgs);
    if (!identity.internalIp) {
        logger.warn(`  No --enr-address in the launch arguments of ${lookup.service}`);
    }

    identity.multiaddr = buildMultiaddr(identity.internalIp, lookup.p2pPort, identity.peerId);
    return identity;
}
