/**
 * CORE: Peer addressing
 */

export interface PeerIdentity {
    service: string;
    peerId: string;
    /** Address the service advertises inside the enclave network (--enr-address). */
    internalIp: string;
    /** Externally reachable HTTP base URL, used only for the identity query. */
    httpUrl: string;
    multiaddr: string;
}

export function emptyPeerIdentity(service: string): PeerIdentity {
    return { service, peerId: '', internalIp: '', httpUrl: '', multiaddr: '' };
}

const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function isIpv4(value: string): boolean {
    const m = value.match(IPV4_REGEX);
    return !!m && m.slice(1).every(octet => parseInt(octet, 10) <= 255);
}

/** Empty unless both the IP and the peer id are known. */
export function buildMultiaddr(ip: string, port: number, peerId: string): string {
    if (!ip || !peerId) return '';
    return `/ip4/${ip}/tcp/${port}/p2p/${peerId}`;
}

/**
 * Finds the --enr-address value among launch arguments.
 * Accepts `--enr-address=IP` and `--enr-address IP`, also inside a single shell-joined string.
 */
export function findEnrAddress(args: string[]): string {
    const tokens = args.flatMap(arg => arg.split(/\s+/)).filter(Boolean);
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (token.startsWith('--enr-address=')) {
            const value = token.slice('--enr-address='.length);
            if (isIpv4(value)) return value;
        } else if (token === '--enr-address' && i + 1 < tokens.length && isIpv4(tokens[i + 1])) {
            return tokens[i + 1];
        }
    }
    return '';
}
