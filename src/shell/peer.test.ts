import { describe, it } from 'node:test';
import assert from 'node:assert';
import { resolvePeerIdentity } from './peer';
import { MemoryLogger } from '../core/logger';
import { FakeCluster, FakeHttp } from '../testing/fakes';

const LOOKUP = {
    service: 'cl-1-lighthouse-geth',
    portId: 'http',
    identityPath: '/eth/v1/node/identity',
    p2pPort: 9000,
};

function runningPeer(): { cluster: FakeCluster; http: FakeHttp } {
    const cluster = new FakeCluster();
    cluster.services.set('cl-1-lighthouse-geth', {
        name: 'cl-1-lighthouse-geth',
        launchArgs: ['lighthouse', 'beacon_node', '--enr-address=172.16.0.10', '--http'],
    });
    cluster.endpoints.set('cl-1-lighthouse-geth/http', '127.0.0.1:32771');
    const http = new FakeHttp();
    http.peerIds.set('http://127.0.0.1:32771', '16Uiu2HAmTestPeer');
    return { cluster, http };
}

describe('resolvePeerIdentity', () => {
    it('assembles the multiaddress from the identity and launch arguments', async () => {
        const { cluster, http } = runningPeer();

        const identity = await resolvePeerIdentity(cluster, http, 'preconf-testnet', LOOKUP, new MemoryLogger());

        assert.deepStrictEqual(identity, {
            service: 'cl-1-lighthouse-geth',
            peerId: '16Uiu2HAmTestPeer',
            internalIp: '172.16.0.10',
            httpUrl: 'http://127.0.0.1:32771',
            multiaddr: '/ip4/172.16.0.10/tcp/9000/p2p/16Uiu2HAmTestPeer',
        });
        assert.deepStrictEqual(http.requests, ['http://127.0.0.1:32771/eth/v1/node/identity']);
    });

    it('returns the empty identity for an absent service', async () => {
        const cluster = new FakeCluster();
        const http = new FakeHttp();
        const logger = new MemoryLogger();

        const identity = await resolvePeerIdentity(cluster, http, 'preconf-testnet', LOOKUP, logger);

        assert.deepStrictEqual(identity, {
            service: 'cl-1-lighthouse-geth',
            peerId: '',
            internalIp: '',
            httpUrl: '',
            multiaddr: '',
        });
        assert.deepStrictEqual(http.requests, []);
        assert.deepStrictEqual(logger.messages('warn'), ["  Service cl-1-lighthouse-geth not found in enclave 'preconf-testnet'"]);
    });

    it('keeps the peer id but no multiaddress when the IP is unknown', async () => {
        const { cluster, http } = runningPeer();
        cluster.services.set('cl-1-lighthouse-geth', { name: 'cl-1-lighthouse-geth', launchArgs: ['lighthouse', 'bn'] });

        const identity = await resolvePeerIdentity(cluster, http, 'preconf-testnet', LOOKUP, new MemoryLogger());

        assert.strictEqual(identity.peerId, '16Uiu2HAmTestPeer');
        assert.strictEqual(identity.internalIp, '');
        assert.strictEqual(identity.multiaddr, '');
    });

    it('keeps the IP but no multiaddress when the identity query fails', async () => {
        const { cluster } = runningPeer();
        const logger = new MemoryLogger();

        const identity = await resolvePeerIdentity(cluster, new FakeHttp(), 'preconf-testnet', LOOKUP, logger);

        assert.strictEqual(identity.internalIp, '172.16.0.10');
        assert.strictEqual(identity.peerId, '');
        assert.strictEqual(identity.multiaddr, '');
        assert.deepStrictEqual(logger.messages('warn'), [
            '  Identity query failed for cl-1-lighthouse-geth: Request failed with status code 404',
        ]);
    });

    it('uses the configured p2p port', async () => {
        const { cluster, http } = runningPeer();
        const identity = await resolvePeerIdentity(cluster, http, 'e', { ...LOOKUP, p2pPort: 9100 }, new MemoryLogger());
        assert.strictEqual(identity.multiaddr, '/ip4/172.16.0.10/tcp/9100/p2p/16Uiu2HAmTestPeer');
    });
});
