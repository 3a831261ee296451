import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    ActivationInputs,
    assertPeerResolved,
    buildActivationConfig,
    enclaveNetworkName,
    firstLineWithPrefix,
    toEnvironment,
} from './activation';
import { ResolutionIncompleteError } from './errors';
import { emptyPeerIdentity } from './multiaddr';

const INPUTS: ActivationInputs = {
    enclaveName: 'preconf-testnet',
    feeRecipient: '0x0000000000000000000000000000000000000000',
    outputDir: '/tmp/fabric',
    dataDir: '/repo/kurtosis/config/data',
    peer: {
        service: 'cl-1-lighthouse-geth',
        peerId: 'peer-1',
        internalIp: '172.16.0.10',
        httpUrl: 'http://127.0.0.1:32771',
        multiaddr: '/ip4/172.16.0.10/tcp/9000/p2p/peer-1',
    },
    bootnodes: { el: 'enode://abc@172.16.0.2:30303', cl: 'enr:-placeholder' },
};

describe('activation config', () => {
    it('derives the container network from the enclave name', () => {
        assert.strictEqual(enclaveNetworkName('preconf-testnet'), 'kt-preconf-testnet');
    });

    it('maps stage results onto the activation keys', () => {
        assert.deepStrictEqual(toEnvironment(buildActivationConfig(INPUTS)), {
            ENCLAVE_NAME: 'preconf-testnet',
            KURTOSIS_NETWORK: 'kt-preconf-testnet',
            LIBP2P_ADDR: '/ip4/172.16.0.10/tcp/9000/p2p/peer-1',
            TRUSTED_PEER: 'peer-1',
            BOOTNODES_EL: 'enode://abc@172.16.0.2:30303',
            BOOTNODES_CL: 'enr:-placeholder',
            FEE_RECIPIENT: '0x0000000000000000000000000000000000000000',
            OUTPUT_DIR: '/tmp/fabric',
            DATA_DIR: '/repo/kurtosis/config/data',
        });
    });

    it('refuses an unresolved peer', () => {
        assert.throws(
            () => buildActivationConfig({ ...INPUTS, peer: emptyPeerIdentity('cl-1-lighthouse-geth') }),
            (err: unknown) => {
                assert.ok(err instanceof ResolutionIncompleteError);
                assert.deepStrictEqual(err.missing, ['LIBP2P_ADDR', 'TRUSTED_PEER']);
                assert.strictEqual(err.message, "LIBP2P_ADDR or TRUSTED_PEER is not set. LIBP2P_ADDR: '', TRUSTED_PEER: ''");
                return true;
            }
        );
    });

    it('names only the missing field', () => {
        const peer = { ...INPUTS.peer, multiaddr: '' };
        assert.throws(() => assertPeerResolved(peer), (err: unknown) => {
            assert.ok(err instanceof ResolutionIncompleteError);
            assert.deepStrictEqual(err.missing, ['LIBP2P_ADDR']);
            return true;
        });
    });

    it('allows empty bootnodes', () => {
        const config = buildActivationConfig({ ...INPUTS, bootnodes: { el: '', cl: '' } });
        assert.strictEqual(config.bootnodesEl, '');
        assert.strictEqual(config.bootnodesCl, '');
    });
});

describe('firstLineWithPrefix', () => {
    it('returns the first trimmed line with the prefix', () => {
        const text = '# bootnodes\n  enr:-first  \nenr:-second\n';
        assert.strictEqual(firstLineWithPrefix(text, 'enr:'), 'enr:-first');
    });

    it('returns empty when no line matches', () => {
        assert.strictEqual(firstLineWithPrefix('enr:-only\n', 'enode://'), '');
    });
});
