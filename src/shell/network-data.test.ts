import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import http from 'node:http';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { fetchNetworkData, readBootnodes } from './network-data';
import { AxiosHttpClient } from './http';
import { PreconditionMissingError, TransferFailureError } from '../core/errors';
import { MemoryLogger } from '../core/logger';
import { StagingArea } from './staging';
import { FakeCluster, FakeHttp, packTree } from '../testing/fakes';

const GENESIS_FILES = {
    'bootnode.txt': '# execution bootnodes\nenode://aaa@172.16.0.2:30303\nenode://bbb@172.16.0.3:30303\n',
    'bootstrap_nodes.txt': 'enr:-first-record\nenr:-second-record\n',
    'config.yaml': 'SECONDS_PER_SLOT: 12\n',
};

const FILE_SERVER = { service: 'apache', portId: 'http', bundlePath: '/network-config.tar' };

describe('fetchNetworkData', () => {
    let root: string;
    let tarPath: string;
    let server: http.Server;
    let port: number;
    let failuresLeft = 0;
    let staging: StagingArea;

    before(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'bootstrap-data-'));
        tarPath = path.join(root, 'network-config.tar');
        await packTree(tarPath, GENESIS_FILES);
        staging = await StagingArea.create({ parentDir: root, registerHandlers: false });

        server = http.createServer((req, res) => {
            if (req.url !== '/network-config.tar') {
                res.writeHead(404).end();
                return;
            }
            if (failuresLeft > 0) {
                failuresLeft--;
                res.writeHead(503).end();
                return;
            }
            res.writeHead(200, { 'Content-Type': 'application/x-tar' });
            fs.createReadStream(tarPath).pipe(res);
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('test server did not bind a TCP port');
        }
        port = address.port;
    });

    after(async () => {
        server.closeAllConnections();
        await staging.dispose();
        await new Promise<void>((resolve, reject) => server.close((err) => err ? reject(err) : resolve()));
        await fs.remove(root);
    });

    function clusterFor(endpoint: string | null): FakeCluster {
        const cluster = new FakeCluster();
        if (endpoint) cluster.endpoints.set('apache/http', endpoint);
        cluster.artifactFiles.set('jwt_file', { jwtsecret: '0xtest-secret' });
        return cluster;
    }

    function options(dataDir: string, logger = new MemoryLogger()) {
        return {
            enclave: 'preconf-testnet',
            dataDir,
            fileServer: FILE_SERVER,
            jwtArtifact: 'jwt_file',
            staging,
            retry: { attempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
            logger,
            sleep: async () => {},
        };
    }

    it('extracts the bundle over HTTP and reads the first bootnodes', async () => {
        const dataDir = path.join(root, 'data-ok');
        await fs.outputFile(path.join(dataDir, 'stale.txt'), 'previous run');

        const result = await fetchNetworkData(
            clusterFor(`127.0.0.1:${port}`),
            new AxiosHttpClient(5000),
            options(dataDir)
        );

        assert.strictEqual(result.bundleUrl, `http://127.0.0.1:${port}/network-config.tar`);
        assert.deepStrictEqual(result.bootnodes, {
            el: 'enode://aaa@172.16.0.2:30303',
            cl: 'enr:-first-record',
        });
        assert.strictEqual(await fs.readFile(path.join(dataDir, 'genesis', 'config.yaml'), 'utf-8'), 'SECONDS_PER_SLOT: 12\n');
        assert.strictEqual(await fs.readFile(path.join(dataDir, 'jwt', 'jwtsecret'), 'utf-8'), '0xtest-secret');
        assert.strictEqual(await fs.pathExists(path.join(dataDir, 'stale.txt')), false);
    });

    it('retries a failing file server', async () => {
        const dataDir = path.join(root, 'data-retry');
        const logger = new MemoryLogger();
        failuresLeft = 1;

        const result = await fetchNetworkData(
            clusterFor(`http://127.0.0.1:${port}`),
            new AxiosHttpClient(5000),
            options(dataDir, logger)
        );

        assert.strictEqual(result.bootnodes.cl, 'enr:-first-record');
        assert.strictEqual(logger.messages('warn').length, 1);
        assert.match(logger.messages('warn')[0], /attempt 1 failed \(Request failed with status code 503\)/);
    });

    it('fails with a transfer error once retries run out', async () => {
        const dataDir = path.join(root, 'data-fail');
        failuresLeft = 2;

        await assert.rejects(
            () => fetchNetworkData(clusterFor(`127.0.0.1:${port}`), new AxiosHttpClient(5000), options(dataDir)),
            (err: unknown) => {
                assert.ok(err instanceof TransferFailureError);
                assert.strictEqual(err.attempts, 2);
                return true;
            }
        );
        failuresLeft = 0;
    });

    it('explains how to enable a missing file server', async () => {
        const dataDir = path.join(root, 'data-missing');

        await assert.rejects(
            () => fetchNetworkData(clusterFor(null), new FakeHttp(), options(dataDir)),
            (err: unknown) => {
                assert.ok(err instanceof PreconditionMissingError);
                assert.strictEqual(
                    err.message,
                    'Could not resolve the apache file server endpoint: Service apache has no port http'
                );
                assert.strictEqual(err.recoveryHint, 'Enable the apache additional service in the network params file and rerun');
                return true;
            }
        );
    });
});

describe('readBootnodes', () => {
    it('warns and returns empty values when records are missing', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bootstrap-bootnodes-'));
        await fs.writeFile(path.join(dir, 'bootnode.txt'), '# none yet\n');
        const logger = new MemoryLogger();

        const bootnodes = await readBootnodes(dir, logger);

        assert.deepStrictEqual(bootnodes, { el: '', cl: '' });
        assert.deepStrictEqual(logger.messages('warn'), [
            '  No enode:// record in bootnode.txt',
            '  bootstrap_nodes.txt not found in genesis data',
        ]);
        await fs.remove(dir);
    });
});
