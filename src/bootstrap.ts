/**
 * Bootstrap pipeline
 *
 * Declares the stages that take a fresh enclave to running local services.
 *
 * Flow:
 * 1. Stop compose services, remove the enclave (both advisory)
 * 2. Start the enclave from the network params file
 * 3. Patch the config documents from the running enclave
 * 4. Consolidate keys, fetch genesis data, resolve the trusted peer
 * 5. Generate service configs and start the services with the typed activation config
 */

import fs from 'fs-extra';
import path from 'path';
import { ActivationConfig, assertPeerResolved, buildActivationConfig, toEnvironment } from './core/activation';
import { BootstrapConfig } from './core/config';
import { PreconditionMissingError } from './core/errors';
import { BootstrapLogger } from './core/logger';
import { PeerIdentity } from './core/multiaddr';
import { RetryOptions } from './core/retry';
import { PipelineResult, Stage, createPipeline, runPipeline } from './core/runner';
import { StateManager } from './core/state';
import { ChainPatchResult, patchChainSpec } from './shell/chain-spec';
import { ComposeClient } from './shell/compose';
import { EnvFileRenderer } from './shell/env-file';
import { CommandRunner } from './shell/exec';
import { HttpClient } from './shell/http';
import { KeyConsolidationSummary, consolidateKeys, describeKeySummary } from './shell/keys';
import { ClusterClient } from './shell/kurtosis';
import { withRunLock } from './shell/lock';
import { NetworkDataResult, fetchNetworkData } from './shell/network-data';
import { resolvePeerIdentity } from './shell/peer';
import { PortExtractionResult, extractPorts } from './shell/ports';
import { StagingArea } from './shell/staging';
import { TransferOptions } from './shell/transfer';

export const ROCKSDB_DIR_NAME = 'rocksdb';

export interface BootstrapServices {
    cluster: ClusterClient;
    compose: ComposeClient;
    http: HttpClient;
    run: CommandRunner;
    logger: BootstrapLogger;
    renderer: EnvFileRenderer;
    /** Retry sleep override, for tests. */
    sleep?: RetryOptions['sleep'];
    /** Register exit/signal cleanup for the staging area. Defaults to true. */
    registerCleanup?: boolean;
}

export interface TeardownOptions {
    /** Leave the enclave alone; only the compose side is restarted. */
    dockerOnly: boolean;
    /** Also run `kurtosis clean -a` (teardown command only). */
    clean: boolean;
}

export interface TeardownContext {
    config: BootstrapConfig;
    services: BootstrapServices;
    options: TeardownOptions;
}

export interface BootstrapResults {
    ports: PortExtractionResult[];
    chain?: ChainPatchResult;
    keys?: KeyConsolidationSummary;
    network?: NetworkDataResult;
    peer?: PeerIdentity;
    activation?: ActivationConfig;
}

export interface BootstrapContext extends TeardownContext {
    staging: StagingArea;
    results: BootstrapResults;
}

function transferOptions(ctx: BootstrapContext): TransferOptions {
    return { retry: ctx.config.retry, logger: ctx.services.logger, sleep: ctx.services.sleep };
}

function required<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
        throw new PreconditionMissingError(`${what} is not available`, 'Run the full pipeline with `up`.');
    }
    return value;
}

function activationFor(ctx: BootstrapContext): ActivationConfig {
    if (!ctx.results.activation) {
        const network = required(ctx.results.network, 'Genesis data');
        ctx.results.activation = buildActivationConfig({
            enclaveName: ctx.config.enclaveName,
            feeRecipient: ctx.config.feeRecipient,
            outputDir: ctx.config.outputDir,
            dataDir: ctx.config.dataDir,
            peer: required(ctx.results.peer, 'Peer identity'),
            bootnodes: network.bootnodes,
        });
    }
    return ctx.results.activation;
}

const dockerOnlySkip = (ctx: TeardownContext) => ctx.options.dockerOnly ? 'docker-only mode' : null;

// ═══════════════════════════════════════════════════════════════════════════
// TEARDOWN
// ═══════════════════════════════════════════════════════════════════════════

export const composeDown: Stage<TeardownContext> = {
    id: 'compose-down',
    label: 'Stopping Docker services',
    advisory: true,
    run: async ({ services }) => {
        await services.compose.down({ volumes: true });
        return 'Docker services stopped';
    },
};

export const enclaveRemove: Stage<TeardownContext> = {
    id: 'enclave-rm',
    label: 'Removing enclave',
    advisory: true,
    skip: dockerOnlySkip,
    run: async ({ config, services }) => {
        await services.cluster.removeEnclave(config.enclaveName);
        return `Enclave '${config.enclaveName}' removed`;
    },
};

export const clusterClean: Stage<TeardownContext> = {
    id: 'clean',
    label: 'Cleaning stopped enclaves',
    advisory: true,
    skip: (ctx) => ctx.options.clean ? null : 'not requested',
    run: async ({ services }) => {
        await services.cluster.clean();
        return 'Stopped enclaves cleaned';
    },
};

// ═══════════════════════════════════════════════════════════════════════════
// BRING-UP
// ═══════════════════════════════════════════════════════════════════════════

export const enclaveRun: Stage<BootstrapContext> = {
    id: 'enclave-run',
    label: 'Starting enclave',
    skip: dockerOnlySkip,
    run: async ({ config, services }) => {
        if (!await fs.pathExists(config.networkParams)) {
            throw new PreconditionMissingError(`Network params file not found: ${config.networkParams}`);
        }
        await services.cluster.runPackage(config.enclaveName, config.package, config.networkParams);
        return `Enclave '${config.enclaveName}' is running`;
    },
};

export const portsStage: Stage<BootstrapContext> = {
    id: 'ports',
    label: 'Extracting service ports',
    run: async (ctx) => {
        const { config, services } = ctx;
        ctx.results.ports = [];
        for (const target of config.endpointTargets) {
            services.logger.info(`  ${target.path}`);
            ctx.results.ports.push(await extractPorts(services.cluster, config.enclaveName, target, services.logger));
        }
        const updated = ctx.results.ports
            .flatMap(r => r.outcomes)
            .filter(o => o.status === 'updated').length;
        return `${updated} field(s) updated in ${ctx.results.ports.length} document(s)`;
    },
};

export const chainSpecStage: Stage<BootstrapContext> = {
    id: 'chain-spec',
    label: 'Patching chain parameters',
    run: async (ctx) => {
        const { config, services } = ctx;
        const result = await patchChainSpec(services.cluster, {
            ...transferOptions(ctx),
            enclave: config.enclaveName,
            genesisArtifact: config.genesis.artifact,
            manifestFile: config.genesis.manifest,
            targetConfig: config.targetConfig,
            staging: ctx.staging,
        });
        ctx.results.chain = result;
        services.logger.info(`  Updated chain line in ${result.path}`);
        services.logger.info(`  Backup: ${result.backupPath}`);
        return result.line;
    },
};

export const keysStage: Stage<BootstrapContext> = {
    id: 'keys',
    label: 'Consolidating validator keys',
    run: async (ctx) => {
        const { config, services } = ctx;
        const summary = await consolidateKeys(services.cluster, {
            ...transferOptions(ctx),
            enclave: config.enclaveName,
            outputDir: config.outputDir,
            staging: ctx.staging,
            keyListLimit: config.keyListLimit,
        });
        ctx.results.keys = summary;
        for (const line of describeKeySummary(summary)) services.logger.info(`  ${line}`);
        return `${summary.keys} keys and ${summary.secrets} secrets from ${summary.artifacts.length} artifact(s)`;
    },
};

export const networkDataStage: Stage<BootstrapContext> = {
    id: 'network-data',
    label: 'Fetching network data',
    run: async (ctx) => {
        const { config, services } = ctx;
        const result = await fetchNetworkData(services.cluster, services.http, {
            ...transferOptions(ctx),
            enclave: config.enclaveName,
            dataDir: config.dataDir,
            fileServer: config.fileServer,
            jwtArtifact: config.jwtArtifact,
            staging: ctx.staging,
        });
        ctx.results.network = result;
        services.logger.info(`  BOOTNODES_EL: ${result.bootnodes.el || '(none)'}`);
        services.logger.info(`  BOOTNODES_CL: ${result.bootnodes.cl || '(none)'}`);
        return `Genesis data in ${result.genesisDir}`;
    },
};

export const peerStage: Stage<BootstrapContext> = {
    id: 'peer',
    label: 'Resolving trusted peer',
    run: async (ctx) => {
        const { config, services } = ctx;
        const peer = await resolvePeerIdentity(
            services.cluster,
            services.http,
            config.enclaveName,
            config.peer,
            services.logger
        );
        ctx.results.peer = peer;
        services.logger.info(`  TRUSTED_PEER: ${peer.peerId || '(none)'}`);
        services.logger.info(`  LIBP2P_ADDR:  ${peer.multiaddr || '(none)'}`);
        assertPeerResolved(peer);
        return `Trusted peer ${peer.service} at ${peer.internalIp}`;
    },
};

export const dbCleanStage: Stage<BootstrapContext> = {
    id: 'db-clean',
    label: 'Cleaning local database',
    run: async ({ config }) => {
        const dbDir = path.join(config.outputDir, ROCKSDB_DIR_NAME);
        if (!await fs.pathExists(dbDir)) {
            return `No database at ${dbDir}`;
        }
        await fs.remove(dbDir);
        return `Removed ${dbDir}`;
    },
};

export const configGenStage: Stage<BootstrapContext> = {
    id: 'config-gen',
    label: 'Generating service configs',
    run: async (ctx) => {
        const { config, services } = ctx;
        const [command, ...args] = config.configGenCommand;
        await services.run(command, args, {
            cwd: config.repoRoot,
            env: toEnvironment(activationFor(ctx)),
            timeoutMs: config.timeouts.commandMs,
            inherit: true,
        });
        return `${config.configGenCommand.join(' ')} finished`;
    },
};

export const activateStage: Stage<BootstrapContext> = {
    id: 'activate',
    label: 'Starting Docker services',
    run: async (ctx) => {
        const { config, services } = ctx;
        const activation = activationFor(ctx);
        await services.renderer.write(config.envFile, activation);
        services.logger.info(`  Env file: ${config.envFile}`);
        await services.compose.up({ envFile: config.envFile, env: toEnvironment(activation) });
        return `Services started on network ${activation.networkName}`;
    },
};

export const bootstrapStages: Stage<BootstrapContext>[] = [
    composeDown,
    enclaveRemove,
    enclaveRun,
    portsStage,
    chainSpecStage,
    keysStage,
    networkDataStage,
    peerStage,
    dbCleanStage,
    configGenStage,
    activateStage,
];

export const bootstrap = createPipeline('bootstrap', bootstrapStages);
export const teardown = createPipeline<TeardownContext>('teardown', [composeDown, enclaveRemove, clusterClean]);

export interface RunOptions extends Partial<TeardownOptions> {
    /** Run only these stage ids, in pipeline order. State is not persisted for partial runs. */
    only?: string[];
}

/**
 * Runs the bring-up pipeline (or a subset of it) under the run lock with a fresh
 * staging area. Both are released on every exit path.
 */
export async function runBootstrap(
    config: BootstrapConfig,
    services: BootstrapServices,
    options: RunOptions = {}
): Promise<PipelineResult> {
    const only = options.only;
    if (only) {
        const unrecognised = only.filter(id => !bootstrapStages.some(s => s.id === id));
        if (unrecognised.length > 0) {
            throw new Error(`Unknown stage(s): ${unrecognised.join(', ')}`);
        }
    }
    const pipeline = only
        ? createPipeline(`bootstrap:${only.join(',')}`, bootstrapStages.filter(s => only.includes(s.id)))
        : bootstrap;

    return withRunLock(config.outputDir, async () => {
        const staging = await StagingArea.create({ registerHandlers: services.registerCleanup ?? true });
        const state = new StateManager(config.outputDir);
        const ctx: BootstrapContext = {
            config,
            services,
            options: { dockerOnly: options.dockerOnly ?? false, clean: false },
            staging,
            results: { ports: [] },
        };

        try {
            return await runPipeline(pipeline, ctx, {
                logger: services.logger,
                onTransition: only ? undefined : (s) => state.save(s),
            });
        } finally {
            await staging.dispose();
        }
    });
}

export async function runTeardown(
    config: BootstrapConfig,
    services: BootstrapServices,
    options: Partial<TeardownOptions> = {}
): Promise<PipelineResult> {
    return withRunLock(config.outputDir, () => runPipeline(teardown, {
        config,
        services,
        options: { dockerOnly: options.dockerOnly ?? false, clean: options.clean ?? false },
    }, { logger: services.logger }));
}
