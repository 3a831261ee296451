import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { EndpointBinding } from './endpoints';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from './retry';

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

export interface EndpointTarget {
    path: string;
    bindings: EndpointBinding[];
}

export interface BootstrapConfig {
    enclaveName: string;
    repoRoot: string;
    outputDir: string;
    /** Holds the compose file, network params and the data/ tree. */
    configDir: string;
    dataDir: string;
    networkParams: string;
    package: string;
    /** Document that receives the chain line. */
    targetConfig: string;
    endpointTargets: EndpointTarget[];
    genesis: {
        artifact: string;
        manifest: string;
    };
    jwtArtifact: string;
    fileServer: {
        service: string;
        portId: string;
        bundlePath: string;
    };
    peer: {
        service: string;
        portId: string;
        identityPath: string;
        p2pPort: number;
    };
    feeRecipient: string;
    keyListLimit: number;
    configGenCommand: string[];
    composeDir: string;
    envFile: string;
    timeouts: {
        commandMs: number;
        clusterRunMs: number;
        httpMs: number;
    };
    retry: RetryPolicy;
}

export interface ConfigOverrides {
    enclaveName?: string;
    outputDir?: string;
    repoRoot?: string;
}

const BindingSchema = z.object({
    key: z.string().min(1),
    service: z.string().min(1),
    portId: z.string().min(1),
    kind: z.enum(['port', 'url']).default('port'),
});

const FileConfigSchema = z.object({
    enclaveName: z.string().min(1),
    repoRoot: z.string().min(1),
    outputDir: z.string().min(1),
    configDir: z.string().min(1),
    dataDir: z.string().min(1),
    networkParams: z.string().min(1),
    package: z.string().min(1),
    targetConfig: z.string().min(1),
    endpointTargets: z.array(z.object({
        path: z.string().min(1),
        bindings: z.array(BindingSchema).min(1),
    })),
    genesis: z.object({
        artifact: z.string().min(1),
        manifest: z.string().min(1),
    }).partial(),
    jwtArtifact: z.string().min(1),
    fileServer: z.object({
        service: z.string().min(1),
        portId: z.string().min(1),
        bundlePath: z.string().startsWith('/'),
    }).partial(),
    peer: z.object({
        service: z.string().min(1),
        portId: z.string().min(1),
        identityPath: z.string().startsWith('/'),
        p2pPort: z.number().int().min(1).max(65535),
    }).partial(),
    feeRecipient: z.string(),
    keyListLimit: z.number().int().min(0),
    configGenCommand: z.array(z.string().min(1)).min(1),
    composeDir: z.string().min(1),
    envFile: z.string().min(1),
    timeouts: z.object({
        commandMs: z.number().int().positive(),
        clusterRunMs: z.number().int().positive(),
        httpMs: z.number().int().positive(),
    }).partial(),
    retry: z.object({
        attempts: z.number().int().min(1).max(10),
        baseDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
    }).partial(),
}).partial().strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

const FEE_RECIPIENT_REGEX = /^0x[0-9a-fA-F]{40}$/;

export const CONFIG_FILE_NAMES = ['bootstrap.config.jsonc', 'bootstrap.config.json'];

function defaultsFor(repoRoot: string): Omit<BootstrapConfig, 'enclaveName' | 'outputDir' | 'repoRoot' | 'feeRecipient'> {
    const configDir = path.join(repoRoot, 'kurtosis', 'config');
    const targetConfig = path.join(repoRoot, 'config', 'docker.config.toml');
    return {
        configDir,
        dataDir: path.join(configDir, 'data'),
        networkParams: path.join(configDir, 'kurtosis-network-params.yaml'),
        package: 'github.com/ethpandaops/ethereum-package',
        targetConfig,
        endpointTargets: [
            {
                path: targetConfig,
                bindings: [
                    { key: 'beacon_port', service: 'cl-1-lighthouse-geth', portId: 'http', kind: 'port' },
                    { key: 'execution_client_port', service: 'el-1-geth-lighthouse', portId: 'rpc', kind: 'port' },
                    { key: 'downstream_relay_port', service: 'mev-relay-api', portId: 'http', kind: 'port' },
                ],
            },
        ],
        genesis: { artifact: 'el_cl_genesis_data', manifest: 'config.yaml' },
        jwtArtifact: 'jwt_file',
        fileServer: { service: 'apache', portId: 'http', bundlePath: '/network-config.tar' },
        peer: {
            service: 'cl-1-lighthouse-geth',
            portId: 'http',
            identityPath: '/eth/v1/node/identity',
            p2pPort: 9000,
        },
        keyListLimit: 10,
        configGenCommand: ['just', 'setup-docker-simulation'],
        composeDir: configDir,
        envFile: path.join(configDir, '.env.bootstrap'),
        timeouts: {
            commandMs: 5 * 60 * 1000,
            clusterRunMs: 30 * 60 * 1000,
            httpMs: 60 * 1000,
        },
        retry: { ...DEFAULT_RETRY_POLICY },
    };
}

export class ConfigLoader {
    private configPath: string | null;
    private explicit: boolean;

    constructor(
        private workDir: string,
        private env: NodeJS.ProcessEnv = process.env,
        configPath?: string
    ) {
        this.explicit = !!configPath;
        if (configPath) {
            this.configPath = path.resolve(workDir, configPath);
        } else {
            const found = CONFIG_FILE_NAMES
                .map(name => path.join(workDir, name))
                .find(p => fs.existsSync(p));
            this.configPath = found ?? null;
        }
    }

    get source(): string | null {
        return this.configPath;
    }

    async readFile(): Promise<FileConfig> {
        if (!this.configPath) return {};

        if (!await fs.pathExists(this.configPath)) {
            if (this.explicit) {
                throw new ConfigError(`Config file not found: ${this.configPath}`);
            }
            return {};
        }

        // Load and parse (strip comments for jsonc)
        let content = await fs.readFile(this.configPath, 'utf-8');
        content = this.stripJsonComments(content);

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new ConfigError(`Invalid config JSON in ${this.configPath}: ${e instanceof Error ? e.message : e}`);
        }

        const parsed = FileConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
                .join('; ');
            throw new ConfigError(`Invalid config in ${this.configPath}: ${issues}`);
        }
        return parsed.data;
    }

    /**
     * Precedence: defaults < config file < environment < CLI overrides.
     * Relative paths resolve against the repo root.
     */
    async load(overrides: ConfigOverrides = {}): Promise<BootstrapConfig> {
        const file = await this.readFile();
        const env = this.env;

        const repoRoot = path.resolve(
            this.workDir,
            overrides.repoRoot ?? env.BOOTSTRAP_REPO_ROOT ?? file.repoRoot ?? '.'
        );
        const resolve = (p: string) => path.resolve(repoRoot, p);
        const defaults = defaultsFor(repoRoot);

        const configDir = file.configDir ? resolve(file.configDir) : defaults.configDir;
        const targetConfig = file.targetConfig ? resolve(file.targetConfig) : defaults.targetConfig;
        const endpointTargets: EndpointTarget[] = file.endpointTargets
            ? file.endpointTargets.map(t => ({ path: resolve(t.path), bindings: t.bindings }))
            : defaults.endpointTargets.map(t => ({ ...t, path: t.path === defaults.targetConfig ? targetConfig : t.path }));

        const config: BootstrapConfig = {
            enclaveName: overrides.enclaveName ?? env.ENCLAVE_NAME ?? file.enclaveName ?? 'preconf-testnet',
            repoRoot,
            outputDir: path.resolve(this.workDir, overrides.outputDir ?? env.OUTPUT_DIR ?? file.outputDir ?? '/tmp/fabric'),
            configDir,
            dataDir: file.dataDir ? resolve(file.dataDir) : path.join(configDir, 'data'),
            networkParams: file.networkParams ? resolve(file.networkParams) : path.join(configDir, 'kurtosis-network-params.yaml'),
            package: file.package ?? defaults.package,
            targetConfig,
            endpointTargets,
            genesis: { ...defaults.genesis, ...file.genesis },
            jwtArtifact: file.jwtArtifact ?? defaults.jwtArtifact,
            fileServer: { ...defaults.fileServer, ...file.fileServer },
            peer: { ...defaults.peer, ...file.peer },
            feeRecipient: env.FEE_RECIPIENT || file.feeRecipient || ZERO_ADDRESS,
            keyListLimit: file.keyListLimit ?? defaults.keyListLimit,
            configGenCommand: file.configGenCommand ?? defaults.configGenCommand,
            composeDir: file.composeDir ? resolve(file.composeDir) : configDir,
            envFile: file.envFile ? resolve(file.envFile) : path.join(file.composeDir ? resolve(file.composeDir) : configDir, '.env.bootstrap'),
            timeouts: { ...defaults.timeouts, ...file.timeouts },
            retry: { ...defaults.retry, ...file.retry },
        };

        if (!FEE_RECIPIENT_REGEX.test(config.feeRecipient)) {
            throw new ConfigError(`FEE_RECIPIENT must be a 20-byte hex address, got: ${config.feeRecipient}`);
        }
        if (!/^[a-zA-Z0-9-]+$/.test(config.enclaveName)) {
            throw new ConfigError(`Invalid enclave name: ${config.enclaveName}`);
        }

        return config;
    }

    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}
