#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { BootstrapServices, RunOptions, runBootstrap, runTeardown } from './bootstrap';
import { BootstrapConfig, ConfigLoader } from './core/config';
import { logError } from './core/errors';
import { BootstrapLogger, ConsoleLogger } from './core/logger';
import { PipelineResult } from './core/runner';
import { StateManager } from './core/state';
import { DockerCompose } from './shell/compose';
import { ABORTED_EXIT_CODE, confirmTeardown } from './shell/confirm';
import { EnvFileRenderer } from './shell/env-file';
import { runCommand } from './shell/exec';
import { AxiosHttpClient } from './shell/http';
import { KurtosisCli } from './shell/kurtosis';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
    // From dist/cli.js or src/cli.ts, go up to package root
    const parsed = PackageSchema.safeParse(fs.readJsonSync(path.join(__dirname, '..', 'package.json')));
    return parsed.success ? parsed.data.version : '0.0.0';
}

const logger = new ConsoleLogger();
const program = new Command();

program
    .name('testnet-bootstrap')
    .description('Bring up a local preconfirmation testnet from a fresh enclave')
    .version(readVersion());

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

interface CommonFlags {
    config?: string;
    enclave?: string;
    outputDir?: string;
}

function withCommonFlags(command: Command): Command {
    return command
        .option('-c, --config <file>', 'config file (default: bootstrap.config.jsonc or bootstrap.config.json)')
        .option('-e, --enclave <name>', 'enclave name (env: ENCLAVE_NAME)')
        .option('-o, --output-dir <dir>', 'output root for keys and run state (env: OUTPUT_DIR)');
}

async function loadConfig(flags: CommonFlags): Promise<BootstrapConfig> {
    const loader = new ConfigLoader(process.cwd(), process.env, flags.config);
    return loader.load({ enclaveName: flags.enclave, outputDir: flags.outputDir });
}

function createServices(config: BootstrapConfig, log: BootstrapLogger): BootstrapServices {
    return {
        cluster: new KurtosisCli(config.timeouts),
        compose: new DockerCompose(config.composeDir, config.timeouts.commandMs),
        http: new AxiosHttpClient(config.timeouts.httpMs),
        run: runCommand,
        logger: log,
        renderer: new EnvFileRenderer(),
    };
}

function report(result: PipelineResult, successMessage: string): void {
    const { state, error } = result;
    if (state.failure) {
        logger.error(`\nFailed at [${state.failure.position}/${state.stages.length}] ${state.failure.label}`);
    }
    if (error) {
        logError(logger, error);
        process.exitCode = 1;
        return;
    }
    const warned = state.stages.filter(s => s.status === 'warned').length;
    logger.success(`\n${successMessage}${warned > 0 ? ` (${warned} warning(s))` : ''}`);
}

async function runStages(flags: CommonFlags, options: RunOptions, successMessage: string): Promise<void> {
    const config = await loadConfig(flags);
    const result = await runBootstrap(config, createServices(config, logger), options);
    report(result, successMessage);
}

// ═══════════════════════════════════════════════════════════════════════════
// UP / DOWN
// ═══════════════════════════════════════════════════════════════════════════

withCommonFlags(
    program
        .command('up')
        .description('Tear down, start the enclave, prepare configs and start the services')
        .option('--docker-only', 'keep the enclave; only restart the Docker services')
        .option('-y, --yes', 'skip the teardown confirmation')
).action(async (flags: CommonFlags & { dockerOnly?: boolean; yes?: boolean }) => {
    const config = await loadConfig(flags);

    logger.info(`Enclave:    ${config.enclaveName}`);
    logger.info(`Output dir: ${config.outputDir}`);
    logger.info(`Data dir:   ${config.dataDir}`);

    const proceed = await confirmTeardown(
        flags.dockerOnly
            ? 'Stop and restart the Docker services?'
            : `Remove enclave '${config.enclaveName}' and start over?`,
        { yes: !!flags.yes, interactive: !!process.stdin.isTTY }
    );
    if (!proceed) {
        logger.info('Aborted.');
        process.exitCode = ABORTED_EXIT_CODE;
        return;
    }

    const result = await runBootstrap(config, createServices(config, logger), { dockerOnly: !!flags.dockerOnly });
    report(result, 'Bootstrap complete. Services are starting.');
});

withCommonFlags(
    program
        .command('down')
        .description('Stop the Docker services and remove the enclave')
        .option('--docker-only', 'keep the enclave')
        .option('--clean', 'also remove stopped enclaves and their artifacts')
).action(async (flags: CommonFlags & { dockerOnly?: boolean; clean?: boolean }) => {
    const config = await loadConfig(flags);
    const result = await runTeardown(config, createServices(config, logger), {
        dockerOnly: !!flags.dockerOnly,
        clean: !!flags.clean,
    });
    report(result, 'Teardown complete.');
});

// ═══════════════════════════════════════════════════════════════════════════
// SINGLE STAGES
// ═══════════════════════════════════════════════════════════════════════════

const STANDALONE: Array<{ name: string; stage: string; description: string }> = [
    { name: 'ports', stage: 'ports', description: 'Write live service ports into the config documents' },
    { name: 'chain-spec', stage: 'chain-spec', description: 'Patch the chain line from the genesis manifest' },
    { name: 'keys', stage: 'keys', description: 'Consolidate validator keys and secrets from the enclave' },
    { name: 'data', stage: 'network-data', description: 'Fetch genesis data and the JWT secret' },
    { name: 'peer', stage: 'peer', description: 'Resolve the trusted peer multiaddress' },
];

for (const entry of STANDALONE) {
    withCommonFlags(program.command(entry.name).description(entry.description))
        .action(async (flags: CommonFlags) => {
            await runStages(flags, { only: [entry.stage] }, 'Done.');
        });
}

// ═══════════════════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════════════════

withCommonFlags(
    program
        .command('status')
        .description('Show the stages of the last full run')
).action(async (flags: CommonFlags) => {
    const config = await loadConfig(flags);
    const state = await new StateManager(config.outputDir).load();
    if (!state) {
        logger.info(`No run recorded in ${config.outputDir}`);
        return;
    }

    logger.info(`Last run: ${state.status} (${new Date(state.updatedAt).toISOString()})`);
    state.stages.forEach((stage, i) => {
        const detail = stage.detail ? `  ${stage.detail}` : '';
        logger.info(`  [${i + 1}/${state.stages.length}] ${stage.status.padEnd(9)} ${stage.label}${detail}`);
    });
});

program.parseAsync(process.argv).catch((err: unknown) => {
    logError(logger, err instanceof Error ? err : new Error(String(err)));
    process.exitCode = 1;
});
