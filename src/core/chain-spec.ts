/**
 * CORE: Chain parameter line
 * Pure extraction from the genesis manifest and single-line replacement in a config document.
 */

import { PatchTargetError, PreconditionMissingError } from './errors';

export interface ChainParameters {
    genesisTime: number;
    slotDuration: number;
    /** Hex string exactly as the manifest wrote it, case included. */
    forkVersion: string;
    chainId: number;
}

export const MANIFEST_KEYS = {
    genesisTime: 'MIN_GENESIS_TIME',
    slotDuration: 'SECONDS_PER_SLOT',
    forkVersion: 'GENESIS_FORK_VERSION',
    chainId: 'DEPOSIT_CHAIN_ID',
} as const;

/** Multiline anchor: one whole line whose key is `chain`, leading whitespace tolerated. */
const CHAIN_LINE_REGEX = /^([ \t]*)chain[ \t]*=[^\r\n]*$/gm;

const CHAIN_LINE_PARSE_REGEX =
    /^[ \t]*chain[ \t]*=[ \t]*\{[ \t]*genesis_time_secs[ \t]*=[ \t]*(\d+)[ \t]*,[ \t]*slot_time_secs[ \t]*=[ \t]*(\d+)[ \t]*,[ \t]*genesis_fork_version[ \t]*=[ \t]*"(0x[0-9a-fA-F]+)"[ \t]*,[ \t]*chain_id[ \t]*=[ \t]*(\d+)[ \t]*\}[ \t]*$/;

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** First `KEY: value` line of the manifest; surrounding quotes are dropped. */
export function readManifestValue(manifest: string, key: string): string | null {
    const m = manifest.match(new RegExp(`^${escapeRegex(key)}:[ \\t]*(\\S+)`, 'm'));
    if (!m) return null;
    return m[1].replace(/^(['"])(.*)\1$/, '$2');
}

function requireInteger(manifest: string, key: string): number {
    const raw = readManifestValue(manifest, key);
    if (raw === null) {
        throw new PreconditionMissingError(`Genesis manifest has no ${key} entry`);
    }
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
        throw new PreconditionMissingError(`Genesis manifest ${key} is not an integer: ${raw}`);
    }
    return Number(raw);
}

export function parseGenesisManifest(manifest: string): ChainParameters {
    const forkVersion = readManifestValue(manifest, MANIFEST_KEYS.forkVersion);
    if (forkVersion === null) {
        throw new PreconditionMissingError(`Genesis manifest has no ${MANIFEST_KEYS.forkVersion} entry`);
    }
    if (!/^0x[0-9a-fA-F]+$/.test(forkVersion)) {
        throw new PreconditionMissingError(
            `Genesis manifest ${MANIFEST_KEYS.forkVersion} is not a hex string: ${forkVersion}`
        );
    }

    return {
        genesisTime: requireInteger(manifest, MANIFEST_KEYS.genesisTime),
        slotDuration: requireInteger(manifest, MANIFEST_KEYS.slotDuration),
        forkVersion,
        chainId: requireInteger(manifest, MANIFEST_KEYS.chainId),
    };
}

export function formatChainLine(params: ChainParameters): string {
    return `chain = { genesis_time_secs = ${params.genesisTime}, slot_time_secs = ${params.slotDuration}, ` +
        `genesis_fork_version = "${params.forkVersion}", chain_id = ${params.chainId}}`;
}

export function parseChainLine(line: string): ChainParameters | null {
    const m = line.match(CHAIN_LINE_PARSE_REGEX);
    if (!m) return null;
    return {
        genesisTime: Number(m[1]),
        slotDuration: Number(m[2]),
        forkVersion: m[3],
        chainId: Number(m[4]),
    };
}

export function countChainLines(document: string): number {
    return document.match(CHAIN_LINE_REGEX)?.length ?? 0;
}

/**
 * Replaces the one `chain = ...` line. Indentation of the old line is kept;
 * everything else in the document is left as it was.
 * @throws PatchTargetError when there is not exactly one such line
 */
export function patchChainLine(document: string, chainLine: string, documentPath?: string): string {
    const count = countChainLines(document);
    if (count === 0) {
        throw new PatchTargetError('No line starting with "chain =" to replace', 'absent', documentPath);
    }
    if (count > 1) {
        throw new PatchTargetError(
            `Found ${count} lines starting with "chain =", expected exactly one`,
            'ambiguous',
            documentPath
        );
    }
    return document.replace(CHAIN_LINE_REGEX, (_line, indent: string) => `${indent}${chainLine}`);
}
