/**
 * CORE: Artifact naming grammar
 * Validator key bundles are named {index}-{clClient}-{elClient}-{startValidator}-{endValidator},
 * e.g. 1-lighthouse-geth-0-3, 2-lighthouse-geth-4-7.
 */

export interface ArtifactInfo {
    uuid: string;
    name: string;
}

export interface KeyArtifact {
    name: string;
    index: number;
    clClient: string;
    elClient: string;
    startValidator: number;
    endValidator: number;
}

export const KEY_ARTIFACT_PATTERN = '{index}-{cl}-{el}-{start}-{end}';

const KEY_ARTIFACT_REGEX = /^(\d+)-([a-zA-Z0-9]+)-([a-zA-Z0-9]+)-(\d+)-(\d+)$/;

export function parseKeyArtifactName(name: string): KeyArtifact | null {
    const m = name.match(KEY_ARTIFACT_REGEX);
    if (!m) return null;
    return {
        name,
        index: parseInt(m[1], 10),
        clClient: m[2],
        elClient: m[3],
        startValidator: parseInt(m[4], 10),
        endValidator: parseInt(m[5], 10),
    };
}

/** Non-matching names are dropped, never reported as errors. Order follows the enclave listing. */
export function selectKeyArtifacts(artifacts: ArtifactInfo[]): KeyArtifact[] {
    const selected: KeyArtifact[] = [];
    const seen = new Set<string>();
    for (const artifact of artifacts) {
        const parsed = parseKeyArtifactName(artifact.name);
        if (!parsed || seen.has(parsed.name)) continue;
        seen.add(parsed.name);
        selected.push(parsed);
    }
    return selected;
}

const SECTION_HEADER_REGEX = /^=+\s*(.*?)\s*=+$/;
const ARTIFACT_ROW_REGEX = /^([a-f0-9]+)\s+(\S+)$/;

/**
 * Parses the "Files Artifacts" table of `kurtosis enclave inspect`.
 * Rows are `<uuid> <name>`. When the output has section headers only the
 * artifacts section is read; otherwise every two-column row counts.
 */
export function parseArtifactTable(output: string): ArtifactInfo[] {
    const lines = output.split(/\r?\n/).map(l => l.trim());
    const hasSections = lines.some(l => SECTION_HEADER_REGEX.test(l));
    let inArtifacts = !hasSections;

    const rows: ArtifactInfo[] = [];
    for (const line of lines) {
        const header = line.match(SECTION_HEADER_REGEX);
        if (header) {
            inArtifacts = /files artifacts/i.test(header[1]);
            continue;
        }
        if (!inArtifacts) continue;
        const m = line.match(ARTIFACT_ROW_REGEX);
        if (m) rows.push({ uuid: m[1], name: m[2] });
    }
    return rows;
}
