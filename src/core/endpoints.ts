/**
 * CORE: Endpoint merge policy
 * Field-scoped rewrites of a config document from live port assignments.
 * Only the first occurrence of a bound key is touched; every other byte is preserved.
 */

import { PatchTargetError } from './errors';

export type EndpointKind = 'port' | 'url';

export interface EndpointBinding {
    /** Field name in the document, e.g. beacon_port. */
    key: string;
    /** Enclave service that owns the port. */
    service: string;
    /** Port label on that service, e.g. http or rpc. */
    portId: string;
    kind: EndpointKind;
}

export type EndpointOutcome =
    | { key: string; status: 'updated'; value: number; previous: string }
    | { key: string; status: 'unchanged'; value: number }
    | { key: string; status: 'no-assignment' }
    | { key: string; status: 'absent' };

export interface MergeResult {
    text: string;
    outcomes: EndpointOutcome[];
}

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** `kurtosis port print` prints `127.0.0.1:58976` or `http://127.0.0.1:58976`. */
export function parsePortFromEndpoint(endpoint: string): number | null {
    const m = endpoint.trim().match(/:(\d+)\/?$/);
    if (!m) return null;
    const port = parseInt(m[1], 10);
    return port > 0 && port <= 65535 ? port : null;
}

/** Adds http:// when the endpoint came back as a bare host:port. */
export function toHttpUrl(endpoint: string): string {
    const trimmed = endpoint.trim().replace(/\/+$/, '');
    return /^https?:\/\//.test(trimmed) ? trimmed : `http://${trimmed}`;
}

function scalarRegex(key: string): RegExp {
    return new RegExp(`^([ \\t]*${escapeRegex(key)}[ \\t]*=[ \\t]*)(.*?)([ \\t]*\\r?)$`, 'm');
}

function urlRegex(key: string): RegExp {
    return new RegExp(`^([ \\t]*${escapeRegex(key)}[ \\t]*=[ \\t]*")([^"\\r\\n]+)("[ \\t]*\\r?)$`, 'm');
}

export function replaceUrlPort(url: string, port: number): string {
    const m = url.match(/^(https?:\/\/)([^/]+)(\/.*)?$/);
    if (!m) {
        throw new PatchTargetError(`Not an http(s) URL: ${url}`, 'malformed');
    }
    const authority = m[2].replace(/:\d+$/, '');
    return `${m[1]}${authority}:${port}${m[3] ?? ''}`;
}

function applyOne(text: string, binding: EndpointBinding, port: number): { text: string; outcome: EndpointOutcome } {
    const regex = binding.kind === 'url' ? urlRegex(binding.key) : scalarRegex(binding.key);
    const m = text.match(regex);
    if (!m) {
        return { text, outcome: { key: binding.key, status: 'absent' } };
    }

    const previous = m[2];
    const next = binding.kind === 'url' ? replaceUrlPort(previous, port) : String(port);
    if (next === previous) {
        return { text, outcome: { key: binding.key, status: 'unchanged', value: port } };
    }

    const updated = text.replace(regex, (_all, prefix: string, _value: string, suffix: string) => `${prefix}${next}${suffix}`);
    return { text: updated, outcome: { key: binding.key, status: 'updated', value: port, previous } };
}

/**
 * Applies observed ports to the document.
 * A binding whose port is missing from `ports` has no live assignment and leaves its field alone.
 */
export function mergeEndpoints(
    text: string,
    bindings: EndpointBinding[],
    ports: ReadonlyMap<string, number>
): MergeResult {
    let current = text;
    const outcomes: EndpointOutcome[] = [];

    for (const binding of bindings) {
        const port = ports.get(binding.key);
        if (port === undefined) {
            outcomes.push({ key: binding.key, status: 'no-assignment' });
            continue;
        }
        const { text: next, outcome } = applyOne(current, binding, port);
        current = next;
        outcomes.push(outcome);
    }

    return { text: current, outcomes };
}
