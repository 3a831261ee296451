/**
 * SHELL: HTTP access to enclave services
 * Explicit timeouts on every request; response bodies validated before use.
 */

import axios, { AxiosInstance } from 'axios';
import { Readable } from 'node:stream';
import { z } from 'zod';

const IdentityResponseSchema = z.object({
    data: z.object({
        peer_id: z.string(),
    }).passthrough(),
});

export interface HttpClient {
    /** GET <baseUrl><path> and return the peer id of the node identity document. */
    fetchPeerId(baseUrl: string, path: string): Promise<string>;
    /** GET a binary body as a stream. Rejects on any non-2xx status. */
    openStream(url: string): Promise<Readable>;
}

export class AxiosHttpClient implements HttpClient {
    private client: AxiosInstance;

    constructor(timeoutMs: number) {
        this.client = axios.create({
            timeout: timeoutMs,
            validateStatus: (status) => status >= 200 && status < 300,
        });
    }

    async fetchPeerId(baseUrl: string, path: string): Promise<string> {
        const res = await this.client.get<unknown>(`${baseUrl}${path}`, { responseType: 'json' });
        const parsed = IdentityResponseSchema.safeParse(res.data);
        if (!parsed.success) {
            throw new Error(`Unexpected identity response from ${baseUrl}${path}`);
        }
        return parsed.data.data.peer_id;
    }

    async openStream(url: string): Promise<Readable> {
        const res = await this.client.get<Readable>(url, { responseType: 'stream', maxRedirects: 5 });
        return res.data;
    }
}
