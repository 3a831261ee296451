/**
 * SHELL: Transfers with bounded retry
 */

import fs from 'fs-extra';
import { TransferFailureError } from '../core/errors';
import { BootstrapLogger } from '../core/logger';
import { RetryExhaustedError, RetryOptions, RetryPolicy, withRetry } from '../core/retry';
import { ClusterClient } from './kurtosis';

export interface TransferOptions {
    retry: RetryPolicy;
    logger: BootstrapLogger;
    /** Test hook; forwarded to withRetry. */
    sleep?: RetryOptions['sleep'];
}

/**
 * Runs a transfer under the retry policy. The destination is emptied before
 * every attempt so a half-written attempt never leaks into the next one.
 * @throws TransferFailureError once the attempts are used up
 */
export async function transfer<T>(
    what: string,
    destDir: string,
    fn: () => Promise<T>,
    options: TransferOptions
): Promise<T> {
    try {
        return await withRetry(async () => {
            await fs.emptyDir(destDir);
            return fn();
        }, {
            ...options.retry,
            sleep: options.sleep,
            onRetry: (err, attempt, delay) => {
                const reason = err instanceof Error ? err.message : String(err);
                options.logger.warn(`  ${what}: attempt ${attempt} failed (${reason}), retrying in ${Math.round(delay)}ms`);
            },
        });
    } catch (err) {
        if (err instanceof RetryExhaustedError) {
            throw new TransferFailureError(`Failed to ${what}: ${err.message}`, err.attempts);
        }
        throw err;
    }
}

export function downloadArtifact(
    cluster: ClusterClient,
    enclave: string,
    artifact: string,
    destDir: string,
    options: TransferOptions
): Promise<void> {
    return transfer(
        `download artifact ${artifact}`,
        destDir,
        () => cluster.downloadArtifact(enclave, artifact, destDir),
        options
    );
}
