import { BootstrapLogger } from './logger';

/**
 * Base error class for the bootstrap pipeline with recovery hints
 */
export class BootstrapError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'BootstrapError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\nHint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * A required endpoint, service or input is not available
 */
export class PreconditionMissingError extends BootstrapError {
    constructor(message: string, recoveryHint?: string) {
        super(message, recoveryHint);
        this.name = 'PreconditionMissingError';
    }
}

/**
 * Artifact discovery matched nothing
 */
export class ArtifactNotFoundError extends BootstrapError {
    constructor(enclave: string, public expectedPattern: string) {
        super(
            `No validator key artifacts found in enclave '${enclave}'`,
            `Expected artifacts matching ${expectedPattern}. Check that the enclave finished starting.`
        );
        this.name = 'ArtifactNotFoundError';
    }
}

export type PatchTargetReason = 'absent' | 'ambiguous' | 'malformed';

/**
 * The line or field a patch should replace is missing, duplicated or unreadable
 */
export class PatchTargetError extends BootstrapError {
    constructor(message: string, public reason: PatchTargetReason, public documentPath?: string) {
        super(
            documentPath ? `${message} (${documentPath})` : message,
            reason === 'ambiguous'
                ? 'Remove the duplicate lines so exactly one remains.'
                : 'Restore the document from its .bak copy or add the missing entry.'
        );
        this.name = 'PatchTargetError';
    }
}

/**
 * Download, stream or extraction failed after all attempts
 */
export class TransferFailureError extends BootstrapError {
    constructor(message: string, public attempts: number) {
        super(message, 'Confirm the endpoint is enabled in the network params file and re-run.');
        this.name = 'TransferFailureError';
    }
}

/**
 * Peer resolution finished without the fields activation needs
 */
export class ResolutionIncompleteError extends BootstrapError {
    constructor(public missing: string[], public details: Record<string, string>) {
        super(
            `${missing.join(' or ')} is not set. ` +
            Object.entries(details).map(([k, v]) => `${k}: '${v}'`).join(', '),
            'Failed to extract peer info from the enclave. Check that the consensus service is running.'
        );
        this.name = 'ResolutionIncompleteError';
    }
}

/**
 * Invalid configuration file, environment override or flag
 */
export class ConfigError extends BootstrapError {
    constructor(message: string) {
        super(message, 'Fix bootstrap.config.json or the environment overrides and re-run.');
        this.name = 'ConfigError';
    }
}

/**
 * Another bootstrap run holds the output root
 */
export class LockError extends BootstrapError {
    constructor(message: string) {
        super(message, 'Wait for the other run to finish; concurrent runs against one output root are not supported.');
        this.name = 'LockError';
    }
}

/**
 * Log error with recovery hint
 */
export function logError(logger: BootstrapLogger, error: Error): void {
    logger.error(`ERROR: ${error.message}`);
    if (error instanceof BootstrapError && error.recoveryHint) {
        logger.info(`Hint: ${error.recoveryHint}`);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
