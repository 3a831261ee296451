export interface BootstrapLogger {
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements BootstrapLogger {
    info(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        console.warn(msg, ...args);
    }
}

export type LogLevel = 'info' | 'error' | 'success' | 'warn';

export interface LogLine {
    level: LogLevel;
    message: string;
}

/**
 * Keeps every line in memory. Used by tests and by callers that want to
 * inspect what a stage printed.
 */
export class MemoryLogger implements BootstrapLogger {
    readonly lines: LogLine[] = [];

    info(msg: string): void {
        this.lines.push({ level: 'info', message: msg });
    }

    error(msg: string): void {
        this.lines.push({ level: 'error', message: msg });
    }

    success(msg: string): void {
        this.lines.push({ level: 'success', message: msg });
    }

    warn(msg: string): void {
        this.lines.push({ level: 'warn', message: msg });
    }

    messages(level?: LogLevel): string[] {
        return this.lines
            .filter(l => level === undefined || l.level === level)
            .map(l => l.message);
    }
}
