/**
 * Observability Port: Logger
 * The kernel writes through this port; the default adapter is the console.
 */
export interface ILogger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Console adapter. Every line is tagged with the component, e.g. `[RoleKernel] ...`.
 */
export class ConsoleLogger implements ILogger {
    constructor(
        private readonly component: string = 'RoleKernel',
        private readonly level: LogLevel = 'warn'
    ) { }

    public debug(message: string, ...meta: unknown[]) {
        if (this.enabled('debug')) console.debug(this.format(message), ...meta);
    }

    public info(message: string, ...meta: unknown[]) {
        if (this.enabled('info')) console.info(this.format(message), ...meta);
    }

    public warn(message: string, ...meta: unknown[]) {
        if (this.enabled('warn')) console.warn(this.format(message), ...meta);
    }

    public error(message: string, ...meta: unknown[]) {
        if (this.enabled('error')) console.error(this.format(message), ...meta);
    }

    public enabled(level: LogLevel): boolean {
        return RANK[level] >= RANK[this.level];
    }

    private format(message: string): string {
        return `[${this.component}] ${message}`;
    }
}

export class SilentLogger implements ILogger {
    public debug() { }
    public info() { }
    public warn() { }
    public error() { }
}
