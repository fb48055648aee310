import { ErrorCode, KernelError } from '../Errors.js';
import { ConsoleLogger, LOG_LEVELS } from './Ports.js';
import type { ILogger, LogLevel } from './Ports.js';

export interface RoleKernelConfig {
    /**
     * Fail at declaration time when a role names a method its declaring entity
     * does not define. When off, the binding resolves the method by name on
     * each call and fails there instead.
     */
    strictDeclarations: boolean;
    /** Longest ancestor path the walker follows before giving up. */
    maxDepth: number;
    logLevel: LogLevel;
    logger: ILogger;
}

export type RoleKernelOptions = Partial<RoleKernelConfig>;

export const DEFAULT_MAX_DEPTH = 256;

export function resolveConfig(options: RoleKernelOptions = {}): RoleKernelConfig {
    const strictDeclarations = options.strictDeclarations ?? true;
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const logLevel = options.logLevel ?? 'warn';

    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
        throw new KernelError(ErrorCode.INVALID_CONFIG, `maxDepth must be a positive integer (got ${maxDepth})`, { option: 'maxDepth' });
    }
    if (!LOG_LEVELS.includes(logLevel)) {
        throw new KernelError(ErrorCode.INVALID_CONFIG, `Unknown log level '${logLevel}'`, { option: 'logLevel' });
    }

    return {
        strictDeclarations,
        maxDepth,
        logLevel,
        logger: options.logger ?? new ConsoleLogger('RoleKernel', logLevel)
    };
}
