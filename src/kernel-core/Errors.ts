/**
 * Allomorph Kernel Error Taxonomy
 * Centralized error codes for declaration failures and traversal faults.
 */

export enum ErrorCode {
    // I. Declaration
    UNRESOLVED_METHOD = 'UNRESOLVED_METHOD',
    INVALID_DECLARATION = 'INVALID_DECLARATION',

    // II. Ancestry
    CYCLIC_INHERITANCE = 'CYCLIC_INHERITANCE',
    DEPTH_EXCEEDED = 'DEPTH_EXCEEDED',

    // III. Dispatch
    UNKNOWN_METHOD = 'UNKNOWN_METHOD',

    // IV. Kernel setup
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly detail: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Allomorph:${code}] ${detail}`);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}
