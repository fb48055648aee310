export { RoleKernel } from './kernel-core/L4/RoleKernel.js';
export type { PerformanceReport, UseReport, RegistrySnapshot } from './kernel-core/L4/RoleKernel.js';
export { EntityHandle, Instance } from './kernel-core/L4/Handles.js';
export { EntityRegistry } from './kernel-core/L1/Entity.js';
export type { EntityDefinition, EntityRecord } from './kernel-core/L1/Entity.js';
export { InheritanceWalker } from './kernel-core/L3/InheritanceWalker.js';
export { resolveConfig, DEFAULT_MAX_DEPTH } from './kernel-core/L0/Config.js';
export type { RoleKernelConfig, RoleKernelOptions } from './kernel-core/L0/Config.js';
export { ConsoleLogger, SilentLogger } from './kernel-core/L0/Ports.js';
export type { ILogger, LogLevel } from './kernel-core/L0/Ports.js';
export { entityOf } from './kernel-core/L0/Ontology.js';
export type {
    Declaration, EntityName, Invocant, InstanceLike, Method, MethodBinding, MethodName, RoleName
} from './kernel-core/L0/Ontology.js';
export { ErrorCode, KernelError, isKernelError } from './kernel-core/Errors.js';
export { defaultKernel, define, role, multi, performs, use, does } from './kernel-core/Kernel.js';
