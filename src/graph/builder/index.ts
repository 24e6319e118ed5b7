/**
 * GraphBuilder modules
 * Barrel exports for the architecture pass, detail pass and connection resolution
 */

// Core Types
export * from './types';

// Per-module state
export { SignalRegistry, scanAccesses, instancePortDirection, modulePortDirection } from './signal-registry';
export { ModuleContext } from './module-context';

// Passes
export { DetailPass, UNNAMED_TARGET, clusterColor } from './detail-pass';
export { ArchitecturePass, summarizeBlock } from './architecture-pass';
export { resolveConnections, isIgnoredSignal } from './connection-resolver';

// Orchestrator
export { GraphBuilder, findModules } from './graph-builder';
