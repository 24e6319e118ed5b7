/**
 * rtl-graph - architecture, control-flow and data-flow graphs from HDL ASTs
 *
 * Library entry point. The CLI in ./cli is a thin wrapper over these exports.
 */

export * from './ast';
export * from './graph';
export * from './utils';

// Main components for programmatic usage
export { GraphBuilder } from './graph/builder';
export { toRenderModel } from './graph/render-model';
export { loadXmlAst, loadJsonAst } from './ast/loaders';
