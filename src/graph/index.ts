export * from './graph-model';
export * from './design-hierarchy';
export * from './diagnostics';
export * from './block-classifier';
export * from './render-model';
export * from './builder';
