export * from './types';
export * from './operators';
export * from './kinds';
export * from './errors';
export { formatExpression } from './expression-formatter';
export { collectVariableNames, firstVariableName } from './variable-collector';
export { loadXmlAst, loadJsonAst } from './loaders';
