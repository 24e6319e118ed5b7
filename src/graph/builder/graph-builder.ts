import { AstNode, attr, tagOf } from '../../ast/types';
import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { DesignHierarchy } from '../design-hierarchy';
import { ArchitecturePass } from './architecture-pass';
import { ModuleContext } from './module-context';
import { GraphBuilderOptions, ResolvedBuilderOptions } from './types';

const logger = createComponentLogger('graph-builder');

/**
 * Entry point of graph construction: one DesignHierarchy per module found
 * under the AST root, modules processed strictly in document order.
 */
export class GraphBuilder {
  private readonly options: ResolvedBuilderOptions;

  constructor(options: GraphBuilderOptions = {}) {
    this.options = {
      ignoredSignals: options.ignoredSignals ?? config.analysis.ignoredSignals,
      datapathOpThreshold: options.datapathOpThreshold ?? config.analysis.datapathOpThreshold,
      sourceLines: options.sourceLines,
    };
  }

  buildDesign(root: AstNode): DesignHierarchy[] {
    const modules = findModules(root);
    logger.info('Building design graphs', { modules: modules.length });

    const hierarchies = modules.map(module => this.buildModule(module));

    const diagnostics = hierarchies.reduce((sum, h) => sum + h.diagnostics.length, 0);
    logger.info('Design graphs built', { modules: hierarchies.length, diagnostics });
    return hierarchies;
  }

  buildModule(module: AstNode): DesignHierarchy {
    const moduleName = attr(module, 'name', 'origName') ?? '<anonymous>';
    const context = new ModuleContext(moduleName, logger);

    const hierarchy = new ArchitecturePass(context, this.options, logger).run(module);

    logger.info('Built module', {
      module: moduleName,
      architectureNodes: hierarchy.architecture.cfgNodes.length,
      architectureEdges: hierarchy.architecture.cfgEdges.length,
      detailGraphs: hierarchy.subGraphs.size,
    });
    return hierarchy;
  }
}

/**
 * Module nodes in document order. The root may itself be a module; nested
 * modules are not searched for.
 */
export function findModules(root: AstNode): AstNode[] {
  if (tagOf(root) === 'module') {
    return [root];
  }
  return root.children.flatMap(child => findModules(child));
}
