import winston from 'winston';
import { GraphModel, SsaState } from '../graph-model';
import { DesignHierarchy } from '../design-hierarchy';
import { DiagnosticCollector } from '../diagnostics';
import { SignalRegistry } from './signal-registry';

/**
 * All state scoped to one module's traversal. A fresh context is created
 * per module, so nothing leaks between modules.
 */
export class ModuleContext {
  readonly ssa = new SsaState();
  readonly registry = new SignalRegistry();
  readonly diagnostics: DiagnosticCollector;
  readonly architecture: GraphModel;
  readonly hierarchy: DesignHierarchy;

  private subGraphCount = 0;

  constructor(
    readonly moduleName: string,
    logger: winston.Logger
  ) {
    this.diagnostics = new DiagnosticCollector(logger);
    this.architecture = new GraphModel(`${moduleName}_arch`, this.ssa);
    this.hierarchy = new DesignHierarchy(moduleName, this.architecture);
  }

  /** Create and register the detail graph for the next procedural block */
  createDetailGraph(blockTag: string): { key: string; graph: GraphModel } {
    const key = `${this.moduleName}_${blockTag}_${this.subGraphCount++}`;
    const graph = new GraphModel(key, this.ssa);
    this.hierarchy.addSubGraph(key, graph);
    return { key, graph };
  }
}
