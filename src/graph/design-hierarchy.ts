import { GraphModel } from './graph-model';
import { BuildDiagnostic } from './diagnostics';

/**
 * One module's graphs: the architecture view plus the detail graph of
 * every procedural block, keyed by the link stored on its architecture node.
 */
export class DesignHierarchy {
  readonly subGraphs = new Map<string, GraphModel>();
  diagnostics: BuildDiagnostic[] = [];

  constructor(
    readonly moduleName: string,
    readonly architecture: GraphModel
  ) {}

  addSubGraph(key: string, graph: GraphModel): void {
    this.subGraphs.set(key, graph);
  }

  getSubGraph(key: string): GraphModel | undefined {
    return this.subGraphs.get(key);
  }

  /** Detail graph linked from an architecture node, if it has one */
  detailFor(architectureNodeId: number): GraphModel | undefined {
    for (const cluster of this.architecture.clusters) {
      const meta = cluster.metadata.get(architectureNodeId);
      if (meta) {
        return this.subGraphs.get(meta.link);
      }
    }
    return undefined;
  }
}
