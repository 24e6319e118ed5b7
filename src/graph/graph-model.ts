/**
 * Per-unit graph container: CFG nodes and edges, clusters, DFG nodes and
 * edges. Node ids are dense indices into the owning arrays.
 */

export type EdgeLabel = string | string[];

export interface CfgNode {
  id: number;
  label: string;
  clusterId?: number;
  line?: number;
}

export interface CfgEdge {
  src: number;
  dst: number;
  label?: EdgeLabel;
}

export interface ClusterNodeMetadata {
  /** Sub-graph key of the detail graph this node drills down into */
  link: string;
}

export interface Cluster {
  id: number;
  name: string;
  color: string;
  nodeIds: number[];
  metadata: Map<number, ClusterNodeMetadata>;
}

export interface DfgNode {
  id: number;
  name: string;
}

export interface DfgEdge {
  src: number;
  dst: number;
}

/**
 * SSA version tables for one module. Shared by every graph built while
 * traversing that module so versions never repeat across blocks.
 */
export class SsaState {
  private counters = new Map<string, number>();
  private latestNames = new Map<string, string>();

  next(variable: string): string {
    const version = (this.counters.get(variable) ?? 0) + 1;
    this.counters.set(variable, version);
    const qualified = `${variable}_${version}`;
    this.latestNames.set(variable, qualified);
    return qualified;
  }

  /** Latest qualified name, or the bare name for a never-assigned (free) variable */
  latest(variable: string): string {
    return this.latestNames.get(variable) ?? variable;
  }

  version(variable: string): number {
    return this.counters.get(variable) ?? 0;
  }

  reset(): void {
    this.counters.clear();
    this.latestNames.clear();
  }
}

export class GraphModel {
  readonly cfgNodes: CfgNode[] = [];
  readonly cfgEdges: CfgEdge[] = [];
  readonly clusters: Cluster[] = [];
  readonly nodeToCluster = new Map<number, number>();

  /** Module type each instance node navigates to */
  readonly nodeModuleLinks = new Map<number, string>();
  readonly nodeDefs = new Map<number, string>();
  readonly nodeUses = new Map<number, string[]>();
  readonly nodeSourceText = new Map<number, string>();

  readonly dfgNodes: DfgNode[] = [];
  readonly dfgEdges: DfgEdge[] = [];

  private dfgNodeIndex = new Map<string, number>();
  private dfgEdgeKeys = new Set<string>();
  private clusterStack: number[] = [];

  constructor(
    readonly name: string,
    private ssa: SsaState = new SsaState()
  ) {}

  addCluster(name: string, color = 'lightgrey'): number {
    const id = this.clusters.length;
    this.clusters.push({ id, name, color, nodeIds: [], metadata: new Map() });
    return id;
  }

  pushCluster(clusterId: number): void {
    this.clusterStack.push(clusterId);
  }

  popCluster(): number | undefined {
    return this.clusterStack.pop();
  }

  currentCluster(): number | undefined {
    return this.clusterStack[this.clusterStack.length - 1];
  }

  /**
   * Add a CFG node. Without an explicit cluster the innermost open cluster is used.
   */
  addCfgNode(label: string, clusterId: number | undefined = this.currentCluster(), line?: number): number {
    const id = this.cfgNodes.length;
    const node: CfgNode = { id, label };
    if (line !== undefined) {
      node.line = line;
    }

    const cluster = clusterId !== undefined ? this.clusters[clusterId] : undefined;
    if (cluster) {
      node.clusterId = cluster.id;
      cluster.nodeIds.push(id);
      this.nodeToCluster.set(id, cluster.id);
    }

    this.cfgNodes.push(node);
    return id;
  }

  /** Ids are not validated; callers only pass ids they received from this graph */
  addCfgEdge(src: number, dst: number, label?: EdgeLabel): void {
    const edge: CfgEdge = { src, dst };
    if (label !== undefined && label !== '') {
      edge.label = label;
    }
    this.cfgEdges.push(edge);
  }

  setNodeLink(clusterId: number, nodeId: number, link: string): void {
    this.clusters[clusterId]?.metadata.set(nodeId, { link });
  }

  ssaNew(variable: string): string {
    return this.ssa.next(variable);
  }

  ssaLatest(variable: string): string {
    return this.ssa.latest(variable);
  }

  resetSsa(): void {
    this.ssa.reset();
  }

  /** Get or create the DFG node for a qualified name */
  dfgNode(name: string): number {
    const existing = this.dfgNodeIndex.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.dfgNodes.length;
    this.dfgNodes.push({ id, name });
    this.dfgNodeIndex.set(name, id);
    return id;
  }

  dfgEdge(src: number, dst: number): void {
    const key = `${src}->${dst}`;
    if (this.dfgEdgeKeys.has(key)) {
      return;
    }
    this.dfgEdgeKeys.add(key);
    this.dfgEdges.push({ src, dst });
  }

  findDfgNode(name: string): number | undefined {
    return this.dfgNodeIndex.get(name);
  }

  nodeLines(): Map<number, number> {
    const lines = new Map<number, number>();
    for (const node of this.cfgNodes) {
      if (node.line !== undefined) {
        lines.set(node.id, node.line);
      }
    }
    return lines;
  }
}
