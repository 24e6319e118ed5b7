import { DesignHierarchy } from './design-hierarchy';
import { EdgeLabel, GraphModel } from './graph-model';
import { BuildDiagnostic } from './diagnostics';

/**
 * Plain, JSON-serializable view of the graphs handed to a renderer.
 * Maps keyed by node id become objects keyed by the id's decimal string.
 */

export interface ClusterSnapshot {
  name: string;
  color: string;
  nodeIds: number[];
  /** Node id -> sub-graph key of its detail graph */
  links: Record<string, string>;
}

export interface GraphSnapshot {
  name: string;
  nodes: string[];
  edges: Array<[number, number, EdgeLabel | null]>;
  clusters: ClusterSnapshot[];
  dfgNodes: string[];
  dfgEdges: Array<[number, number]>;
  lines: Record<string, number>;
  moduleLinks: Record<string, string>;
  defs: Record<string, string>;
  uses: Record<string, string[]>;
  sourceText: Record<string, string>;
}

export interface ModuleRenderModel {
  module: string;
  architecture: GraphSnapshot;
  details: Record<string, GraphSnapshot>;
  diagnostics: BuildDiagnostic[];
}

function byId<T>(map: ReadonlyMap<number, T>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [id, value] of map) {
    record[String(id)] = value;
  }
  return record;
}

export function snapshotGraph(graph: GraphModel): GraphSnapshot {
  return {
    name: graph.name,
    nodes: graph.cfgNodes.map(node => node.label),
    edges: graph.cfgEdges.map((edge): [number, number, EdgeLabel | null] => [
      edge.src,
      edge.dst,
      edge.label ?? null,
    ]),
    clusters: graph.clusters.map(cluster => ({
      name: cluster.name,
      color: cluster.color,
      nodeIds: [...cluster.nodeIds],
      links: byId(new Map([...cluster.metadata].map(([id, meta]): [number, string] => [id, meta.link]))),
    })),
    dfgNodes: graph.dfgNodes.map(node => node.name),
    dfgEdges: graph.dfgEdges.map((edge): [number, number] => [edge.src, edge.dst]),
    lines: byId(graph.nodeLines()),
    moduleLinks: byId(graph.nodeModuleLinks),
    defs: byId(graph.nodeDefs),
    uses: byId(graph.nodeUses),
    sourceText: byId(graph.nodeSourceText),
  };
}

export function toRenderModel(hierarchy: DesignHierarchy): ModuleRenderModel {
  const details: Record<string, GraphSnapshot> = {};
  for (const [key, graph] of hierarchy.subGraphs) {
    details[key] = snapshotGraph(graph);
  }

  return {
    module: hierarchy.moduleName,
    architecture: snapshotGraph(hierarchy.architecture),
    details,
    diagnostics: hierarchy.diagnostics,
  };
}
