/**
 * Architecture pass
 *
 * Visits a module's children in document order and produces one node per
 * procedural block, continuous assignment and instance, plus one aggregated
 * node per port direction. Each block also gets its own detail graph.
 */

import winston from 'winston';
import { AstNode, PortDirection, attr, findAll, normalizeDirection, sourceLine, tagOf } from '../../ast/types';
import { ASSIGN_TAGS, PROCESS_TAGS, SUBROUTINE_TAGS, isNonblocking, toExpression } from '../../ast/kinds';
import { formatExpression } from '../../ast/expression-formatter';
import { collectVariableNames, firstVariableName } from '../../ast/variable-collector';
import { classifyBlock } from '../block-classifier';
import { DesignHierarchy } from '../design-hierarchy';
import { DetailPass } from './detail-pass';
import { ModuleContext } from './module-context';
import { instancePortDirection, modulePortDirection, scanAccesses } from './signal-registry';
import { resolveConnections } from './connection-resolver';
import { ResolvedBuilderOptions } from './types';

const INSTANCE_TAGS: ReadonlySet<string> = new Set(['instance', 'cell', 'instantiation']);
const PORT_DECLARATION_TAGS: ReadonlySet<string> = new Set(['var', 'port']);
const INSTANCE_PORT_TAGS: ReadonlySet<string> = new Set(['port', 'pin']);
const CONTAINER_TAGS: ReadonlySet<string> = new Set(['begin', 'generate', 'genblock', 'scope']);
const IGNORED_TAGS: ReadonlySet<string> = new Set([
  'var',
  'decl',
  'param',
  'genvar',
  'typedef',
  'typetable',
  'comment',
]);

const PORT_NODE_TITLES: Readonly<Record<PortDirection, string>> = {
  in: 'Inputs',
  out: 'Outputs',
  inout: 'Inouts',
};

interface BlockSummary {
  classification: string;
  inline?: string;
}

export class ArchitecturePass {
  private moduleCluster = 0;
  private ports: Record<PortDirection, string[]> = { in: [], out: [], inout: [] };

  constructor(
    private readonly context: ModuleContext,
    private readonly options: ResolvedBuilderOptions,
    private readonly logger: winston.Logger
  ) {}

  run(module: AstNode): DesignHierarchy {
    const { architecture } = this.context;
    architecture.resetSsa();

    this.moduleCluster = architecture.addCluster(`Module: ${this.context.moduleName}`, 'lightblue');
    architecture.pushCluster(this.moduleCluster);

    module.children.forEach(child => this.visitChild(child));
    this.materializePorts();

    const connections = resolveConnections(this.context.registry, this.options.ignoredSignals);
    for (const connection of connections) {
      const label = connection.signals.length === 1 ? connection.signals[0] : connection.signals;
      architecture.addCfgEdge(connection.src, connection.dst, label);
    }

    architecture.popCluster();

    const { hierarchy } = this.context;
    hierarchy.diagnostics = this.context.diagnostics.list();
    return hierarchy;
  }

  /** Port declarations count only directly under the module */
  private visitChild(child: AstNode, moduleLevel = true): void {
    const tag = tagOf(child);

    if (PROCESS_TAGS.has(tag) || ASSIGN_TAGS.has(tag)) {
      this.visitBlock(child);
    } else if (INSTANCE_TAGS.has(tag)) {
      this.visitInstance(child);
    } else if (moduleLevel && PORT_DECLARATION_TAGS.has(tag) && attr(child, 'dir', 'direction')) {
      this.visitPortDeclaration(child);
    } else if (CONTAINER_TAGS.has(tag)) {
      child.children.forEach(grandchild => this.visitChild(grandchild, false));
    } else if (!IGNORED_TAGS.has(tag)) {
      this.context.diagnostics.unrecognized(child);
      child.children.forEach(grandchild => this.visitChild(grandchild, false));
    }
  }

  private visitBlock(block: AstNode): void {
    const { architecture, diagnostics, registry } = this.context;
    const tag = tagOf(block);

    const classification = classifyBlock(block, {
      datapathOpThreshold: this.options.datapathOpThreshold,
    });
    if (classification.rule === 'default') {
      diagnostics.ambiguous(block, classification.label);
    }

    const summary = summarizeBlock(block, classification.label);
    const label = summary.inline ? `${summary.classification}\n${summary.inline}` : summary.classification;
    const nodeId = architecture.addCfgNode(label, this.moduleCluster, sourceLine(block));

    // Subroutine arguments and locals are not module nets
    if (!SUBROUTINE_TAGS.has(tag)) {
      registry.registerAccesses(nodeId, scanAccesses(block));
    }

    const { key, graph } = this.context.createDetailGraph(tag);
    new DetailPass(graph, diagnostics, this.options.sourceLines).build(block, summary.classification);
    architecture.setNodeLink(this.moduleCluster, nodeId, key);

    this.logger.debug('Built block', {
      module: this.context.moduleName,
      block: key,
      classification: summary.classification,
      cfgNodes: graph.cfgNodes.length,
      dfgNodes: graph.dfgNodes.length,
    });
  }

  private visitInstance(instance: AstNode): void {
    const { architecture, diagnostics, registry } = this.context;

    const name = attr(instance, 'name') ?? '<unnamed instance>';
    const moduleType = attr(instance, 'defName', 'submodname', 'type', 'module');
    if (!moduleType) {
      diagnostics.malformed(instance, `Instance ${name} has no module type`, 'no module link recorded');
    }

    const nodeId = architecture.addCfgNode(
      `${name} (${moduleType ?? '<unknown module>'})`,
      this.moduleCluster,
      sourceLine(instance)
    );
    if (moduleType) {
      architecture.nodeModuleLinks.set(nodeId, moduleType);
    }

    for (const port of instance.children.filter(child => INSTANCE_PORT_TAGS.has(tagOf(child)))) {
      const direction = instancePortDirection(normalizeDirection(attr(port, 'direction', 'dir')));
      collectVariableNames(port).forEach(signal => registry.register(signal, nodeId, direction));
    }
  }

  private visitPortDeclaration(port: AstNode): void {
    const name = attr(port, 'name');
    if (!name) {
      this.context.diagnostics.malformed(port, 'Port declaration without a name', 'port skipped');
      return;
    }
    this.ports[normalizeDirection(attr(port, 'dir', 'direction'))].push(name);
  }

  /** One node per port direction; each port binds with the direction seen from inside */
  private materializePorts(): void {
    const { architecture, registry } = this.context;
    const directions: PortDirection[] = ['in', 'out', 'inout'];

    for (const direction of directions) {
      const names = this.ports[direction];
      if (names.length === 0) continue;

      const nodeId = architecture.addCfgNode(
        `${PORT_NODE_TITLES[direction]}\n${names.join(', ')}`,
        this.moduleCluster
      );
      names.forEach(name => registry.register(name, nodeId, modulePortDirection(direction)));
    }
  }
}

/**
 * Classification plus an inline label. A single assignment is shown in
 * full; an `initial` block holding one constant assignment becomes "Init".
 */
export function summarizeBlock(block: AstNode, classification: string): BlockSummary {
  const tag = tagOf(block);
  const assignments = ASSIGN_TAGS.has(tag) ? [block] : findAll(block, ASSIGN_TAGS);
  if (assignments.length !== 1) {
    return { classification };
  }

  const [assignment] = assignments;
  if (assignment.children.length < 2) {
    return { classification };
  }

  const target = assignment.children[assignment.children.length - 1];
  const sources = assignment.children.slice(0, -1);
  const targetText = formatExpression(target) || firstVariableName(target) || '<unnamed>';
  const valueText = sources.map(source => formatExpression(source)).join(', ');

  if (tag === 'initial' && sources.length === 1 && toExpression(sources[0]).kind === 'constant') {
    return { classification: 'Init', inline: `${targetText} = ${valueText}` };
  }

  const operator = isNonblocking(assignment) ? '<=' : '=';
  return { classification, inline: `${targetText} ${operator} ${valueText}` };
}
