/**
 * Detail pass
 *
 * Recursive descent over one procedural block, producing its statement-level
 * CFG and, through SSA renaming, its DFG. Every visit returns the fragment's
 * entry node and the node control leaves from; a missing exit means control
 * was transferred elsewhere (break/continue).
 */

import { AstNode, sourceLine, tagOf } from '../../ast/types';
import { Statement, assertNever, toStatement } from '../../ast/kinds';
import { operatorFor } from '../../ast/operators';
import { formatExpression } from '../../ast/expression-formatter';
import { collectVariableNames, firstVariableName } from '../../ast/variable-collector';
import { GraphModel } from '../graph-model';
import { DiagnosticCollector } from '../diagnostics';

interface Fragment {
  entry: number;
  exit?: number;
}

interface LoopFrame {
  header: number;
  exit: number;
}

export const UNNAMED_TARGET = '<unnamed>';

const CLUSTER_COLORS: Readonly<Record<string, string>> = {
  'FSM Controller': 'skyblue',
  Counter: 'lightgreen',
  'Combinational Datapath': 'lightcoral',
  'Sequential Logic': 'darkseagreen1',
  'Combinational Logic': 'lightgoldenrod',
  'Continuous Assignment': 'lightsalmon',
  Init: 'lavender',
};

export function clusterColor(classification: string): string {
  return CLUSTER_COLORS[classification] ?? 'lightgrey';
}

export class DetailPass {
  private loops: LoopFrame[] = [];

  constructor(
    private readonly graph: GraphModel,
    private readonly diagnostics: DiagnosticCollector,
    private readonly sourceLines?: readonly string[]
  ) {}

  /**
   * Build the whole detail graph for a block: a cluster named after the
   * classification, an entry node, then the block's statements.
   */
  build(block: AstNode, classification: string): void {
    const clusterId = this.graph.addCluster(classification, clusterColor(classification));
    this.graph.pushCluster(clusterId);

    const entry = this.addNode(`Enter ${tagOf(block)}`, block);
    const statement = toStatement(block);
    const body = statement.kind === 'process' ? statement.body : [block];

    const fragment = this.sequence(body);
    if (fragment) {
      this.graph.addCfgEdge(entry, fragment.entry);
    }

    this.graph.popCluster();
  }

  private visit(node: AstNode): Fragment | undefined {
    const statement = toStatement(node);

    switch (statement.kind) {
      case 'process':
        return this.sequence(statement.body);
      case 'block':
        return this.sequence(statement.statements);
      case 'if':
        return this.visitIf(statement);
      case 'case':
        return this.visitCase(statement);
      case 'loop':
        return this.visitLoop(statement);
      case 'assign':
        return this.visitAssign(statement);
      case 'break':
        return this.visitJump(node, 'break');
      case 'continue':
        return this.visitJump(node, 'continue');
      case 'declaration':
        return undefined;
      case 'unrecognized':
        this.diagnostics.unrecognized(node);
        return this.sequence(node.children);
      default:
        return assertNever(statement);
    }
  }

  /** Chain statements in document order */
  private sequence(nodes: readonly AstNode[]): Fragment | undefined {
    let entry: number | undefined;
    let exit: number | undefined;

    for (const node of nodes) {
      const fragment = this.visit(node);
      if (!fragment) continue;

      if (entry === undefined) {
        entry = fragment.entry;
      } else if (exit !== undefined) {
        this.graph.addCfgEdge(exit, fragment.entry);
      }
      exit = fragment.exit;
    }

    return entry === undefined ? undefined : { entry, exit };
  }

  private visitIf(statement: Extract<Statement, { kind: 'if' }>): Fragment {
    const { node, condition } = statement;
    if (!condition) {
      this.diagnostics.malformed(node, 'Conditional without a condition', 'labelled <missing condition>');
    }

    const uses = this.lowerCondition(condition);
    const conditionText = condition ? formatExpression(condition) : '<missing condition>';
    const conditionId = this.addNode(`if ${parenthesize(conditionText)}\nUSE: ${formatUses(uses)}`, node);
    this.graph.nodeUses.set(conditionId, uses);
    const joinId = this.graph.addCfgNode('EndIf');

    this.wireBranch(conditionId, joinId, statement.thenBranch, 'True');
    this.wireBranch(conditionId, joinId, statement.elseBranch, 'False');

    return { entry: conditionId, exit: joinId };
  }

  private wireBranch(from: number, join: number, statements: readonly AstNode[], label: string): void {
    const branch = this.sequence(statements);
    if (!branch) {
      this.graph.addCfgEdge(from, join, label);
      return;
    }
    this.graph.addCfgEdge(from, branch.entry, label);
    if (branch.exit !== undefined) {
      this.graph.addCfgEdge(branch.exit, join);
    }
  }

  private visitCase(statement: Extract<Statement, { kind: 'case' }>): Fragment {
    const { node, subject } = statement;
    if (!subject) {
      this.diagnostics.malformed(node, 'Case statement without a subject', 'labelled <missing subject>');
    }

    const uses = this.lowerCondition(subject);
    const subjectText = subject ? formatExpression(subject) : '<missing subject>';
    const dispatchId = this.addNode(`case ${parenthesize(subjectText)}\nUSE: ${formatUses(uses)}`, node);
    this.graph.nodeUses.set(dispatchId, uses);
    const endId = this.graph.addCfgNode('EndCase');

    const itemNodes = new Map<string, number>();
    for (const item of statement.items) {
      const value =
        item.label ?? (item.values.length > 0 ? item.values.map(formatExpression).join(', ') : 'default');

      let itemId = itemNodes.get(value);
      if (itemId === undefined) {
        itemId = this.addNode(value, item.node);
        itemNodes.set(value, itemId);
        this.graph.addCfgEdge(dispatchId, itemId, value);
      }

      const body = this.sequence(item.body);
      if (!body) {
        this.graph.addCfgEdge(itemId, endId);
        continue;
      }
      this.graph.addCfgEdge(itemId, body.entry);
      if (body.exit !== undefined) {
        this.graph.addCfgEdge(body.exit, endId);
      }
    }

    if (statement.items.length === 0) {
      this.graph.addCfgEdge(dispatchId, endId);
    }

    return { entry: dispatchId, exit: endId };
  }

  private visitLoop(statement: Extract<Statement, { kind: 'loop' }>): Fragment {
    const { node, tag, condition } = statement;
    if (!condition && tag !== 'forever') {
      this.diagnostics.malformed(node, `Loop <${tag}> without a condition`, 'header labelled with the loop kind');
    }

    const init = this.sequence(statement.init);

    const uses = this.lowerCondition(condition);
    const headerLabel = condition
      ? `${tag} ${parenthesize(formatExpression(condition))}\nUSE: ${formatUses(uses)}`
      : tag;
    const headerId = this.addNode(headerLabel, node);
    this.graph.nodeUses.set(headerId, uses);
    const exitId = this.graph.addCfgNode('EndLoop');

    this.loops.push({ header: headerId, exit: exitId });
    const body = this.sequence(statement.body);
    this.loops.pop();

    if (body) {
      this.graph.addCfgEdge(headerId, body.entry, 'True');
      if (body.exit !== undefined) {
        this.graph.addCfgEdge(body.exit, headerId);
      }
    } else {
      this.graph.addCfgEdge(headerId, headerId, 'True');
    }
    this.graph.addCfgEdge(headerId, exitId, 'False');

    if (init) {
      if (init.exit !== undefined) {
        this.graph.addCfgEdge(init.exit, headerId);
      }
      return { entry: init.entry, exit: exitId };
    }
    return { entry: headerId, exit: exitId };
  }

  private visitJump(node: AstNode, kind: 'break' | 'continue'): Fragment {
    const id = this.addNode(kind, node);
    const loop = this.loops[this.loops.length - 1];

    if (!loop) {
      this.diagnostics.malformed(node, `${kind} outside a loop`, 'treated as a plain statement');
      return { entry: id, exit: id };
    }

    this.graph.addCfgEdge(id, kind === 'break' ? loop.exit : loop.header);
    return { entry: id };
  }

  private visitAssign(statement: Extract<Statement, { kind: 'assign' }>): Fragment {
    const { node, sources, target } = statement;

    let targetName = firstVariableName(target);
    if (!targetName) {
      this.diagnostics.malformed(node, 'Assignment without a target variable', `target named ${UNNAMED_TARGET}`);
      targetName = UNNAMED_TARGET;
    }

    // Right-hand side reads the versions live before this write
    const uses = [...new Set(sources.flatMap(source => collectVariableNames(source)))].map(name =>
      this.graph.ssaLatest(name)
    );
    const outputs = sources.flatMap(source => this.lowerExpression(source));

    const defined = this.graph.ssaNew(targetName);
    const definedId = this.graph.dfgNode(defined);
    outputs.forEach(output => this.graph.dfgEdge(output, definedId));

    const operator = statement.assignKind === 'nonblocking' ? '<=' : '=';
    const targetText = (target && formatExpression(target)) || targetName;
    const valueText = sources.map(source => formatExpression(source)).join(', ');

    const id = this.addNode(
      `${targetText} ${operator} ${valueText}\nDEF: ${defined}\nUSE: ${formatUses(uses)}`,
      node
    );
    this.graph.nodeDefs.set(id, defined);
    this.graph.nodeUses.set(id, uses);

    return { entry: id, exit: id };
  }

  /**
   * Lower an expression into the DFG. Each operator gets its own node fed by
   * its operands; leaves resolve to the latest SSA version of each variable.
   */
  private lowerExpression(node: AstNode): number[] {
    const operator = operatorFor(tagOf(node));
    if (!operator) {
      return collectVariableNames(node).map(name => this.graph.dfgNode(this.graph.ssaLatest(name)));
    }

    const opId = this.graph.dfgNode(`op_${operator.dfgName}_${this.graph.dfgNodes.length}`);
    for (const child of node.children) {
      this.lowerExpression(child).forEach(operand => this.graph.dfgEdge(operand, opId));
    }
    return [opId];
  }

  private lowerCondition(condition: AstNode | undefined): string[] {
    if (!condition) return [];
    this.lowerExpression(condition);
    return collectVariableNames(condition).map(name => this.graph.ssaLatest(name));
  }

  private addNode(label: string, node: AstNode): number {
    const line = sourceLine(node);
    const id = this.graph.addCfgNode(label, this.graph.currentCluster(), line);

    const text = line !== undefined ? this.sourceLines?.[line - 1]?.trim() : undefined;
    if (text) {
      this.graph.nodeSourceText.set(id, text);
    }
    return id;
  }
}

/** Wrap in parentheses unless the text already is one parenthesized group */
function parenthesize(text: string): string {
  if (text.startsWith('(') && text.endsWith(')')) {
    let depth = 0;
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '(') depth++;
      else if (text[i] === ')') depth--;
      if (depth === 0 && i < text.length - 1) {
        return `(${text})`;
      }
    }
    return text;
  }
  return `(${text})`;
}

function formatUses(uses: readonly string[]): string {
  return uses.length > 0 ? uses.join(', ') : 'none';
}
