/**
 * Heuristic block classifier
 *
 * Labels a procedural block or continuous assignment with the role it most
 * likely plays. Rules are checked in a fixed priority order; the labels are
 * hints for a reader, not verified properties.
 */

import { AstNode, attr, findAll, findChild, findFirst, tagOf } from '../ast/types';
import {
  ASSIGN_TAGS,
  CASE_TAGS,
  CLOCKED_PROCESS_TAGS,
  HEURISTIC_PROCESS_TAGS,
  VARIABLE_TAGS,
  isNonblocking,
} from '../ast/kinds';
import { ADDITION_TAGS, DATAPATH_OPERATOR_TAGS } from '../ast/operators';
import { collectVariableNames, firstVariableName } from '../ast/variable-collector';
import { config } from '../utils/config';

export type BlockLabel =
  | 'Continuous Assignment'
  | 'FSM Controller'
  | 'Counter'
  | 'Combinational Datapath'
  | 'Sequential Logic'
  | 'Combinational Logic'
  | `Block: ${string}`;

export type ClassificationRule =
  | 'assignment'
  | 'non-procedural'
  | 'fsm'
  | 'counter'
  | 'datapath'
  | 'default';

export interface BlockClassification {
  label: BlockLabel;
  clocked: boolean;
  rule: ClassificationRule;
}

export interface ClassifierOptions {
  datapathOpThreshold?: number;
}

const EDGE_TYPES: ReadonlySet<string> = new Set(['posedge', 'negedge', 'pos', 'neg', 'both', 'bothedge']);
const EDGE_TAGS: ReadonlySet<string> = new Set(['posedge', 'negedge']);
const SENSITIVITY_ITEM_TAGS: ReadonlySet<string> = new Set(['senitem']);
const CLOCK_NAME_HINTS = ['clk', 'clock', 'reset', 'rst'];

/**
 * A block is clock-sensitive when its sensitivity list has an edge trigger,
 * or, when the frontend dropped the edge type, names a clock or reset net.
 */
export function isClockSensitive(block: AstNode): boolean {
  if (CLOCKED_PROCESS_TAGS.has(tagOf(block))) {
    return true;
  }

  const sentree = findChild(block, 'sentree');
  if (!sentree) return false;

  const items = findAll(sentree, SENSITIVITY_ITEM_TAGS);
  const hasEdge = items.some(item => {
    const edge = attr(item, 'edgeType', 'type', 'edge');
    return edge !== undefined && EDGE_TYPES.has(edge.toLowerCase());
  });
  if (hasEdge || findFirst(sentree, EDGE_TAGS)) {
    return true;
  }

  return items.some(item =>
    collectVariableNames(item).some(name => {
      const lower = name.toLowerCase();
      return CLOCK_NAME_HINTS.some(hint => lower.includes(hint));
    })
  );
}

function containsCase(block: AstNode): boolean {
  return findAll(block, CASE_TAGS).length > 0;
}

/**
 * `x <= x + ...`: a non-blocking write whose target is also an addition operand.
 */
function hasSelfIncrement(block: AstNode): boolean {
  const assignments = findAll(block, ASSIGN_TAGS).filter(isNonblocking);

  return assignments.some(assignment => {
    if (assignment.children.length < 2) return false;
    const target = firstVariableName(assignment.children[assignment.children.length - 1]);
    if (!target) return false;

    return assignment.children.slice(0, -1).some(source => {
      const additions = ADDITION_TAGS.has(tagOf(source))
        ? [source, ...findAll(source, ADDITION_TAGS)]
        : findAll(source, ADDITION_TAGS);
      return additions.some(addition =>
        findAll(addition, VARIABLE_TAGS).some(ref => attr(ref, 'name') === target)
      );
    });
  });
}

function countDatapathOperators(block: AstNode): number {
  return findAll(block, DATAPATH_OPERATOR_TAGS).length;
}

export function classifyBlock(block: AstNode, options: ClassifierOptions = {}): BlockClassification {
  const tag = tagOf(block);
  const threshold = options.datapathOpThreshold ?? config.analysis.datapathOpThreshold;

  if (ASSIGN_TAGS.has(tag)) {
    return { label: 'Continuous Assignment', clocked: false, rule: 'assignment' };
  }
  if (!HEURISTIC_PROCESS_TAGS.has(tag)) {
    return { label: `Block: ${tag}`, clocked: false, rule: 'non-procedural' };
  }

  const clocked = isClockSensitive(block);

  if (clocked && containsCase(block)) {
    return { label: 'FSM Controller', clocked, rule: 'fsm' };
  }
  if (clocked && hasSelfIncrement(block)) {
    return { label: 'Counter', clocked, rule: 'counter' };
  }
  if (!clocked && (containsCase(block) || countDatapathOperators(block) > threshold)) {
    return { label: 'Combinational Datapath', clocked, rule: 'datapath' };
  }

  return {
    label: clocked ? 'Sequential Logic' : 'Combinational Logic',
    clocked,
    rule: 'default',
  };
}
