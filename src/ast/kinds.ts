import { AstNode, attr, findChild, tagOf } from './types';
import { OperatorInfo, operatorFor } from './operators';

/**
 * Closed variants over the raw AST. Tag strings are interpreted here and
 * nowhere else; consumers switch on `kind` exhaustively.
 */

// ---------- Expressions ----------

export type Expression =
  | { kind: 'variable'; node: AstNode; name: string }
  | { kind: 'constant'; node: AstNode; value: string }
  | { kind: 'comparison'; node: AstNode; operator: OperatorInfo; left: AstNode; right: AstNode }
  | { kind: 'logical'; node: AstNode; operator: OperatorInfo; operands: readonly AstNode[] }
  | { kind: 'binary'; node: AstNode; operator: OperatorInfo; left: AstNode; right: AstNode }
  | { kind: 'unary'; node: AstNode; operator: OperatorInfo; operand: AstNode | undefined }
  | { kind: 'ternary'; node: AstNode; condition: AstNode; whenTrue: AstNode; whenFalse: AstNode }
  | { kind: 'structural'; node: AstNode; operator: OperatorInfo }
  | { kind: 'other'; node: AstNode };

export const VARIABLE_TAGS: ReadonlySet<string> = new Set(['varref', 'var', 'signal']);
const CONSTANT_TAGS: ReadonlySet<string> = new Set(['const', 'constant', 'number']);
const TERNARY_TAGS: ReadonlySet<string> = new Set(['cond', 'ternary']);

export function toExpression(node: AstNode): Expression {
  const tag = tagOf(node);

  if (VARIABLE_TAGS.has(tag)) {
    return { kind: 'variable', node, name: attr(node, 'name') ?? '' };
  }
  if (CONSTANT_TAGS.has(tag)) {
    return { kind: 'constant', node, value: attr(node, 'name', 'value') ?? '' };
  }

  const [first, second, third] = node.children;

  if (TERNARY_TAGS.has(tag)) {
    if (first && second && third) {
      return { kind: 'ternary', node, condition: first, whenTrue: second, whenFalse: third };
    }
    return { kind: 'other', node };
  }

  const operator = operatorFor(tag);
  if (!operator) {
    return { kind: 'other', node };
  }

  switch (operator.kind) {
    case 'comparison':
      return first && second
        ? { kind: 'comparison', node, operator, left: first, right: second }
        : { kind: 'other', node };
    case 'logical':
      return { kind: 'logical', node, operator, operands: node.children };
    case 'arithmetic':
    case 'bitwise':
    case 'shift':
      return first && second
        ? { kind: 'binary', node, operator, left: first, right: second }
        : { kind: 'other', node };
    case 'unary':
      return { kind: 'unary', node, operator, operand: first };
    case 'structural':
      return { kind: 'structural', node, operator };
    default:
      return assertNever(operator.kind);
  }
}

/**
 * True when the tag reads as a value rather than a statement.
 */
export function isExpressionNode(node: AstNode): boolean {
  const tag = tagOf(node);
  return (
    VARIABLE_TAGS.has(tag) ||
    CONSTANT_TAGS.has(tag) ||
    TERNARY_TAGS.has(tag) ||
    operatorFor(tag) !== undefined
  );
}

// ---------- Statements ----------

export type AssignKind = 'blocking' | 'nonblocking' | 'continuous';

export interface CaseItem {
  node: AstNode;
  /** Match expressions; empty for the default item */
  values: readonly AstNode[];
  /** Explicit label from a `value` attribute, if the frontend provides one */
  label?: string;
  body: readonly AstNode[];
}

export type Statement =
  | { kind: 'process'; node: AstNode; tag: string; body: readonly AstNode[] }
  | { kind: 'block'; node: AstNode; statements: readonly AstNode[] }
  | {
      kind: 'if';
      node: AstNode;
      condition: AstNode | undefined;
      thenBranch: readonly AstNode[];
      elseBranch: readonly AstNode[];
    }
  | { kind: 'case'; node: AstNode; subject: AstNode | undefined; items: readonly CaseItem[] }
  | {
      kind: 'loop';
      node: AstNode;
      tag: string;
      init: readonly AstNode[];
      condition: AstNode | undefined;
      body: readonly AstNode[];
    }
  | {
      kind: 'assign';
      node: AstNode;
      assignKind: AssignKind;
      /** Every child before the target */
      sources: readonly AstNode[];
      target: AstNode | undefined;
    }
  | { kind: 'break'; node: AstNode }
  | { kind: 'continue'; node: AstNode }
  | { kind: 'declaration'; node: AstNode }
  | { kind: 'unrecognized'; node: AstNode };

/** Procedural blocks the classifier's heuristics apply to */
export const HEURISTIC_PROCESS_TAGS: ReadonlySet<string> = new Set([
  'always',
  'always_ff',
  'always_comb',
  'initial',
]);

/** Functions and tasks: one block each, their arguments and locals stay inside */
export const SUBROUTINE_TAGS: ReadonlySet<string> = new Set(['function', 'func', 'task']);

export const PROCESS_TAGS: ReadonlySet<string> = new Set([
  ...HEURISTIC_PROCESS_TAGS,
  'always_latch',
  'final',
  ...SUBROUTINE_TAGS,
]);

export const CLOCKED_PROCESS_TAGS: ReadonlySet<string> = new Set(['always_ff']);

const BLOCK_TAGS: ReadonlySet<string> = new Set(['begin', 'block', 'fork', 'then', 'else', 'body']);
const IF_TAGS: ReadonlySet<string> = new Set(['if', 'ifstmt']);
export const CASE_TAGS: ReadonlySet<string> = new Set(['case', 'casestmt']);
const CASE_ITEM_TAGS: ReadonlySet<string> = new Set(['caseitem', 'item']);
const LOOP_TAGS: ReadonlySet<string> = new Set(['while', 'for', 'repeat', 'loop', 'dowhile', 'forever']);
const NONBLOCKING_TAGS: ReadonlySet<string> = new Set(['nonblockingassign', 'assigndly']);
const CONTINUOUS_TAGS: ReadonlySet<string> = new Set(['continuousassign', 'contassign', 'assignw']);
export const ASSIGN_TAGS: ReadonlySet<string> = new Set([
  'assign',
  'blockingassign',
  ...NONBLOCKING_TAGS,
  ...CONTINUOUS_TAGS,
]);
const DECLARATION_TAGS: ReadonlySet<string> = new Set([
  'var',
  'decl',
  'param',
  'genvar',
  'typedef',
  'sentree',
  'senitem',
  'comment',
]);

export function isNonblocking(node: AstNode): boolean {
  return NONBLOCKING_TAGS.has(tagOf(node));
}

export function toStatement(node: AstNode): Statement {
  const tag = tagOf(node);

  if (PROCESS_TAGS.has(tag)) {
    return {
      kind: 'process',
      node,
      tag,
      body: node.children.filter(child => !DECLARATION_TAGS.has(tagOf(child))),
    };
  }
  if (BLOCK_TAGS.has(tag)) {
    return { kind: 'block', node, statements: node.children };
  }
  if (IF_TAGS.has(tag)) {
    return toIfStatement(node);
  }
  if (CASE_TAGS.has(tag)) {
    return toCaseStatement(node);
  }
  if (LOOP_TAGS.has(tag)) {
    return toLoopStatement(node, tag);
  }
  if (ASSIGN_TAGS.has(tag)) {
    const sources = node.children.slice(0, -1);
    const target = node.children.length >= 2 ? node.children[node.children.length - 1] : undefined;
    const assignKind: AssignKind = NONBLOCKING_TAGS.has(tag)
      ? 'nonblocking'
      : CONTINUOUS_TAGS.has(tag)
        ? 'continuous'
        : 'blocking';
    return { kind: 'assign', node, assignKind, sources, target };
  }
  if (tag === 'break') {
    return { kind: 'break', node };
  }
  if (tag === 'continue') {
    return { kind: 'continue', node };
  }
  if (DECLARATION_TAGS.has(tag)) {
    return { kind: 'declaration', node };
  }
  return { kind: 'unrecognized', node };
}

/**
 * A `cond` child holding exactly one node is a wrapper; anything else is a
 * ternary expression standing in condition position.
 */
function unwrapCondition(node: AstNode | undefined): AstNode | undefined {
  if (node && tagOf(node) === 'cond' && node.children.length === 1) {
    return node.children[0];
  }
  return node;
}

function branchStatements(node: AstNode | undefined): readonly AstNode[] {
  if (!node) return [];
  const tag = tagOf(node);
  return tag === 'then' || tag === 'else' ? node.children : [node];
}

function toIfStatement(node: AstNode): Statement {
  const thenWrapper = findChild(node, 'then');
  const elseWrapper = findChild(node, 'else');

  if (thenWrapper || elseWrapper) {
    const explicitCond = findChild(node, 'cond');
    const condition = explicitCond
      ? unwrapCondition(explicitCond)
      : node.children.find(child => isExpressionNode(child));
    return {
      kind: 'if',
      node,
      condition,
      thenBranch: branchStatements(thenWrapper),
      elseBranch: branchStatements(elseWrapper),
    };
  }

  const [condition, thenNode, elseNode] = node.children;
  return {
    kind: 'if',
    node,
    condition: unwrapCondition(condition),
    thenBranch: branchStatements(thenNode),
    elseBranch: branchStatements(elseNode),
  };
}

function toCaseStatement(node: AstNode): Statement {
  const items: CaseItem[] = [];
  let subject: AstNode | undefined;

  for (const child of node.children) {
    const tag = tagOf(child);
    if (CASE_ITEM_TAGS.has(tag)) {
      const values = child.children.filter(grandchild => isExpressionNode(grandchild));
      const body = child.children.filter(grandchild => !isExpressionNode(grandchild));
      items.push({ node: child, values, label: attr(child, 'value'), body });
    } else if (subject === undefined) {
      subject = tag === 'expr' ? child.children[0] : child;
    }
  }

  return { kind: 'case', node, subject, items };
}

function toLoopStatement(node: AstNode, tag: string): Statement {
  const condWrapper = findChild(node, 'cond');
  const bodyWrapper = findChild(node, 'body');

  if (bodyWrapper || (condWrapper && condWrapper.children.length === 1)) {
    const init = findChild(node, 'init');
    return {
      kind: 'loop',
      node,
      tag,
      init: init ? init.children : [],
      condition: unwrapCondition(condWrapper),
      body: bodyWrapper ? bodyWrapper.children : [],
    };
  }

  const condIndex = node.children.findIndex(child => isExpressionNode(child));
  if (condIndex < 0) {
    return { kind: 'loop', node, tag, init: [], condition: undefined, body: node.children };
  }
  return {
    kind: 'loop',
    node,
    tag,
    init: node.children.slice(0, condIndex),
    condition: node.children[condIndex],
    body: node.children.slice(condIndex + 1),
  };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
