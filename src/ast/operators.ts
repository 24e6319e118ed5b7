export type OperatorKind =
  | 'comparison'
  | 'logical'
  | 'arithmetic'
  | 'bitwise'
  | 'shift'
  | 'unary'
  | 'structural';

export interface OperatorInfo {
  kind: OperatorKind;
  /** Infix or prefix symbol used by the expression formatter */
  symbol: string;
  /** Name of the synthetic DFG node created for this operator */
  dfgName: string;
}

const op = (kind: OperatorKind, symbol: string, dfgName: string): OperatorInfo => ({
  kind,
  symbol,
  dfgName,
});

const OPERATORS: Readonly<Record<string, OperatorInfo>> = {
  // Comparison, signed variants share the symbol
  lt: op('comparison', '<', 'LT'),
  lts: op('comparison', '<', 'LT'),
  lte: op('comparison', '<=', 'LTE'),
  ltes: op('comparison', '<=', 'LTE'),
  gt: op('comparison', '>', 'GT'),
  gts: op('comparison', '>', 'GT'),
  gte: op('comparison', '>=', 'GTE'),
  gtes: op('comparison', '>=', 'GTE'),
  eq: op('comparison', '==', 'EQ'),
  neq: op('comparison', '!=', 'NEQ'),

  land: op('logical', '&&', 'LAND'),
  logand: op('logical', '&&', 'LAND'),
  lor: op('logical', '||', 'LOR'),
  logor: op('logical', '||', 'LOR'),

  add: op('arithmetic', '+', 'ADD'),
  sub: op('arithmetic', '-', 'SUB'),
  mul: op('arithmetic', '*', 'MUL'),
  muls: op('arithmetic', '*', 'MUL'),
  div: op('arithmetic', '/', 'DIV'),
  divs: op('arithmetic', '/', 'DIV'),
  mod: op('arithmetic', '%', 'MOD'),
  moddiv: op('arithmetic', '%', 'MOD'),

  and: op('bitwise', '&', 'AND'),
  or: op('bitwise', '|', 'OR'),
  xor: op('bitwise', '^', 'XOR'),

  shl: op('shift', '<<', 'SLL'),
  sll: op('shift', '<<', 'SLL'),
  shiftl: op('shift', '<<', 'SLL'),
  shr: op('shift', '>>', 'SRL'),
  srl: op('shift', '>>', 'SRL'),
  shiftr: op('shift', '>>', 'SRL'),
  ashr: op('shift', '>>>', 'SRA'),
  sra: op('shift', '>>>', 'SRA'),
  shiftrs: op('shift', '>>>', 'SRA'),

  neg: op('unary', '-', 'NEG'),
  negate: op('unary', '-', 'NEG'),
  not: op('unary', '~', 'NOT'),
  lnot: op('unary', '!', 'LNOT'),
  lognot: op('unary', '!', 'LNOT'),

  concat: op('structural', ',', 'CONCAT'),
  bitselect: op('structural', '[]', 'BITSEL'),
  sel: op('structural', '[]', 'BITSEL'),
  partselect: op('structural', '[:]', 'PARTSEL'),
  cond: op('structural', '?:', 'MUX'),
  ternary: op('structural', '?:', 'MUX'),
};

export function operatorFor(tag: string): OperatorInfo | undefined {
  return Object.prototype.hasOwnProperty.call(OPERATORS, tag) ? OPERATORS[tag] : undefined;
}

/** Tags counted by the datapath heuristic */
export const DATAPATH_OPERATOR_TAGS: ReadonlySet<string> = new Set(
  Object.entries(OPERATORS)
    .filter(([, info]) => info.kind === 'arithmetic' || info.kind === 'bitwise')
    .map(([tag]) => tag)
);

export const ADDITION_TAGS: ReadonlySet<string> = new Set(['add']);
