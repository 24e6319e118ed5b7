/**
 * Frontend-neutral AST node. Loaders map their source format onto this
 * shape; the graph builder never mutates it.
 */
export interface AstNode {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  children: readonly AstNode[];
}

export type PortDirection = 'in' | 'out' | 'inout';

/**
 * Build an AST node. Used by the loaders and heavily by tests.
 */
export function el(
  tag: string,
  attributes: Record<string, string> = {},
  ...children: AstNode[]
): AstNode {
  return { tag, attributes, children };
}

export function tagOf(node: AstNode): string {
  return node.tag.toLowerCase();
}

export function attr(node: AstNode, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = node.attributes[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

export function findChild(node: AstNode, tag: string): AstNode | undefined {
  return node.children.find(child => tagOf(child) === tag);
}

/**
 * Depth-first search for the first descendant (or the node itself) with the given tag.
 */
export function findFirst(node: AstNode, tags: ReadonlySet<string>): AstNode | undefined {
  if (tags.has(tagOf(node))) {
    return node;
  }
  for (const child of node.children) {
    const found = findFirst(child, tags);
    if (found) return found;
  }
  return undefined;
}

/**
 * All proper descendants carrying one of the given tags, in document order.
 */
export function findAll(node: AstNode, tags: ReadonlySet<string>): AstNode[] {
  const found: AstNode[] = [];
  const visit = (current: AstNode) => {
    for (const child of current.children) {
      if (tags.has(tagOf(child))) {
        found.push(child);
      }
      visit(child);
    }
  };
  visit(node);
  return found;
}

/**
 * Line number from a `loc` attribute. Accepts the `file,line,col,...` form
 * emitted by XML frontends and a plain `line:col` form.
 */
export function sourceLine(node: AstNode): number | undefined {
  const loc = attr(node, 'loc');
  if (!loc) return undefined;

  const raw = loc.includes(',') ? loc.split(',')[1] : loc.split(':')[0];
  const line = parseInt(raw ?? '', 10);
  return isNaN(line) ? undefined : line;
}

export function normalizeDirection(raw: string | undefined): PortDirection {
  switch ((raw ?? '').toLowerCase()) {
    case 'in':
    case 'input':
      return 'in';
    case 'out':
    case 'output':
      return 'out';
    default:
      return 'inout';
  }
}
