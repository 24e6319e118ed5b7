import { AstNode, attr, tagOf } from './types';
import { VARIABLE_TAGS } from './kinds';

/**
 * Distinct variable names referenced anywhere in a subtree, the root included.
 * Order follows first occurrence.
 */
export function collectVariableNames(node: AstNode | undefined | null): string[] {
  const names = new Set<string>();
  if (!node) {
    return [];
  }

  const visit = (current: AstNode) => {
    if (VARIABLE_TAGS.has(tagOf(current))) {
      const name = attr(current, 'name');
      if (name) names.add(name);
    }
    current.children.forEach(visit);
  };
  visit(node);

  return [...names];
}

/**
 * Name of the first variable reference in a subtree, searching depth-first.
 */
export function firstVariableName(node: AstNode | undefined): string | undefined {
  if (!node) return undefined;
  if (VARIABLE_TAGS.has(tagOf(node))) {
    const name = attr(node, 'name');
    if (name) return name;
  }
  for (const child of node.children) {
    const found = firstVariableName(child);
    if (found) return found;
  }
  return undefined;
}
