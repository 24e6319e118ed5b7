import { AstNode, PortDirection, attr, tagOf } from '../../ast/types';
import { ASSIGN_TAGS, VARIABLE_TAGS } from '../../ast/kinds';
import { collectVariableNames, firstVariableName } from '../../ast/variable-collector';
import { BlockAccesses, SignalBinding, SignalDirection } from './types';

/**
 * Per-module index from signal name to the nodes that touch it.
 */
export class SignalRegistry {
  private bindingsBySignal = new Map<string, SignalBinding[]>();

  register(signal: string, nodeId: number, direction: SignalDirection): void {
    const bindings = this.bindingsBySignal.get(signal) ?? [];
    if (bindings.some(b => b.nodeId === nodeId && b.direction === direction)) {
      return;
    }
    bindings.push({ nodeId, direction });
    this.bindingsBySignal.set(signal, bindings);
  }

  registerAccesses(nodeId: number, accesses: BlockAccesses): void {
    accesses.reads.forEach(signal => this.register(signal, nodeId, 'receiver'));
    accesses.writes.forEach(signal => this.register(signal, nodeId, 'driver'));
  }

  signals(): string[] {
    return [...this.bindingsBySignal.keys()];
  }

  bindings(signal: string): SignalBinding[] {
    return [...(this.bindingsBySignal.get(signal) ?? [])];
  }

  get size(): number {
    return this.bindingsBySignal.size;
  }
}

/** An instance input consumes the net; an output drives it */
export function instancePortDirection(direction: PortDirection): SignalDirection {
  switch (direction) {
    case 'in':
      return 'receiver';
    case 'out':
      return 'driver';
    case 'inout':
      return 'inout';
  }
}

/** A module input drives internal logic; an output receives from it */
export function modulePortDirection(direction: PortDirection): SignalDirection {
  switch (direction) {
    case 'in':
      return 'driver';
    case 'out':
      return 'receiver';
    case 'inout':
      return 'inout';
  }
}

/**
 * Reads and writes of a block. An assignment's last child is its write
 * target and every preceding child is read; any other variable reference
 * outside the sensitivity list is a read.
 */
export function scanAccesses(block: AstNode): BlockAccesses {
  const reads = new Set<string>();
  const writes = new Set<string>();

  const visit = (node: AstNode) => {
    const tag = tagOf(node);
    if (tag === 'sentree') {
      return;
    }

    if (ASSIGN_TAGS.has(tag) && node.children.length >= 2) {
      const target = node.children[node.children.length - 1];
      node.children.slice(0, -1).forEach(source => {
        collectVariableNames(source).forEach(name => reads.add(name));
      });
      // Index expressions inside the target (`mem[i]`) are reads
      const written = firstVariableName(target);
      collectVariableNames(target).forEach(name => {
        if (name === written) {
          writes.add(name);
        } else {
          reads.add(name);
        }
      });
      return;
    }

    if (VARIABLE_TAGS.has(tag)) {
      const name = attr(node, 'name');
      if (name) reads.add(name);
    }
    node.children.forEach(visit);
  };
  visit(block);

  return { reads: [...reads], writes: [...writes] };
}
