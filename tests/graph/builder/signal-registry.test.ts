import { el } from '../../../src/ast/types';
import {
  SignalRegistry,
  instancePortDirection,
  modulePortDirection,
  scanAccesses,
} from '../../../src/graph/builder/signal-registry';

const v = (name: string) => el('varref', { name });
const posedge = (name: string) => el('sentree', {}, el('senitem', { edgeType: 'POS' }, v(name)));

describe('scanAccesses', () => {
  it('should read assignment sources and write the target', () => {
    expect(scanAccesses(el('contassign', {}, el('and', {}, v('a'), v('b')), v('y')))).toEqual({
      reads: ['a', 'b'],
      writes: ['y'],
    });
  });

  it('should skip the sensitivity list', () => {
    const block = el('always', {}, posedge('clk'), el('assigndly', {}, v('d'), v('q')));
    expect(scanAccesses(block)).toEqual({ reads: ['d'], writes: ['q'] });
  });

  it('should count conditions as reads', () => {
    const block = el('always', {}, el('if', {}, v('en'), el('assigndly', {}, v('d'), v('q'))));
    expect(scanAccesses(block)).toEqual({ reads: ['en', 'd'], writes: ['q'] });
  });

  it('should treat index expressions in the target as reads', () => {
    const write = el('assigndly', {}, v('d'), el('arraysel', {}, v('mem'), v('i')));
    expect(scanAccesses(write)).toEqual({ reads: ['d', 'i'], writes: ['mem'] });
  });
});

describe('SignalRegistry', () => {
  it('should register reads as receivers and writes as drivers', () => {
    const registry = new SignalRegistry();
    registry.registerAccesses(3, { reads: ['a'], writes: ['y'] });

    expect(registry.signals()).toEqual(['a', 'y']);
    expect(registry.bindings('a')).toEqual([{ nodeId: 3, direction: 'receiver' }]);
    expect(registry.bindings('y')).toEqual([{ nodeId: 3, direction: 'driver' }]);
    expect(registry.bindings('missing')).toEqual([]);
    expect(registry.size).toBe(2);
  });
});

describe('port directions', () => {
  it('should bind instance ports from the outside and module ports from the inside', () => {
    expect(instancePortDirection('in')).toBe('receiver');
    expect(instancePortDirection('out')).toBe('driver');
    expect(modulePortDirection('in')).toBe('driver');
    expect(modulePortDirection('out')).toBe('receiver');
    expect(modulePortDirection('inout')).toBe('inout');
  });
});
