import { SignalRegistry } from '../../../src/graph/builder/signal-registry';
import { isIgnoredSignal, resolveConnections } from '../../../src/graph/builder/connection-resolver';

const IGNORED = ['clk', 'clock', 'rst', 'reset'];

describe('resolveConnections', () => {
  let registry: SignalRegistry;

  beforeEach(() => {
    registry = new SignalRegistry();
  });

  it('should emit one edge per driver and receiver pair', () => {
    registry.register('w', 0, 'driver');
    registry.register('w', 1, 'receiver');
    registry.register('w', 2, 'receiver');

    expect(resolveConnections(registry, IGNORED)).toEqual([
      { src: 0, dst: 1, signals: ['w'] },
      { src: 0, dst: 2, signals: ['w'] },
    ]);
  });

  it('should cross every driver with every receiver', () => {
    registry.register('bus', 0, 'driver');
    registry.register('bus', 1, 'driver');
    registry.register('bus', 2, 'receiver');
    registry.register('bus', 3, 'inout');

    const edges = resolveConnections(registry, IGNORED).map(e => `${e.src}->${e.dst}`);
    expect(edges).toEqual(['0->2', '0->3', '1->2', '1->3']);
  });

  it('should suppress self-loops', () => {
    registry.register('count', 4, 'receiver');
    registry.register('count', 4, 'driver');
    expect(resolveConnections(registry, IGNORED)).toEqual([]);
  });

  it('should never wire ignored clock and reset nets', () => {
    registry.register('clk', 0, 'driver');
    registry.register('clk', 1, 'receiver');
    registry.register('sys_reset_n', 0, 'driver');
    registry.register('sys_reset_n', 1, 'receiver');
    expect(resolveConnections(registry, IGNORED)).toEqual([]);
  });

  it('should wire nets whose names only contain a clock or reset pattern', () => {
    registry.register('first_word', 0, 'driver');
    registry.register('first_word', 1, 'receiver');
    expect(resolveConnections(registry, IGNORED)).toEqual([{ src: 0, dst: 1, signals: ['first_word'] }]);
  });

  it('should chain undirected bindings in id order', () => {
    registry.register('shared', 5, 'inout');
    registry.register('shared', 2, 'receiver');
    registry.register('shared', 9, 'inout');

    expect(resolveConnections(registry, IGNORED)).toEqual([
      { src: 2, dst: 5, signals: ['shared'] },
      { src: 5, dst: 9, signals: ['shared'] },
    ]);
  });

  it('should leave a net with drivers but no receivers unwired', () => {
    registry.register('orphan', 0, 'driver');
    registry.register('orphan', 1, 'driver');
    expect(resolveConnections(registry, IGNORED)).toEqual([]);
  });

  it('should coalesce signals between the same node pair into a bus', () => {
    registry.register('data', 0, 'driver');
    registry.register('valid', 0, 'driver');
    registry.register('data', 1, 'receiver');
    registry.register('valid', 1, 'receiver');
    registry.register('valid', 2, 'receiver');

    expect(resolveConnections(registry, IGNORED)).toEqual([
      { src: 0, dst: 1, signals: ['data', 'valid'] },
      { src: 0, dst: 2, signals: ['valid'] },
    ]);
  });

  it('should ignore duplicate registrations', () => {
    registry.register('w', 0, 'driver');
    registry.register('w', 0, 'driver');
    expect(registry.bindings('w')).toEqual([{ nodeId: 0, direction: 'driver' }]);
  });
});

describe('isIgnoredSignal', () => {
  it('should match whole name tokens case-insensitively', () => {
    expect(isIgnoredSignal('CLK_DIV', IGNORED)).toBe(true);
    expect(isIgnoredSignal('sys_clk', IGNORED)).toBe(true);
    expect(isIgnoredSignal('rst_n', IGNORED)).toBe(true);
    expect(isIgnoredSignal('rstn', IGNORED)).toBe(true);
    expect(isIgnoredSignal('data_out', IGNORED)).toBe(false);
    expect(isIgnoredSignal('data_out', ['DATA'])).toBe(true);
  });

  it('should not match names that merely contain a pattern', () => {
    expect(isIgnoredSignal('first_word', IGNORED)).toBe(false);
    expect(isIgnoredSignal('burst_len', IGNORED)).toBe(false);
    expect(isIgnoredSignal('worst', IGNORED)).toBe(false);
  });
});
