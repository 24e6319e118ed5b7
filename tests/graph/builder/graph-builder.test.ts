import { AstNode, el } from '../../../src/ast/types';
import { DiagnosticType } from '../../../src/graph/diagnostics';
import { GraphBuilder, findModules } from '../../../src/graph/builder/graph-builder';
import { summarizeBlock } from '../../../src/graph/builder/architecture-pass';

const v = (name: string) => el('varref', { name });
const c = (name: string) => el('const', { name });
const port = (name: string, dir: string) => el('var', { name, dir });
const pin = (dir: string, signal: string) => el('port', { name: signal, direction: dir }, v(signal));
const posedge = (name: string) => el('sentree', {}, el('senitem', { edgeType: 'POS' }, v(name)));

const IGNORED = ['clk', 'clock', 'rst', 'reset'];

const edgesOf = (hierarchyEdges: ReadonlyArray<{ src: number; dst: number; label?: string | string[] }>) =>
  hierarchyEdges.map(edge => [edge.src, edge.dst, edge.label]);

describe('GraphBuilder', () => {
  let builder: GraphBuilder;

  beforeEach(() => {
    builder = new GraphBuilder({ ignoredSignals: IGNORED });
  });

  describe('continuous assignments', () => {
    const module = el(
      'module',
      { name: 'top' },
      port('a', 'input'),
      port('b', 'input'),
      port('y', 'output'),
      el('contassign', {}, el('and', {}, v('a'), v('b')), v('y'))
    );

    it('should create one architecture node per assignment and per port direction', () => {
      const hierarchy = builder.buildModule(module);
      const { architecture } = hierarchy;

      expect(architecture.name).toBe('top_arch');
      expect(architecture.cfgNodes.map(node => node.label)).toEqual([
        'Continuous Assignment\ny = (a & b)',
        'Inputs\na, b',
        'Outputs\ny',
      ]);
      expect(architecture.clusters).toHaveLength(1);
      expect(architecture.clusters[0]).toMatchObject({ name: 'Module: top', color: 'lightblue', nodeIds: [0, 1, 2] });
    });

    it('should wire ports to the assignment, bundling parallel signals', () => {
      const { architecture } = builder.buildModule(module);
      expect(edgesOf(architecture.cfgEdges)).toEqual([
        [1, 0, ['a', 'b']],
        [0, 2, 'y'],
      ]);
    });

    it('should link the assignment to its detail graph', () => {
      const hierarchy = builder.buildModule(module);

      expect(hierarchy.architecture.clusters[0].metadata.get(0)).toEqual({ link: 'top_contassign_0' });
      const detail = hierarchy.detailFor(0);
      expect(detail?.name).toBe('top_contassign_0');
      expect(detail?.dfgNodes.map(node => node.name)).toEqual(['op_AND_0', 'a', 'b', 'y_1']);
      expect(detail?.findDfgNode('y_1')).toBe(3);
      expect(hierarchy.diagnostics).toEqual([]);
    });
  });

  describe('instances', () => {
    const producer = el('instance', { name: 'u1', defName: 'producer' }, pin('out', 'w'), pin('in', 'a'));
    const consumer = (name: string) =>
      el('instance', { name, defName: 'consumer' }, pin('in', 'w'), pin('out', 'y'));

    it('should wire a shared net from its driver to its receiver', () => {
      const module = el(
        'module',
        { name: 'top' },
        port('clk', 'input'),
        port('a', 'input'),
        port('y', 'output'),
        producer,
        consumer('u2')
      );
      const { architecture } = builder.buildModule(module);

      expect(architecture.cfgNodes.map(node => node.label)).toEqual([
        'u1 (producer)',
        'u2 (consumer)',
        'Inputs\nclk, a',
        'Outputs\ny',
      ]);
      expect(edgesOf(architecture.cfgEdges)).toEqual([
        [0, 1, 'w'],
        [2, 0, 'a'],
        [1, 3, 'y'],
      ]);
      expect(architecture.nodeModuleLinks.get(0)).toBe('producer');
      expect(architecture.nodeModuleLinks.get(1)).toBe('consumer');
    });

    it('should not wire two receivers of the same net to each other', () => {
      const module = el('module', { name: 'top' }, producer, consumer('u2'), consumer('u3'));
      const { architecture } = builder.buildModule(module);

      const wEdges = architecture.cfgEdges.filter(edge => edge.label === 'w');
      expect(wEdges.map(edge => [edge.src, edge.dst])).toEqual([
        [0, 1],
        [0, 2],
      ]);
    });

    it('should record an instance without a module type', () => {
      const hierarchy = builder.buildModule(el('module', { name: 'top' }, el('instance', { name: 'u9' })));

      expect(hierarchy.architecture.cfgNodes[0].label).toBe('u9 (<unknown module>)');
      expect(hierarchy.architecture.nodeModuleLinks.size).toBe(0);
      expect(hierarchy.diagnostics.map(d => d.type)).toEqual([DiagnosticType.MALFORMED_INPUT]);
    });
  });

  describe('procedural blocks', () => {
    it('should label and link clocked counters', () => {
      const counter = el(
        'always',
        { loc: 'a,4,3,4,9' },
        posedge('clk'),
        el('assigndly', {}, el('add', {}, v('count'), c('1')), v('count'))
      );
      const hierarchy = builder.buildModule(el('module', { name: 'cnt' }, port('clk', 'input'), counter));
      const { architecture } = hierarchy;

      expect(architecture.cfgNodes[0]).toMatchObject({ label: 'Counter\ncount <= (count + 1)', line: 4 });
      expect(hierarchy.getSubGraph('cnt_always_0')?.clusters[0]).toMatchObject({
        name: 'Counter',
        color: 'lightgreen',
      });
      // A block reading and writing its own register gets no self-loop; clk is ignored
      expect(architecture.cfgEdges).toEqual([]);
    });

    it('should summarize a constant initializer as Init', () => {
      const initial = el('initial', {}, el('assign', {}, c('0'), v('x')));
      const hierarchy = builder.buildModule(el('module', { name: 'm' }, initial));

      expect(hierarchy.architecture.cfgNodes[0].label).toBe('Init\nx = 0');
      expect(hierarchy.getSubGraph('m_initial_0')?.clusters[0]).toMatchObject({ name: 'Init', color: 'lavender' });
      expect(hierarchy.diagnostics.map(d => d.type)).toEqual([DiagnosticType.CLASSIFICATION_AMBIGUITY]);
    });

    it('should wire one block into the next through a shared register', () => {
      const module = el(
        'module',
        { name: 'pipe' },
        el('always', {}, posedge('clk'), el('assigndly', {}, v('d'), v('stage'))),
        el('contassign', {}, el('not', {}, v('stage')), v('q'))
      );
      const hierarchy = builder.buildModule(module);

      expect(edgesOf(hierarchy.architecture.cfgEdges)).toEqual([[0, 1, 'stage']]);
      expect(hierarchy.getSubGraph('pipe_contassign_1')?.nodeUses.get(1)).toEqual(['stage_1']);
    });

    it('should keep a function as one block without leaking its arguments into the ports', () => {
      const module = el(
        'module',
        { name: 'm' },
        port('x', 'input'),
        port('y', 'output'),
        el(
          'func',
          { name: 'inc' },
          port('inc', 'output'),
          port('a', 'input'),
          el('assign', {}, el('add', {}, v('a'), c('1')), v('inc'))
        ),
        el('contassign', {}, v('x'), v('y'))
      );
      const hierarchy = builder.buildModule(module);
      const { architecture } = hierarchy;

      expect(architecture.cfgNodes.map(node => node.label)).toEqual([
        'Block: func\ninc = (a + 1)',
        'Continuous Assignment\ny = x',
        'Inputs\nx',
        'Outputs\ny',
      ]);
      expect(edgesOf(architecture.cfgEdges)).toEqual([
        [2, 1, 'x'],
        [1, 3, 'y'],
      ]);

      const detail = hierarchy.getSubGraph('m_func_0');
      expect(detail?.clusters[0]).toMatchObject({ name: 'Block: func', color: 'lightgrey' });
      expect(detail?.cfgNodes.map(node => node.label)).toEqual([
        'Enter func',
        'inc = (a + 1)\nDEF: inc_1\nUSE: a',
      ]);
      expect(hierarchy.diagnostics).toEqual([]);
    });

    it('should label tasks and latches by tag instead of guessing a role', () => {
      const module = el(
        'module',
        { name: 'm' },
        el('task', { name: 'tick' }, el('assign', {}, v('a'), v('b'))),
        el('always_latch', {}, el('if', {}, v('en'), el('assign', {}, v('d'), v('q'))))
      );
      const hierarchy = builder.buildModule(module);

      expect(hierarchy.architecture.cfgNodes.map(node => node.label)).toEqual([
        'Block: task\nb = a',
        'Block: always_latch\nq = d',
      ]);
      expect(hierarchy.diagnostics).toEqual([]);
    });

    it('should descend through unrecognized containers and report them', () => {
      const module = el(
        'module',
        { name: 'm' },
        el('generate', {}, el('contassign', {}, v('a'), v('b'))),
        el('checker', {}, el('contassign', {}, v('b'), v('c')))
      );
      const hierarchy = builder.buildModule(module);

      expect(hierarchy.architecture.cfgNodes.map(node => node.label)).toEqual([
        'Continuous Assignment\nb = a',
        'Continuous Assignment\nc = b',
      ]);
      expect(hierarchy.diagnostics.map(d => d.message)).toEqual(['No rule for <checker>']);
    });
  });

  describe('buildDesign', () => {
    const writer = (name: string) =>
      el('module', { name }, el('always', {}, posedge('clk'), el('assigndly', {}, v('d'), v('q'))));

    it('should build every module in document order', () => {
      const root = el('verilator_xml', {}, el('netlist', {}, writer('first'), writer('second')));
      const hierarchies = builder.buildDesign(root);
      expect(hierarchies.map(h => h.moduleName)).toEqual(['first', 'second']);
    });

    it('should restart SSA numbering for each module', () => {
      const [first, second] = builder.buildDesign(el('netlist', {}, writer('first'), writer('second')));
      expect(first.getSubGraph('first_always_0')?.nodeDefs.get(1)).toBe('q_1');
      expect(second.getSubGraph('second_always_0')?.nodeDefs.get(1)).toBe('q_1');
    });

    it('should name a module without a name attribute <anonymous>', () => {
      const [hierarchy] = builder.buildDesign(el('module'));
      expect(hierarchy.moduleName).toBe('<anonymous>');
      expect(hierarchy.architecture.cfgNodes).toEqual([]);
    });
  });
});

describe('findModules', () => {
  it('should not look inside modules', () => {
    const inner = el('module', { name: 'inner' });
    const outer = el('module', { name: 'outer' }, inner);
    const root: AstNode = el('root', {}, outer, el('package'));
    expect(findModules(root)).toEqual([outer]);
  });
});

describe('summarizeBlock', () => {
  it('should omit the inline label when a block holds several assignments', () => {
    const block = el(
      'always',
      {},
      el('begin', {}, el('assign', {}, v('a'), v('x')), el('assign', {}, v('b'), v('y')))
    );
    expect(summarizeBlock(block, 'Combinational Logic')).toEqual({ classification: 'Combinational Logic' });
  });

  it('should use the blocking operator for initial blocks with a non-constant value', () => {
    const block = el('initial', {}, el('assign', {}, v('seed'), v('x')));
    expect(summarizeBlock(block, 'Combinational Logic')).toEqual({
      classification: 'Combinational Logic',
      inline: 'x = seed',
    });
  });
});
