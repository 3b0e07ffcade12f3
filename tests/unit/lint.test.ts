import { beforeEach, describe, it, expect } from 'vitest';
import type { Graph } from '../../src/graph/graph.js';
import { LintEngine } from '../../src/lint/engine.js';
import {
  builtinLintPasses,
  createLintEngine,
  dynVarNamingPass,
  unboundInputPass,
} from '../../src/lint/passes/index.js';
import type { TLintPass } from '../../src/lint/types.js';
import { createRecordingLogger, newGraph, type TRecordingLogger } from '../helpers/graph-helpers.js';

describe('lint', () => {
  let graph: Graph;
  let logger: TRecordingLogger;

  beforeEach(() => {
    graph = newGraph();
    logger = createRecordingLogger();
  });

  function writeNamed(name: string, nodeType = 'WriteDynVar<Int>') {
    const write = graph.addNode(nodeType);
    write.bind('name', graph.addLiteral('STRING', name).onlyOutput());
    return write;
  }

  describe('dyn-var-naming', () => {
    it('warns about names without a variable space', () => {
      writeNamed('World');
      const engine = new LintEngine([dynVarNamingPass], { logger });

      expect(engine.run(graph)).toBe(1);
      expect(logger.warnings).toEqual([
        '[dyn-var-naming] DYN_VAR_NAME_UNSCOPED (node 0): Name "World" for 0<WriteDynVar<Int>> ' +
          'does not include a variable space ("space/name"). Consider adding a space.',
      ]);
    });

    it('accepts names with a variable space', () => {
      writeNamed('World/Meow');
      const engine = new LintEngine([dynVarNamingPass], { logger });

      expect(engine.run(graph)).toBe(0);
      expect(logger.warnings).toEqual([]);
    });

    it('checks every writer type', () => {
      writeNamed('Meow', 'WriteDynVar<String>');
      expect(dynVarNamingPass.run(graph.nodes()).map((w) => w.code)).toEqual(['DYN_VAR_NAME_UNSCOPED']);
    });

    it('warns about empty and unset names', () => {
      writeNamed('');
      const unset = graph.addNode('WriteDynVar<Int>');
      unset.bind('name', graph.addNode('StringInput').onlyOutput());

      const warnings = dynVarNamingPass.run(graph.nodes());

      expect(warnings).toEqual([
        { pass: 'dyn-var-naming', code: 'DYN_VAR_NAME_EMPTY', message: 'Name input for 0<WriteDynVar<Int>> is empty.', node: 0 },
        { pass: 'dyn-var-naming', code: 'DYN_VAR_NAME_EMPTY', message: 'Name input for 2<WriteDynVar<Int>> is empty.', node: 2 },
      ]);
    });

    it('warns about writers without a name', () => {
      graph.addNode('WriteDynVar<Int>');
      expect(dynVarNamingPass.run(graph.nodes())).toEqual([
        {
          pass: 'dyn-var-naming',
          code: 'DYN_VAR_NAME_UNBOUND',
          message: 'Node 0<WriteDynVar<Int>> has no name input connected.',
          node: 0,
        },
      ]);
    });

    it('skips computed names', () => {
      const write = graph.addNode('WriteDynVar<Int>');
      const name = graph.addLiteral('STRING', 'World').combine('*', 'Meow');
      write.bind('name', name.onlyOutput());

      expect(dynVarNamingPass.run(graph.nodes())).toEqual([]);
    });

    it('ignores other nodes', () => {
      graph.addNode('ReadDynVar<Int>').bind('name', graph.addLiteral('STRING', 'World').onlyOutput());
      expect(dynVarNamingPass.run(graph.nodes())).toEqual([]);
    });
  });

  describe('unbound-input', () => {
    it('reports unbound scalar inputs and skips lists', () => {
      const write = graph.addNode('WriteDynVar<Int>');
      write.bind('slot', graph.root().onlyOutput());

      const warnings = unboundInputPass.run(graph.nodes());

      expect(warnings.map((w) => w.message)).toEqual([
        'Input name (STRING) of node 0<WriteDynVar<Int>> is not connected.',
        'Input value (INT) of node 0<WriteDynVar<Int>> is not connected.',
      ]);
      expect(warnings.every((w) => w.code === 'UNBOUND_INPUT' && w.node === 0)).toBe(true);
    });

    it('is quiet on a fully bound graph', () => {
      graph.addNode('NumChildren').bind('slot', graph.root().onlyOutput());
      expect(unboundInputPass.run(graph.nodes())).toEqual([]);
    });
  });

  describe('LintEngine', () => {
    it('runs passes in registration order', () => {
      writeNamed('World');
      const engine = new LintEngine(builtinLintPasses, { logger });

      const codes = engine.collect(graph).map((w) => w.code);

      expect(codes).toEqual(['DYN_VAR_NAME_UNSCOPED', 'UNBOUND_INPUT', 'UNBOUND_INPUT']);
      expect(logger.warnings).toEqual([]);
    });

    it('takes custom passes', () => {
      const countPass: TLintPass = {
        name: 'node-count',
        description: 'Reports the node count',
        run: (nodes) => [{ pass: 'node-count', code: 'COUNT', message: `${nodes.length} nodes` }],
      };
      graph.addNode('Pulse');
      const engine = new LintEngine([], { logger }).register(countPass);

      expect(engine.run(graph)).toBe(1);
      expect(logger.warnings).toEqual(['[node-count] COUNT: 1 nodes']);
      expect(engine.passes()).toEqual([countPass]);
    });

    it('reports nothing for an empty graph', () => {
      expect(createLintEngine({ logger }).run(graph)).toBe(0);
    });
  });

  describe('createLintEngine', () => {
    it('includes every builtin pass by default', () => {
      expect(createLintEngine({ logger }).passes().map((p) => p.name)).toEqual(['dyn-var-naming', 'unbound-input']);
    });

    it('leaves out disabled passes', () => {
      const engine = createLintEngine({ disabled: ['unbound-input', 'not-a-pass'], logger });
      expect(engine.passes().map((p) => p.name)).toEqual(['dyn-var-naming']);
    });
  });
});
