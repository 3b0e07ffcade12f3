import { beforeEach, describe, it, expect } from 'vitest';
import { combine, operandDatatype, toOperand } from '../../src/graph/combine.js';
import { Graph } from '../../src/graph/graph.js';
import { NodeSpecBuilder } from '../../src/registry/node-spec.js';
import { NodeSpecRegistry } from '../../src/registry/registry.js';
import { boundIds, createRecordingLogger, expectGraphError, newGraph } from '../helpers/graph-helpers.js';

describe('combine', () => {
  let graph: Graph;

  beforeEach(() => {
    graph = newGraph();
  });

  describe('toOperand', () => {
    it('classifies literals', () => {
      expect(toOperand(3)).toEqual({ kind: 'int', value: 3 });
      expect(toOperand(2.0)).toEqual({ kind: 'int', value: 2 });
      expect(toOperand(0.25)).toEqual({ kind: 'float', value: 0.25 });
      expect(toOperand('a')).toEqual({ kind: 'string', value: 'a' });
      expect(toOperand(false)).toEqual({ kind: 'bool', value: false });
    });

    it('uses the only output of a node', () => {
      const literal = graph.addLiteral('INT', 1);
      const operand = toOperand(literal);
      expect(operand.kind).toBe('output');
      expect(operandDatatype(operand)).toBe('INT');
    });

    it('passes operands through', () => {
      const operand = { kind: 'float', value: 1 } as const;
      expect(toOperand(operand)).toBe(operand);
      expect(operandDatatype(operand)).toBe('FLOAT');
    });
  });

  it('increments with PlusOne<Int> for the literal 1', () => {
    const source = graph.addLiteral('INT', 3);

    const result = source.combine('*', 1);

    expect(result.label).toBe('1<PlusOne<Int>>');
    expect(boundIds(result.input('value'))).toEqual([[0, '*']]);
    expect(graph.size).toBe(2);
  });

  it('accumulates other int literals through a new IntInput', () => {
    const source = graph.addLiteral('INT', 3);

    const result = source.combine('*', 5);

    expect(result.label).toBe('1<Plus<Int>>');
    expect(graph.node(2)?.name).toBe('IntInput');
    expect(graph.node(2)?.getContent()).toBe(5);
    expect(boundIds(result.input('values'))).toEqual([
      [0, '*'],
      [2, '*'],
    ]);
  });

  it('concatenates string literals with the source first', () => {
    const source = graph.addLiteral('STRING', 'space/');

    const result = combine(source.onlyOutput(), 'name');

    expect(result.label).toBe('1<Plus<String>>');
    expect(graph.node(2)?.getContent()).toBe('name');
    expect(boundIds(result.input('values'))).toEqual([
      [0, '*'],
      [2, '*'],
    ]);
  });

  it('sums two int outputs without adding literals', () => {
    const a = graph.addLiteral('INT', 1);
    const b = graph.addLiteral('INT', 2);

    const result = a.onlyOutput().combine(b);

    expect(result.label).toBe('2<Plus<Int>>');
    expect(graph.size).toBe(3);
    expect(boundIds(result.input('values'))).toEqual([
      [0, '*'],
      [1, '*'],
    ]);
  });

  it('concatenates two string outputs with the receiver first', () => {
    const a = graph.addLiteral('STRING', 'a');
    const b = graph.addLiteral('STRING', 'b');

    const result = b.combine('*', a.onlyOutput());

    expect(result.name).toBe('Plus<String>');
    expect(boundIds(result.input('values'))).toEqual([
      [1, '*'],
      [0, '*'],
    ]);
  });

  it('combines non-only outputs by name', () => {
    const read = graph.addNode('ReadDynVar<Int>');

    const result = read.combine('value', 1);

    expect(result.input('value').bound().map((output) => output.toString())).toEqual(['0<ReadDynVar<Int>>:value']);
  });

  it('fails with TYPE_MISMATCH and adds nothing', () => {
    const source = graph.addLiteral('INT', 3);

    const error = expectGraphError(() => source.combine('*', 'x'), 'TYPE_MISMATCH');

    expect(error.message).toBe('Cannot combine 0<IntInput>:* of type INT with string "x" of type STRING.');
    expect(graph.size).toBe(1);
  });

  it('rejects an output operand of another type', () => {
    const int = graph.addLiteral('INT', 3);
    const text = graph.addLiteral('STRING', 'x');
    expectGraphError(() => int.combine('*', text), 'TYPE_MISMATCH');
  });

  it('fails with UNSUPPORTED_COMBINATION where no combinator exists', () => {
    const float = graph.addLiteral('FLOAT', 0.5);
    const bool = graph.addLiteral('BOOL', true);

    const error = expectGraphError(() => float.combine('*', 0.25), 'UNSUPPORTED_COMBINATION');

    expect(error.message).toBe("Don't know how to combine 0<FloatInput>:* (FLOAT) with float 0.25.");
    expectGraphError(() => bool.combine('*', false), 'UNSUPPORTED_COMBINATION');
    expectGraphError(() => float.combine('*', float), 'UNSUPPORTED_COMBINATION');
    expect(graph.size).toBe(2);
  });

  it('rejects int literals beyond the safe range without adding nodes', () => {
    const source = graph.addLiteral('INT', 3);

    const error = expectGraphError(() => source.combine('*', 2 ** 60), 'UNSUPPORTED_COMBINATION');

    expect(error.details.actual).toBe('INT');
    expectGraphError(() => source.combine('*', { kind: 'int', value: 1.5 }), 'UNSUPPORTED_COMBINATION');
    expect(graph.nodes().map((node) => node.label)).toEqual(['0<IntInput>']);
  });

  it('adds nothing when the literal node type is missing', () => {
    const registry = new NodeSpecRegistry([
      new NodeSpecBuilder('Counter').output('*', 'INT').build(),
      new NodeSpecBuilder('Plus<Int>').input('values', 'INT_LIST').output('*', 'INT').build(),
    ]);
    const sparse = new Graph(registry, { logger: createRecordingLogger() });
    const counter = sparse.addNode('Counter');

    const error = expectGraphError(() => counter.combine('*', 5), 'UNKNOWN_NODE_TYPE');

    expect(error.details.nodeType).toBe('IntInput');
    expect(sparse.nodes().map((node) => node.label)).toEqual(['0<Counter>']);
  });

  it('rejects operands from another graph', () => {
    const other = newGraph();
    const foreign = other.addLiteral('INT', 1);
    const source = graph.addLiteral('INT', 3);

    expectGraphError(() => source.combine('*', foreign), 'FOREIGN_NODE');
    expect(graph.size).toBe(1);
  });
});
