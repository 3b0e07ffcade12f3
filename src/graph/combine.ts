/**
 * Composition: combining an output with an operand into a new node.
 *
 * The operand is normalized into the TOperand union and dispatched on its
 * kind, never on the source node's type. Supporting a new kind of operand
 * means adding a variant and a case in `combine`; the `never` check keeps the
 * switch exhaustive.
 *
 * | operand            | source | result                                   |
 * |--------------------|--------|------------------------------------------|
 * | int literal 1      | INT    | PlusOne<Int>(source)                     |
 * | other int literal  | INT    | Plus<Int>[source, IntInput(literal)]     |
 * | string literal     | STRING | Plus<String>[source, StringInput(lit.)]  |
 * | INT output         | INT    | Plus<Int>[source, operand]               |
 * | STRING output      | STRING | Plus<String>[source, operand]            |
 */

import { COMBINATOR_NODE_NAMES, COMBINATOR_PORT_NAMES } from '../constants.js';
import { matchesContentKind, type TContentValue, type TDatatype } from '../datatypes.js';
import { GraphBuildError } from '../errors.js';
import { literalNodeName } from './graph.js';
import { GraphNode } from './node.js';
import { OutputPort } from './ports.js';

export type TOperand =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'output'; output: OutputPort };

/** Anything `combine` accepts; nodes contribute their `*` output */
export type TOperandSource = TContentValue | OutputPort | GraphNode | TOperand;

export function toOperand(source: TOperandSource): TOperand {
  if (source instanceof OutputPort) {
    return { kind: 'output', output: source };
  }
  if (source instanceof GraphNode) {
    return { kind: 'output', output: source.onlyOutput() };
  }
  switch (typeof source) {
    case 'number':
      return Number.isInteger(source) ? { kind: 'int', value: source } : { kind: 'float', value: source };
    case 'string':
      return { kind: 'string', value: source };
    case 'boolean':
      return { kind: 'bool', value: source };
    default:
      return source;
  }
}

export function operandDatatype(operand: TOperand): TDatatype {
  switch (operand.kind) {
    case 'int':
      return 'INT';
    case 'float':
      return 'FLOAT';
    case 'string':
      return 'STRING';
    case 'bool':
      return 'BOOL';
    case 'output':
      return operand.output.datatype;
  }
}

function describeOperand(operand: TOperand): string {
  return operand.kind === 'output' ? operand.output.toString() : `${operand.kind} ${JSON.stringify(operand.value)}`;
}

function unsupported(source: OutputPort, operand: TOperand): GraphBuildError {
  return new GraphBuildError(
    'UNSUPPORTED_COMBINATION',
    `Don't know how to combine ${source.toString()} (${source.datatype}) with ${describeOperand(operand)}.`,
    { nodeType: source.node.name, nodeId: source.node.id, port: source.name, actual: operandDatatype(operand) }
  );
}

/**
 * New list-input node fed `[source, operand]`. The receiver comes first for
 * strings too, so `a.combine(b)` reads as `a + b`.
 */
function accumulate(nodeType: string, source: OutputPort, operand: OutputPort): GraphNode {
  const node = source.node.graph.addNode(nodeType);
  const values = node.input(COMBINATOR_PORT_NAMES.ACCUMULATE_VALUES);
  values.append(source);
  values.append(operand);
  return node;
}

/**
 * Like `accumulate`, with a fresh literal node created after the combinator.
 * Both node types are resolved before either is added.
 */
function accumulateLiteral(
  nodeType: string,
  source: OutputPort,
  datatype: TDatatype,
  value: TContentValue
): GraphNode {
  const graph = source.node.graph;
  graph.registry.specOf(nodeType);
  graph.registry.specOf(literalNodeName(datatype));
  const node = graph.addNode(nodeType);
  const literal = graph.addLiteral(datatype, value);
  const values = node.input(COMBINATOR_PORT_NAMES.ACCUMULATE_VALUES);
  values.append(source);
  values.append(literal.onlyOutput());
  return node;
}

function increment(source: OutputPort): GraphNode {
  const node = source.node.graph.addNode(COMBINATOR_NODE_NAMES.INCREMENT_INT);
  node.bind(COMBINATOR_PORT_NAMES.INCREMENT_VALUE, source);
  return node;
}

/**
 * Produces and wires a new node implementing `source + operand`, and returns it.
 * @throws GraphBuildError TYPE_MISMATCH when the operand's datatype differs from the source's
 * @throws GraphBuildError UNSUPPORTED_COMBINATION when no combinator exists for the pair
 */
export function combine(source: OutputPort, operandSource: TOperandSource): GraphNode {
  const operand = toOperand(operandSource);
  const graph = source.node.graph;
  const operandType = operandDatatype(operand);

  if (operand.kind === 'output' && operand.output.node.graph !== graph) {
    throw new GraphBuildError(
      'FOREIGN_NODE',
      `Cannot combine ${source.toString()} with ${operand.output.toString()}: the nodes belong to different graphs.`,
      { nodeType: source.node.name, nodeId: source.node.id, port: source.name }
    );
  }
  if (operandType !== source.datatype) {
    throw new GraphBuildError(
      'TYPE_MISMATCH',
      `Cannot combine ${source.toString()} of type ${source.datatype} with ${describeOperand(operand)} of type ${operandType}.`,
      { nodeType: source.node.name, nodeId: source.node.id, port: source.name, expected: source.datatype, actual: operandType }
    );
  }

  switch (operand.kind) {
    case 'int':
      // IntInput content must be a safe integer
      if (!matchesContentKind('INT', operand.value)) {
        throw unsupported(source, operand);
      }
      if (operand.value === 1) {
        return increment(source);
      }
      return accumulateLiteral(COMBINATOR_NODE_NAMES.ACCUMULATE_INT, source, 'INT', operand.value);
    case 'string':
      return accumulateLiteral(COMBINATOR_NODE_NAMES.CONCAT_STRING, source, 'STRING', operand.value);
    case 'output':
      if (operandType === 'INT') {
        return accumulate(COMBINATOR_NODE_NAMES.ACCUMULATE_INT, source, operand.output);
      }
      if (operandType === 'STRING') {
        return accumulate(COMBINATOR_NODE_NAMES.CONCAT_STRING, source, operand.output);
      }
      throw unsupported(source, operand);
    case 'float':
    case 'bool':
      throw unsupported(source, operand);
    default: {
      const exhaustive: never = operand;
      return exhaustive;
    }
  }
}
