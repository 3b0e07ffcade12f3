import { RESERVED_PORT_NAMES } from '../constants.js';
import { matchesContentKind, scalarOf, type TContentValue, type TDatatype } from '../datatypes.js';
import { GraphBuildError } from '../errors.js';
import { findInput, findOutput, type TNodeSpec } from '../registry/node-spec.js';
import { didYouMean } from '../utils/string-distance.js';
import { combine, type TOperandSource } from './combine.js';
import type { Graph } from './graph.js';
import { InputPort, OutputPort } from './ports.js';

/**
 * A vertex of a graph: an instance of a node spec with its bound inputs and
 * optional literal content.
 *
 * Nodes are created by `Graph.addNode`, which assigns the id. Inputs and
 * content only change through the validated operations below.
 */
export class GraphNode {
  private readonly boundInputs = new Map<string, OutputPort[]>();
  private content: TContentValue | undefined;

  /** @internal use Graph.addNode */
  constructor(
    public readonly graph: Graph,
    public readonly id: number,
    public readonly spec: TNodeSpec
  ) {
    for (const input of spec.inputs) {
      this.boundInputs.set(input.name, []);
    }
  }

  get name(): string {
    return this.spec.name;
  }

  /** `id<name>`, used in messages */
  get label(): string {
    return `${this.id}<${this.name}>`;
  }

  inputType(inputName: string): TDatatype {
    const input = findInput(this.spec, inputName);
    if (!input) {
      throw this.unknownPort(inputName, 'input', this.spec.inputs.map((p) => p.name));
    }
    return input.datatype;
  }

  outputType(outputName: string): TDatatype {
    const output = findOutput(this.spec, outputName);
    if (!output) {
      throw this.unknownPort(outputName, 'output', this.spec.outputs.map((p) => p.name));
    }
    return output.datatype;
  }

  /**
   * Resolves a name to an output handle, or to an input handle when no output
   * has that name.
   */
  port(name: string): OutputPort | InputPort {
    if (findOutput(this.spec, name)) return new OutputPort(this, name);
    if (findInput(this.spec, name)) return new InputPort(this, name);
    throw this.unknownPort(name, 'port', [
      ...this.spec.outputs.map((p) => p.name),
      ...this.spec.inputs.map((p) => p.name),
    ]);
  }

  input(name: string): InputPort {
    this.inputType(name);
    return new InputPort(this, name);
  }

  output(name: string): OutputPort {
    this.outputType(name);
    return new OutputPort(this, name);
  }

  /** The `*` output carried by literal and arithmetic nodes */
  onlyOutput(): OutputPort {
    return this.output(RESERVED_PORT_NAMES.ONLY_OUTPUT);
  }

  /**
   * Binds an output to one of this node's inputs.
   *
   * A scalar input takes one output; a list input collects them in bind order.
   * The output's datatype must equal the input's (element) type.
   */
  bind(inputName: string, output: OutputPort): void {
    const declared = this.inputType(inputName);
    const bound = this.boundTo(inputName);

    if (output.node.graph !== this.graph) {
      throw new GraphBuildError(
        'FOREIGN_NODE',
        `Cannot bind ${output.toString()} to node ${this.label}: the nodes belong to different graphs.`,
        { nodeType: this.name, nodeId: this.id, port: inputName }
      );
    }

    const expected = scalarOf(declared);
    const isListInput = expected !== declared;

    if (!isListInput && bound.length > 0) {
      throw new GraphBuildError(
        'DUPLICATE_BINDING',
        `Cannot add another ${output.datatype} to input ${inputName} of node ${this.label}; ` +
          `it is already bound to ${bound[0].toString()}.`,
        { nodeType: this.name, nodeId: this.id, port: inputName }
      );
    }

    if (output.datatype !== expected) {
      throw new GraphBuildError(
        'TYPE_MISMATCH',
        `Connecting an output of type ${output.datatype} to the ${inputName} input of node ` +
          `${this.label} of type ${expected} is not possible.`,
        { nodeType: this.name, nodeId: this.id, port: inputName, expected, actual: output.datatype }
      );
    }

    this.boundInputs.set(inputName, [...bound, output]);
  }

  /**
   * Binds the first output of `node` whose datatype matches the input's
   * (element) type, and returns it.
   */
  bindToNode(inputName: string, node: GraphNode): OutputPort {
    const output = node.firstOutputOfType(this.inputType(inputName));
    this.bind(inputName, output);
    return output;
  }

  boundTo(inputName: string): readonly OutputPort[] {
    this.inputType(inputName);
    return this.boundInputs.get(inputName) ?? [];
  }

  /** Bound outputs per input, in spec declaration order */
  inputs(): ReadonlyMap<string, readonly OutputPort[]> {
    return this.boundInputs;
  }

  hasContent(): boolean {
    return this.content !== undefined;
  }

  getContent(): TContentValue | undefined {
    this.contentType();
    return this.content;
  }

  setContent(value: TContentValue): void {
    const contentType = this.contentType();
    if (!matchesContentKind(contentType, value)) {
      throw new GraphBuildError(
        'CONTENT_TYPE_MISMATCH',
        `Node ${this.label} can only take content of type ${contentType}, ` +
          `and ${JSON.stringify(value)} (${typeof value}) is not compatible.`,
        { nodeType: this.name, nodeId: this.id, expected: contentType, actual: typeof value }
      );
    }
    this.content = value;
  }

  /** Name of the first IMPULSE_LIST input in declaration order */
  firstInputImpulse(): string {
    const first = this.spec.inputs.find((input) => input.datatype === 'IMPULSE_LIST');
    if (!first) {
      throw new GraphBuildError('MISSING_IMPULSE_INPUT', `Node ${this.label} has no input impulses.`, {
        nodeType: this.name,
        nodeId: this.id,
      });
    }
    return first.name;
  }

  firstOutputImpulse(): OutputPort {
    const first = this.spec.outputs.find((output) => output.datatype === 'IMPULSE');
    if (!first) {
      throw new GraphBuildError('MISSING_IMPULSE_OUTPUT', `Node ${this.label} has no output impulses.`, {
        nodeType: this.name,
        nodeId: this.id,
      });
    }
    return new OutputPort(this, first.name);
  }

  /** First output in declaration order carrying `datatype`, element-adjusted for lists */
  firstOutputOfType(datatype: TDatatype): OutputPort {
    const wanted = scalarOf(datatype);
    const first = this.spec.outputs.find((output) => output.datatype === wanted);
    if (!first) {
      throw new GraphBuildError('NO_MATCHING_OUTPUT', `Node ${this.label} has no output of type ${wanted}.`, {
        nodeType: this.name,
        nodeId: this.id,
        expected: wanted,
      });
    }
    return new OutputPort(this, first.name);
  }

  /** Wires a new node combining one of this node's outputs with the operand */
  combine(outputName: string, operand: TOperandSource): GraphNode {
    return combine(this.output(outputName), operand);
  }

  toString(): string {
    return this.label;
  }

  private contentType(): TDatatype {
    const contentType = this.spec.contentType;
    if (contentType === undefined) {
      throw new GraphBuildError('NO_CONTENT_SLOT', `Node ${this.label} does not have content to set.`, {
        nodeType: this.name,
        nodeId: this.id,
      });
    }
    return contentType;
  }

  private unknownPort(name: string, kind: 'input' | 'output' | 'port', known: string[]): GraphBuildError {
    return new GraphBuildError(
      'UNKNOWN_PORT',
      `${kind === 'port' ? 'Port' : kind === 'input' ? 'Input' : 'Output'} ${name} is not in node ${this.label}.` +
        didYouMean(name, known),
      { nodeType: this.name, nodeId: this.id, port: name }
    );
  }
}
