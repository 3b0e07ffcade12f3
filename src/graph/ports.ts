import { isList, scalarOf, type TDatatype } from '../datatypes.js';
import { GraphBuildError } from '../errors.js';
import type { TOperandSource } from './combine.js';
import type { GraphNode } from './node.js';

/**
 * Transient handle on a named input or output of a node.
 *
 * Ports are not stored anywhere; two handles on the same node and name are
 * interchangeable (see `sameAs`).
 */
export abstract class Port {
  abstract readonly direction: 'input' | 'output';

  constructor(
    public readonly node: GraphNode,
    public readonly name: string
  ) {}

  /** Datatype carried by a single connection through this port */
  abstract get datatype(): TDatatype;

  sameAs(other: Port): boolean {
    return this.direction === other.direction && this.node === other.node && this.name === other.name;
  }

  toString(): string {
    return `${this.node.label}:${this.name}`;
  }
}

export class OutputPort extends Port {
  readonly direction = 'output';

  get datatype(): TDatatype {
    return this.node.outputType(this.name);
  }

  connectTo(input: InputPort): void {
    input.connect(this);
  }

  /** Wires a new node combining this output with the operand, see `combine` */
  combine(operand: TOperandSource): GraphNode {
    return this.node.combine(this.name, operand);
  }
}

export class InputPort extends Port {
  readonly direction = 'input';

  /** Type as declared in the node spec, list types included */
  get declaredType(): TDatatype {
    return this.node.inputType(this.name);
  }

  /** Element type for list inputs */
  get datatype(): TDatatype {
    return scalarOf(this.declaredType);
  }

  get isList(): boolean {
    return isList(this.declaredType);
  }

  connect(output: OutputPort): this {
    this.node.bind(this.name, output);
    return this;
  }

  /**
   * Adds another connection to a list input. A node argument contributes its
   * first output of the input's element type.
   * @throws GraphBuildError NOT_A_LIST on scalar inputs
   */
  append(source: OutputPort | GraphNode): this {
    if (!this.isList) {
      throw new GraphBuildError(
        'NOT_A_LIST',
        `Cannot append to input ${this.name} of node ${this.node.label}: ${this.declaredType} is not a list.`,
        { nodeType: this.node.name, nodeId: this.node.id, port: this.name, actual: this.declaredType }
      );
    }
    if (source instanceof OutputPort) {
      return this.connect(source);
    }
    this.bindToFirstMatchingOutput(source);
    return this;
  }

  bindToFirstMatchingOutput(node: GraphNode): OutputPort {
    return this.node.bindToNode(this.name, node);
  }

  /** Bound outputs in bind order */
  bound(): readonly OutputPort[] {
    return this.node.boundTo(this.name);
  }
}
