/**
 * Typed value wrappers
 *
 * Thin helpers over output ports for the common data-flow idioms:
 *
 * ```typescript
 * const count = SlotValue.root(graph).numChildren().plus(1);
 * write.bind('value', count.output);
 * ```
 */

import { RESERVED_PORT_NAMES } from './constants.js';
import type { TDatatype } from './datatypes.js';
import { GraphBuildError } from './errors.js';
import type { Graph } from './graph/graph.js';
import type { OutputPort } from './graph/ports.js';

abstract class Value {
  protected abstract readonly datatype: TDatatype;

  constructor(public readonly output: OutputPort) {}

  protected assertDatatype(): void {
    if (this.output.datatype !== this.datatype) {
      throw new GraphBuildError(
        'TYPE_MISMATCH',
        `Output ${this.output.toString()} is ${this.output.datatype}, not ${this.datatype}.`,
        { expected: this.datatype, actual: this.output.datatype, port: this.output.name }
      );
    }
  }
}

export class IntValue extends Value {
  protected readonly datatype = 'INT';

  constructor(output: OutputPort) {
    super(output);
    this.assertDatatype();
  }

  /** `this + operand` as a new combinator node */
  plus(operand: number | IntValue): IntValue {
    const node = this.output.combine(operand instanceof IntValue ? operand.output : operand);
    return new IntValue(node.onlyOutput());
  }
}

export class SlotValue extends Value {
  protected readonly datatype = 'SLOT';

  constructor(output: OutputPort) {
    super(output);
    this.assertDatatype();
  }

  static root(graph: Graph): SlotValue {
    return new SlotValue(graph.root().onlyOutput());
  }

  numChildren(): IntValue {
    const node = this.output.node.graph.addNode('NumChildren');
    node.bind('slot', this.output);
    return new IntValue(node.output(RESERVED_PORT_NAMES.ONLY_OUTPUT));
  }
}
