import type { TDatatype } from '../datatypes.js';
import { GraphBuildError } from '../errors.js';

export type TPortSpec = {
  readonly name: string;
  readonly datatype: TDatatype;
};

/**
 * Immutable schema shared by every node of one type.
 * Port order is declaration order; "first output of type" lookups depend on it.
 */
export type TNodeSpec = {
  readonly name: string;
  readonly inputs: readonly TPortSpec[];
  readonly outputs: readonly TPortSpec[];
  readonly contentType?: TDatatype;
};

export function findInput(spec: TNodeSpec, name: string): TPortSpec | undefined {
  return spec.inputs.find((port) => port.name === name);
}

export function findOutput(spec: TNodeSpec, name: string): TPortSpec | undefined {
  return spec.outputs.find((port) => port.name === name);
}

/**
 * Fluent builder for TNodeSpec
 *
 * @example
 * ```typescript
 * const ifSpec = new NodeSpecBuilder('If')
 *   .input('impulse', 'IMPULSE_LIST')
 *   .input('condition', 'BOOL')
 *   .output('true', 'IMPULSE')
 *   .output('false', 'IMPULSE')
 *   .build();
 * ```
 */
export class NodeSpecBuilder {
  private readonly inputs: TPortSpec[] = [];
  private readonly outputs: TPortSpec[] = [];
  private contentType?: TDatatype;

  constructor(private readonly name: string) {}

  input(name: string, datatype: TDatatype): this {
    this.inputs.push({ name, datatype });
    return this;
  }
  output(name: string, datatype: TDatatype): this {
    this.outputs.push({ name, datatype });
    return this;
  }
  content(datatype: TDatatype): this {
    this.contentType = datatype;
    return this;
  }

  /** Build the frozen spec, rejecting repeated port names per direction */
  build(): TNodeSpec {
    assertUniquePorts(this.name, 'input', this.inputs);
    assertUniquePorts(this.name, 'output', this.outputs);
    return Object.freeze({
      name: this.name,
      inputs: Object.freeze(this.inputs.map((port) => Object.freeze({ ...port }))),
      outputs: Object.freeze(this.outputs.map((port) => Object.freeze({ ...port }))),
      ...(this.contentType !== undefined ? { contentType: this.contentType } : {}),
    });
  }
}

function assertUniquePorts(nodeType: string, direction: 'input' | 'output', ports: readonly TPortSpec[]): void {
  const seen = new Set<string>();
  for (const port of ports) {
    if (seen.has(port.name)) {
      throw new GraphBuildError(
        'DUPLICATE_PORT_NAME',
        `Node type ${nodeType} declares ${direction} "${port.name}" more than once.`,
        { nodeType, port: port.name }
      );
    }
    seen.add(port.name);
  }
}
