import { GraphBuildError } from '../errors.js';
import type { GraphNode } from '../graph/node.js';
import type { OutputPort } from '../graph/ports.js';

/**
 * Throws NOT_AN_IMPULSE unless the output carries impulses.
 */
export function assertImpulse(output: OutputPort): void {
  if (output.datatype !== 'IMPULSE') {
    throw new GraphBuildError('NOT_AN_IMPULSE', `Output ${output.toString()} is not an impulse.`, {
      nodeType: output.node.name,
      nodeId: output.node.id,
      port: output.name,
      expected: 'IMPULSE',
      actual: output.datatype,
    });
  }
}

/**
 * The default chain of impulses.
 *
 * The cursor holds the impulse output still waiting for a consumer. Appending
 * a node sends the cursor into the node's first impulse input and moves the
 * cursor to the node's first impulse output.
 *
 * @example
 * ```typescript
 * const chain = new ImpulseChain(pulse.onlyOutput());
 * chain.append(write).append(sequence);
 * ```
 */
export class ImpulseChain {
  private cursor: OutputPort;
  private readonly appended: GraphNode[] = [];
  private isClosed = false;

  constructor(impulse: OutputPort) {
    assertImpulse(impulse);
    this.cursor = impulse;
  }

  /** The impulse output the next appended node will be driven by */
  get last(): OutputPort {
    return this.cursor;
  }

  /** Nodes appended so far, in order */
  get history(): readonly GraphNode[] {
    return this.appended;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  append(node: GraphNode): this {
    this.assertOpen();
    const inputName = node.firstInputImpulse();
    const next = node.firstOutputImpulse();
    node.bind(inputName, this.cursor);
    this.cursor = next;
    this.appended.push(node);
    return this;
  }

  /**
   * Drives a sink node (one without impulse outputs) and closes the chain.
   */
  end(node: GraphNode): void {
    this.assertOpen();
    node.bind(node.firstInputImpulse(), this.cursor);
    this.appended.push(node);
    this.isClosed = true;
  }

  /** Ends the chain; later appends fail with CLOSED_CHAIN */
  close(): void {
    this.isClosed = true;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new GraphBuildError('CLOSED_CHAIN', `The impulse chain from ${this.cursor.toString()} is closed.`, {
        nodeType: this.cursor.node.name,
        nodeId: this.cursor.node.id,
        port: this.cursor.name,
      });
    }
  }
}
