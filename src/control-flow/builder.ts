/**
 * # Branch construction
 *
 * Chains and If/Else blocks are scopes. Each Graph owns one stack of open
 * scopes; every scope remembers the last child scope that closed directly
 * inside it. `else` pairs with that sibling, so an If and its Else must be
 * adjacent scopes at the same level:
 *
 * ```typescript
 * graph.flow.if(pulse.onlyOutput(), cond.onlyOutput(), (outer) => {
 *   outer.append(a);
 *   graph.flow.if(outer.last, cond2.onlyOutput(), (inner) => inner.append(b));
 *   graph.flow.else((inner) => inner.append(c)); // pairs with the inner If
 * });
 * graph.flow.else((outer) => outer.append(d)); // pairs with the outer If
 * ```
 *
 * Non-scope statements between an If and its Else are fine. A chain scope
 * opened and closed between them is an intervening sibling, and the Else
 * then fails with DANGLING_ELSE.
 *
 * Branch frame states: open → else-pending → else-open → else-closed. Only a
 * frame in else-pending accepts an Else.
 */

import { RESERVED_NODE_NAMES, RESERVED_PORT_NAMES } from '../constants.js';
import { GraphBuildError } from '../errors.js';
import type { Graph } from '../graph/graph.js';
import type { GraphNode } from '../graph/node.js';
import type { OutputPort } from '../graph/ports.js';
import { assertImpulse, ImpulseChain } from './impulse-chain.js';

export type TBranchState = 'open' | 'else-pending' | 'else-open' | 'else-closed';

export type TBranchFrame = {
  readonly ifNode: GraphNode;
  state: TBranchState;
};

export type TScopeKind = 'chain' | 'if' | 'else';

/**
 * An open chain, If or Else block. Close it exactly once, innermost first.
 */
export class FlowScope {
  /** @internal last scope closed directly inside this one */
  lastClosedChild: FlowScope | undefined;
  private isClosed = false;

  /** @internal use ControlFlowBuilder */
  constructor(
    private readonly owner: ControlFlowBuilder,
    public readonly kind: TScopeKind,
    public readonly chain: ImpulseChain,
    public readonly frame?: TBranchFrame
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  /** The If node of an if or else scope */
  get ifNode(): GraphNode | undefined {
    return this.frame?.ifNode;
  }

  close(): void {
    this.owner.close(this);
  }

  /** @internal */
  markClosed(): void {
    this.isClosed = true;
    this.chain.close();
  }
}

/** Scope of an If's true branch or its Else's false branch */
export class BranchScope extends FlowScope {
  declare readonly frame: TBranchFrame;

  constructor(owner: ControlFlowBuilder, kind: 'if' | 'else', chain: ImpulseChain, frame: TBranchFrame) {
    super(owner, kind, chain, frame);
  }

  get ifNode(): GraphNode {
    return this.frame.ifNode;
  }
}

export class ControlFlowBuilder {
  private readonly stack: FlowScope[] = [];
  private lastClosedAtSession: FlowScope | undefined;

  constructor(private readonly graph: Graph) {}

  /** Number of open scopes */
  get depth(): number {
    return this.stack.length;
  }

  /** Frames of the open if and else scopes, outermost first */
  openFrames(): TBranchFrame[] {
    return this.stack.flatMap((scope) => (scope.frame ? [scope.frame] : []));
  }

  openChain(impulse: OutputPort): FlowScope {
    this.assertOwned(impulse);
    return this.push(new FlowScope(this, 'chain', new ImpulseChain(impulse)));
  }

  /**
   * Adds an If node driven by `trigger` and testing `condition`, and opens the
   * chain from its "true" output.
   * @throws GraphBuildError NOT_AN_IMPULSE, NOT_A_BOOLEAN
   */
  openIf(trigger: OutputPort, condition: OutputPort): BranchScope {
    assertImpulse(trigger);
    if (condition.datatype !== 'BOOL') {
      throw new GraphBuildError('NOT_A_BOOLEAN', `Output ${condition.toString()} is not a bool.`, {
        nodeType: condition.node.name,
        nodeId: condition.node.id,
        port: condition.name,
        expected: 'BOOL',
        actual: condition.datatype,
      });
    }
    this.assertOwned(trigger);
    this.assertOwned(condition);

    const ifNode = this.graph.addNode(RESERVED_NODE_NAMES.IF);
    ifNode.bind(ifNode.firstInputImpulse(), trigger);
    ifNode.bind(RESERVED_PORT_NAMES.IF_CONDITION, condition);

    const chain = new ImpulseChain(ifNode.output(RESERVED_PORT_NAMES.IF_TRUE));
    return this.push(new BranchScope(this, 'if', chain, { ifNode, state: 'open' }));
  }

  /**
   * Opens the chain from the "false" output of the If whose scope closed last
   * at the current level.
   * @throws GraphBuildError DANGLING_ELSE when there is no such If, or its Else was already opened
   */
  openElse(): BranchScope {
    const top = this.top();
    const sibling = top ? top.lastClosedChild : this.lastClosedAtSession;
    const frame = sibling?.kind === 'if' ? sibling.frame : undefined;
    if (!frame || frame.state !== 'else-pending') {
      throw new GraphBuildError('DANGLING_ELSE', 'Cannot have Else without If first.', {
        nodeType: RESERVED_NODE_NAMES.IF,
        nodeId: frame?.ifNode.id,
      });
    }
    frame.state = 'else-open';
    const chain = new ImpulseChain(frame.ifNode.output(RESERVED_PORT_NAMES.IF_FALSE));
    return this.push(new BranchScope(this, 'else', chain, frame));
  }

  /**
   * Closes the innermost open scope.
   * @throws GraphBuildError UNBALANCED_SCOPE when `scope` is not the innermost open scope
   */
  close(scope: FlowScope): void {
    if (this.top() !== scope) {
      throw new GraphBuildError(
        'UNBALANCED_SCOPE',
        scope.closed
          ? `The ${scope.kind} scope is already closed.`
          : `Cannot close the ${scope.kind} scope while an inner scope is still open.`,
        { nodeId: scope.ifNode?.id }
      );
    }
    this.stack.pop();
    scope.markClosed();
    if (scope.frame) {
      scope.frame.state = scope.kind === 'if' ? 'else-pending' : 'else-closed';
    }

    const parent = this.top();
    if (parent) {
      parent.lastClosedChild = scope;
    } else {
      this.lastClosedAtSession = scope;
    }
  }

  /** Runs `body` with an open chain, closing it afterwards even if `body` throws */
  chain<T>(impulse: OutputPort, body: (chain: ImpulseChain) => T): T {
    const scope = this.openChain(impulse);
    return this.scoped(scope, () => body(scope.chain));
  }

  /** Runs `body` on the true branch of a new If node */
  if<T>(trigger: OutputPort, condition: OutputPort, body: (chain: ImpulseChain, ifNode: GraphNode) => T): T {
    const scope = this.openIf(trigger, condition);
    return this.scoped(scope, () => body(scope.chain, scope.ifNode));
  }

  /** Runs `body` on the false branch of the sibling If */
  else<T>(body: (chain: ImpulseChain, ifNode: GraphNode) => T): T {
    const scope = this.openElse();
    return this.scoped(scope, () => body(scope.chain, scope.ifNode));
  }

  /**
   * Runs `body`, then closes `scope` along with anything the body left open
   * above it. A body's error is rethrown as is; UNBALANCED_SCOPE is raised only
   * after a body that returned normally.
   */
  private scoped<T>(scope: FlowScope, body: () => T): T {
    let result: T;
    try {
      result = body();
    } catch (error) {
      this.unwindTo(scope);
      throw error;
    }
    try {
      scope.close();
    } catch (error) {
      this.unwindTo(scope);
      throw error;
    }
    return result;
  }

  /** Closes open scopes innermost first, down to and including `scope` */
  private unwindTo(scope: FlowScope): void {
    if (!this.stack.includes(scope)) return;
    let top = this.top();
    while (top) {
      this.close(top);
      if (top === scope) return;
      top = this.top();
    }
  }

  private push<S extends FlowScope>(scope: S): S {
    this.stack.push(scope);
    return scope;
  }

  private top(): FlowScope | undefined {
    return this.stack[this.stack.length - 1];
  }

  private assertOwned(output: OutputPort): void {
    if (output.node.graph !== this.graph) {
      throw new GraphBuildError(
        'FOREIGN_NODE',
        `Output ${output.toString()} belongs to a different graph.`,
        { nodeType: output.node.name, nodeId: output.node.id, port: output.name }
      );
    }
  }
}
