import { LITERAL_NODE_NAMES, RESERVED_NODE_NAMES } from '../constants.js';
import { matchesContentKind, type TContentValue, type TDatatype } from '../datatypes.js';
import { GraphBuildError } from '../errors.js';
import { ControlFlowBuilder } from '../control-flow/builder.js';
import { logger as defaultLogger, type TLogger } from '../logger.js';
import type { NodeSpecRegistry } from '../registry/registry.js';
import { GraphNode } from './node.js';

export type TGraphOptions = {
  logger?: TLogger;
};

/**
 * A construction session: the ordered nodes of one program, the cached root
 * slot node and the branch nesting stack (`flow`).
 *
 * Sessions share nothing with each other; build graphs independently by
 * giving each its own Graph.
 *
 * @example
 * ```typescript
 * const graph = new Graph(loadBuiltinRegistry());
 * const numChildren = graph.addNode('NumChildren');
 * numChildren.bind('slot', graph.root().onlyOutput());
 * ```
 */
export class Graph {
  private readonly nodeList: GraphNode[] = [];
  private rootNode: GraphNode | undefined;
  private readonly logger: TLogger;

  /** Impulse chains and If/Else scopes for this session */
  readonly flow: ControlFlowBuilder;

  constructor(
    public readonly registry: NodeSpecRegistry,
    options: TGraphOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.flow = new ControlFlowBuilder(this);
  }

  get size(): number {
    return this.nodeList.length;
  }

  /**
   * Creates a node of the given type. Its id is the number of nodes added
   * before it.
   * @throws GraphBuildError UNKNOWN_NODE_TYPE
   */
  addNode(typeName: string): GraphNode {
    const spec = this.registry.specOf(typeName);
    const node = new GraphNode(this, this.nodeList.length, spec);
    this.nodeList.push(node);
    this.logger.debug(`Added node ${node.label}`);
    return node;
  }

  /**
   * Adds the literal holder node for `datatype` with `value` as its content.
   * The value is checked first; a failed call adds no node.
   * @throws GraphBuildError NO_CONTENT_SLOT, CONTENT_TYPE_MISMATCH
   */
  addLiteral(datatype: TDatatype, value: TContentValue): GraphNode {
    const typeName = literalNodeName(datatype);
    if (!matchesContentKind(datatype, value)) {
      throw new GraphBuildError(
        'CONTENT_TYPE_MISMATCH',
        `Literal node ${typeName} can only hold ${datatype} content, ` +
          `and ${JSON.stringify(value)} (${typeof value}) is not compatible.`,
        { nodeType: typeName, expected: datatype, actual: typeof value }
      );
    }
    const node = this.addNode(typeName);
    node.setContent(value);
    return node;
  }

  /** The graph's RootSlot node, created on first use */
  root(): GraphNode {
    if (this.rootNode === undefined) {
      this.rootNode = this.addNode(RESERVED_NODE_NAMES.ROOT_SLOT);
    }
    return this.rootNode;
  }

  /** Nodes in insertion order (index === id) */
  nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  node(id: number): GraphNode | undefined {
    return this.nodeList[id];
  }
}

/** Name of the node type holding literals of `datatype` */
export function literalNodeName(datatype: TDatatype): string {
  switch (datatype) {
    case 'INT':
    case 'FLOAT':
    case 'STRING':
    case 'BOOL':
      return LITERAL_NODE_NAMES[datatype];
    default:
      throw new GraphBuildError('NO_CONTENT_SLOT', `There is no literal node for type ${datatype}.`, {
        actual: datatype,
      });
  }
}
