import type { GraphNode } from '../graph/node.js';

export type TLintWarning = {
  /** Name of the pass that produced the warning */
  pass: string;
  code: string;
  message: string;
  /** Id of the offending node */
  node?: number;
};

/**
 * A stateless check over a finished graph. Passes read nodes and report
 * warnings; they never mutate the graph.
 */
export type TLintPass = {
  name: string;
  description: string;
  run(nodes: readonly GraphNode[]): TLintWarning[];
};
