/**
 * Construction errors raised while assembling a graph.
 *
 * Every failure is synchronous and thrown at the point of violation. Nothing in
 * the builder catches these; callers decide whether to abort or recover.
 */

export type TGraphErrorCode =
  | 'UNKNOWN_NODE_TYPE'
  | 'UNKNOWN_PORT'
  | 'TYPE_MISMATCH'
  | 'DUPLICATE_BINDING'
  | 'NO_MATCHING_OUTPUT'
  | 'NO_CONTENT_SLOT'
  | 'CONTENT_TYPE_MISMATCH'
  | 'NOT_AN_IMPULSE'
  | 'NOT_A_BOOLEAN'
  | 'NOT_A_LIST'
  | 'MISSING_IMPULSE_INPUT'
  | 'MISSING_IMPULSE_OUTPUT'
  | 'UNSUPPORTED_COMBINATION'
  | 'DANGLING_ELSE'
  | 'DUPLICATE_PORT_NAME'
  | 'INVALID_CATALOG'
  | 'INVALID_CONFIG'
  | 'FOREIGN_NODE'
  | 'UNBALANCED_SCOPE'
  | 'CLOSED_CHAIN';

/** Structured context attached to a construction error */
export type TErrorDetails = {
  nodeType?: string;
  nodeId?: number;
  port?: string;
  expected?: string;
  actual?: string;
  suggestions?: string[];
};

export class GraphBuildError extends Error {
  constructor(
    public readonly code: TGraphErrorCode,
    message: string,
    public readonly details: TErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GraphBuildError';
  }

  static isGraphBuildError(error: unknown, code?: TGraphErrorCode): error is GraphBuildError {
    if (!(error instanceof GraphBuildError)) return false;
    return code === undefined || error.code === code;
  }
}

/** Message of an Error, or the stringified value for anything else thrown */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
