/**
 * # Reserved node and port names
 *
 * The builder itself only knows a handful of node types by name: the root slot
 * handed out by `Graph.root()`, the `If` node created by the branch builder,
 * and the literal and combinator nodes used by composition. Everything else
 * is looked up in the registry by the caller.
 *
 * ```
 * Pulse ──*──▶ If ──true──▶ ...
 *              ▲  └─false─▶ ...
 * BoolInput ─*─┘ (condition)
 * ```
 */

export const RESERVED_NODE_NAMES = {
  ROOT_SLOT: 'RootSlot',
  IF: 'If',
} as const;

export const RESERVED_PORT_NAMES = {
  /** Name of the single output on literal and arithmetic nodes */
  ONLY_OUTPUT: '*',
  IF_CONDITION: 'condition',
  IF_TRUE: 'true',
  IF_FALSE: 'false',
} as const;

/** Literal holder node per content datatype */
export const LITERAL_NODE_NAMES = {
  INT: 'IntInput',
  FLOAT: 'FloatInput',
  STRING: 'StringInput',
  BOOL: 'BoolInput',
} as const;

/** Combinator nodes selected by composition */
export const COMBINATOR_NODE_NAMES = {
  INCREMENT_INT: 'PlusOne<Int>',
  ACCUMULATE_INT: 'Plus<Int>',
  CONCAT_STRING: 'Plus<String>',
} as const;

export const COMBINATOR_PORT_NAMES = {
  INCREMENT_VALUE: 'value',
  ACCUMULATE_VALUES: 'values',
} as const;

/** Prefix shared by every dynamic variable writer node */
export const DYN_VAR_WRITER_PREFIX = 'WriteDynVar';

/** Separator between a dynamic variable space and the variable name */
export const DYN_VAR_SPACE_SEPARATOR = '/';
