import { GraphBuildError } from './errors.js';

/**
 * Port datatypes.
 *
 * The *_LIST datatypes are for inputs that take zero or more connections of
 * their element type. IMPULSE_LIST is used by every impulse input; the other
 * list types belong to expandable inputs such as the Plus nodes.
 */
export const DATATYPES = [
  'IMPULSE',
  'IMPULSE_LIST',
  'FLOAT',
  'INT',
  'INT_LIST',
  'STRING',
  'STRING_LIST',
  'SLOT',
  'BOOL',
] as const;

export type TDatatype = (typeof DATATYPES)[number];

/** Runtime kind a literal content value must have */
export type TContentKind = 'string' | 'integer' | 'number' | 'boolean';

/** Literal values a node can hold as content */
export type TContentValue = string | number | boolean;

export interface DatatypeInfo {
  readonly elementType?: TDatatype;
  readonly contentKind?: TContentKind;
  readonly description: string;
}

export const DATATYPE_INFO: Record<TDatatype, DatatypeInfo> = {
  IMPULSE: {
    description: 'Control flow signal',
  },
  IMPULSE_LIST: {
    elementType: 'IMPULSE',
    description: 'Any number of incoming impulses',
  },
  FLOAT: {
    contentKind: 'number',
    description: 'Floating point value',
  },
  INT: {
    contentKind: 'integer',
    description: 'Integer value',
  },
  INT_LIST: {
    elementType: 'INT',
    description: 'Ordered integer operands',
  },
  STRING: {
    contentKind: 'string',
    description: 'Text value',
  },
  STRING_LIST: {
    elementType: 'STRING',
    description: 'Ordered string operands',
  },
  SLOT: {
    description: 'Reference to a slot in the scene hierarchy',
  },
  BOOL: {
    contentKind: 'boolean',
    description: 'True or false value',
  },
} as const;

export function isDatatype(value: unknown): value is TDatatype {
  return DATATYPES.some((datatype) => datatype === value);
}

export function isList(datatype: TDatatype): boolean {
  return DATATYPE_INFO[datatype].elementType !== undefined;
}

/**
 * Gets the element datatype of a list datatype.
 * @throws GraphBuildError NOT_A_LIST for scalar datatypes
 */
export function elementType(datatype: TDatatype): TDatatype {
  const element = DATATYPE_INFO[datatype].elementType;
  if (element === undefined) {
    throw new GraphBuildError('NOT_A_LIST', `Type ${datatype} is not a list.`, {
      actual: datatype,
    });
  }
  return element;
}

/** Element type for list datatypes, the datatype itself otherwise */
export function scalarOf(datatype: TDatatype): TDatatype {
  return DATATYPE_INFO[datatype].elementType ?? datatype;
}

/** Whether a literal value has the runtime kind the datatype's content requires */
export function matchesContentKind(datatype: TDatatype, value: unknown): value is TContentValue {
  switch (DATATYPE_INFO[datatype].contentKind) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    default:
      return false;
  }
}
