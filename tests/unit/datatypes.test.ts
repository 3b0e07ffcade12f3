import { describe, it, expect } from 'vitest';
import {
  DATATYPES,
  elementType,
  isDatatype,
  isList,
  matchesContentKind,
  scalarOf,
} from '../../src/datatypes.js';
import { expectGraphError } from '../helpers/graph-helpers.js';

describe('Type lattice', () => {
  describe('isList', () => {
    it('is true exactly for the list datatypes', () => {
      expect(DATATYPES.filter(isList)).toEqual(['IMPULSE_LIST', 'INT_LIST', 'STRING_LIST']);
    });
  });

  describe('elementType', () => {
    it('maps each list to its element type', () => {
      expect(elementType('IMPULSE_LIST')).toBe('IMPULSE');
      expect(elementType('INT_LIST')).toBe('INT');
      expect(elementType('STRING_LIST')).toBe('STRING');
    });

    it('fails with NOT_A_LIST for scalar types', () => {
      const error = expectGraphError(() => elementType('SLOT'), 'NOT_A_LIST');
      expect(error.message).toBe('Type SLOT is not a list.');
    });
  });

  describe('scalarOf', () => {
    it('returns the element type for lists and the type itself otherwise', () => {
      expect(scalarOf('INT_LIST')).toBe('INT');
      expect(scalarOf('BOOL')).toBe('BOOL');
    });
  });

  describe('isDatatype', () => {
    it('accepts known names and rejects everything else', () => {
      expect(isDatatype('FLOAT')).toBe(true);
      expect(isDatatype('float')).toBe(false);
      expect(isDatatype('NUMBER')).toBe(false);
      expect(isDatatype(3)).toBe(false);
    });
  });

  describe('matchesContentKind', () => {
    it('requires integers for INT', () => {
      expect(matchesContentKind('INT', 4)).toBe(true);
      expect(matchesContentKind('INT', 4.5)).toBe(false);
      expect(matchesContentKind('INT', '4')).toBe(false);
    });

    it('accepts any finite number for FLOAT', () => {
      expect(matchesContentKind('FLOAT', 4)).toBe(true);
      expect(matchesContentKind('FLOAT', 0.25)).toBe(true);
      expect(matchesContentKind('FLOAT', Number.NaN)).toBe(false);
    });

    it('checks strings and booleans', () => {
      expect(matchesContentKind('STRING', '')).toBe(true);
      expect(matchesContentKind('STRING', 1)).toBe(false);
      expect(matchesContentKind('BOOL', false)).toBe(true);
      expect(matchesContentKind('BOOL', 0)).toBe(false);
    });

    it('accepts nothing for types without literal content', () => {
      expect(matchesContentKind('SLOT', 'root')).toBe(false);
      expect(matchesContentKind('IMPULSE', true)).toBe(false);
      expect(matchesContentKind('INT_LIST', 1)).toBe(false);
    });
  });
});
