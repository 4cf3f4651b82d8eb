import { describe, it, expect } from 'vitest';
import {
  checkSavedObject,
  isExportMetadata,
  isFindResponse,
  objectKey,
  recordTitle,
} from './saved-objects';

describe('saved object types', () => {
  describe('checkSavedObject', () => {
    it('should normalize a valid object and drop extra fields', () => {
      const result = checkSavedObject({
        id: 'web-logs',
        type: 'dashboard',
        attributes: { title: 'Web logs' },
        references: [
          { type: 'visualization', id: 'v1', name: 'panel_0' },
          { type: 'search', id: 's1' },
        ],
        version: 'WzEsMV0=',
        updated_at: '2025-01-01T00:00:00.000Z',
      });

      expect(result._unsafeUnwrap()).toEqual({
        id: 'web-logs',
        type: 'dashboard',
        attributes: { title: 'Web logs' },
        references: [
          { type: 'visualization', id: 'v1', name: 'panel_0' },
          { type: 'search', id: 's1', name: '' },
        ],
      });
    });

    it('should default missing references to an empty list', () => {
      const result = checkSavedObject({ id: 'a', type: 'search', attributes: {} });
      expect(result._unsafeUnwrap().references).toEqual([]);
    });

    it.each([
      ['dashboard', 'string value', 'not a JSON object'],
      [{ type: 'dashboard', attributes: {} }, 'missing id', 'missing string field "id"'],
      [{ id: 'a', type: '', attributes: {} }, 'empty type', 'missing string field "type"'],
      [{ id: 'a', type: 'dashboard' }, 'no attributes', 'missing object field "attributes"'],
      [
        { id: 'a', type: 'dashboard', attributes: {}, references: {} },
        'object references',
        'field "references" must be an array',
      ],
      [
        { id: 'a', type: 'dashboard', attributes: {}, references: [{ type: 'search' }] },
        'reference without id',
        'references[0] needs a non-empty type and id',
      ],
    ])('should reject %j (%s)', (value, _label, reason) => {
      expect(checkSavedObject(value)._unsafeUnwrapErr()).toBe(reason);
    });
  });

  describe('isExportMetadata', () => {
    it('should recognise both metadata shapes', () => {
      expect(isExportMetadata({ exportedCount: 3, missingRefCount: 0 })).toBe(true);
      expect(isExportMetadata({ _index_pattern_map: {} })).toBe(true);
      expect(isExportMetadata({ id: 'a', type: 'dashboard', attributes: {} })).toBe(false);
    });
  });

  describe('isFindResponse', () => {
    it('should require saved_objects and total', () => {
      expect(isFindResponse({ saved_objects: [], total: 0 })).toBe(true);
      expect(isFindResponse({ saved_objects: [] })).toBe(false);
    });
  });

  it('recordTitle should fall back to the id', () => {
    const base = { id: 'a', type: 'search', references: [] };
    expect(recordTitle({ ...base, attributes: { title: 'Errors' } })).toBe('Errors');
    expect(recordTitle({ ...base, attributes: { title: '' } })).toBe('a');
    expect(recordTitle({ ...base, attributes: {} })).toBe('a');
  });

  it('objectKey should join type and id', () => {
    expect(objectKey('index-pattern', 'logs-*')).toBe('index-pattern:logs-*');
  });
});
