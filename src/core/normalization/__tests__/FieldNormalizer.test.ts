import { describe, it, expect, vi } from 'vitest';
import {
  displayName,
  fieldId,
  fieldToJson,
  normalizeField,
  normalizeFieldList
} from '../FieldNormalizer.js';

describe('normalizeField', () => {
  it('maps null and undefined to absent', () => {
    expect(normalizeField(null)).toEqual({ kind: 'absent' });
    expect(normalizeField(undefined)).toEqual({ kind: 'absent' });
  });

  it('maps a positive integer to an id', () => {
    expect(normalizeField(3)).toEqual({ kind: 'id', id: 3 });
  });

  it('maps a non-empty string to a label', () => {
    expect(normalizeField('open')).toEqual({ kind: 'label', label: 'open' });
  });

  it('treats blank strings as absent', () => {
    expect(normalizeField('   ')).toEqual({ kind: 'absent' });
  });

  it('keeps the original object on the brief variant', () => {
    const raw = { id: 7, name: 'Support', active: true };
    expect(normalizeField(raw)).toEqual({
      kind: 'brief',
      id: 7,
      name: 'Support',
      fields: { id: 7, name: 'Support', active: true }
    });
  });

  it('derives a brief name from user attributes', () => {
    expect(normalizeField({ id: 2, firstname: 'Ada', lastname: 'Lovelace' })).toMatchObject({
      name: 'Ada Lovelace'
    });
    expect(normalizeField({ id: 2, login: 'agent' })).toMatchObject({ name: 'agent' });
    expect(normalizeField({ id: 2, email: 'a@example.com' })).toMatchObject({ name: 'a@example.com' });
    expect(normalizeField({ id: 2 })).toMatchObject({ name: 'ID 2' });
  });

  it.each([
    ['a list', [1, 2], 'unrecognized field shape: list of 2'],
    ['a boolean', true, 'unrecognized field shape: boolean'],
    ['zero', 0, 'expected a positive integer id, got 0'],
    ['a fraction', 1.5, 'expected a positive integer id, got 1.5'],
    ['an object without id', { name: 'x' }, 'expected an object with a positive integer "id"']
  ])('treats %s as absent and warns', (_label, raw, warning) => {
    const onWarning = vi.fn();
    expect(normalizeField(raw, onWarning)).toEqual({ kind: 'absent' });
    expect(onWarning).toHaveBeenCalledWith(warning);
  });
});

describe('normalizeFieldList', () => {
  it('normalizes every element', () => {
    expect(normalizeFieldList([4, 'Bob', null])).toEqual([
      { kind: 'id', id: 4 },
      { kind: 'label', label: 'Bob' },
      { kind: 'absent' }
    ]);
  });

  it('returns an empty list for a scalar', () => {
    const onWarning = vi.fn();
    expect(normalizeFieldList('x', onWarning)).toEqual([]);
    expect(onWarning).toHaveBeenCalledWith('expected a list, got string');
  });
});

describe('field accessors', () => {
  it('renders display names per variant', () => {
    expect(displayName(normalizeField(5))).toBe('ID 5');
    expect(displayName(normalizeField('open'))).toBe('open');
    expect(displayName(normalizeField({ id: 1, name: 'Users' }))).toBe('Users');
    expect(displayName(normalizeField(null))).toBe('N/A');
  });

  it('exposes ids only where one exists', () => {
    expect(fieldId(normalizeField(5))).toBe(5);
    expect(fieldId(normalizeField({ id: 9, name: 'x' }))).toBe(9);
    expect(fieldId(normalizeField('open'))).toBeNull();
  });

  it('renders the variant that arrived as JSON', () => {
    expect(fieldToJson(normalizeField(5))).toBe(5);
    expect(fieldToJson(normalizeField('open'))).toBe('open');
    expect(fieldToJson(normalizeField({ id: 1, name: 'Users' }))).toEqual({ id: 1, name: 'Users' });
    expect(fieldToJson(normalizeField(null))).toBeNull();
  });
});
