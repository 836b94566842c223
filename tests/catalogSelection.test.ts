import { describe, expect, test } from '@jest/globals';
import {
  requireItemById,
  requireUniqueItem,
  resolveDesignReference,
  resolveSelection,
} from '../src/lib/costing';

const items = [
  { id: 'A', name: 'First' },
  { id: 'B', name: 'Second' },
  { id: 'C', name: 'Third' },
];

describe('resolveSelection', () => {
  test('no selector picks the first item', () => {
    expect(resolveSelection(items, undefined, 'Tapes', 'Perimeter tape').item?.id).toBe('A');
  });

  test('an id selects the exact item', () => {
    expect(resolveSelection(items, { id: 'B' }, 'Tapes', 'Perimeter tape').item?.id).toBe('B');
  });

  test('an index is clamped to the list bounds', () => {
    expect(resolveSelection(items, { index: 1 }, 'Tapes', 'Perimeter tape').item?.id).toBe('B');
    expect(resolveSelection(items, { index: 99 }, 'Tapes', 'Perimeter tape').item?.id).toBe('C');
    expect(resolveSelection(items, { index: -4 }, 'Tapes', 'Perimeter tape').item?.id).toBe('A');
  });

  test('an unknown id is reported, never replaced', () => {
    const resolved = resolveSelection(items, { id: 'Z' }, 'Tapes', 'Perimeter tape');
    expect(resolved.item).toBeUndefined();
    expect(resolved.issue).toEqual({
      code: 'SELECTION_NOT_FOUND',
      category: 'Tapes',
      role: 'Perimeter tape',
      message: 'Selected item "Z" for Perimeter tape is not in the catalog',
    });
  });

  test('an empty list is an EMPTY_CATEGORY issue', () => {
    const resolved = resolveSelection([], { index: 0 }, 'Tapes', 'Other tape');
    expect(resolved.issue?.code).toBe('EMPTY_CATEGORY');
  });
});

describe('resolveDesignReference', () => {
  test('finds a linked id', () => {
    expect(resolveDesignReference(items, 'C', 'Silver', 'Negative bar silver').item?.id).toBe('C');
  });

  test('null and unknown ids are DESIGN_REFERENCE_NOT_FOUND', () => {
    expect(resolveDesignReference(items, null, 'Silver', 'Negative bar silver').issue?.message).toBe(
      'Design has no silver linked for Negative bar silver'
    );
    expect(resolveDesignReference(items, 'Q', 'Silver', 'Negative bar silver').issue?.code).toBe(
      'DESIGN_REFERENCE_NOT_FOUND'
    );
  });
});

describe('required roles', () => {
  test('requireItemById reports a missing id as MISSING_ROLE', () => {
    const resolved = requireItemById(items, 'Weld_Head_Ag', 'Weld heads');
    expect(resolved.issue?.code).toBe('MISSING_ROLE');
    expect(resolved.issue?.role).toBe('Weld_Head_Ag');
  });

  test('requireUniqueItem needs exactly one match', () => {
    expect(requireUniqueItem(items, (item) => item.id === 'A', 'Packaging', 'x').item?.name).toBe('First');
    expect(requireUniqueItem(items, () => false, 'Packaging', 'x').issue?.code).toBe('MISSING_ROLE');
    expect(requireUniqueItem(items, (item) => item.id !== 'A', 'Packaging', 'x').issue?.code).toBe('DUPLICATE_ROLE');
  });
});
