import { describe, it, expect } from 'vitest';
import { computeOutline, computePosition, countHeadingChildren, headingWorkItemId, isHeadingPartId } from './calculator.ts';

const parts = [{ id: 'doc/workitem_A-1' }, { id: 'doc/workitem_A-2' }, { id: 'doc/workitem_A-3' }];

describe('computePosition', () => {
  it('appends to an empty document', () => {
    expect(computePosition([], null)).toBe(1);
  });

  it('appends when no previous part is given', () => {
    expect(computePosition(parts)).toBe(4);
  });

  it('goes directly after the previous part', () => {
    expect(computePosition(parts, 'doc/workitem_A-1')).toBe(2);
    expect(computePosition(parts, 'doc/workitem_A-3')).toBe(4);
  });

  it('appends when the previous part is unknown', () => {
    expect(computePosition(parts, 'doc/workitem_missing')).toBe(4);
  });
});

describe('computeOutline', () => {
  it.each([
    [1, 'FC-1.1-1'],
    [10, 'FC-1.1-10'],
    [11, 'FC-1.2-1'],
    [13, 'FC-1.2-3'],
    [100, 'FC-1.10-10'],
    [101, 'FC-2.1-1'],
  ])('numbers a requirement at position %i as %s', (position, expected) => {
    expect(computeOutline({ position, workItemType: 'requirement' })).toBe(expected);
  });

  it.each([
    [1, '1.1'],
    [10, '1.10'],
    [11, '2.1'],
    [13, '2.3'],
  ])('numbers a heading at position %i as %s', (position, expected) => {
    expect(computeOutline({ position, workItemType: 'heading' })).toBe(expected);
  });

  it('nests under a parent outline that already has a suffix', () => {
    expect(computeOutline({ position: 4, workItemType: 'requirement', parentOutline: 'FC-1.1-1' })).toBe('FC-1.1-1.4');
  });

  it('starts a suffix under a plain parent outline', () => {
    expect(computeOutline({ position: 4, workItemType: 'requirement', parentOutline: '2.3' })).toBe('2.3-4');
  });

  it('numbers items after a heading relative to it', () => {
    expect(computeOutline({ position: 2, workItemType: 'requirement', headingOutline: '4.1', headingChildCount: 0 })).toBe('4.1-1');
    expect(computeOutline({ position: 2, workItemType: 'requirement', headingOutline: '4.1', headingChildCount: 1 })).toBe('4.1-2');
  });

  it('prefers the heading over the parent outline', () => {
    expect(
      computeOutline({
        position: 7,
        workItemType: 'requirement',
        parentOutline: 'FC-1.1-1',
        headingOutline: '4.1',
        headingChildCount: 2,
      }),
    ).toBe('4.1-3');
  });

  it('is deterministic', () => {
    const input = { position: 42, workItemType: 'requirement' };
    expect(computeOutline(input)).toBe(computeOutline(input));
  });

  it('rejects positions below 1', () => {
    expect(() => computeOutline({ position: 0, workItemType: 'requirement' })).toThrow(RangeError);
    expect(() => computeOutline({ position: 1.5, workItemType: 'heading' })).toThrow(RangeError);
  });
});

describe('heading part ids', () => {
  it('detects heading-tagged parts', () => {
    expect(isHeadingPartId('Python/_default/Template/heading_PYTH-9397')).toBe(true);
    expect(isHeadingPartId('Python/_default/Template/workitem_FCTS-9001')).toBe(false);
  });

  it('resolves the heading work item within the project', () => {
    expect(headingWorkItemId('Python/_default/Template/heading_PYTH-9397', 'Python')).toBe('Python/PYTH-9397');
    expect(headingWorkItemId('heading_PYTH-9397', 'Python')).toBe('Python/PYTH-9397');
  });

  it('returns null for parts that are not headings', () => {
    expect(headingWorkItemId('Python/_default/Template/workitem_FCTS-9001', 'Python')).toBeNull();
    expect(headingWorkItemId('doc/heading_', 'Python')).toBeNull();
  });

  it('counts only outlines directly under the heading', () => {
    expect(countHeadingChildren(['4.1-1', '4.1-2', '4.10-1', '4.1', null], '4.1')).toBe(2);
  });
});
