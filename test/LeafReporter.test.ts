/**
 * 叶子报告器测试
 */

import { describe, it, expect } from 'vitest';
import { Vector2 } from '@galacean/engine-math';
import { LeafReporter, type LeafRecord } from '../src/LeafReporter';
import { QuadNode } from '../src/QuadNode';
import { QuadTree } from '../src/QuadTree';

const pad = (n: number): string => ' '.repeat(n);

const record = (overrides: Partial<LeafRecord> = {}): LeafRecord => ({
  index: 1,
  x: 1,
  y: 1,
  width: 1,
  height: 1,
  count: 100,
  overflow: false,
  ...overrides,
});

describe('LeafReporter', () => {
  it('formats six right-aligned columns of width 10', () => {
    const line = new LeafReporter().formatRecord(record());
    expect(line).toBe(`${pad(9)}1${pad(9)}1${pad(9)}1${pad(9)}1${pad(9)}1${pad(7)}100`);
  });

  it('formats reals with six significant digits', () => {
    const line = new LeafReporter().formatRecord(
      record({ index: 12, x: 11.234567, y: 0.875, width: 0.25, height: 0.125, count: 7 }),
    );
    expect(line).toBe(`${pad(8)}12${pad(3)}11.2346${pad(5)}0.875${pad(6)}0.25${pad(5)}0.125${pad(9)}7`);
  });

  it('rounds halfway cell centres to the even digit', () => {
    const line = new LeafReporter().formatRecord(
      record({ x: 12.03125, y: 10.40625, width: 11.71875, height: 0.03125, count: 31 }),
    );
    expect(line).toBe(`${pad(9)}1${pad(3)}12.0312${pad(3)}10.4062${pad(3)}11.7188${pad(3)}0.03125${pad(8)}31`);
  });

  it('clamps the precision', () => {
    expect(new LeafReporter({ precision: 500 }).precision).toBe(100);
    expect(new LeafReporter({ precision: 0 }).precision).toBe(1);
    expect(new LeafReporter({ precision: 500 }).formatRecord(record({ x: 1.5 }))).toBe(
      `${pad(9)}1${pad(7)}1.5${pad(9)}1${pad(9)}1${pad(9)}1${pad(7)}100`,
    );
  });

  it('honours a custom column width', () => {
    const line = new LeafReporter({ columnWidth: 4 }).formatRecord(record({ x: 2.5 }));
    expect(line).toBe(`   1 2.5   1   1   1 100`);
  });

  it('marks overflow leaves only when asked', () => {
    const overflow = record({ overflow: true, count: 150 });
    expect(new LeafReporter().formatRecord(overflow).endsWith('150')).toBe(true);
    expect(new LeafReporter({ markOverflow: true }).formatRecord(overflow).endsWith('150 *')).toBe(true);
    expect(new LeafReporter({ markOverflow: true }).formatRecord(record()).endsWith('100')).toBe(true);
  });

  it('builds records from leaves', () => {
    const leaf = QuadNode.create(4.5, 5.5, 1, 1);
    leaf.insertXY(4.2, 5.7);
    expect(LeafReporter.toRecord(leaf, 3)).toEqual({
      index: 3,
      x: 4.5,
      y: 5.5,
      width: 1,
      height: 1,
      count: 1,
      overflow: false,
    });
  });

  it('reports every leaf of a tree in traversal order', () => {
    const tree = new QuadTree({ width: 2, height: 1, supersampling: 2 });
    for (const [x, y] of [
      [0.7, 0.7],
      [1.3, 0.7],
      [0.7, 1.3],
      [1.3, 1.3],
      [1.4, 1.4],
    ]) {
      tree.insert(0, 0, new Vector2(x, y));
    }
    tree.refine();

    const written: string[] = [];
    const lines = new LeafReporter({ columnWidth: 6 }).report(tree, (line) => written.push(line));

    expect(written).toEqual(lines);
    expect(lines).toEqual([
      '     1  0.75  0.75   0.5   0.5     1',
      '     2  1.25  0.75   0.5   0.5     1',
      '     3  0.75  1.25   0.5   0.5     1',
      '     4  1.25  1.25   0.5   0.5     2',
      '     5     2     1     1     1     0',
    ]);
  });
});
