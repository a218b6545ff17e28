/**
 * 源平面四叉树测试
 */

import { describe, it, expect } from 'vitest';
import { Vector2 } from '@galacean/engine-math';
import { QuadTree } from '../src/QuadTree';
import { isQuadTreeFailure } from '../src/QuadTreeFailure';
import { TrackingAllocator } from '../src/StorageAllocator';

function scatter(tree: QuadTree, count: number): number {
  let inserted = 0;
  let state = 7;
  for (let k = 0; k < count; k++) {
    state = (state * 16807) % 2147483647;
    const u = state / 2147483647;
    state = (state * 16807) % 2147483647;
    const v = state / 2147483647;
    // 集中在第一个根节点附近
    const x = 0.5 + tree.width * u * u;
    const y = 0.5 + tree.height * v * v;
    const index = tree.rootIndexAt(x, y);
    if (index && !isQuadTreeFailure(tree.insert(index[0], index[1], new Vector2(x, y)))) inserted++;
  }
  return inserted;
}

describe('QuadTree', () => {
  it('lays out unit roots in row-major order', () => {
    const tree = new QuadTree({ width: 3, height: 2 });
    expect(tree.roots).toHaveLength(6);
    expect([tree.roots[4].x, tree.roots[4].y]).toEqual([2, 2]);
    expect(tree.getRoot(1, 1)).toBe(tree.roots[4]);
    expect(tree.roots.every((root) => root.width === 1 && root.height === 1 && root.isLeaf)).toBe(true);
  });

  it('throws for root indices outside the grid', () => {
    const tree = new QuadTree({ width: 3, height: 2 });
    expect(() => tree.getRoot(3, 0)).toThrow(RangeError);
    expect(() => tree.getRoot(0, -1)).toThrow(RangeError);
    expect(() => tree.getRoot(0.5, 0)).toThrow(RangeError);
  });

  it('finds the root covering a coordinate', () => {
    const tree = new QuadTree({ width: 3, height: 2 });
    expect(tree.rootIndexAt(0.5, 0.5)).toEqual([0, 0]);
    expect(tree.rootIndexAt(3.49, 2.49)).toEqual([2, 1]);
    expect(tree.rootIndexAt(1.5, 1.5)).toEqual([1, 1]);
    expect(tree.rootIndexAt(3.5, 1)).toBe(null);
    expect(tree.rootIndexAt(0.49, 1)).toBe(null);
    expect(tree.rootIndexAt(Number.NaN, 1)).toBe(null);
  });

  it('derives the threshold from the supersampling factor', () => {
    expect(new QuadTree({ width: 1, height: 1 }).threshold).toBe(100);
    expect(new QuadTree({ width: 1, height: 1, supersampling: 4, thresholdMultiplier: 1.5 }).threshold).toBe(24);
  });

  it('uses the supersampling factor as the buffer block size', () => {
    const tree = new QuadTree({ width: 1, height: 1, supersampling: 4 });
    tree.insert(0, 0, new Vector2(1, 1));
    expect(tree.roots[0].points?.capacity).toBe(4);
  });

  describe('after refinement', () => {
    const build = (): { tree: QuadTree; inserted: number } => {
      const tree = new QuadTree({ width: 4, height: 3, supersampling: 5 });
      const inserted = scatter(tree, 3000);
      const summary = tree.refine();
      if (isQuadTreeFailure(summary)) throw new Error(summary.reason);
      return { tree, inserted };
    };

    it('passes validation', () => {
      const { tree } = build();
      expect(tree.validate()).toEqual({ valid: true, errors: [] });
    });

    it('conserves the inserted points', () => {
      const { tree, inserted } = build();
      expect(inserted).toBe(3000);
      expect(tree.getStats().pointCount).toBe(3000);

      let total = 0;
      tree.forEachLeaf((leaf) => (total += leaf.pointCount));
      expect(total).toBe(3000);
    });

    it('keeps every leaf within the threshold', () => {
      const { tree } = build();
      const stats = tree.getStats();
      expect(stats.maxLeafPoints).toBeLessThanOrEqual(25);
      expect(stats.overflowLeafCount).toBe(0);
      expect(stats.maxDepth).toBeGreaterThan(0);
    });

    it('numbers leaves consecutively from 1', () => {
      const { tree } = build();
      const indices: number[] = [];
      const count = tree.forEachLeaf((_leaf, index) => indices.push(index));
      expect(count).toBe(tree.getStats().leafCount);
      expect(indices).toEqual(Array.from({ length: count }, (_, i) => i + 1));
    });

    it('visits roots in row-major order', () => {
      const { tree } = build();
      const last = tree.roots[tree.roots.length - 1];
      let lastLeafRoot = { x: 0, y: 0 };
      tree.forEachLeaf((leaf) => (lastLeafRoot = { x: Math.round(leaf.x), y: Math.round(leaf.y) }));
      expect(lastLeafRoot).toEqual({ x: last.x, y: last.y });
    });

    it('counts nodes and leaves consistently', () => {
      const { tree } = build();
      const stats = tree.getStats();
      // 每次拆分把一个叶子变成四个
      expect((stats.nodeCount - stats.rootCount) % 4).toBe(0);
      expect(stats.leafCount).toBe(stats.rootCount + (3 * (stats.nodeCount - stats.rootCount)) / 4);
    });
  });

  it('reports leaves above the threshold before refinement', () => {
    const tree = new QuadTree({ width: 1, height: 1, supersampling: 4, thresholdMultiplier: 1.5 });
    for (let i = 0; i < 30; i++) tree.insert(0, 0, new Vector2(0.5 + i / 30, 1));

    const { valid, errors } = tree.validate();
    expect(valid).toBe(false);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith('叶子点数 30 超过阈值 24')).toBe(true);
  });

  it('accepts overflow leaves produced by the depth guard', () => {
    const tree = new QuadTree({ width: 1, height: 1, supersampling: 2, maxDepth: 3 });
    for (let i = 0; i < 10; i++) tree.insert(0, 0, new Vector2(1.25, 1.25));

    const summary = tree.refine();
    expect(summary).toEqual({ splits: 3, overflowLeaves: 1, maxDepth: 3 });
    expect(tree.validate().valid).toBe(true);
    expect(tree.getStats().overflowLeafCount).toBe(1);
  });

  it('releases all storage on teardown', () => {
    const allocator = new TrackingAllocator();
    const tree = new QuadTree({ width: 4, height: 3, supersampling: 5, allocator });
    scatter(tree, 3000);
    tree.refine();
    expect(allocator.liveBytesOf('children')).toBeGreaterThan(0);

    tree.release();
    expect(allocator.liveBytes).toBe(0);
    expect(allocator.liveBytesOf('points')).toBe(0);
    expect(allocator.liveBytesOf('children')).toBe(0);
    expect(tree.getStats().nodeCount).toBe(0);
  });
});
