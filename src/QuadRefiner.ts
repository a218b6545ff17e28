import { Vector2 } from '@galacean/engine-math';
import { QuadNodeKind } from './enums';
import type { QuadChildren, QuadNode } from './QuadNode';
import { isQuadTreeFailure, type QuadTreeFailure } from './QuadTreeFailure';
import type { RefineSummary } from './types';

/**
 * 细分选项
 */
export interface RefineOptions {
  /** 点数阈值，超过则拆分 */
  threshold: number;
  /** 最大深度 (默认: 32) */
  maxDepth?: number;
  /** 最小单元尺寸，子节点宽或高小于该值时不再拆分 (默认: 0) */
  minCellSize?: number;
}

/**
 * 四叉树细分器
 *
 * 递归拆分点数超过阈值的叶子节点，把点重新分配到 4 个子节点
 */
export class QuadRefiner {
  /** 默认最大深度 */
  static readonly DEFAULT_MAX_DEPTH = 32;

  /** 复用的临时点 */
  private static readonly _tempPoint = new Vector2();

  /**
   * 递归细分节点
   *
   * 拆分失败时节点保持为完整的叶子；子树中的失败会向上传递，
   * 已完成的拆分保留，点数守恒
   */
  static refine(node: QuadNode, options: RefineOptions): RefineSummary | QuadTreeFailure {
    const summary: RefineSummary = { splits: 0, overflowLeaves: 0, maxDepth: node.depth };
    const failure = this.refineRecursive(node, options, summary);
    return failure ?? summary;
  }

  /**
   * 拆分单个叶子节点：创建子节点、按象限分配点、转换为内部节点
   *
   * 任何分配失败都会回滚，节点保持不变
   */
  static split(node: QuadNode): QuadChildren | QuadTreeFailure {
    const points = node.points;
    if (node.kind !== QuadNodeKind.Leaf || points === null) {
      return { reason: node.kind === QuadNodeKind.Released ? 'RELEASED' : 'NOT_A_LEAF' };
    }

    const children = node.createChildren();
    if (isQuadTreeFailure(children)) return children;

    let failure: QuadTreeFailure | null = null;
    for (let k = 0; k < points.count && failure === null; k++) {
      const p = points.getPoint(k, QuadRefiner._tempPoint);
      const result = children[node.getQuadrant(p.x, p.y)].insertXY(p.x, p.y);
      if (isQuadTreeFailure(result)) failure = result;
    }

    if (failure) {
      node.discardChildren(children);
      return failure;
    }

    node.resetAsInternal(children);
    return children;
  }

  private static refineRecursive(
    node: QuadNode,
    options: RefineOptions,
    summary: RefineSummary,
  ): QuadTreeFailure | null {
    if (node.kind !== QuadNodeKind.Leaf || node.pointCount <= options.threshold) {
      return null;
    }

    const maxDepth = options.maxDepth ?? this.DEFAULT_MAX_DEPTH;
    const minCellSize = options.minCellSize ?? 0;
    if (
      node.depth >= maxDepth ||
      0.5 * Math.min(node.width, node.height) < minCellSize
    ) {
      if (!node.overflow) {
        node.overflow = true;
        summary.overflowLeaves++;
      }
      return null;
    }

    const children = this.split(node);
    if (isQuadTreeFailure(children)) return children;

    summary.splits++;
    summary.maxDepth = Math.max(summary.maxDepth, node.depth + 1);

    for (const child of children) {
      const failure = this.refineRecursive(child, options, summary);
      if (failure) return failure;
    }

    return null;
  }
}
