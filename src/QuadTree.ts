import type { Vector2 } from '@galacean/engine-math';
import { MathUtil } from '@galacean/engine-math';
import { QuadNodeKind } from './enums';
import { QuadNode } from './QuadNode';
import { QuadRefiner } from './QuadRefiner';
import { isQuadTreeFailure, type QuadTreeFailure } from './QuadTreeFailure';
import { NODE_BYTES, POINT_BYTES, defaultAllocator, type StorageAllocator } from './StorageAllocator';
import type { LeafVisitor, QuadTreeStats, RefineSummary } from './types';

/**
 * 四叉树配置选项
 */
export interface QuadTreeOptions {
  /** 根网格宽度（单元数） */
  width: number;
  /** 根网格高度（单元数） */
  height: number;
  /** 每个单元每个轴的超采样数 N，同时作为点缓冲区扩容块大小 (默认: 10) */
  supersampling?: number;
  /** 阈值倍数，阈值 = 倍数 × N² (默认: 1.0) */
  thresholdMultiplier?: number;
  /** 最大深度 (默认: 32) */
  maxDepth?: number;
  /** 最小单元尺寸 (默认: 0，不限制) */
  minCellSize?: number;
  /** 存储分配器 */
  allocator?: StorageAllocator;
}

/**
 * 源平面四叉树
 *
 * 由 width × height 个单位根节点组成，根节点 (i, j) 的中心位于 (i + 1, j + 1)，
 * 覆盖 [i + 0.5, i + 1.5) × [j + 0.5, j + 1.5)
 */
export class QuadTree {
  /** 根网格宽度 */
  public readonly width: number;
  /** 根网格高度 */
  public readonly height: number;
  /** 超采样数 N */
  public readonly supersampling: number;
  /** 阈值倍数 */
  public readonly thresholdMultiplier: number;
  /** 最大深度 */
  public readonly maxDepth: number;
  /** 最小单元尺寸 */
  public readonly minCellSize: number;
  /** 根节点，行优先排列 */
  public readonly roots: QuadNode[];

  /**
   * 创建四叉树
   */
  constructor(options: QuadTreeOptions) {
    this.width = Math.max(1, Math.floor(options.width));
    this.height = Math.max(1, Math.floor(options.height));
    this.supersampling = Math.max(1, Math.floor(options.supersampling ?? 10));
    this.thresholdMultiplier = Math.max(0, options.thresholdMultiplier ?? 1.0);
    this.maxDepth = Math.max(0, options.maxDepth ?? QuadRefiner.DEFAULT_MAX_DEPTH);
    this.minCellSize = Math.max(0, options.minCellSize ?? 0);

    const allocator = options.allocator ?? defaultAllocator;
    this.roots = [];
    for (let n = 0; n < this.width * this.height; n++) {
      this.roots.push(
        QuadNode.create((n % this.width) + 1, Math.floor(n / this.width) + 1, 1, 1, {
          blockSize: this.supersampling,
          allocator,
        }),
      );
    }
  }

  /**
   * 拆分阈值 = 倍数 × N²
   */
  get threshold(): number {
    return this.thresholdMultiplier * this.supersampling * this.supersampling;
  }

  /**
   * 获取根节点 (i, j)
   */
  getRoot(i: number, j: number): QuadNode {
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || i >= this.width || j < 0 || j >= this.height) {
      throw new RangeError(`QuadTree: 根节点索引 (${i}, ${j}) 超出 ${this.width} × ${this.height}`);
    }
    return this.roots[j * this.width + i];
  }

  /**
   * 获取覆盖指定坐标的根节点索引，超出范围返回 null
   */
  rootIndexAt(x: number, y: number): [number, number] | null {
    if (!(x >= 0.5 && x < this.width + 0.5 && y >= 0.5 && y < this.height + 0.5)) {
      return null;
    }
    return [Math.floor(x - 0.5), Math.floor(y - 0.5)];
  }

  /**
   * 向根节点 (i, j) 插入点
   */
  insert(i: number, j: number, point: Vector2): number | QuadTreeFailure {
    return this.getRoot(i, j).insert(point);
  }

  /**
   * 细分所有根节点
   *
   * 遇到失败立即返回，已完成的根节点保持细分状态
   */
  refine(): RefineSummary | QuadTreeFailure {
    const total: RefineSummary = { splits: 0, overflowLeaves: 0, maxDepth: 0 };
    const options = {
      threshold: this.threshold,
      maxDepth: this.maxDepth,
      minCellSize: this.minCellSize,
    };

    for (const root of this.roots) {
      const summary = QuadRefiner.refine(root, options);
      if (isQuadTreeFailure(summary)) return summary;
      total.splits += summary.splits;
      total.overflowLeaves += summary.overflowLeaves;
      total.maxDepth = Math.max(total.maxDepth, summary.maxDepth);
    }

    return total;
  }

  /**
   * 按行优先的根节点顺序遍历所有叶子，序号从 1 开始
   * @returns 访问的叶子数
   */
  forEachLeaf(visit: LeafVisitor): number {
    let index = 1;
    for (const root of this.roots) {
      index = root.traverseLeaves(visit, index);
    }
    return index - 1;
  }

  /**
   * 释放所有根节点持有的存储
   */
  release(): void {
    for (const root of this.roots) root.release();
  }

  /**
   * 获取树的统计信息
   */
  getStats(): QuadTreeStats {
    const stats: QuadTreeStats = {
      rootCount: this.roots.length,
      nodeCount: 0,
      leafCount: 0,
      overflowLeafCount: 0,
      maxDepth: 0,
      pointCount: 0,
      maxLeafPoints: 0,
      memoryUsage: 0,
    };

    const traverse = (node: QuadNode): void => {
      if (node.kind === QuadNodeKind.Released) return;

      stats.nodeCount++;
      stats.maxDepth = Math.max(stats.maxDepth, node.depth);

      if (node.isLeaf) {
        stats.leafCount++;
        stats.pointCount += node.pointCount;
        stats.maxLeafPoints = Math.max(stats.maxLeafPoints, node.pointCount);
        if (node.overflow) stats.overflowLeafCount++;
        stats.memoryUsage += (node.points?.capacity ?? 0) * POINT_BYTES;
      }

      if (node.children) {
        for (const child of node.children) traverse(child);
      }
    };

    for (const root of this.roots) traverse(root);

    stats.memoryUsage += stats.nodeCount * NODE_BYTES;

    return stats;
  }

  /**
   * 验证树的状态是否健康
   *
   * 检查节点类型互斥、子节点平铺父节点、叶子点数不超过阈值（溢出叶子除外）
   * @returns 验证结果，包含是否有效和错误信息
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const threshold = this.threshold;

    const validateNode = (node: QuadNode, depth: number): void => {
      if (node.depth !== depth) {
        errors.push(`节点深度不一致: 期望 ${depth}, 实际 ${node.depth} (${node})`);
      }

      if (node.kind === QuadNodeKind.Leaf) {
        if (node.children) errors.push(`叶子节点不应该有子节点 (${node})`);
        if (!node.points) errors.push(`叶子节点缺少点缓冲区 (${node})`);
        if (!node.overflow && node.pointCount > threshold) {
          errors.push(`叶子点数 ${node.pointCount} 超过阈值 ${threshold} (${node})`);
        }
        return;
      }

      if (node.kind === QuadNodeKind.Released) {
        errors.push(`节点已释放 (${node})`);
        return;
      }

      if (node.points) errors.push(`内部节点不应该持有点缓冲区 (${node})`);
      if (!node.children) {
        errors.push(`内部节点缺少子节点 (${node})`);
        return;
      }

      node.children.forEach((child, k) => {
        const sx = k & 1 ? 1 : -1;
        const sy = k & 2 ? 1 : -1;
        if (
          !MathUtil.equals(child.x, node.x + sx * 0.25 * node.width) ||
          !MathUtil.equals(child.y, node.y + sy * 0.25 * node.height) ||
          !MathUtil.equals(child.width, 0.5 * node.width) ||
          !MathUtil.equals(child.height, 0.5 * node.height)
        ) {
          errors.push(`子节点 ${k} 未平铺父节点 (${child})`);
        }
        validateNode(child, depth + 1);
      });
    };

    for (const root of this.roots) validateNode(root, 0);

    return { valid: errors.length === 0, errors };
  }
}
