import type { QuadNode } from './QuadNode';

/**
 * 四叉树统计信息
 */
export interface QuadTreeStats {
  /** 根节点数 */
  rootCount: number;
  /** 节点总数 */
  nodeCount: number;
  /** 叶子节点数 */
  leafCount: number;
  /** 溢出叶子数（达到深度或尺寸限制仍超过阈值） */
  overflowLeafCount: number;
  /** 树的最大深度 */
  maxDepth: number;
  /** 点总数 */
  pointCount: number;
  /** 单个叶子的最大点数 */
  maxLeafPoints: number;
  /** 内存使用估算 (字节) */
  memoryUsage: number;
}

/**
 * 细分统计
 */
export interface RefineSummary {
  /** 拆分次数 */
  splits: number;
  /** 新产生的溢出叶子数 */
  overflowLeaves: number;
  /** 细分到达的最大深度 */
  maxDepth: number;
}

/**
 * 叶子访问回调，index 为显式传递的序号
 */
export type LeafVisitor = (leaf: QuadNode, index: number) => void;

/**
 * 透镜参数
 */
export interface LensParameters {
  /** 中心 x */
  x: number;
  /** 中心 y */
  y: number;
  /** 尺度半径 */
  b: number;
  /** 轴比 (0, 1] */
  q: number;
  /** 位置角 (度) */
  pa: number;
}
