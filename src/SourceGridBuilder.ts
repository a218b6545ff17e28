import {
  resolveSourceGridConfig,
  validateSourceGridConfig,
  type SourceGridConfig,
  type SourceGridConfigInput,
} from './config';
import { GridSampler, type SampleSummary } from './GridSampler';
import { QuadTree } from './QuadTree';
import { isQuadTreeFailure, type QuadTreeFailure } from './QuadTreeFailure';
import { SIELens } from './SIELens';
import { TrackingAllocator } from './StorageAllocator';
import type { RefineSummary } from './types';

/**
 * 构建结果
 */
export interface SourceGrid {
  /** 完整配置 */
  config: SourceGridConfig;
  /** 细分后的四叉树 */
  tree: QuadTree;
  /** 透镜 */
  lens: SIELens;
  /** 存储记账 */
  allocator: TrackingAllocator;
  /** 采样统计 */
  sample: SampleSummary;
  /** 细分统计 */
  refine: RefineSummary;
}

/**
 * 构建失败，tree 为失败时的部分结果（配置无效时不存在）
 */
export interface SourceGridFailure extends QuadTreeFailure {
  readonly tree?: QuadTree;
}

/**
 * 源平面网格构建器
 *
 * 采样 → 偏折 → 插入根节点 → 细分，失败时返回部分结果交由调用方决定
 */
export class SourceGridBuilder {
  /**
   * 按配置构建源平面四叉树
   * @param input - 运行配置，缺省字段使用默认值
   */
  static build(input: SourceGridConfigInput = {}): SourceGrid | SourceGridFailure {
    const config = resolveSourceGridConfig(input);
    const { valid, errors } = validateSourceGridConfig(config);
    if (!valid) {
      return { reason: 'INVALID_CONFIG', details: errors.join('; ') };
    }

    const allocator = new TrackingAllocator(config.memoryLimit);
    const tree = new QuadTree({
      width: config.width,
      height: config.height,
      supersampling: config.supersampling,
      thresholdMultiplier: config.thresholdMultiplier,
      maxDepth: config.maxDepth,
      minCellSize: config.minCellSize,
      allocator,
    });
    const lens = new SIELens(config.lens);

    const sample = GridSampler.sample(tree, lens);
    if (isQuadTreeFailure(sample)) return { ...sample, tree };

    const refine = tree.refine();
    if (isQuadTreeFailure(refine)) return { ...refine, tree };

    if (refine.overflowLeaves > 0) {
      console.warn(
        `SourceGridBuilder: ${refine.overflowLeaves} 个叶子达到深度或尺寸限制，点数仍超过阈值 ${tree.threshold}`,
      );
    }

    return { config, tree, lens, allocator, sample, refine };
  }
}
